/**
 * Simulation Engine
 *
 * Sole owner of the game state. Each tick drains the command queue, advances
 * the clock, runs one daily pass per day boundary crossed and commits a
 * frozen snapshot. Readers never see anything but committed snapshots.
 */

import {
  ENGINE_STATE_FORMAT,
  type ActivityRecord,
  type Cents,
  type ClockRatio,
  type Command,
  type CommandFailure,
  type CommandResult,
  type DifficultyName,
  type DifficultyPreset,
  type EngineState,
  type GameTime,
  type LotId,
  type OrderId,
  type RetailerName,
} from '../types.js';
import {
  ACTIVITY_LOG_CAPACITY,
  DEFAULT_CLOCK_RATIO,
  DIFFICULTY_PRESETS,
  GENERATOR_DEFAULTS,
  MARKET_DEFAULTS,
  REPUTATION_DEFAULTS,
  type GeneratorConfig,
  type MarketConfig,
  type ReputationConfig,
} from '../config.js';
import { InvariantViolation, SaveFormatError, failure, invariant } from '../errors.js';
import { formatCents, formatFace, sumBy } from '../utils/money.js';
import {
  AchievementTracker,
  emptyAchievements,
  type HoldingsFacts,
  type Unlock,
} from './achievements.js';
import { ActivityLog } from './activity-log.js';
import { Analytics, emptyAnalytics } from './analytics.js';
import { RETAILERS } from './catalog.js';
import { Clock } from './clock.js';
import { Inventory } from './inventory.js';
import { Market } from './market.js';
import { OrderBook } from './order-book.js';
import { OrderGenerator } from './orders.js';
import { Reputation } from './reputation.js';
import { SeededRNG, deriveSeed } from './rng.js';
import { seasonForDay } from './seasons.js';
import { buildSnapshot, type ReadonlySnapshot } from './snapshot.js';
import { Wallet } from './wallet.js';

// =============================================================================
// OPTIONS & INTERNAL STATE
// =============================================================================

export interface EngineOptions {
  seed: number;
  difficulty?: DifficultyName;
  clockRatio?: ClockRatio;
  activityCapacity?: number;
  /** Records included in each snapshot */
  snapshotActivity?: number;
  market?: MarketConfig;
  reputation?: ReputationConfig;
  generator?: GeneratorConfig;
}

export type TuningOptions = Omit<EngineOptions, 'seed' | 'difficulty'>;

export type SnapshotListener = (snapshot: ReadonlySnapshot) => void;

interface QueuedCommand {
  command: Command;
  resolve: (result: CommandResult) => void;
  reject: (error: unknown) => void;
}

/** Everything one game owns. Replaced wholesale on restore. */
interface World {
  seed: number;
  preset: DifficultyPreset;
  clock: Clock;
  market: Market;
  inventory: Inventory;
  orderBook: OrderBook;
  reputation: Reputation;
  wallet: Wallet;
  analytics: Analytics;
  achievements: AchievementTracker;
  log: ActivityLog;
  generator: OrderGenerator;
  orderRng: SeededRNG;
  lotRng: SeededRNG;
  nextOrderId: number;
  version: number;
}

const ORDER_STREAM = 1;
const LOT_STREAM = 2;
const FIRST_ORDER_ID = 1000;
const DEFAULT_SNAPSHOT_ACTIVITY = 20;

// =============================================================================
// ENGINE
// =============================================================================

export class SimulationEngine {
  private world: World;
  private committed: ReadonlySnapshot;
  private queue: QueuedCommand[] = [];
  private inDailyPass = false;
  private readonly listeners = new Set<SnapshotListener>();
  private readonly tuning: TuningOptions;

  constructor(options: EngineOptions) {
    const { seed, difficulty = 'normal', ...tuning } = options;
    this.tuning = tuning;
    this.world = this.createWorld(seed, DIFFICULTY_PRESETS[difficulty]);
    this.openForBusiness();
    this.committed = this.buildCommitted();
  }

  /** Rebuild an engine from exported state. */
  static fromState(state: EngineState, tuning: TuningOptions = {}): SimulationEngine {
    const engine = new SimulationEngine({ ...tuning, seed: state.seed, difficulty: state.difficulty });
    engine.restore(state);
    return engine;
  }

  // ---------------------------------------------------------------------------
  // Reading
  // ---------------------------------------------------------------------------

  /** Latest committed snapshot. */
  snapshot(): ReadonlySnapshot {
    return this.committed;
  }

  activityTail(limit?: number): ActivityRecord[] {
    return this.world.log.tail(limit);
  }

  pendingCommands(): number {
    return this.queue.length;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Driving
  // ---------------------------------------------------------------------------

  /**
   * One host-loop step. Queued commands run first against the last committed
   * state, then time advances and day boundaries are processed in order.
   */
  tick(elapsedMs: number): ReadonlySnapshot {
    this.assertIdle('tick');

    const drained = this.queue;
    this.queue = [];
    const settled: Array<{ entry: QueuedCommand; result: CommandResult }> = [];

    try {
      for (const entry of drained) {
        settled.push({ entry, result: this.apply(entry.command) });
      }

      const crossings = this.world.clock.advance(elapsedMs);
      for (const day of crossings) {
        this.runDailyPass(day);
      }
    } catch (error) {
      for (const entry of drained) entry.reject(error);
      throw error;
    }

    const snapshot = this.publish();
    for (const { entry, result } of settled) entry.resolve(result);
    this.notify(snapshot);
    return snapshot;
  }

  /** Queue a command for the start of the next tick. */
  submit(command: Command): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve, reject) => {
      this.queue.push({ command, resolve, reject });
    });
  }

  /** Apply a command right away and commit. */
  execute(command: Command): CommandResult {
    this.assertIdle('execute');
    const result = this.apply(command);
    this.commit();
    return result;
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  exportState(): EngineState {
    const w = this.world;
    const clockTime = w.clock.now();
    return {
      format: ENGINE_STATE_FORMAT,
      seed: w.seed,
      difficulty: w.preset.name,
      clock: { time: clockTime, paused: w.clock.isPaused(), carry: w.clock.getCarry() },
      player: { cash: w.wallet.balance(), reputation: w.reputation.value() },
      lots: w.inventory.list(),
      nextLotId: w.inventory.nextLotId(),
      orders: w.orderBook.activeOrders(),
      closedOrders: w.orderBook.closedOrders(),
      nextOrderId: w.nextOrderId,
      unavailable: w.market
        .listings()
        .filter((l) => !l.available)
        .map((l) => ({ retailer: l.retailer, denomination: l.denomination })),
      orderRng: w.orderRng.getState(),
      lotRng: w.lotRng.getState(),
      activity: w.log.tail(),
      analytics: w.analytics.toState(),
      achievements: w.achievements.toState(),
      version: w.version,
    };
  }

  /**
   * Replace the whole game with exported state. Pending commands are kept.
   * Inconsistent state throws `SaveFormatError` and leaves the current game
   * untouched.
   */
  restore(state: EngineState): ReadonlySnapshot {
    this.assertIdle('restore');
    if (state.format !== ENGINE_STATE_FORMAT) {
      throw new SaveFormatError(`Unsupported engine state format ${state.format}, expected ${ENGINE_STATE_FORMAT}`);
    }
    checkStateConsistency(state, this.reputationConfig());

    const preset = DIFFICULTY_PRESETS[state.difficulty];
    const market = new Market(RETAILERS, this.tuning.market ?? MARKET_DEFAULTS, this.reputationConfig());
    for (const { retailer, denomination } of state.unavailable) {
      if (!market.setAvailability(retailer, denomination, false)) {
        throw new SaveFormatError(`Saved market lists ${retailer} ${formatFace(denomination)}, which is not in the catalog`);
      }
    }
    const orderRng = new SeededRNG(0);
    orderRng.setState(state.orderRng);
    const lotRng = new SeededRNG(0);
    lotRng.setState(state.lotRng);

    const world: World = {
      seed: state.seed,
      preset,
      clock: new Clock(
        this.tuning.clockRatio ?? DEFAULT_CLOCK_RATIO,
        state.clock.time,
        state.clock.paused,
        state.clock.carry
      ),
      market,
      inventory: new Inventory(state.lots, state.nextLotId),
      orderBook: new OrderBook(state.orders, state.closedOrders),
      reputation: new Reputation(this.reputationConfig(), state.player.reputation),
      wallet: new Wallet(state.player.cash),
      analytics: new Analytics(state.analytics),
      achievements: new AchievementTracker(state.achievements),
      log: new ActivityLog(this.tuning.activityCapacity ?? ACTIVITY_LOG_CAPACITY, state.activity),
      generator: new OrderGenerator(preset, this.tuning.generator ?? GENERATOR_DEFAULTS),
      orderRng,
      lotRng,
      nextOrderId: state.nextOrderId,
      version: state.version,
    };

    this.world = world;
    return this.commit();
  }

  // ===========================================================================
  // COMMANDS
  // ===========================================================================

  private apply(command: Command): CommandResult {
    const result = this.dispatch(command);
    if (!result.ok) {
      this.record(result.error.message);
    }
    return result;
  }

  private dispatch(command: Command): CommandResult {
    switch (command.type) {
      case 'Purchase':
        return this.purchase(command.retailer, command.denomination, command.quantity);
      case 'AcceptOrder':
        return this.acceptOrder(command.orderId);
      case 'DeclineOrder':
        return this.declineOrder(command.orderId);
      case 'Pause': {
        const changed = this.world.clock.pause();
        if (changed) this.record('Paused');
        return { ok: true, outcome: { type: 'Pause', changed } };
      }
      case 'Resume': {
        const changed = this.world.clock.resume();
        if (changed) this.record('Resumed');
        return { ok: true, outcome: { type: 'Resume', changed } };
      }
      case 'LiquidateLot':
        return this.liquidate(command.lotId);
    }
  }

  private purchase(retailer: RetailerName, denomination: Cents, quantity: number): CommandResult {
    const w = this.world;
    if (!Number.isInteger(quantity) || quantity < 1) {
      return rejected(failure('InvalidCommand', `Quantity must be a positive whole number, got ${quantity}`));
    }
    const label = `${retailer} ${formatFace(denomination)}`;
    if (!w.market.listing(retailer, denomination)) {
      return rejected(failure('InvalidCommand', `${label} cards are not sold at the market`));
    }
    if (!w.market.isAvailable(retailer, denomination)) {
      return rejected(failure('InsufficientStock', `${label} cards are out of stock at the market`));
    }

    const { day } = w.clock.now();
    const unitCost = w.market.quote(retailer, denomination, quantity, {
      day,
      reputation: w.reputation.value(),
    });
    const totalCost = unitCost * quantity;
    if (!w.wallet.canAfford(totalCost)) {
      return rejected(
        failure(
          'InsufficientFunds',
          `Insufficient funds for ${quantity}x ${label} (need ${formatCents(totalCost)}, have ${formatCents(w.wallet.balance())})`
        )
      );
    }

    const { min, max } = w.preset.expirationRangeDays;
    w.wallet.debit(totalCost);
    const lot = w.inventory.addLot({
      retailer,
      denomination,
      quantity,
      unitCost,
      purchaseDay: day,
      expirationDay: day + w.lotRng.int(min, max),
    });
    w.analytics.recordPurchase(totalCost);
    this.record(`Purchased ${quantity}x ${label} for ${formatCents(totalCost)}`);
    this.settle(w.achievements.checkHoldings(this.holdings()));

    return { ok: true, outcome: { type: 'Purchase', lot, totalCost } };
  }

  private acceptOrder(orderId: OrderId): CommandResult {
    const w = this.world;
    const { day } = w.clock.now();
    const purchaseDays = new Map(w.inventory.list().map((lot): [LotId, number] => [lot.id, lot.purchaseDay]));
    const fulfilled = w.orderBook.acceptAndFulfill(orderId, {
      inventory: w.inventory,
      wallet: w.wallet,
      reputation: w.reputation,
      currentDay: day,
    });
    if (!fulfilled.ok) return rejected(fulfilled.error);

    const { order, consumed, costBasis, reputationDelta } = fulfilled.value;
    const cards = sumBy(consumed, (p) => p.quantity);
    const profit = order.offeredPrice - costBasis;
    w.analytics.recordSale(order.offeredPrice, costBasis, cards);
    this.record(
      `Completed order #${order.id} for ${order.customer.name}: ${formatCents(order.offeredPrice)} (profit ${formatCents(profit)})`
    );
    if (reputationDelta > 0) {
      this.record(`Reputation +${reputationDelta} for delivering ${order.deadlineDay - day} day(s) early`);
    }
    const newestPurchase = Math.max(...consumed.map((p) => purchaseDays.get(p.lotId) ?? 0));
    this.settle([
      ...w.achievements.recordSale({
        day,
        season: seasonForDay(day),
        profit,
        ordersCompleted: w.analytics.view().ordersCompleted,
        stars: w.reputation.stars(),
        newestCardAgeDays: day - newestPurchase,
      }),
      ...w.achievements.checkHoldings(this.holdings()),
    ]);

    return {
      ok: true,
      outcome: {
        type: 'AcceptOrder',
        orderId: order.id,
        revenue: order.offeredPrice,
        costBasis,
        profit,
        reputationDelta,
      },
    };
  }

  private declineOrder(orderId: OrderId): CommandResult {
    const w = this.world;
    const declined = w.orderBook.decline(orderId, w.clock.now().day);
    if (!declined.ok) return rejected(declined.error);

    w.analytics.recordDeclinedOrder();
    this.record(`Declined order #${declined.value.id} from ${declined.value.customer.name}`);
    return { ok: true, outcome: { type: 'DeclineOrder', orderId: declined.value.id } };
  }

  private liquidate(lotId: LotId): CommandResult {
    const w = this.world;
    const lot = w.inventory.removeLot(lotId);
    if (!lot) {
      return rejected(failure('InvalidCommand', `Lot #${lotId} is not in inventory`));
    }

    const proceeds = w.market.liquidationValue(lot.denomination) * lot.quantity;
    const profit = proceeds - lot.unitCost * lot.quantity;
    w.wallet.credit(proceeds);
    w.analytics.recordLiquidation(proceeds, lot.quantity);
    this.record(
      `Sold ${lot.quantity}x ${lot.retailer} ${formatFace(lot.denomination)} to a liquidator for ${formatCents(proceeds)} (${profit >= 0 ? 'profit' : 'loss'} ${formatCents(Math.abs(profit))})`
    );
    this.settle(w.achievements.checkHoldings(this.holdings()));

    return { ok: true, outcome: { type: 'LiquidateLot', lotId, quantity: lot.quantity, proceeds } };
  }

  // ===========================================================================
  // DAILY PASS
  // ===========================================================================

  /**
   * Fixed order: season and analytics roll-over, inventory aging, order
   * expiry, reputation penalties, new orders, then achievements.
   */
  private runDailyPass(day: number): void {
    const w = this.world;
    this.inDailyPass = true;
    try {
      const at: GameTime = { day, minuteOfDay: 0 };
      const season = seasonForDay(day);
      const seasonBegan = season !== seasonForDay(day - 1);

      w.analytics.startNewDay();
      if (seasonBegan) {
        this.record(`${season} season begins`, at);
      }
      this.record(`Day ${day} begins`, at);

      const expiredLots = w.inventory.ageOneDay(day);
      if (expiredLots.length > 0) {
        const cards = sumBy(expiredLots, (e) => e.lot.quantity);
        const loss = sumBy(expiredLots, (e) => e.loss);
        w.analytics.recordExpiredCards(cards, loss);
        for (const { lot, loss: lotLoss } of expiredLots) {
          this.record(
            `Lot #${lot.id} expired: lost ${lot.quantity}x ${lot.retailer} ${formatFace(lot.denomination)} worth ${formatCents(lotLoss)}`,
            at
          );
        }
      }

      const expiredOrders = w.orderBook.expireOverdue(day);
      for (const order of expiredOrders) {
        const delta = w.reputation.onOrderExpired(order);
        w.analytics.recordExpiredOrder();
        this.record(
          `Order #${order.id} from ${order.customer.name} expired (reputation ${delta})`,
          at
        );
      }

      const generated = w.generator.generateForDay(
        day,
        w.reputation,
        w.market,
        w.orderRng,
        w.nextOrderId
      );
      for (const order of generated.orders) {
        w.orderBook.insert(order);
        this.record(describeNewOrder(order), at);
      }
      w.nextOrderId = generated.nextOrderId;

      const totals = w.analytics.view();
      this.settle(
        [
          ...w.achievements.startDay({
            day,
            season,
            seasonBegan,
            ordersExpiredToday: expiredOrders.length,
            ordersCompleted: totals.ordersCompleted,
            ordersExpired: totals.ordersExpired,
          }),
          ...w.achievements.checkHoldings(this.holdings(day)),
        ],
        at
      );

      console.log(
        `[Day ${day}] ${expiredLots.length} lots expired | ` +
        `${expiredOrders.length} orders expired | ` +
        `${generated.orders.length} new orders | ` +
        `cash ${formatCents(w.wallet.balance())} | ` +
        `reputation ${w.reputation.value()}`
      );
    } finally {
      this.inDailyPass = false;
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private createWorld(seed: number, preset: DifficultyPreset): World {
    const reputation = this.reputationConfig();
    return {
      seed,
      preset,
      clock: new Clock(this.tuning.clockRatio ?? DEFAULT_CLOCK_RATIO),
      market: new Market(RETAILERS, this.tuning.market ?? MARKET_DEFAULTS, reputation),
      inventory: new Inventory(),
      orderBook: new OrderBook(),
      reputation: new Reputation(reputation),
      wallet: new Wallet(preset.startingCash),
      analytics: new Analytics(emptyAnalytics()),
      achievements: new AchievementTracker(emptyAchievements(seasonForDay(1))),
      log: new ActivityLog(this.tuning.activityCapacity ?? ACTIVITY_LOG_CAPACITY),
      generator: new OrderGenerator(preset, this.tuning.generator ?? GENERATOR_DEFAULTS),
      orderRng: new SeededRNG(deriveSeed(seed, ORDER_STREAM)),
      lotRng: new SeededRNG(deriveSeed(seed, LOT_STREAM)),
      nextOrderId: FIRST_ORDER_ID,
      version: 0,
    };
  }

  private openForBusiness(): void {
    const w = this.world;
    const { day } = w.clock.now();
    this.record('Welcome to Gift Card Empire!');
    this.record(`Starting with ${formatCents(w.wallet.balance())} capital (${w.preset.name})`);

    const opening = w.generator.generateForDay(
      day,
      w.reputation,
      w.market,
      w.orderRng,
      w.nextOrderId,
      { guaranteed: (this.tuning.generator ?? GENERATOR_DEFAULTS).openingOrders }
    );
    for (const order of opening.orders) {
      w.orderBook.insert(order);
      this.record(describeNewOrder(order));
    }
    w.nextOrderId = opening.nextOrderId;
  }

  /** Pay and log unlocks. A reward can itself cross a cash milestone. */
  private settle(unlocks: Unlock[], at?: GameTime): void {
    const w = this.world;
    let pending = unlocks;
    while (pending.length > 0) {
      for (const unlock of pending) {
        w.wallet.credit(unlock.reward);
        this.record(`Achievement unlocked: ${unlock.name} (+${formatCents(unlock.reward)})`, at);
      }
      pending = w.achievements.checkHoldings(this.holdings(at?.day));
    }
  }

  private holdings(day: number = this.world.clock.now().day): HoldingsFacts {
    const w = this.world;
    return { day, cash: w.wallet.balance(), lots: w.inventory.list() };
  }

  private reputationConfig(): ReputationConfig {
    return this.tuning.reputation ?? REPUTATION_DEFAULTS;
  }

  private record(message: string, at: GameTime = this.world.clock.now()): void {
    this.world.log.append({ day: at.day, minute: at.minuteOfDay, message });
  }

  private commit(): ReadonlySnapshot {
    const snapshot = this.publish();
    this.notify(snapshot);
    return snapshot;
  }

  private publish(): ReadonlySnapshot {
    this.world.version += 1;
    this.committed = this.buildCommitted();
    return this.committed;
  }

  /** A failing listener is logged and skipped; the commit stands. */
  private notify(snapshot: ReadonlySnapshot): void {
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        console.error(`[Engine] Snapshot listener failed at version ${snapshot.version}:`, error);
      }
    }
  }

  private buildCommitted(): ReadonlySnapshot {
    const w = this.world;
    invariant(w.wallet.balance() >= 0, 'Cash went negative', { cash: w.wallet.balance() });
    return buildSnapshot({
      version: w.version,
      difficulty: w.preset.name,
      time: w.clock.now(),
      paused: w.clock.isPaused(),
      cash: w.wallet.balance(),
      reputation: w.reputation,
      lots: w.inventory.list(),
      orders: w.orderBook.prioritized(),
      market: w.market,
      analytics: w.analytics.view(),
      achievements: w.achievements.view(),
      activity: w.log.tail(this.tuning.snapshotActivity ?? DEFAULT_SNAPSHOT_ACTIVITY),
    });
  }

  private assertIdle(operation: string): void {
    if (this.inDailyPass) {
      throw new InvariantViolation(`${operation} called during a daily pass`);
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/** Cross-field checks the per-field save decoder cannot make. */
function checkStateConsistency(state: EngineState, reputation: ReputationConfig): void {
  const orderIds = new Set<number>();
  for (const order of [...state.orders, ...state.closedOrders]) {
    if (orderIds.has(order.id)) {
      throw new SaveFormatError(`Saved game has order #${order.id} more than once`);
    }
    orderIds.add(order.id);
    if (order.id >= state.nextOrderId) {
      throw new SaveFormatError(`Saved order #${order.id} is not below the next order id ${state.nextOrderId}`);
    }
  }
  for (const order of state.orders) {
    if (order.status !== 'Pending') {
      throw new SaveFormatError(`Saved active order #${order.id} is ${order.status}`);
    }
  }
  for (const order of state.closedOrders) {
    if (order.status === 'Pending') {
      throw new SaveFormatError(`Saved order history holds pending order #${order.id}`);
    }
  }

  const lotIds = new Set<number>();
  for (const lot of state.lots) {
    if (lotIds.has(lot.id)) {
      throw new SaveFormatError(`Saved game has lot #${lot.id} more than once`);
    }
    lotIds.add(lot.id);
    if (lot.id >= state.nextLotId) {
      throw new SaveFormatError(`Saved lot #${lot.id} is not below the next lot id ${state.nextLotId}`);
    }
    if (lot.expirationDay <= lot.purchaseDay) {
      throw new SaveFormatError(`Saved lot #${lot.id} expires before it was bought`);
    }
  }

  if (state.player.reputation < reputation.min || state.player.reputation > reputation.max) {
    throw new SaveFormatError(`Saved reputation ${state.player.reputation} is out of range`);
  }
}

function rejected(error: CommandFailure): CommandResult {
  return { ok: false, error };
}

function describeNewOrder(order: {
  id: OrderId;
  customer: { name: string };
  requestedItems: Array<{ retailer: RetailerName; denomination: Cents; quantity: number }>;
  offeredPrice: Cents;
  deadlineDay: number;
}): string {
  const items = order.requestedItems
    .map((line) => `${line.quantity}x ${line.retailer} ${formatFace(line.denomination)}`)
    .join(', ');
  return `New order #${order.id}: ${order.customer.name} wants ${items} for ${formatCents(order.offeredPrice)} by day ${order.deadlineDay}`;
}
