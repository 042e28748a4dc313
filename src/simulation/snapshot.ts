/**
 * Snapshot construction.
 *
 * A snapshot is a deep-frozen copy of the committed state, shaped for the
 * display layer. Nothing in it aliases engine internals.
 */

import type {
  AchievementView,
  ActivityRecord,
  AnalyticsView,
  CustomerOrder,
  DifficultyName,
  GameTime,
  GiftCardLot,
  InventoryGroupView,
  MarketQuoteView,
  OrderView,
  Player,
  Snapshot,
} from '../types.js';
import { EXPIRING_SOON_DAYS } from '../config.js';
import { formatClock } from './clock.js';
import type { Market } from './market.js';
import { orderFaceValue } from './orders.js';
import type { Reputation } from './reputation.js';
import { seasonForDay } from './seasons.js';

type Primitive = string | number | boolean | bigint | symbol | undefined | null;

export type DeepReadonly<T> = T extends Primitive
  ? T
  : T extends Array<infer U>
    ? ReadonlyArray<DeepReadonly<U>>
    : { readonly [K in keyof T]: DeepReadonly<T[K]> };

export type ReadonlySnapshot = DeepReadonly<Snapshot>;

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export interface SnapshotSource {
  version: number;
  difficulty: DifficultyName;
  time: GameTime;
  paused: boolean;
  cash: number;
  reputation: Reputation;
  lots: readonly GiftCardLot[];
  orders: readonly CustomerOrder[];
  market: Market;
  analytics: AnalyticsView;
  achievements: readonly AchievementView[];
  activity: readonly ActivityRecord[];
}

/**
 * Lots grouped by retailer and denomination. Groups are ordered by retailer
 * then face value, lots inside a group by expiration.
 */
export function groupInventory(lots: readonly GiftCardLot[], today: number): InventoryGroupView[] {
  const groups = new Map<string, GiftCardLot[]>();
  for (const lot of lots) {
    const key = `${lot.retailer}:${lot.denomination}`;
    const group = groups.get(key);
    if (group) group.push({ ...lot });
    else groups.set(key, [{ ...lot }]);
  }

  const views: InventoryGroupView[] = [];
  for (const group of groups.values()) {
    group.sort((a, b) => a.expirationDay - b.expirationDay || a.id - b.id);
    const soonest = group[0];
    const daysLeft = soonest.expirationDay - today;
    views.push({
      retailer: soonest.retailer,
      denomination: soonest.denomination,
      totalQuantity: group.reduce((sum, lot) => sum + lot.quantity, 0),
      soonestExpirationDay: soonest.expirationDay,
      daysUntilSoonestExpiration: daysLeft,
      expiringSoon: daysLeft <= EXPIRING_SOON_DAYS,
      lots: group,
    });
  }

  return views.sort((a, b) =>
    a.retailer === b.retailer ? a.denomination - b.denomination : a.retailer < b.retailer ? -1 : 1
  );
}

function orderView(order: CustomerOrder, today: number): OrderView {
  return {
    ...order,
    customer: { ...order.customer },
    requestedItems: order.requestedItems.map((line) => ({ ...line })),
    daysRemaining: order.deadlineDay - today,
    faceValue: orderFaceValue(order),
  };
}

function marketView(market: Market, day: number, reputation: number): MarketQuoteView[] {
  return market.listings().map((listing) => ({
    ...listing,
    unitPrice: market.quote(listing.retailer, listing.denomination, 1, { day, reputation }),
  }));
}

export function buildSnapshot(source: SnapshotSource): ReadonlySnapshot {
  const { time, reputation } = source;
  const player: Player & { stars: number; reputationLabel: string } = {
    cash: source.cash,
    reputation: reputation.value(),
    stars: reputation.stars(),
    reputationLabel: reputation.label(),
  };

  const snapshot: Snapshot = {
    version: source.version,
    difficulty: source.difficulty,
    time: { ...time, label: formatClock(time.minuteOfDay) },
    paused: source.paused,
    season: seasonForDay(time.day),
    player,
    inventory: groupInventory(source.lots, time.day),
    orders: source.orders.map((order) => orderView(order, time.day)),
    market: marketView(source.market, time.day, reputation.value()),
    analytics: {
      ...source.analytics,
      dailyRevenues: [...source.analytics.dailyRevenues],
      profitMarginsBps: [...source.analytics.profitMarginsBps],
    },
    achievements: source.achievements.map((achievement) => ({ ...achievement })),
    activity: source.activity.map((record) => ({ ...record })),
  };

  return deepFreeze(snapshot);
}
