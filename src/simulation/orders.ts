/**
 * Order Generator
 *
 * Produces the day's customer orders from a seeded stream. Output depends
 * only on (day, reputation, market state, rng state, next id), so replaying
 * a seed reproduces the same orders.
 */

import {
  createOrderId,
  type BasisPoints,
  type CustomerKind,
  type CustomerOrder,
  type DifficultyPreset,
  type MarketListing,
  type OrderLine,
  type OrderPriority,
} from '../types.js';
import { GENERATOR_DEFAULTS, type GeneratorConfig } from '../config.js';
import type { Market } from './market.js';
import type { Reputation } from './reputation.js';
import type { SeededRNG } from './rng.js';
import { seasonForDay, seasonalDemandBps } from './seasons.js';

const CUSTOMER_NAMES = [
  'Alice',
  'Bob',
  'Charlie',
  'Diana',
  'Eve',
  'Frank',
  'Grace',
  'Henry',
  'Iris',
  'Jamal',
  'Keiko',
  'Luis',
] as const;

// Cards per line for each kind of customer
const QUANTITY_RANGE: Record<CustomerKind, [number, number]> = {
  casual: [1, 2],
  regular: [1, 4],
  corporate: [3, 8],
};

const LINE_RANGE: Record<CustomerKind, [number, number]> = {
  casual: [1, 1],
  regular: [1, 2],
  corporate: [1, 3],
};

export interface GenerationOptions {
  /** Number of leading arrival slots that always produce an order */
  guaranteed?: number;
}

export interface GeneratedOrders {
  orders: CustomerOrder[];
  nextOrderId: number;
}

export class OrderGenerator {
  private readonly preset: DifficultyPreset;
  private readonly config: GeneratorConfig;

  constructor(preset: DifficultyPreset, config: GeneratorConfig = GENERATOR_DEFAULTS) {
    this.preset = preset;
    this.config = config;
  }

  /**
   * Chance that the first arrival slot of `day` yields an order. Later slots
   * halve it each time.
   */
  arrivalChance(day: number, reputation: Reputation): number {
    const demand = seasonalDemandBps(seasonForDay(day)) / 10_000;
    const base = this.config.arrivalBase + this.config.arrivalSlope * reputation.ratio();
    return Math.min(this.config.arrivalCap, base * demand);
  }

  generateForDay(
    day: number,
    reputation: Reputation,
    market: Market,
    rng: SeededRNG,
    nextOrderId: number,
    options: GenerationOptions = {}
  ): GeneratedOrders {
    const listings = market.availableListings();
    if (listings.length === 0) {
      return { orders: [], nextOrderId };
    }

    const guaranteed = options.guaranteed ?? 0;
    const slots = Math.max(this.config.maxOrdersPerDay, guaranteed);
    const firstSlotChance = this.arrivalChance(day, reputation);

    const orders: CustomerOrder[] = [];
    let id = nextOrderId;
    for (let slot = 0; slot < slots; slot++) {
      const arrives = slot < guaranteed || rng.chance(firstSlotChance / 2 ** slot);
      if (!arrives) continue;
      orders.push(this.createOrder(id, day, reputation, market, listings, rng));
      id += 1;
    }

    return { orders, nextOrderId: id };
  }

  classifyPriority(marginBps: BasisPoints): OrderPriority {
    const { highBps, mediumBps } = this.config.priorityThresholds;
    if (marginBps >= highBps) return 'High';
    if (marginBps >= mediumBps) return 'Medium';
    return 'Low';
  }

  private createOrder(
    id: number,
    day: number,
    reputation: Reputation,
    market: Market,
    listings: readonly MarketListing[],
    rng: SeededRNG
  ): CustomerOrder {
    const kindRoll = rng.next();
    const kind: CustomerKind = kindRoll < 0.15 ? 'corporate' : kindRoll < 0.5 ? 'regular' : 'casual';
    const name = rng.pick(CUSTOMER_NAMES);

    const [minLines, maxLines] = LINE_RANGE[kind];
    const lineCount = Math.min(listings.length, rng.int(minLines, maxLines));
    const pool = [...listings];
    const [minQty, maxQty] = QUANTITY_RANGE[kind];
    const requestedItems: OrderLine[] = [];
    for (let i = 0; i < lineCount; i++) {
      const [listing] = pool.splice(rng.int(0, pool.length - 1), 1);
      requestedItems.push({
        retailer: listing.retailer,
        denomination: listing.denomination,
        quantity: rng.int(minQty, maxQty),
      });
    }

    const faceValue = orderFaceValue({ requestedItems });

    // Skew toward the top of the band as reputation rises
    const skew = rng.next() ** (1 / (1 + 2 * reputation.ratio()));
    const { minBps, maxBps } = this.preset.profitMarginBand;
    const multiplierBps = Math.round(minBps + (maxBps - minBps) * skew);
    const offeredPrice = Math.round((faceValue * multiplierBps) / 10_000);

    const wholesaleCost = requestedItems.reduce(
      (sum, l) => sum + market.price(l.retailer, l.denomination, l.quantity) * l.quantity,
      0
    );
    const marginBps = Math.floor(((offeredPrice - wholesaleCost) * 10_000) / offeredPrice);

    const { min, max } = this.preset.orderDeadlineRangeDays;
    return {
      id: createOrderId(id),
      customer: { name, kind },
      requestedItems,
      offeredPrice,
      priority: this.classifyPriority(marginBps),
      deadlineDay: day + rng.int(min, max),
      createdDay: day,
      status: 'Pending',
    };
  }
}

/** Total face value of an order's lines. */
export function orderFaceValue(order: Pick<CustomerOrder, 'requestedItems'>): number {
  return order.requestedItems.reduce((sum, l) => sum + l.denomination * l.quantity, 0);
}
