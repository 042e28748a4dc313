/**
 * Market
 *
 * Wholesale pricing with bulk discounts, per-listing stock flags, seasonal
 * multipliers and the reputation pricing band. Every read is pure.
 */

import type {
  BasisPoints,
  Cents,
  MarketListing,
  Retailer,
  RetailerName,
} from '../types.js';
import {
  MARKET_DEFAULTS,
  REPUTATION_DEFAULTS,
  type MarketConfig,
  type ReputationConfig,
} from '../config.js';
import { invariant } from '../errors.js';
import { RETAILERS } from './catalog.js';
import { seasonForDay, seasonalPriceBps } from './seasons.js';

export interface QuoteContext {
  day: number;
  reputation: number;
}

const listingKey = (retailer: RetailerName, denomination: Cents): string =>
  `${retailer}:${denomination}`;

export class Market {
  private readonly listingsByKey = new Map<string, MarketListing>();
  private readonly config: MarketConfig;
  private readonly reputation: ReputationConfig;

  constructor(
    retailers: readonly Retailer[] = RETAILERS,
    config: MarketConfig = MARKET_DEFAULTS,
    reputation: ReputationConfig = REPUTATION_DEFAULTS
  ) {
    this.config = config;
    this.reputation = reputation;
    for (const retailer of retailers) {
      for (const entry of retailer.catalog) {
        this.listingsByKey.set(listingKey(retailer.name, entry.denomination), {
          retailer: retailer.name,
          denomination: entry.denomination,
          wholesalePrice: entry.wholesalePrice,
          available: true,
        });
      }
    }
  }

  listing(retailer: RetailerName, denomination: Cents): MarketListing | undefined {
    const found = this.listingsByKey.get(listingKey(retailer, denomination));
    return found ? { ...found } : undefined;
  }

  /** All listings in catalog order. */
  listings(): MarketListing[] {
    return [...this.listingsByKey.values()].map((l) => ({ ...l }));
  }

  availableListings(): MarketListing[] {
    return this.listings().filter((l) => l.available);
  }

  isAvailable(retailer: RetailerName, denomination: Cents): boolean {
    return this.listingsByKey.get(listingKey(retailer, denomination))?.available ?? false;
  }

  /** Toggle the stock flag. Returns false for an unknown listing. */
  setAvailability(retailer: RetailerName, denomination: Cents, available: boolean): boolean {
    const found = this.listingsByKey.get(listingKey(retailer, denomination));
    if (!found) return false;
    found.available = available;
    return true;
  }

  /** Lowest unit price allowed for a face value. */
  floorPrice(denomination: Cents): Cents {
    return Math.ceil((denomination * this.config.floorBps) / 10_000);
  }

  bulkDiscountBps(quantity: number): BasisPoints {
    let discount = 0;
    for (const tier of this.config.bulkTiers) {
      if (quantity >= tier.minQuantity && tier.discountBps > discount) {
        discount = tier.discountBps;
      }
    }
    return discount;
  }

  /**
   * Wholesale unit cost for buying `quantity` cards at once.
   */
  price(retailer: RetailerName, denomination: Cents, quantity: number): Cents {
    const found = this.listingsByKey.get(listingKey(retailer, denomination));
    invariant(found, `No listing for ${retailer} ${denomination}`);
    invariant(Number.isInteger(quantity) && quantity > 0, 'Quantity must be a positive integer', {
      quantity,
    });

    const discounted = Math.round(
      (found.wholesalePrice * (10_000 - this.bulkDiscountBps(quantity))) / 10_000
    );
    return Math.max(this.floorPrice(denomination), discounted);
  }

  /** Price adjustment from reputation; negative means cheaper. */
  reputationAdjustmentBps(reputation: number): BasisPoints {
    const { min, max, neutral } = this.reputation;
    const band = this.config.reputationBandBps;
    if (reputation >= neutral) {
      return max === neutral ? 0 : -Math.round((band * (reputation - neutral)) / (max - neutral));
    }
    return neutral === min ? 0 : Math.round((band * (neutral - reputation)) / (neutral - min));
  }

  /**
   * Unit price the player actually pays today: bulk price, seasonal
   * multiplier and reputation band, never below the floor.
   */
  quote(retailer: RetailerName, denomination: Cents, quantity: number, ctx: QuoteContext): Cents {
    const base = this.price(retailer, denomination, quantity);
    const seasonBps = seasonalPriceBps(seasonForDay(ctx.day), retailer);
    const reputationBps = 10_000 + this.reputationAdjustmentBps(ctx.reputation);
    const adjusted = Math.round((base * seasonBps * reputationBps) / 100_000_000);
    return Math.max(this.floorPrice(denomination), adjusted);
  }

  /** Cash received per card when a lot is sold back. */
  liquidationValue(denomination: Cents): Cents {
    return Math.floor((denomination * this.config.liquidationBps) / 10_000);
  }
}
