/**
 * Inventory
 *
 * Owned gift-card lots. Each purchase is its own lot so expiration order is
 * tracked per batch; stock is always consumed soonest-expiring first.
 */

import {
  createLotId,
  type Cents,
  type ConsumedPortion,
  type ExpiredLot,
  type GiftCardLot,
  type LotId,
  type OrderLine,
  type Result,
  type RetailerName,
} from '../types.js';
import { err, failure, invariant, ok } from '../errors.js';
import { formatFace } from '../utils/money.js';

export interface NewLot {
  retailer: RetailerName;
  denomination: Cents;
  quantity: number;
  unitCost: Cents;
  purchaseDay: number;
  expirationDay: number;
}

/** Expiration first, then insertion (lot ids are handed out in order). */
const byExpiration = (a: GiftCardLot, b: GiftCardLot): number =>
  a.expirationDay - b.expirationDay || a.id - b.id;

export class Inventory {
  private lots: GiftCardLot[];
  private nextId: number;

  constructor(lots: readonly GiftCardLot[] = [], nextLotId = 1) {
    this.lots = lots.map((lot) => ({ ...lot }));
    this.nextId = nextLotId;
    for (const lot of this.lots) {
      this.checkLot(lot);
      invariant(lot.id < this.nextId, 'Lot id ahead of the id counter', { lotId: lot.id });
    }
  }

  addLot(input: NewLot): GiftCardLot {
    const lot: GiftCardLot = { id: createLotId(this.nextId), ...input };
    this.checkLot(lot);
    this.nextId += 1;
    this.lots.push(lot);
    return { ...lot };
  }

  /**
   * Drop every lot with `expirationDay <= currentDay` and report each once,
   * ordered by expiration then insertion.
   */
  ageOneDay(currentDay: number): ExpiredLot[] {
    const expired = this.lots.filter((lot) => lot.expirationDay <= currentDay).sort(byExpiration);
    if (expired.length === 0) return [];

    this.lots = this.lots.filter((lot) => lot.expirationDay > currentDay);
    return expired.map((lot) => ({ lot: { ...lot }, loss: lot.unitCost * lot.quantity }));
  }

  /** Cards on hand for a retailer/denomination pair. */
  available(retailer: RetailerName, denomination: Cents): number {
    let total = 0;
    for (const lot of this.lots) {
      if (lot.retailer === retailer && lot.denomination === denomination) {
        total += lot.quantity;
      }
    }
    return total;
  }

  consume(
    retailer: RetailerName,
    denomination: Cents,
    quantity: number
  ): Result<ConsumedPortion[]> {
    return this.consumeMany([{ retailer, denomination, quantity }]);
  }

  /**
   * Remove stock for every line or for none of them. Lines naming the same
   * pair are checked against their combined quantity.
   */
  consumeMany(lines: readonly OrderLine[]): Result<ConsumedPortion[]> {
    const needed = new Map<string, OrderLine>();
    for (const line of lines) {
      invariant(Number.isInteger(line.quantity) && line.quantity > 0, 'Line quantity must be positive', {
        line,
      });
      const key = `${line.retailer}:${line.denomination}`;
      const entry = needed.get(key);
      needed.set(key, entry ? { ...entry, quantity: entry.quantity + line.quantity } : { ...line });
    }

    for (const line of needed.values()) {
      const onHand = this.available(line.retailer, line.denomination);
      if (onHand < line.quantity) {
        return err(
          failure(
            'InsufficientStock',
            `Need ${line.quantity} ${line.retailer} ${formatFace(line.denomination)} cards, have ${onHand}`
          )
        );
      }
    }

    const portions: ConsumedPortion[] = [];
    for (const line of lines) {
      portions.push(...this.take(line));
    }
    this.lots = this.lots.filter((lot) => lot.quantity > 0);
    return ok(portions);
  }

  getLot(id: LotId): GiftCardLot | undefined {
    const lot = this.lots.find((l) => l.id === id);
    return lot ? { ...lot } : undefined;
  }

  removeLot(id: LotId): GiftCardLot | undefined {
    const index = this.lots.findIndex((l) => l.id === id);
    if (index === -1) return undefined;
    const [removed] = this.lots.splice(index, 1);
    return { ...removed };
  }

  /** Copies of all lots, in insertion order. */
  list(): GiftCardLot[] {
    return this.lots.map((lot) => ({ ...lot }));
  }

  totalCards(): number {
    return this.lots.reduce((sum, lot) => sum + lot.quantity, 0);
  }

  nextLotId(): number {
    return this.nextId;
  }

  // Walks matching lots soonest-expiring first, splitting the last one touched.
  private take(line: OrderLine): ConsumedPortion[] {
    const candidates = this.lots
      .filter(
        (lot) =>
          lot.retailer === line.retailer && lot.denomination === line.denomination && lot.quantity > 0
      )
      .sort(byExpiration);

    const portions: ConsumedPortion[] = [];
    let remaining = line.quantity;
    for (const lot of candidates) {
      if (remaining === 0) break;
      const taken = Math.min(remaining, lot.quantity);
      lot.quantity -= taken;
      remaining -= taken;
      portions.push({
        lotId: lot.id,
        retailer: lot.retailer,
        denomination: lot.denomination,
        quantity: taken,
        unitCost: lot.unitCost,
      });
    }

    invariant(remaining === 0, 'Stock check passed but lots ran short', { line, remaining });
    return portions;
  }

  private checkLot(lot: GiftCardLot): void {
    invariant(Number.isInteger(lot.quantity) && lot.quantity > 0, 'Lot quantity must be positive', {
      lotId: lot.id,
      quantity: lot.quantity,
    });
    invariant(lot.expirationDay > lot.purchaseDay, 'Lot must expire after its purchase day', {
      lotId: lot.id,
    });
    invariant(Number.isInteger(lot.unitCost) && lot.unitCost >= 0, 'Lot cost must be whole cents', {
      lotId: lot.id,
    });
  }
}
