/**
 * Player cash. Never negative.
 */

import type { Cents } from '../types.js';
import { invariant } from '../errors.js';

export class Wallet {
  private cash: Cents;

  constructor(initial: Cents) {
    invariant(Number.isInteger(initial) && initial >= 0, 'Cash must be whole non-negative cents', {
      initial,
    });
    this.cash = initial;
  }

  balance(): Cents {
    return this.cash;
  }

  canAfford(amount: Cents): boolean {
    return amount <= this.cash;
  }

  debit(amount: Cents): void {
    invariant(Number.isInteger(amount) && amount >= 0, 'Debit must be whole cents', { amount });
    invariant(amount <= this.cash, 'Debit would overdraw cash', { amount, cash: this.cash });
    this.cash -= amount;
  }

  credit(amount: Cents): void {
    invariant(Number.isInteger(amount) && amount >= 0, 'Credit must be whole cents', { amount });
    this.cash += amount;
  }
}
