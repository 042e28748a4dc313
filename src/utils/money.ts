/**
 * Currency helpers. All amounts are integer cents.
 */

import type { Cents } from '../types.js';

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
});

/** 499200 -> "$4,992.00", -150 -> "-$1.50" */
export function formatCents(cents: Cents): string {
  return usd.format(cents / 100);
}

/** Face value label: 1000 -> "$10", 1550 -> "$15.50" */
export function formatFace(cents: Cents): string {
  return cents % 100 === 0 ? `$${cents / 100}` : formatCents(cents);
}

export function sumBy<T>(items: readonly T[], value: (item: T) => number): number {
  let total = 0;
  for (const item of items) total += value(item);
  return total;
}
