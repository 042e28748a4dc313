/**
 * Retailer reference data. Face values and wholesale prices in cents.
 */

import type { Retailer } from '../types.js';

export const RETAILERS: readonly Retailer[] = [
  {
    name: 'Amazon',
    catalog: [
      { denomination: 2500, wholesalePrice: 2000 },
      { denomination: 5000, wholesalePrice: 4100 },
      { denomination: 10000, wholesalePrice: 8300 },
    ],
  },
  {
    name: 'Starbucks',
    catalog: [
      { denomination: 1000, wholesalePrice: 800 },
      { denomination: 2500, wholesalePrice: 2050 },
    ],
  },
  {
    name: 'Target',
    catalog: [
      { denomination: 2500, wholesalePrice: 2100 },
      { denomination: 5000, wholesalePrice: 4200 },
    ],
  },
  {
    name: 'iTunes',
    catalog: [
      { denomination: 1500, wholesalePrice: 1200 },
      { denomination: 2500, wholesalePrice: 2000 },
    ],
  },
  {
    name: 'Walmart',
    catalog: [
      { denomination: 2000, wholesalePrice: 1700 },
      { denomination: 5000, wholesalePrice: 4250 },
    ],
  },
];

export function isRetailerName(value: unknown): value is Retailer['name'] {
  return RETAILERS.some((r) => r.name === value);
}

/** True when the retailer sells cards of this face value. */
export function isCatalogListing(retailer: Retailer['name'], denomination: number): boolean {
  return RETAILERS.some(
    (r) => r.name === retailer && r.catalog.some((entry) => entry.denomination === denomination)
  );
}
