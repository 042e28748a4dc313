/**
 * Seasons follow a 360-day year of four 90-day quarters.
 */

import type { BasisPoints, RetailerName, Season } from '../types.js';

const SEASON_ORDER: readonly Season[] = ['Spring', 'Summer', 'Fall', 'Winter'];

const DEMAND_BPS: Record<Season, BasisPoints> = {
  Spring: 10_000,
  Summer: 11_000,
  Fall: 9_000,
  Winter: 14_000,
};

export function seasonForDay(day: number): Season {
  const dayOfYear = (day - 1) % 360;
  return SEASON_ORDER[Math.floor(dayOfYear / 90)];
}

/** Order arrival modifier for the season. */
export function seasonalDemandBps(season: Season): BasisPoints {
  return DEMAND_BPS[season];
}

/** Wholesale price multiplier for a retailer in the season. */
export function seasonalPriceBps(season: Season, retailer: RetailerName): BasisPoints {
  switch (season) {
    case 'Summer':
      if (retailer === 'Target') return 12_000;
      if (retailer === 'Walmart') return 11_000;
      return 10_000;
    case 'Fall':
      if (retailer === 'iTunes') return 13_000;
      if (retailer === 'Amazon') return 12_000;
      return 10_000;
    case 'Winter':
      if (retailer === 'Amazon') return 15_000;
      if (retailer === 'iTunes') return 14_000;
      if (retailer === 'Starbucks') return 13_000;
      return 12_000;
    case 'Spring':
      return 10_000;
  }
}
