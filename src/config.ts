/**
 * Game configuration: difficulty presets, engine tuning and server settings.
 */

import type {
  BasisPoints,
  BulkDiscountTier,
  ClockRatio,
  DifficultyName,
  DifficultyPreset,
  OrderPriority,
} from './types.js';

// =============================================================================
// DIFFICULTY PRESETS
// =============================================================================

/** Every preset's offer band and deadline range stay inside these. */
export const OFFER_BAND_LIMITS = { minBps: 10_500, maxBps: 13_000 } as const;
export const DEADLINE_LIMITS_DAYS = { min: 2, max: 6 } as const;

export const DIFFICULTY_PRESETS: Record<DifficultyName, DifficultyPreset> = {
  easy: {
    name: 'easy',
    startingCash: 1_000_000,
    profitMarginBand: { minBps: 11_000, maxBps: 13_000 },
    expirationRangeDays: { min: 45, max: 120 },
    orderDeadlineRangeDays: { min: 3, max: 6 },
  },
  normal: {
    name: 'normal',
    startingCash: 500_000,
    profitMarginBand: { minBps: 10_500, maxBps: 13_000 },
    expirationRangeDays: { min: 30, max: 90 },
    orderDeadlineRangeDays: { min: 2, max: 6 },
  },
  hard: {
    name: 'hard',
    startingCash: 250_000,
    profitMarginBand: { minBps: 10_500, maxBps: 12_200 },
    expirationRangeDays: { min: 20, max: 60 },
    orderDeadlineRangeDays: { min: 2, max: 4 },
  },
};

export function isDifficultyName(value: unknown): value is DifficultyName {
  return value === 'easy' || value === 'normal' || value === 'hard';
}

// =============================================================================
// ENGINE TUNING
// =============================================================================

/** 10 simulated minutes every 3 real seconds */
export const DEFAULT_CLOCK_RATIO: ClockRatio = { simMinutes: 10, realMs: 3000 };

/** New games open at 09:00 on day 1 */
export const OPENING_MINUTE = 9 * 60;

export const ACTIVITY_LOG_CAPACITY = 50;

export interface MarketConfig {
  bulkTiers: BulkDiscountTier[];
  /** Unit price never drops below this share of face value */
  floorBps: BasisPoints;
  /** Max reputation-driven price adjustment either way */
  reputationBandBps: BasisPoints;
  /** Share of face value paid when liquidating a lot */
  liquidationBps: BasisPoints;
}

export const MARKET_DEFAULTS: MarketConfig = {
  bulkTiers: [
    { minQuantity: 5, discountBps: 200 },
    { minQuantity: 10, discountBps: 400 },
    { minQuantity: 25, discountBps: 700 },
    { minQuantity: 50, discountBps: 1000 },
  ],
  floorBps: 7000,
  reputationBandBps: 500,
  liquidationBps: 8500,
};

export interface ReputationConfig {
  min: number;
  max: number;
  initial: number;
  /** Reputation at which prices and offers are unadjusted */
  neutral: number;
  minGain: number;
  maxGain: number;
  expiryPenalty: Record<OrderPriority, number>;
}

/** Hundredths of a star: 0..500 is 0 to 5 stars */
export const REPUTATION_DEFAULTS: ReputationConfig = {
  min: 0,
  max: 500,
  initial: 300,
  neutral: 300,
  minGain: 5,
  maxGain: 25,
  expiryPenalty: { High: 40, Medium: 25, Low: 15 },
};

export interface GeneratorConfig {
  /** Arrival slots evaluated per day */
  maxOrdersPerDay: number;
  arrivalBase: number;
  arrivalSlope: number;
  arrivalCap: number;
  /** Priority by implied margin: at or above `high` is High, at or above `medium` is Medium */
  priorityThresholds: { highBps: BasisPoints; mediumBps: BasisPoints };
  openingOrders: number;
}

export const GENERATOR_DEFAULTS: GeneratorConfig = {
  maxOrdersPerDay: 3,
  arrivalBase: 0.3,
  arrivalSlope: 0.6,
  arrivalCap: 0.95,
  priorityThresholds: { highBps: 3300, mediumBps: 2700 },
  openingOrders: 2,
};

/** Lots within this many days of expiring are flagged in snapshots */
export const EXPIRING_SOON_DAYS = 15;

/** Days of revenue history kept by analytics */
export const REVENUE_HISTORY_DAYS = 30;

// =============================================================================
// SERVER CONFIGURATION
// =============================================================================

export interface ServerConfig {
  port: number;
  dbPath: string;
  difficulty: DifficultyName;
  seed: number;
  tickIntervalMs: number;
}

function parseIntOr(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Read server settings from the environment.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const difficulty = env.GAME_DIFFICULTY ?? 'normal';
  if (!isDifficultyName(difficulty)) {
    console.warn(`[Config] Unknown GAME_DIFFICULTY "${difficulty}", using normal`);
  }

  const tickIntervalMs = parseIntOr(env.TICK_INTERVAL_MS, 250);

  return {
    port: parseIntOr(env.PORT, 3000),
    dbPath: env.GAME_DB_PATH ?? './giftcard-empire.db',
    difficulty: isDifficultyName(difficulty) ? difficulty : 'normal',
    seed: parseIntOr(env.GAME_SEED, Date.now() % 2_147_483_647),
    tickIntervalMs: tickIntervalMs > 0 ? tickIntervalMs : 250,
  };
}
