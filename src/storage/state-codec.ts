/**
 * Engine state (de)serialization for save slots.
 *
 * Stored JSON is untrusted: every field is checked and rebuilt into a typed
 * value before the engine sees it.
 */

import {
  ENGINE_STATE_FORMAT,
  createLotId,
  createOrderId,
  type AchievementProgress,
  type AchievementsState,
  type ActivityRecord,
  type AnalyticsState,
  type CustomerOrder,
  type EngineState,
  type GiftCardLot,
  type OrderLine,
  type RetailerName,
} from '../types.js';
import { isDifficultyName } from '../config.js';
import { SaveFormatError } from '../errors.js';
import { ACHIEVEMENT_IDS } from '../simulation/achievements.js';
import { isCatalogListing, isRetailerName } from '../simulation/catalog.js';
import {
  isInteger,
  isNonNegativeInteger,
  isOneOf,
  isPositiveInteger,
  isRecord,
  readArray,
} from '../utils/guards.js';

const isPriority = isOneOf(['High', 'Medium', 'Low'] as const);
const isStatus = isOneOf(['Pending', 'Fulfilled', 'Expired', 'Declined'] as const);
const isCustomerKind = isOneOf(['casual', 'regular', 'corporate'] as const);
const isSeason = isOneOf(['Spring', 'Summer', 'Fall', 'Winter'] as const);
const isAchievementId = isOneOf(ACHIEVEMENT_IDS);

export function serializeEngineState(state: EngineState): string {
  return JSON.stringify(state);
}

export function deserializeEngineState(json: string): EngineState {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new SaveFormatError(`Save data is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseEngineState(raw);
}

/** Validate an untyped value as engine state. Throws `SaveFormatError`. */
export function parseEngineState(raw: unknown): EngineState {
  if (!isRecord(raw)) throw new SaveFormatError('Save data is not an object');
  if (raw.format !== ENGINE_STATE_FORMAT) {
    throw new SaveFormatError(`Unsupported save format ${String(raw.format)}, expected ${ENGINE_STATE_FORMAT}`);
  }

  const { seed, difficulty, orderRng, lotRng, nextLotId, nextOrderId, version } = raw;
  if (!isInteger(seed)) fail('seed');
  if (!isDifficultyName(difficulty)) fail('difficulty');
  if (!isNonNegativeInteger(orderRng)) fail('orderRng');
  if (!isNonNegativeInteger(lotRng)) fail('lotRng');
  if (!isPositiveInteger(nextLotId)) fail('nextLotId');
  if (!isPositiveInteger(nextOrderId)) fail('nextOrderId');
  if (!isNonNegativeInteger(version)) fail('version');

  return {
    format: ENGINE_STATE_FORMAT,
    seed,
    difficulty,
    clock: readClock(raw.clock) ?? fail('clock'),
    player: readPlayer(raw.player) ?? fail('player'),
    lots: readArray(raw.lots, readLot) ?? fail('lots'),
    nextLotId,
    orders: readArray(raw.orders, readOrder) ?? fail('orders'),
    closedOrders: readArray(raw.closedOrders, readOrder) ?? fail('closedOrders'),
    nextOrderId,
    unavailable: readArray(raw.unavailable, readListingKey) ?? fail('unavailable'),
    orderRng,
    lotRng,
    activity: readArray(raw.activity, readActivity) ?? fail('activity'),
    analytics: readAnalytics(raw.analytics) ?? fail('analytics'),
    achievements: readAchievements(raw.achievements) ?? fail('achievements'),
    version,
  };
}

function fail(field: string): never {
  throw new SaveFormatError(`Save data has an invalid "${field}" field`);
}

// =============================================================================
// FIELD READERS
// =============================================================================

function readClock(value: unknown): EngineState['clock'] | undefined {
  if (!isRecord(value) || !isRecord(value.time)) return undefined;
  const { day, minuteOfDay } = value.time;
  const { paused, carry } = value;
  if (!isPositiveInteger(day) || !isNonNegativeInteger(minuteOfDay) || minuteOfDay >= 1440) return undefined;
  if (typeof paused !== 'boolean' || typeof carry !== 'number' || !Number.isFinite(carry) || carry < 0) {
    return undefined;
  }
  return { time: { day, minuteOfDay }, paused, carry };
}

function readPlayer(value: unknown): EngineState['player'] | undefined {
  if (!isRecord(value)) return undefined;
  const { cash, reputation } = value;
  if (!isNonNegativeInteger(cash) || !isInteger(reputation)) return undefined;
  return { cash, reputation };
}

function readListingKey(value: unknown): { retailer: RetailerName; denomination: number } | undefined {
  if (!isRecord(value)) return undefined;
  const { retailer, denomination } = value;
  if (!isRetailerName(retailer) || !isPositiveInteger(denomination)) return undefined;
  if (!isCatalogListing(retailer, denomination)) return undefined;
  return { retailer, denomination };
}

function readLot(value: unknown): GiftCardLot | undefined {
  if (!isRecord(value)) return undefined;
  const key = readListingKey(value);
  const { id, unitCost, quantity, purchaseDay, expirationDay } = value;
  if (!key || !isPositiveInteger(id) || !isNonNegativeInteger(unitCost)) return undefined;
  if (!isPositiveInteger(quantity) || !isPositiveInteger(purchaseDay) || !isPositiveInteger(expirationDay)) {
    return undefined;
  }
  return { id: createLotId(id), ...key, unitCost, quantity, purchaseDay, expirationDay };
}

function readLine(value: unknown): OrderLine | undefined {
  if (!isRecord(value)) return undefined;
  const key = readListingKey(value);
  const { quantity } = value;
  if (!key || !isPositiveInteger(quantity)) return undefined;
  return { ...key, quantity };
}

function readOrder(value: unknown): CustomerOrder | undefined {
  if (!isRecord(value) || !isRecord(value.customer)) return undefined;
  const { id, offeredPrice, priority, deadlineDay, createdDay, status, closedDay } = value;
  const { name, kind } = value.customer;
  const requestedItems = readArray(value.requestedItems, readLine);
  if (!isPositiveInteger(id) || typeof name !== 'string' || !isCustomerKind(kind)) return undefined;
  if (!requestedItems || requestedItems.length === 0) return undefined;
  if (!isPositiveInteger(offeredPrice) || !isPriority(priority) || !isStatus(status)) return undefined;
  if (!isPositiveInteger(deadlineDay) || !isPositiveInteger(createdDay)) return undefined;

  const order: CustomerOrder = {
    id: createOrderId(id),
    customer: { name, kind },
    requestedItems,
    offeredPrice,
    priority,
    deadlineDay,
    createdDay,
    status,
  };
  if (closedDay !== undefined) {
    if (!isPositiveInteger(closedDay)) return undefined;
    order.closedDay = closedDay;
  }
  return order;
}

function readActivity(value: unknown): ActivityRecord | undefined {
  if (!isRecord(value)) return undefined;
  const { day, minute, message } = value;
  if (!isPositiveInteger(day) || !isNonNegativeInteger(minute) || typeof message !== 'string') return undefined;
  return { day, minute, message };
}

function readAnalytics(value: unknown): AnalyticsState | undefined {
  if (!isRecord(value)) return undefined;
  const {
    totalRevenue,
    totalPurchases,
    liquidationRevenue,
    ordersCompleted,
    ordersExpired,
    ordersDeclined,
    cardsSold,
    cardsExpired,
    expiredLoss,
    bestDayRevenue,
  } = value;
  if (
    !isNonNegativeInteger(totalRevenue) ||
    !isNonNegativeInteger(totalPurchases) ||
    !isNonNegativeInteger(liquidationRevenue) ||
    !isNonNegativeInteger(ordersCompleted) ||
    !isNonNegativeInteger(ordersExpired) ||
    !isNonNegativeInteger(ordersDeclined) ||
    !isNonNegativeInteger(cardsSold) ||
    !isNonNegativeInteger(cardsExpired) ||
    !isNonNegativeInteger(expiredLoss) ||
    !isNonNegativeInteger(bestDayRevenue)
  ) {
    return undefined;
  }

  const dailyRevenues = readArray(value.dailyRevenues, (v) => (isNonNegativeInteger(v) ? v : undefined));
  const profitMarginsBps = readArray(value.profitMarginsBps, (v) => (isInteger(v) ? v : undefined));
  if (!dailyRevenues || !profitMarginsBps) return undefined;

  return {
    totalRevenue,
    totalPurchases,
    liquidationRevenue,
    ordersCompleted,
    ordersExpired,
    ordersDeclined,
    cardsSold,
    cardsExpired,
    expiredLoss,
    bestDayRevenue,
    dailyRevenues,
    profitMarginsBps,
  };
}

function readAchievementProgress(value: unknown): AchievementProgress | undefined {
  if (!isRecord(value)) return undefined;
  const { id, progress, unlockedDay } = value;
  if (!isAchievementId(id) || !isInteger(progress)) return undefined;
  const entry: AchievementProgress = { id, progress };
  if (unlockedDay !== undefined) {
    if (!isPositiveInteger(unlockedDay)) return undefined;
    entry.unlockedDay = unlockedDay;
  }
  return entry;
}

function readAchievements(value: unknown): AchievementsState | undefined {
  if (!isRecord(value)) return undefined;
  const { ordersCompletedToday, perfectDayStreak, efficientDayStreak, winterProfit } = value;
  if (
    !isNonNegativeInteger(ordersCompletedToday) ||
    !isNonNegativeInteger(perfectDayStreak) ||
    !isNonNegativeInteger(efficientDayStreak) ||
    !isInteger(winterProfit)
  ) {
    return undefined;
  }

  const progress = readArray(value.progress, readAchievementProgress);
  const seasonsSeen = readArray(value.seasonsSeen, (v) => (isSeason(v) ? v : undefined));
  if (!progress || !seasonsSeen) return undefined;
  if (new Set(progress.map((p) => p.id)).size !== progress.length) return undefined;

  return { progress, ordersCompletedToday, perfectDayStreak, efficientDayStreak, winterProfit, seasonsSeen };
}
