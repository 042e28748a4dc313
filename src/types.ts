/**
 * Gift Card Empire Core Types
 *
 * Foundational types for the simulation engine and everything that reads it.
 * All money values are integer cents.
 */

// ============================================================================
// IDENTIFIERS (branded types for type safety)
// ============================================================================

export type OrderId = number & { readonly __brand: 'OrderId' };
export type LotId = number & { readonly __brand: 'LotId' };
export type SaveId = string & { readonly __brand: 'SaveId' };

// ID factories
export const createOrderId = (id: number): OrderId => id as OrderId;
export const createLotId = (id: number): LotId => id as LotId;
export const createSaveId = (id: string): SaveId => id as SaveId;

/** Integer number of cents. */
export type Cents = number;

/** Fraction expressed in basis points (10000 = 100%). */
export type BasisPoints = number;

export interface IntRange {
  min: number;
  max: number;
}

// ============================================================================
// TIME
// ============================================================================

export const MINUTES_PER_DAY = 1440;

export interface GameTime {
  day: number; // >= 1
  minuteOfDay: number; // 0..1439
}

export interface ClockRatio {
  /** Simulated minutes that pass per `realMs` of wall-clock time */
  simMinutes: number;
  realMs: number;
}

export type Season = 'Spring' | 'Summer' | 'Fall' | 'Winter';

// ============================================================================
// MARKET
// ============================================================================

export type RetailerName = 'Amazon' | 'Starbucks' | 'Target' | 'iTunes' | 'Walmart';

export interface CatalogEntry {
  denomination: Cents;
  wholesalePrice: Cents;
}

export interface Retailer {
  name: RetailerName;
  catalog: readonly CatalogEntry[];
}

export interface BulkDiscountTier {
  minQuantity: number;
  discountBps: BasisPoints;
}

export interface MarketListing {
  retailer: RetailerName;
  denomination: Cents;
  wholesalePrice: Cents;
  available: boolean;
}

// ============================================================================
// INVENTORY
// ============================================================================

export interface GiftCardLot {
  id: LotId;
  retailer: RetailerName;
  denomination: Cents;
  unitCost: Cents;
  quantity: number;
  purchaseDay: number;
  expirationDay: number;
}

export interface ExpiredLot {
  lot: GiftCardLot;
  /** Full purchase value lost */
  loss: Cents;
}

/** A slice of one lot that was removed to satisfy a request. */
export interface ConsumedPortion {
  lotId: LotId;
  retailer: RetailerName;
  denomination: Cents;
  quantity: number;
  unitCost: Cents;
}

// ============================================================================
// ORDERS
// ============================================================================

export type OrderPriority = 'High' | 'Medium' | 'Low';

export type OrderStatus = 'Pending' | 'Fulfilled' | 'Expired' | 'Declined';

export type CustomerKind = 'casual' | 'regular' | 'corporate';

export interface CustomerProfile {
  name: string;
  kind: CustomerKind;
}

export interface OrderLine {
  retailer: RetailerName;
  denomination: Cents;
  quantity: number;
}

export interface CustomerOrder {
  id: OrderId;
  customer: CustomerProfile;
  requestedItems: OrderLine[];
  offeredPrice: Cents;
  priority: OrderPriority;
  deadlineDay: number;
  createdDay: number;
  status: OrderStatus;
  /** Day the order left the Pending state */
  closedDay?: number;
}

// ============================================================================
// PLAYER & ACTIVITY
// ============================================================================

export interface Player {
  cash: Cents;
  reputation: number;
}

export interface ActivityRecord {
  day: number;
  minute: number;
  message: string;
}

// ============================================================================
// ANALYTICS
// ============================================================================

export interface AnalyticsState {
  totalRevenue: Cents;
  totalPurchases: Cents;
  liquidationRevenue: Cents;
  ordersCompleted: number;
  ordersExpired: number;
  ordersDeclined: number;
  cardsSold: number;
  cardsExpired: number;
  expiredLoss: Cents;
  bestDayRevenue: Cents;
  /** Revenue per day, oldest first, current day last */
  dailyRevenues: Cents[];
  /** Margin of each fulfilled order in basis points */
  profitMarginsBps: BasisPoints[];
}

// ============================================================================
// ACHIEVEMENTS
// ============================================================================

export type AchievementId =
  | 'FirstSale'
  | 'EarlyBird'
  | 'CustomerFavorite'
  | 'TrustedSeller'
  | 'Entrepreneur'
  | 'BusinessMogul'
  | 'Millionaire'
  | 'LegendaryStatus'
  | 'SpeedDemon'
  | 'PerfectWeek'
  | 'EfficiencyExpert'
  | 'WinterWinner'
  | 'SeasonVeteran'
  | 'Collector'
  | 'DiversifiedPortfolio'
  | 'QuickTurnaround';

export interface AchievementProgress {
  id: AchievementId;
  /** Best value reached so far */
  progress: number;
  unlockedDay?: number;
}

export interface AchievementsState {
  progress: AchievementProgress[];
  ordersCompletedToday: number;
  perfectDayStreak: number;
  efficientDayStreak: number;
  /** Profit from orders completed in the current or latest Winter */
  winterProfit: Cents;
  seasonsSeen: Season[];
}

export interface AchievementView {
  id: AchievementId;
  name: string;
  description: string;
  progress: number;
  target: number;
  rewardCash: Cents;
  unlocked: boolean;
  unlockedDay: number | null;
}

// ============================================================================
// COMMANDS
// ============================================================================

export type Command =
  | { type: 'Purchase'; retailer: RetailerName; denomination: Cents; quantity: number }
  | { type: 'AcceptOrder'; orderId: OrderId }
  | { type: 'DeclineOrder'; orderId: OrderId }
  | { type: 'Pause' }
  | { type: 'Resume' }
  | { type: 'LiquidateLot'; lotId: LotId };

export type CommandType = Command['type'];

export type CommandFailureKind =
  | 'InsufficientFunds'
  | 'InsufficientStock'
  | 'UnfulfillableOrder'
  | 'UnknownOrder'
  | 'InvalidCommand';

export interface CommandFailure {
  kind: CommandFailureKind;
  message: string;
}

export type CommandOutcome =
  | { type: 'Purchase'; lot: GiftCardLot; totalCost: Cents }
  | {
      type: 'AcceptOrder';
      orderId: OrderId;
      revenue: Cents;
      costBasis: Cents;
      profit: Cents;
      reputationDelta: number;
    }
  | { type: 'DeclineOrder'; orderId: OrderId }
  | { type: 'Pause'; changed: boolean }
  | { type: 'Resume'; changed: boolean }
  | { type: 'LiquidateLot'; lotId: LotId; quantity: number; proceeds: Cents };

export type CommandResult =
  | { ok: true; outcome: CommandOutcome }
  | { ok: false; error: CommandFailure };

export type Result<T, E = CommandFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ============================================================================
// DIFFICULTY
// ============================================================================

export type DifficultyName = 'easy' | 'normal' | 'hard';

export interface DifficultyPreset {
  name: DifficultyName;
  startingCash: Cents;
  /** Offered price multiplier band over face value */
  profitMarginBand: { minBps: BasisPoints; maxBps: BasisPoints };
  expirationRangeDays: IntRange;
  orderDeadlineRangeDays: IntRange;
}

// ============================================================================
// SNAPSHOT (read-only view for the display layer)
// ============================================================================

export interface InventoryGroupView {
  retailer: RetailerName;
  denomination: Cents;
  totalQuantity: number;
  soonestExpirationDay: number;
  daysUntilSoonestExpiration: number;
  expiringSoon: boolean;
  lots: GiftCardLot[];
}

export interface OrderView extends CustomerOrder {
  daysRemaining: number;
  faceValue: Cents;
}

export interface MarketQuoteView extends MarketListing {
  unitPrice: Cents;
}

export interface AnalyticsView extends AnalyticsState {
  averageProfitMarginBps: BasisPoints;
  recentDailyAverage: Cents;
  totalProfit: Cents;
}

export interface Snapshot {
  version: number;
  difficulty: DifficultyName;
  time: GameTime & { label: string };
  paused: boolean;
  season: Season;
  player: Player & { stars: number; reputationLabel: string };
  inventory: InventoryGroupView[];
  orders: OrderView[];
  market: MarketQuoteView[];
  analytics: AnalyticsView;
  achievements: AchievementView[];
  activity: ActivityRecord[];
}

// ============================================================================
// PERSISTED STATE (encoding-agnostic)
// ============================================================================

export const ENGINE_STATE_FORMAT = 2;

export interface EngineState {
  format: typeof ENGINE_STATE_FORMAT;
  seed: number;
  difficulty: DifficultyName;
  clock: { time: GameTime; paused: boolean; carry: number };
  player: Player;
  lots: GiftCardLot[];
  nextLotId: number;
  orders: CustomerOrder[];
  closedOrders: CustomerOrder[];
  nextOrderId: number;
  unavailable: Array<{ retailer: RetailerName; denomination: Cents }>;
  orderRng: number;
  lotRng: number;
  activity: ActivityRecord[];
  analytics: AnalyticsState;
  achievements: AchievementsState;
  version: number;
}
