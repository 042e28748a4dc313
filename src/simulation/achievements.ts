/**
 * Achievements
 *
 * One-off milestones. Each unlocks at most once per game and pays a cash
 * reward, which the engine credits and logs. The tracker only keeps
 * progress; it never touches the wallet itself.
 */

import type {
  AchievementId,
  AchievementProgress,
  AchievementView,
  AchievementsState,
  Cents,
  GiftCardLot,
  Season,
} from '../types.js';

// =============================================================================
// DEFINITIONS
// =============================================================================

export interface AchievementDefinition {
  id: AchievementId;
  name: string;
  description: string;
  target: number;
  reward: Cents;
}

export const ACHIEVEMENTS: readonly AchievementDefinition[] = [
  { id: 'FirstSale', name: 'First Sale', description: 'Complete your first customer order', target: 1, reward: 10_000 },
  { id: 'EarlyBird', name: 'Early Bird', description: 'Complete 10 customer orders', target: 10, reward: 50_000 },
  { id: 'CustomerFavorite', name: 'Customer Favorite', description: 'Complete 100 customer orders', target: 100, reward: 300_000 },
  { id: 'TrustedSeller', name: 'Trusted Seller', description: 'Complete 500 customer orders', target: 500, reward: 1_000_000 },
  { id: 'Entrepreneur', name: 'Entrepreneur', description: 'Hold $10,000 in cash', target: 1_000_000, reward: 100_000 },
  { id: 'BusinessMogul', name: 'Business Mogul', description: 'Hold $50,000 in cash', target: 5_000_000, reward: 500_000 },
  { id: 'Millionaire', name: 'Millionaire', description: 'Hold $1,000,000 in cash', target: 100_000_000, reward: 5_000_000 },
  { id: 'LegendaryStatus', name: 'Legendary Status', description: 'Reach a 5-star reputation', target: 5, reward: 200_000 },
  { id: 'SpeedDemon', name: 'Speed Demon', description: 'Complete 5 orders in a single day', target: 5, reward: 150_000 },
  { id: 'PerfectWeek', name: 'Perfect Week', description: '7 days in a row with orders completed and none expired', target: 7, reward: 200_000 },
  { id: 'EfficiencyExpert', name: 'Efficiency Expert', description: 'Keep a 90%+ order success rate for 30 days', target: 30, reward: 300_000 },
  { id: 'WinterWinner', name: 'Winter Winner', description: 'Earn $5,000 profit in one Winter', target: 500_000, reward: 200_000 },
  { id: 'SeasonVeteran', name: 'Season Veteran', description: 'Trade through all 4 seasons', target: 4, reward: 300_000 },
  { id: 'Collector', name: 'Collector', description: 'Hold 100 or more gift cards at once', target: 100, reward: 200_000 },
  { id: 'DiversifiedPortfolio', name: 'Diversified Portfolio', description: 'Hold cards from all 5 retailers', target: 5, reward: 100_000 },
  { id: 'QuickTurnaround', name: 'Quick Turnaround', description: 'Sell cards within 3 days of buying them', target: 1, reward: 150_000 },
];

export const ACHIEVEMENT_IDS: readonly AchievementId[] = ACHIEVEMENTS.map((a) => a.id);

export const QUICK_TURNAROUND_DAYS = 3;

const ORDER_COUNT_MILESTONES = ['FirstSale', 'EarlyBird', 'CustomerFavorite', 'TrustedSeller'] as const;
const CASH_MILESTONES = ['Entrepreneur', 'BusinessMogul', 'Millionaire'] as const;

export interface Unlock {
  id: AchievementId;
  name: string;
  reward: Cents;
}

/** A completed order, as the tracker sees it. */
export interface SaleFacts {
  day: number;
  season: Season;
  profit: Cents;
  /** Lifetime completed orders, this one included */
  ordersCompleted: number;
  stars: number;
  /** Days since the most recently bought card in the order was purchased */
  newestCardAgeDays: number;
}

export interface HoldingsFacts {
  day: number;
  cash: Cents;
  lots: readonly GiftCardLot[];
}

/** The day that just ended, reported at the start of the next daily pass. */
export interface DayFacts {
  day: number;
  season: Season;
  /** The new day opens a season */
  seasonBegan: boolean;
  ordersExpiredToday: number;
  ordersCompleted: number;
  ordersExpired: number;
}

export function emptyAchievements(openingSeason: Season): AchievementsState {
  return {
    progress: ACHIEVEMENTS.map((a) => ({ id: a.id, progress: 0 })),
    ordersCompletedToday: 0,
    perfectDayStreak: 0,
    efficientDayStreak: 0,
    winterProfit: 0,
    seasonsSeen: [openingSeason],
  };
}

// =============================================================================
// TRACKER
// =============================================================================

export class AchievementTracker {
  private readonly progress = new Map<AchievementId, AchievementProgress>();
  private ordersCompletedToday: number;
  private perfectDayStreak: number;
  private efficientDayStreak: number;
  private winterProfit: Cents;
  private readonly seasonsSeen: Season[];

  constructor(state: AchievementsState) {
    for (const { id } of ACHIEVEMENTS) {
      this.progress.set(id, { id, progress: 0 });
    }
    for (const entry of state.progress) {
      this.progress.set(entry.id, { ...entry });
    }
    this.ordersCompletedToday = state.ordersCompletedToday;
    this.perfectDayStreak = state.perfectDayStreak;
    this.efficientDayStreak = state.efficientDayStreak;
    this.winterProfit = state.winterProfit;
    this.seasonsSeen = [...state.seasonsSeen];
  }

  recordSale(facts: SaleFacts): Unlock[] {
    const unlocks: Unlock[] = [];
    this.ordersCompletedToday += 1;

    for (const id of ORDER_COUNT_MILESTONES) {
      this.advance(id, facts.ordersCompleted, facts.day, unlocks);
    }
    this.advance('LegendaryStatus', facts.stars, facts.day, unlocks);
    this.advance('SpeedDemon', this.ordersCompletedToday, facts.day, unlocks);
    if (facts.newestCardAgeDays <= QUICK_TURNAROUND_DAYS) {
      this.advance('QuickTurnaround', 1, facts.day, unlocks);
    }
    if (facts.season === 'Winter') {
      this.winterProfit += facts.profit;
      this.advance('WinterWinner', this.winterProfit, facts.day, unlocks);
    }
    return unlocks;
  }

  checkHoldings(facts: HoldingsFacts): Unlock[] {
    const unlocks: Unlock[] = [];
    for (const id of CASH_MILESTONES) {
      this.advance(id, facts.cash, facts.day, unlocks);
    }
    const cards = facts.lots.reduce((sum, lot) => sum + lot.quantity, 0);
    this.advance('Collector', cards, facts.day, unlocks);
    this.advance('DiversifiedPortfolio', new Set(facts.lots.map((lot) => lot.retailer)).size, facts.day, unlocks);
    return unlocks;
  }

  /**
   * Close the books on the previous day: streaks, season tracking, and the
   * daily order counter.
   */
  startDay(facts: DayFacts): Unlock[] {
    const unlocks: Unlock[] = [];

    if (this.ordersCompletedToday > 0 && facts.ordersExpiredToday === 0) {
      this.perfectDayStreak += 1;
    } else {
      this.perfectDayStreak = 0;
    }
    this.advance('PerfectWeek', this.perfectDayStreak, facts.day, unlocks);

    const settled = facts.ordersCompleted + facts.ordersExpired;
    if (settled > 0) {
      // 90% without floating point
      this.efficientDayStreak = facts.ordersCompleted * 10 >= settled * 9 ? this.efficientDayStreak + 1 : 0;
    }
    this.advance('EfficiencyExpert', this.efficientDayStreak, facts.day, unlocks);

    this.ordersCompletedToday = 0;

    if (facts.seasonBegan && facts.season === 'Winter') {
      this.winterProfit = 0;
    }
    if (!this.seasonsSeen.includes(facts.season)) {
      this.seasonsSeen.push(facts.season);
    }
    this.advance('SeasonVeteran', this.seasonsSeen.length, facts.day, unlocks);

    return unlocks;
  }

  isUnlocked(id: AchievementId): boolean {
    return this.progress.get(id)?.unlockedDay !== undefined;
  }

  view(): AchievementView[] {
    return ACHIEVEMENTS.map((def) => {
      const entry = this.progress.get(def.id);
      return {
        id: def.id,
        name: def.name,
        description: def.description,
        progress: Math.min(entry?.progress ?? 0, def.target),
        target: def.target,
        rewardCash: def.reward,
        unlocked: entry?.unlockedDay !== undefined,
        unlockedDay: entry?.unlockedDay ?? null,
      };
    });
  }

  toState(): AchievementsState {
    return {
      progress: ACHIEVEMENTS.map((def) => ({ ...(this.progress.get(def.id) ?? { id: def.id, progress: 0 }) })),
      ordersCompletedToday: this.ordersCompletedToday,
      perfectDayStreak: this.perfectDayStreak,
      efficientDayStreak: this.efficientDayStreak,
      winterProfit: this.winterProfit,
      seasonsSeen: [...this.seasonsSeen],
    };
  }

  private advance(id: AchievementId, value: number, day: number, unlocks: Unlock[]): void {
    const entry = this.progress.get(id);
    const def = ACHIEVEMENTS.find((a) => a.id === id);
    if (!entry || !def || entry.unlockedDay !== undefined) return;

    entry.progress = Math.max(entry.progress, value);
    if (entry.progress >= def.target) {
      entry.unlockedDay = day;
      unlocks.push({ id, name: def.name, reward: def.reward });
    }
  }
}
