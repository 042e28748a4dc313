/**
 * Business analytics: running totals and recent daily revenue.
 */

import type { AnalyticsState, AnalyticsView, BasisPoints, Cents } from '../types.js';
import { REVENUE_HISTORY_DAYS } from '../config.js';

export function emptyAnalytics(): AnalyticsState {
  return {
    totalRevenue: 0,
    totalPurchases: 0,
    liquidationRevenue: 0,
    ordersCompleted: 0,
    ordersExpired: 0,
    ordersDeclined: 0,
    cardsSold: 0,
    cardsExpired: 0,
    expiredLoss: 0,
    bestDayRevenue: 0,
    dailyRevenues: [0],
    profitMarginsBps: [],
  };
}

export class Analytics {
  private state: AnalyticsState;

  constructor(state: AnalyticsState = emptyAnalytics()) {
    this.state = cloneAnalytics(state);
  }

  recordPurchase(amount: Cents): void {
    this.state.totalPurchases += amount;
  }

  recordSale(revenue: Cents, costBasis: Cents, cards: number): void {
    this.state.totalRevenue += revenue;
    this.state.ordersCompleted += 1;
    this.state.cardsSold += cards;
    if (revenue > 0) {
      this.state.profitMarginsBps.push(Math.round(((revenue - costBasis) * 10_000) / revenue));
    }
    this.addDailyRevenue(revenue);
  }

  recordLiquidation(proceeds: Cents, cards: number): void {
    this.state.totalRevenue += proceeds;
    this.state.liquidationRevenue += proceeds;
    this.state.cardsSold += cards;
    this.addDailyRevenue(proceeds);
  }

  recordExpiredOrder(): void {
    this.state.ordersExpired += 1;
  }

  recordDeclinedOrder(): void {
    this.state.ordersDeclined += 1;
  }

  recordExpiredCards(count: number, loss: Cents): void {
    this.state.cardsExpired += count;
    this.state.expiredLoss += loss;
  }

  startNewDay(): void {
    this.state.dailyRevenues.push(0);
    if (this.state.dailyRevenues.length > REVENUE_HISTORY_DAYS) {
      this.state.dailyRevenues = this.state.dailyRevenues.slice(-REVENUE_HISTORY_DAYS);
    }
  }

  averageProfitMarginBps(): BasisPoints {
    const margins = this.state.profitMarginsBps;
    if (margins.length === 0) return 0;
    return Math.round(margins.reduce((sum, m) => sum + m, 0) / margins.length);
  }

  /** Mean revenue over the last seven recorded days, current day included. */
  recentDailyAverage(): Cents {
    const revenues = this.state.dailyRevenues;
    if (revenues.length <= 1) return 0;
    const recent = revenues.slice(-7);
    return Math.round(recent.reduce((sum, r) => sum + r, 0) / recent.length);
  }

  totalProfit(): Cents {
    return this.state.totalRevenue - this.state.totalPurchases;
  }

  view(): AnalyticsView {
    return {
      ...cloneAnalytics(this.state),
      averageProfitMarginBps: this.averageProfitMarginBps(),
      recentDailyAverage: this.recentDailyAverage(),
      totalProfit: this.totalProfit(),
    };
  }

  toState(): AnalyticsState {
    return cloneAnalytics(this.state);
  }

  private addDailyRevenue(amount: Cents): void {
    if (this.state.dailyRevenues.length === 0) this.state.dailyRevenues.push(0);
    const last = this.state.dailyRevenues.length - 1;
    this.state.dailyRevenues[last] += amount;
    this.state.bestDayRevenue = Math.max(this.state.bestDayRevenue, this.state.dailyRevenues[last]);
  }
}

function cloneAnalytics(state: AnalyticsState): AnalyticsState {
  return {
    ...state,
    dailyRevenues: [...state.dailyRevenues],
    profitMarginsBps: [...state.profitMarginsBps],
  };
}
