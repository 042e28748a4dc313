/**
 * Reputation
 *
 * Bounded integer score in hundredths of a star. Fulfilling early earns more
 * (with diminishing returns); missing a high-priority order costs more.
 */

import type { CustomerOrder } from '../types.js';
import { REPUTATION_DEFAULTS, type ReputationConfig } from '../config.js';

const LABELS = ['Unknown', 'Poor', 'Fair', 'Good', 'Excellent', 'Legendary'] as const;

export class Reputation {
  private score: number;
  private readonly config: ReputationConfig;

  constructor(config: ReputationConfig = REPUTATION_DEFAULTS, initial?: number) {
    this.config = config;
    this.score = this.clamp(initial ?? config.initial);
  }

  value(): number {
    return this.score;
  }

  /** Share of the scale, 0..1. */
  ratio(): number {
    return (this.score - this.config.min) / (this.config.max - this.config.min);
  }

  /** Whole stars, 0..5. */
  stars(): number {
    const { min, max } = this.config;
    return Math.floor(((this.score - min) * 5) / (max - min));
  }

  label(): string {
    return LABELS[Math.min(this.stars(), LABELS.length - 1)];
  }

  /**
   * Reward for a fulfilled order. Returns the applied change after clamping.
   */
  onOrderFulfilled(order: CustomerOrder, currentDay: number): number {
    const window = Math.max(1, order.deadlineDay - order.createdDay);
    const slack = Math.min(window, Math.max(0, order.deadlineDay - currentDay));
    const earliness = slack / window;
    const { minGain, maxGain } = this.config;
    const gain = Math.round(minGain + (maxGain - minGain) * Math.sqrt(earliness));
    return this.adjust(gain);
  }

  /** Penalty for a missed order, scaled by its priority. */
  onOrderExpired(order: CustomerOrder): number {
    return this.adjust(-this.config.expiryPenalty[order.priority]);
  }

  private adjust(delta: number): number {
    const before = this.score;
    this.score = this.clamp(this.score + delta);
    return this.score - before;
  }

  private clamp(value: number): number {
    return Math.min(this.config.max, Math.max(this.config.min, Math.round(value)));
  }
}
