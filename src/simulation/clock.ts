/**
 * Simulation Clock
 *
 * Turns wall-clock milliseconds into simulated minutes and reports every
 * day boundary that was crossed. Pausing stops time and nothing else.
 */

import { MINUTES_PER_DAY, type ClockRatio, type GameTime } from '../types.js';
import { DEFAULT_CLOCK_RATIO, OPENING_MINUTE } from '../config.js';

export class Clock {
  private time: GameTime;
  private paused: boolean;
  /** Scaled remainder (elapsed ms x simMinutes) not yet worth a whole minute */
  private carry: number;
  private readonly ratio: ClockRatio;

  constructor(
    ratio: ClockRatio = DEFAULT_CLOCK_RATIO,
    start: GameTime = { day: 1, minuteOfDay: OPENING_MINUTE },
    paused = false,
    carry = 0
  ) {
    if (!(ratio.simMinutes > 0) || !(ratio.realMs > 0)) {
      throw new RangeError('Clock ratio must be positive');
    }
    this.ratio = { ...ratio };
    this.time = { ...start };
    this.paused = paused;
    this.carry = carry;
  }

  /**
   * Advance by real elapsed time. Returns the days that started, in order.
   */
  advance(elapsedMs: number): number[] {
    if (this.paused || !Number.isFinite(elapsedMs) || elapsedMs <= 0) {
      return [];
    }

    this.carry += elapsedMs * this.ratio.simMinutes;
    const minutes = Math.floor(this.carry / this.ratio.realMs);
    if (minutes === 0) return [];
    this.carry -= minutes * this.ratio.realMs;

    const total = this.time.minuteOfDay + minutes;
    const daysCrossed = Math.floor(total / MINUTES_PER_DAY);
    const crossings: number[] = [];
    for (let i = 1; i <= daysCrossed; i++) {
      crossings.push(this.time.day + i);
    }

    this.time = {
      day: this.time.day + daysCrossed,
      minuteOfDay: total % MINUTES_PER_DAY,
    };
    return crossings;
  }

  pause(): boolean {
    const changed = !this.paused;
    this.paused = true;
    return changed;
  }

  resume(): boolean {
    const changed = this.paused;
    this.paused = false;
    return changed;
  }

  isPaused(): boolean {
    return this.paused;
  }

  now(): GameTime {
    return { ...this.time };
  }

  getCarry(): number {
    return this.carry;
  }
}

/** "9:00 AM" style label for a minute of the day. */
export function formatClock(minuteOfDay: number): string {
  const hour = Math.floor(minuteOfDay / 60);
  const minute = minuteOfDay % 60;
  const period = hour < 12 ? 'AM' : 'PM';
  const displayHour = hour === 0 ? 12 : hour > 12 ? hour - 12 : hour;
  return `${displayHour}:${String(minute).padStart(2, '0')} ${period}`;
}
