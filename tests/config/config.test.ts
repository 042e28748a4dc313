/**
 * Configuration Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  DEADLINE_LIMITS_DAYS,
  DIFFICULTY_PRESETS,
  OFFER_BAND_LIMITS,
  loadServerConfig,
} from '../../src/config.js';

describe('loadServerConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should read settings from the environment', () => {
    const config = loadServerConfig({
      PORT: '8080',
      GAME_DB_PATH: '/tmp/test-saves.db',
      GAME_DIFFICULTY: 'hard',
      GAME_SEED: '1234',
      TICK_INTERVAL_MS: '100',
    });
    expect(config).toEqual({
      port: 8080,
      dbPath: '/tmp/test-saves.db',
      difficulty: 'hard',
      seed: 1234,
      tickIntervalMs: 100,
    });
  });

  it('should fall back to defaults', () => {
    const config = loadServerConfig({});
    expect(config.port).toBe(3000);
    expect(config.dbPath).toBe('./giftcard-empire.db');
    expect(config.difficulty).toBe('normal');
    expect(config.tickIntervalMs).toBe(250);
    expect(Number.isInteger(config.seed)).toBe(true);
  });

  it('should warn about an unknown difficulty', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(loadServerConfig({ GAME_DIFFICULTY: 'brutal' }).difficulty).toBe('normal');
    expect(warn).toHaveBeenCalledWith('[Config] Unknown GAME_DIFFICULTY "brutal", using normal');
  });

  it('should ignore unusable numbers', () => {
    const config = loadServerConfig({ PORT: 'abc', TICK_INTERVAL_MS: '0' });
    expect(config.port).toBe(3000);
    expect(config.tickIntervalMs).toBe(250);
  });
});

describe('DIFFICULTY_PRESETS', () => {
  it('should describe the normal game', () => {
    expect(DIFFICULTY_PRESETS.normal).toEqual({
      name: 'normal',
      startingCash: 500_000,
      profitMarginBand: { minBps: 10_500, maxBps: 13_000 },
      expirationRangeDays: { min: 30, max: 90 },
      orderDeadlineRangeDays: { min: 2, max: 6 },
    });
  });

  it('should make harder games poorer', () => {
    expect(DIFFICULTY_PRESETS.easy.startingCash).toBeGreaterThan(DIFFICULTY_PRESETS.normal.startingCash);
    expect(DIFFICULTY_PRESETS.hard.startingCash).toBeLessThan(DIFFICULTY_PRESETS.normal.startingCash);
  });

  it('should keep every offer band and deadline range inside the pricing policy', () => {
    for (const preset of Object.values(DIFFICULTY_PRESETS)) {
      const { minBps, maxBps } = preset.profitMarginBand;
      expect(minBps).toBeGreaterThanOrEqual(OFFER_BAND_LIMITS.minBps);
      expect(maxBps).toBeLessThanOrEqual(OFFER_BAND_LIMITS.maxBps);
      expect(minBps).toBeLessThanOrEqual(maxBps);

      const { min, max } = preset.orderDeadlineRangeDays;
      expect(min).toBeGreaterThanOrEqual(DEADLINE_LIMITS_DAYS.min);
      expect(max).toBeLessThanOrEqual(DEADLINE_LIMITS_DAYS.max);
      expect(min).toBeLessThanOrEqual(max);
    }
  });
});
