/**
 * Achievement Tracker Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ACHIEVEMENTS,
  AchievementTracker,
  emptyAchievements,
  type SaleFacts,
} from '../../src/simulation/achievements.js';
import { createLotId, type GiftCardLot, type RetailerName } from '../../src/types.js';

const sale = (overrides: Partial<SaleFacts> = {}): SaleFacts => ({
  day: 3,
  season: 'Spring',
  profit: 500,
  ordersCompleted: 1,
  stars: 3,
  newestCardAgeDays: 10,
  ...overrides,
});

const quietDay = (day: number) => ({
  day,
  season: 'Spring' as const,
  seasonBegan: false,
  ordersExpiredToday: 0,
  ordersCompleted: 0,
  ordersExpired: 0,
});

const lot = (id: number, retailer: RetailerName, quantity: number): GiftCardLot => ({
  id: createLotId(id),
  retailer,
  denomination: 2500,
  unitCost: 2000,
  quantity,
  purchaseDay: 1,
  expirationDay: 60,
});

const ids = (unlocks: Array<{ id: string }>) => unlocks.map((u) => u.id);

describe('AchievementTracker', () => {
  let tracker: AchievementTracker;

  beforeEach(() => {
    tracker = new AchievementTracker(emptyAchievements('Spring'));
  });

  it('should start with every achievement locked', () => {
    const view = tracker.view();
    expect(view).toHaveLength(ACHIEVEMENTS.length);
    expect(view.every((a) => !a.unlocked && a.progress === 0 && a.unlockedDay === null)).toBe(true);
  });

  it('should unlock the first sale once', () => {
    expect(tracker.recordSale(sale())).toEqual([{ id: 'FirstSale', name: 'First Sale', reward: 10_000 }]);
    expect(tracker.recordSale(sale({ ordersCompleted: 2 }))).toEqual([]);

    const firstSale = tracker.view().find((a) => a.id === 'FirstSale');
    expect(firstSale).toMatchObject({ unlocked: true, unlockedDay: 3, progress: 1 });
  });

  it('should unlock cash milestones as balances cross them', () => {
    expect(ids(tracker.checkHoldings({ day: 5, cash: 999_999, lots: [] }))).toEqual([]);
    expect(ids(tracker.checkHoldings({ day: 5, cash: 1_000_000, lots: [] }))).toEqual(['Entrepreneur']);
    expect(ids(tracker.checkHoldings({ day: 6, cash: 1_000_000, lots: [] }))).toEqual([]);
    expect(ids(tracker.checkHoldings({ day: 9, cash: 5_000_000, lots: [] }))).toEqual(['BusinessMogul']);
  });

  it('should reward a large and varied inventory', () => {
    const lots = [
      lot(1, 'Amazon', 60),
      lot(2, 'Starbucks', 10),
      lot(3, 'Target', 10),
      lot(4, 'iTunes', 10),
      lot(5, 'Walmart', 10),
    ];
    expect(ids(tracker.checkHoldings({ day: 2, cash: 0, lots }))).toEqual(['Collector', 'DiversifiedPortfolio']);
  });

  it('should count five completions in one day as a speed run', () => {
    const unlocks = [1, 2, 3, 4, 5].flatMap((n) => ids(tracker.recordSale(sale({ ordersCompleted: n }))));
    expect(unlocks).toEqual(['FirstSale', 'SpeedDemon']);
  });

  it('should reset the daily completion count at the start of a day', () => {
    for (const n of [1, 2, 3, 4]) tracker.recordSale(sale({ ordersCompleted: n }));
    tracker.startDay(quietDay(4));
    expect(ids(tracker.recordSale(sale({ day: 4, ordersCompleted: 5 })))).toEqual([]);
    expect(tracker.isUnlocked('SpeedDemon')).toBe(false);
  });

  it('should reward selling freshly bought cards', () => {
    expect(ids(tracker.recordSale(sale({ newestCardAgeDays: 3 })))).toEqual(['FirstSale', 'QuickTurnaround']);
  });

  it('should need seven perfect days in a row', () => {
    let completed = 0;
    const perfectDay = (day: number) => {
      completed += 1;
      tracker.recordSale(sale({ day, ordersCompleted: completed }));
      return ids(tracker.startDay({ ...quietDay(day + 1), ordersCompleted: completed }));
    };

    for (let day = 1; day <= 6; day++) perfectDay(day);
    tracker.recordSale(sale({ day: 7, ordersCompleted: ++completed }));
    tracker.startDay({ ...quietDay(8), ordersExpiredToday: 1, ordersCompleted: completed, ordersExpired: 1 });

    for (let day = 8; day <= 13; day++) {
      expect(perfectDay(day)).not.toContain('PerfectWeek');
    }
    expect(perfectDay(14)).toContain('PerfectWeek');
  });

  it('should track a 90% success rate over 30 days', () => {
    let unlockedOn: number | undefined;
    for (let day = 2; day <= 31; day++) {
      const unlocks = tracker.startDay({ ...quietDay(day), ordersCompleted: 9, ordersExpired: 1 });
      if (ids(unlocks).includes('EfficiencyExpert')) unlockedOn = day;
    }
    expect(unlockedOn).toBe(31);
  });

  it('should restart the efficiency streak when the rate drops', () => {
    for (let day = 2; day <= 30; day++) {
      tracker.startDay({ ...quietDay(day), ordersCompleted: 9, ordersExpired: 1 });
    }
    tracker.startDay({ ...quietDay(31), ordersCompleted: 8, ordersExpired: 2 });
    expect(tracker.isUnlocked('EfficiencyExpert')).toBe(false);
    expect(tracker.toState().efficientDayStreak).toBe(0);
  });

  it('should unlock after trading through every season', () => {
    expect(ids(tracker.startDay({ ...quietDay(91), season: 'Summer', seasonBegan: true }))).toEqual([]);
    expect(ids(tracker.startDay({ ...quietDay(181), season: 'Fall', seasonBegan: true }))).toEqual([]);
    expect(ids(tracker.startDay({ ...quietDay(271), season: 'Winter', seasonBegan: true }))).toEqual([
      'SeasonVeteran',
    ]);
  });

  it('should count Winter profit per Winter', () => {
    tracker.recordSale(sale({ day: 271, season: 'Winter', profit: 300_000, ordersCompleted: 1 }));
    tracker.startDay({ ...quietDay(631), season: 'Winter', seasonBegan: true });

    expect(ids(tracker.recordSale(sale({ day: 631, season: 'Winter', profit: 300_000, ordersCompleted: 2 })))).toEqual([]);
    expect(ids(tracker.recordSale(sale({ day: 631, season: 'Winter', profit: 200_000, ordersCompleted: 3 })))).toEqual([
      'WinterWinner',
    ]);
  });

  it('should carry progress through its saved state', () => {
    tracker.recordSale(sale());
    tracker.startDay({ ...quietDay(4), season: 'Summer', seasonBegan: true, ordersCompleted: 1 });

    const copy = new AchievementTracker(tracker.toState());
    expect(copy.view()).toEqual(tracker.view());
    expect(copy.toState()).toEqual(tracker.toState());
    expect(copy.toState().seasonsSeen).toEqual(['Spring', 'Summer']);
  });
});
