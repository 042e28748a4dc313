/**
 * Snapshot Tests
 */

import { describe, it, expect } from 'vitest';
import { buildSnapshot, groupInventory } from '../../src/simulation/snapshot.js';
import { Market } from '../../src/simulation/market.js';
import { Reputation } from '../../src/simulation/reputation.js';
import { Analytics } from '../../src/simulation/analytics.js';
import { AchievementTracker, emptyAchievements } from '../../src/simulation/achievements.js';
import { createLotId, createOrderId, type GiftCardLot } from '../../src/types.js';

const lots: GiftCardLot[] = [
  { id: createLotId(1), retailer: 'Starbucks', denomination: 1000, quantity: 2, unitCost: 800, purchaseDay: 1, expirationDay: 20 },
  { id: createLotId(2), retailer: 'Amazon', denomination: 2500, quantity: 1, unitCost: 2000, purchaseDay: 1, expirationDay: 50 },
  { id: createLotId(3), retailer: 'Starbucks', denomination: 1000, quantity: 1, unitCost: 790, purchaseDay: 1, expirationDay: 10 },
];

describe('groupInventory', () => {
  it('should group lots by retailer and denomination', () => {
    const groups = groupInventory(lots, 1);
    expect(groups.map((g) => [g.retailer, g.denomination, g.totalQuantity])).toEqual([
      ['Amazon', 2500, 1],
      ['Starbucks', 1000, 3],
    ]);
  });

  it('should flag groups about to expire', () => {
    const [amazon, starbucks] = groupInventory(lots, 1);
    expect(amazon.daysUntilSoonestExpiration).toBe(49);
    expect(amazon.expiringSoon).toBe(false);
    expect(starbucks.soonestExpirationDay).toBe(10);
    expect(starbucks.daysUntilSoonestExpiration).toBe(9);
    expect(starbucks.expiringSoon).toBe(true);
    expect(starbucks.lots.map((l) => l.id)).toEqual([3, 1]);
  });
});

describe('buildSnapshot', () => {
  const build = () =>
    buildSnapshot({
      version: 4,
      difficulty: 'normal',
      time: { day: 2, minuteOfDay: 600 },
      paused: false,
      cash: 123_400,
      reputation: new Reputation(),
      lots,
      orders: [
        {
          id: createOrderId(1000),
          customer: { name: 'Iris', kind: 'casual' },
          requestedItems: [{ retailer: 'Starbucks', denomination: 1000, quantity: 2 }],
          offeredPrice: 2400,
          priority: 'Low',
          deadlineDay: 5,
          createdDay: 2,
          status: 'Pending',
        },
      ],
      market: new Market(),
      analytics: new Analytics().view(),
      achievements: new AchievementTracker(emptyAchievements('Spring')).view(),
      activity: [{ day: 2, minute: 600, message: 'hello' }],
    });

  it('should shape state for display', () => {
    const snapshot = build();
    expect(snapshot.version).toBe(4);
    expect(snapshot.time).toEqual({ day: 2, minuteOfDay: 600, label: '10:00 AM' });
    expect(snapshot.season).toBe('Spring');
    expect(snapshot.player).toEqual({ cash: 123_400, reputation: 300, stars: 3, reputationLabel: 'Good' });
    expect(snapshot.orders[0].daysRemaining).toBe(3);
    expect(snapshot.orders[0].faceValue).toBe(2000);
    expect(snapshot.market).toHaveLength(11);
    expect(snapshot.market.find((q) => q.retailer === 'Starbucks' && q.denomination === 1000)?.unitPrice).toBe(800);
    expect(snapshot.achievements).toHaveLength(16);
    expect(snapshot.achievements[0]).toEqual({
      id: 'FirstSale',
      name: 'First Sale',
      description: 'Complete your first customer order',
      progress: 0,
      target: 1,
      rewardCash: 10_000,
      unlocked: false,
      unlockedDay: null,
    });
  });

  it('should be deeply frozen', () => {
    const snapshot = build();
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.player)).toBe(true);
    expect(Object.isFrozen(snapshot.orders[0].requestedItems[0])).toBe(true);
    expect(Object.isFrozen(snapshot.inventory[0].lots[0])).toBe(true);
    expect(Object.isFrozen(snapshot.analytics.dailyRevenues)).toBe(true);
  });

  it('should not alias its inputs', () => {
    const snapshot = build();
    expect(Object.isFrozen(lots[0])).toBe(false);
    expect(snapshot.inventory[1].lots[1]).not.toBe(lots[0]);
  });
});
