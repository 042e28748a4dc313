/**
 * Order Book Tests
 *
 * Lifecycle transitions, expiry and atomic fulfillment.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { OrderBook } from '../../src/simulation/order-book.js';
import { Inventory } from '../../src/simulation/inventory.js';
import { Reputation } from '../../src/simulation/reputation.js';
import { Wallet } from '../../src/simulation/wallet.js';
import { InvariantViolation } from '../../src/errors.js';
import { createOrderId, type CustomerOrder } from '../../src/types.js';

const makeOrder = (id: number, overrides: Partial<CustomerOrder> = {}): CustomerOrder => ({
  id: createOrderId(id),
  customer: { name: 'Grace', kind: 'regular' },
  requestedItems: [{ retailer: 'Starbucks', denomination: 1000, quantity: 2 }],
  offeredPrice: 2500,
  priority: 'Medium',
  deadlineDay: 5,
  createdDay: 1,
  status: 'Pending',
  ...overrides,
});

describe('OrderBook', () => {
  let book: OrderBook;
  let inventory: Inventory;
  let wallet: Wallet;
  let reputation: Reputation;

  const stock = (quantity: number): void => {
    inventory.addLot({
      retailer: 'Starbucks',
      denomination: 1000,
      quantity,
      unitCost: 800,
      purchaseDay: 1,
      expirationDay: 60,
    });
  };

  beforeEach(() => {
    book = new OrderBook();
    inventory = new Inventory();
    wallet = new Wallet(0);
    reputation = new Reputation();
  });

  describe('insert', () => {
    it('should reject duplicate ids', () => {
      book.insert(makeOrder(1001));
      expect(() => book.insert(makeOrder(1001))).toThrow(InvariantViolation);
    });

    it('should only accept pending orders', () => {
      expect(() => book.insert(makeOrder(1001, { status: 'Fulfilled' }))).toThrow(InvariantViolation);
    });

    it('should reject orders without items', () => {
      expect(() => book.insert(makeOrder(1001, { requestedItems: [] }))).toThrow(InvariantViolation);
    });
  });

  it('should order by priority, then deadline, then id', () => {
    book.insert(makeOrder(1, { priority: 'Low', deadlineDay: 3 }));
    book.insert(makeOrder(2, { priority: 'High', deadlineDay: 5 }));
    book.insert(makeOrder(3, { priority: 'High', deadlineDay: 4 }));
    book.insert(makeOrder(4, { priority: 'Medium', deadlineDay: 2 }));
    book.insert(makeOrder(5, { priority: 'High', deadlineDay: 4 }));

    expect(book.prioritized().map((o) => o.id)).toEqual([3, 5, 2, 4, 1]);
  });

  describe('expireOverdue', () => {
    it('should keep an order through its deadline day', () => {
      book.insert(makeOrder(1001, { deadlineDay: 5 }));
      expect(book.expireOverdue(5)).toEqual([]);
      expect(book.size()).toBe(1);
    });

    it('should expire an order the day after its deadline and refuse it afterwards', () => {
      stock(2);
      book.insert(makeOrder(1001, { deadlineDay: 5 }));

      const expired = book.expireOverdue(6);
      expect(expired).toHaveLength(1);
      expect(expired[0].status).toBe('Expired');
      expect(expired[0].closedDay).toBe(6);
      expect(book.size()).toBe(0);

      const result = book.acceptAndFulfill(createOrderId(1001), {
        inventory,
        wallet,
        reputation,
        currentDay: 6,
      });
      expect(result).toEqual({
        ok: false,
        error: { kind: 'UnknownOrder', message: 'Order #1001 is not active' },
      });
      expect(inventory.available('Starbucks', 1000)).toBe(2);
    });

    it('should return expired orders in id order', () => {
      book.insert(makeOrder(1003, { deadlineDay: 2 }));
      book.insert(makeOrder(1001, { deadlineDay: 3 }));
      expect(book.expireOverdue(10).map((o) => o.id)).toEqual([1001, 1003]);
    });
  });

  describe('acceptAndFulfill', () => {
    it('should fail without side effects when stock is short', () => {
      stock(1);
      book.insert(makeOrder(1001));

      const result = book.acceptAndFulfill(createOrderId(1001), {
        inventory,
        wallet,
        reputation,
        currentDay: 1,
      });

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'UnfulfillableOrder',
          message: 'Cannot fulfill order #1001: Need 2 Starbucks $10 cards, have 1',
        },
      });
      expect(wallet.balance()).toBe(0);
      expect(inventory.available('Starbucks', 1000)).toBe(1);
      expect(book.get(createOrderId(1001))?.status).toBe('Pending');
      expect(reputation.value()).toBe(300);
    });

    it('should consume stock, credit cash and close the order', () => {
      stock(3);
      book.insert(makeOrder(1001));

      const result = book.acceptAndFulfill(createOrderId(1001), {
        inventory,
        wallet,
        reputation,
        currentDay: 1,
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.costBasis).toBe(1600);
      expect(result.value.reputationDelta).toBe(25);
      expect(result.value.order.status).toBe('Fulfilled');
      expect(result.value.order.closedDay).toBe(1);
      expect(wallet.balance()).toBe(2500);
      expect(inventory.available('Starbucks', 1000)).toBe(1);
      expect(book.size()).toBe(0);
      expect(book.closedOrders().map((o) => o.id)).toEqual([1001]);
    });
  });

  describe('decline', () => {
    it('should close the order once', () => {
      book.insert(makeOrder(1001));
      const first = book.decline(createOrderId(1001), 2);
      expect(first.ok && first.value.status).toBe('Declined');

      const second = book.decline(createOrderId(1001), 2);
      expect(second).toEqual({
        ok: false,
        error: { kind: 'UnknownOrder', message: 'Order #1001 is not active' },
      });
    });
  });

  it('should cap closed order history', () => {
    const small = new OrderBook([], [], 2);
    for (const id of [1, 2, 3]) {
      small.insert(makeOrder(id));
      small.decline(createOrderId(id), 1);
    }
    expect(small.closedOrders().map((o) => o.id)).toEqual([2, 3]);
  });
});
