/**
 * Order Book
 *
 * Active customer orders and their lifecycle:
 *   Pending -> Fulfilled | Expired | Declined
 * Every state after Pending is terminal.
 */

import type {
  Cents,
  ConsumedPortion,
  CustomerOrder,
  OrderId,
  OrderPriority,
  OrderStatus,
  Result,
} from '../types.js';
import { err, failure, invariant, ok } from '../errors.js';
import type { Inventory } from './inventory.js';
import type { Reputation } from './reputation.js';
import type { Wallet } from './wallet.js';

const PRIORITY_RANK: Record<OrderPriority, number> = { High: 0, Medium: 1, Low: 2 };

/** High before Medium before Low, then nearest deadline, then oldest id. */
export const compareOrders = (a: CustomerOrder, b: CustomerOrder): number =>
  PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
  a.deadlineDay - b.deadlineDay ||
  a.id - b.id;

export interface FulfillmentContext {
  inventory: Inventory;
  wallet: Wallet;
  reputation: Reputation;
  currentDay: number;
}

export interface Fulfillment {
  order: CustomerOrder;
  consumed: ConsumedPortion[];
  costBasis: Cents;
  reputationDelta: number;
}

const DEFAULT_HISTORY_LIMIT = 100;

export class OrderBook {
  private readonly active = new Map<OrderId, CustomerOrder>();
  private closed: CustomerOrder[] = [];
  private readonly historyLimit: number;

  constructor(
    active: readonly CustomerOrder[] = [],
    closed: readonly CustomerOrder[] = [],
    historyLimit = DEFAULT_HISTORY_LIMIT
  ) {
    this.historyLimit = historyLimit;
    for (const order of active) this.insert(order);
    for (const order of closed) {
      invariant(order.status !== 'Pending', 'Closed order history holds a pending order', {
        orderId: order.id,
      });
      this.closed.push(cloneOrder(order));
    }
  }

  insert(order: CustomerOrder): void {
    invariant(order.status === 'Pending', 'Orders enter the book as Pending', {
      orderId: order.id,
      status: order.status,
    });
    invariant(!this.active.has(order.id), 'Duplicate order id', { orderId: order.id });
    invariant(order.requestedItems.length > 0, 'Order has no requested items', { orderId: order.id });
    this.active.set(order.id, cloneOrder(order));
  }

  get(id: OrderId): CustomerOrder | undefined {
    const order = this.active.get(id);
    return order ? cloneOrder(order) : undefined;
  }

  size(): number {
    return this.active.size;
  }

  /** Active orders in insertion order. */
  activeOrders(): CustomerOrder[] {
    return [...this.active.values()].map(cloneOrder);
  }

  /** Active orders by priority, then deadline, then id. */
  prioritized(): CustomerOrder[] {
    return this.activeOrders().sort(compareOrders);
  }

  /** Most recent terminal orders, oldest first. */
  closedOrders(): CustomerOrder[] {
    return this.closed.map(cloneOrder);
  }

  /**
   * Expire every Pending order whose deadline is before `currentDay`.
   * Returned in id order.
   */
  expireOverdue(currentDay: number): CustomerOrder[] {
    const overdue = [...this.active.values()]
      .filter((order) => order.deadlineDay < currentDay)
      .sort((a, b) => a.id - b.id);
    return overdue.map((order) => this.close(order, 'Expired', currentDay));
  }

  /**
   * Consume every requested line from inventory and get paid, or change
   * nothing at all.
   */
  acceptAndFulfill(id: OrderId, ctx: FulfillmentContext): Result<Fulfillment> {
    const order = this.active.get(id);
    if (!order) {
      return err(failure('UnknownOrder', `Order #${id} is not active`));
    }

    const consumed = ctx.inventory.consumeMany(order.requestedItems);
    if (!consumed.ok) {
      return err(failure('UnfulfillableOrder', `Cannot fulfill order #${id}: ${consumed.error.message}`));
    }

    ctx.wallet.credit(order.offeredPrice);
    const closed = this.close(order, 'Fulfilled', ctx.currentDay);
    const reputationDelta = ctx.reputation.onOrderFulfilled(closed, ctx.currentDay);
    const costBasis = consumed.value.reduce((sum, p) => sum + p.unitCost * p.quantity, 0);

    return ok({ order: closed, consumed: consumed.value, costBasis, reputationDelta });
  }

  decline(id: OrderId, currentDay: number): Result<CustomerOrder> {
    const order = this.active.get(id);
    if (!order) {
      return err(failure('UnknownOrder', `Order #${id} is not active`));
    }
    return ok(this.close(order, 'Declined', currentDay));
  }

  private close(order: CustomerOrder, status: Exclude<OrderStatus, 'Pending'>, day: number): CustomerOrder {
    invariant(order.status === 'Pending', 'Terminal orders cannot change state', {
      orderId: order.id,
      from: order.status,
      to: status,
    });
    this.active.delete(order.id);
    const closed: CustomerOrder = { ...cloneOrder(order), status, closedDay: day };
    this.closed.push(closed);
    if (this.closed.length > this.historyLimit) {
      this.closed = this.closed.slice(-this.historyLimit);
    }
    return cloneOrder(closed);
  }
}

export function cloneOrder(order: CustomerOrder): CustomerOrder {
  return {
    ...order,
    customer: { ...order.customer },
    requestedItems: order.requestedItems.map((line) => ({ ...line })),
  };
}
