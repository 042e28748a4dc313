/**
 * Request body parsing for POST /api/commands.
 */

import {
  createLotId,
  createOrderId,
  type Command,
  type CommandFailureKind,
  type Result,
} from '../types.js';
import { err, ok } from '../errors.js';
import { isRetailerName } from '../simulation/catalog.js';
import { isPositiveInteger, isRecord } from '../utils/guards.js';

export function parseCommand(body: unknown): Result<Command, string> {
  if (!isRecord(body)) return err('Command must be a JSON object');

  switch (body.type) {
    case 'Purchase': {
      const { retailer, denomination, quantity } = body;
      if (!isRetailerName(retailer)) return err(`Unknown retailer: ${String(retailer)}`);
      if (!isPositiveInteger(denomination)) return err('denomination must be a positive integer (cents)');
      if (typeof quantity !== 'number') return err('quantity must be a number');
      return ok({ type: 'Purchase', retailer, denomination, quantity });
    }
    case 'AcceptOrder': {
      const { orderId } = body;
      if (!isPositiveInteger(orderId)) return err('orderId must be a positive integer');
      return ok({ type: 'AcceptOrder', orderId: createOrderId(orderId) });
    }
    case 'DeclineOrder': {
      const { orderId } = body;
      if (!isPositiveInteger(orderId)) return err('orderId must be a positive integer');
      return ok({ type: 'DeclineOrder', orderId: createOrderId(orderId) });
    }
    case 'LiquidateLot': {
      const { lotId } = body;
      if (!isPositiveInteger(lotId)) return err('lotId must be a positive integer');
      return ok({ type: 'LiquidateLot', lotId: createLotId(lotId) });
    }
    case 'Pause':
      return ok({ type: 'Pause' });
    case 'Resume':
      return ok({ type: 'Resume' });
    default:
      return err(`Unknown command type: ${String(body.type)}`);
  }
}

/** HTTP status for a rejected command. */
export function statusForFailure(kind: CommandFailureKind): 400 | 404 | 409 {
  switch (kind) {
    case 'UnknownOrder':
      return 404;
    case 'InvalidCommand':
      return 400;
    case 'InsufficientFunds':
    case 'InsufficientStock':
    case 'UnfulfillableOrder':
      return 409;
  }
}
