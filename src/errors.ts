/**
 * Error model.
 *
 * Player-facing problems are values (`CommandFailure`) returned to the
 * issuer. A broken invariant is a defect and throws.
 */

import type { CommandFailure, CommandFailureKind, Result } from './types.js';

export class InvariantViolation extends Error {
  readonly details: Record<string, unknown> | undefined;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'InvariantViolation';
    this.details = details;
  }
}

/** Throws `InvariantViolation` when the condition does not hold. */
export function invariant(
  condition: unknown,
  message: string,
  details?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message, details);
  }
}

export function failure(kind: CommandFailureKind, message: string): CommandFailure {
  return { kind, message };
}

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E = CommandFailure>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** A stored game that cannot be read back. */
export class SaveFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SaveFormatError';
  }
}
