/**
 * Signal Digest — Outcome
 *
 * Degrade-or-default combinator. Outbound calls run through `attempt`;
 * the enricher and the classifier collapse the failure branch into their
 * fallback results with `withDefault`.
 */

import { errorMessage } from './errors';

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string; error: unknown };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T = never>(error: unknown): Outcome<T> {
  return { ok: false, reason: errorMessage(error), error };
}

/**
 * Run an operation, capturing a throw or rejection as a failed outcome.
 */
export async function attempt<T>(operation: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return success(await operation());
  } catch (error) {
    return failure(error);
  }
}

/**
 * Synchronous counterpart of `attempt` for parsers and validators.
 */
export function attemptSync<T>(operation: () => T): Outcome<T> {
  try {
    return success(operation());
  } catch (error) {
    return failure(error);
  }
}

export function mapOutcome<T, R>(outcome: Outcome<T>, transform: (value: T) => R): Outcome<R> {
  return outcome.ok ? success(transform(outcome.value)) : outcome;
}

export function withDefault<T>(
  outcome: Outcome<T>,
  fallback: (reason: string) => T
): T {
  return outcome.ok ? outcome.value : fallback(outcome.reason);
}
