/**
 * Outcome values returned by pipeline stages for expected failures.
 */

import type { WatchdogError } from './errors.js';

/**
 * Type for operation results.
 */
export type Result<T, E = WatchdogError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}
