/**
 * Publish Guard
 *
 * Short-circuits outbound operations while the transport session is down.
 */

import { NotConnectedError } from '../errors.js';

export interface ConnectivityGate {
  isConnected(): boolean;
}

export interface NotConnectedRejection {
  ok: false;
  error: NotConnectedError;
}

/**
 * Wrap an outbound operation so it is rejected with `NotConnectedError`
 * (without running) whenever the gate is closed.
 */
export function withConnectionGuard<A extends unknown[], R>(
  gate: ConnectivityGate,
  operation: string,
  fn: (...args: A) => R,
  onReject?: (error: NotConnectedError) => void
): (...args: A) => R | NotConnectedRejection {
  return (...args: A) => {
    if (!gate.isConnected()) {
      const error = new NotConnectedError(operation);
      onReject?.(error);
      return { ok: false, error };
    }
    return fn(...args);
  };
}
