/**
 * Engine Errors
 *
 * Classified failures. Inbound errors stop at the router; outbound errors are
 * returned to the caller that asked for the change.
 */

import type { SettingsField } from './protocol/types.js';

export const ErrorCode = {
  MALFORMED_PAYLOAD: 'MALFORMED_PAYLOAD',
  VALIDATION_FAILURE: 'VALIDATION_FAILURE',
  NOT_CONNECTED: 'NOT_CONNECTED',
  SNAPSHOT_LOAD_FAILURE: 'SNAPSHOT_LOAD_FAILURE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * `malformed-shape`: wrong type or structure.
 * `out-of-range`: right type, outside the field's domain.
 */
export type ValidationErrorKind = 'malformed-shape' | 'out-of-range';

export class MalformedPayloadError extends Error {
  readonly code = ErrorCode.MALFORMED_PAYLOAD;

  constructor(
    public readonly topic: string,
    public readonly reason: string
  ) {
    super(`Malformed payload on '${topic}': ${reason}`);
    this.name = 'MalformedPayloadError';
  }
}

export class ValidationError extends Error {
  readonly code = ErrorCode.VALIDATION_FAILURE;

  constructor(
    public readonly field: SettingsField,
    public readonly kind: ValidationErrorKind,
    public readonly value: unknown,
    detail: string
  ) {
    super(`Invalid ${field} value ${formatValue(value)}: ${detail}`);
    this.name = 'ValidationError';
  }
}

export class NotConnectedError extends Error {
  readonly code = ErrorCode.NOT_CONNECTED;

  constructor(public readonly operation: string) {
    super(`Cannot ${operation}: transport session is not established`);
    this.name = 'NotConnectedError';
  }
}

export class SnapshotLoadError extends Error {
  readonly code = ErrorCode.SNAPSHOT_LOAD_FAILURE;

  constructor(
    public readonly path: string,
    public readonly issues: string[]
  ) {
    super(`Failed to load settings from '${path}':\n  ${issues.join('\n  ')}`);
    this.name = 'SnapshotLoadError';
  }
}

function formatValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
