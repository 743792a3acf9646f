/**
 * Payload Codec
 *
 * UTF-8 JSON records. `{"value": V}` sets a field, `{}` asks for it.
 */

import { MalformedPayloadError } from '../errors.js';

export type PayloadRecord = Record<string, unknown>;

export interface DecodedPayload {
  record: PayloadRecord;
  /** Set when the payload could not be used; `record` is then empty */
  error?: MalformedPayloadError;
}

export function encodeSetPayload(value: unknown): string {
  return JSON.stringify({ value });
}

export function encodeRequestPayload(): string {
  return JSON.stringify({});
}

/**
 * Decode an inbound payload. Never throws: anything that is not a JSON object
 * decodes to an empty record with the reason attached.
 */
export function decodePayload(topic: string, payload: Buffer | string): DecodedPayload {
  const text = typeof payload === 'string' ? payload : payload.toString('utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unparseable JSON';
    return { record: {}, error: new MalformedPayloadError(topic, reason) };
  }

  if (!isRecord(parsed)) {
    return {
      record: {},
      error: new MalformedPayloadError(topic, 'Payload is not a JSON object'),
    };
  }

  return { record: parsed };
}

export function isRecord(value: unknown): value is PayloadRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function payloadText(payload: Buffer | string): string {
  return typeof payload === 'string' ? payload : payload.toString('utf-8');
}
