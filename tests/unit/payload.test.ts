/**
 * Payload Codec Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  decodePayload,
  encodeRequestPayload,
  encodeSetPayload,
  payloadText,
} from '../../src/core/protocol/payload.js';
import { MalformedPayloadError, ErrorCode } from '../../src/core/errors.js';

describe('Payload codec', () => {
  it('should encode set payloads under "value"', () => {
    expect(encodeSetPayload(3)).toBe('{"value":3}');
    expect(encodeSetPayload([[0, 0], [10, 1]])).toBe('{"value":[[0,0],[10,1]]}');
  });

  it('should encode request payloads as an empty object', () => {
    expect(encodeRequestPayload()).toBe('{}');
  });

  it('should decode JSON objects from buffers', () => {
    const decoded = decodePayload('t', Buffer.from('{"value":12.5}', 'utf-8'));
    expect(decoded).toEqual({ record: { value: 12.5 } });
  });

  it('should treat invalid JSON as an empty record', () => {
    const decoded = decodePayload('lab/response/rf1/mz', 'not json');
    expect(decoded.record).toEqual({});
    expect(decoded.error).toBeInstanceOf(MalformedPayloadError);
    expect(decoded.error?.code).toBe(ErrorCode.MALFORMED_PAYLOAD);
    expect(decoded.error?.topic).toBe('lab/response/rf1/mz');
  });

  it('should treat JSON that is not an object as an empty record', () => {
    for (const text of ['[1,2]', '42', 'null', '"text"']) {
      const decoded = decodePayload('t', text);
      expect(decoded.record).toEqual({});
      expect(decoded.error?.reason).toBe('Payload is not a JSON object');
    }
  });

  it('should return raw text for buffers and strings', () => {
    expect(payloadText(Buffer.from('IO error', 'utf-8'))).toBe('IO error');
    expect(payloadText('plain')).toBe('plain');
  });
});
