/**
 * Command Publisher
 *
 * Turns operator intent into device commands: validate, apply to the mirror
 * optimistically, then publish. Also issues the parameterless "send me the
 * current value" requests used by resync.
 */

import type { RequestTarget, SettingsField } from '../protocol/types.js';
import { FIELD_COMMAND_CODES, SETTINGS_FIELDS, UpdateOrigin, CommandCode } from '../protocol/types.js';
import type { TopicScheme } from '../protocol/topics.js';
import { requestTopic } from '../protocol/topics.js';
import { encodeRequestPayload, encodeSetPayload } from '../protocol/payload.js';
import type { NotConnectedError, ValidationError } from '../errors.js';
import type { SettingsMirror } from '../state/mirror.js';
import type { ConnectivityGate } from './guard.js';
import { withConnectionGuard } from './guard.js';
import type { DeviceTransport } from '../../transports/types.js';
import type { Logger } from '../../observability/logger.js';
import { withCallLogging } from '../../observability/logger.js';
import type { EngineMetrics } from '../../observability/metrics.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type CommandResult =
  | { ok: true; topic: string }
  | { ok: false; error: NotConnectedError | ValidationError };

export type PushResult =
  | { ok: true; topics: string[] }
  | { ok: false; error: NotConnectedError };

export interface CommandPublisherOptions {
  mirror: SettingsMirror;
  transport: Pick<DeviceTransport, 'publish'>;
  gate: ConnectivityGate;
  scheme: TopicScheme;
  logger: Logger;
  metrics?: EngineMetrics;
}

// -----------------------------------------------------------------------------
// Command Publisher
// -----------------------------------------------------------------------------

export class CommandPublisher {
  private readonly mirror: SettingsMirror;
  private readonly transport: Pick<DeviceTransport, 'publish'>;
  private readonly scheme: TopicScheme;
  private readonly logger: Logger;
  private readonly metrics: EngineMetrics | undefined;

  private readonly guardedRequest: (field: SettingsField, value: unknown) => CommandResult;
  private readonly guardedRequestCurrent: (target: RequestTarget) => CommandResult;
  private readonly guardedPushAll: () => PushResult;

  constructor(options: CommandPublisherOptions) {
    this.mirror = options.mirror;
    this.transport = options.transport;
    this.scheme = options.scheme;
    this.logger = options.logger;
    this.metrics = options.metrics;

    const compose = <A extends unknown[], R>(name: string, fn: (...args: A) => R) =>
      withCallLogging(
        this.logger,
        name,
        withConnectionGuard(options.gate, name, fn, (error) => this.reject(name, error))
      );

    this.guardedRequest = compose('request', (field: SettingsField, value: unknown) =>
      this.applyAndPublish(field, value)
    );
    this.guardedRequestCurrent = compose('requestCurrent', (target: RequestTarget) =>
      this.publishRequest(target)
    );
    this.guardedPushAll = compose('pushAll', () => this.publishMirror());
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Request a change to a field. The mirror is updated before the device
   * confirms; a rejection leaves both the mirror and the wire untouched.
   */
  request(field: SettingsField, value: unknown): CommandResult {
    return this.guardedRequest(field, value);
  }

  /**
   * Ask the device for the current value of a field, or for its full state.
   */
  requestCurrent(target: RequestTarget): CommandResult {
    return this.guardedRequestCurrent(target);
  }

  /**
   * Publish every current mirror value to the device without changing the
   * mirror. Used after a settings file has been loaded.
   */
  pushAll(): PushResult {
    return this.guardedPushAll();
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  private applyAndPublish(field: SettingsField, value: unknown): CommandResult {
    const result = this.mirror.setIfValid(field, value, UpdateOrigin.OPERATOR);
    if (!result.ok) {
      this.metrics?.recordValidationFailure(field, 'outbound');
      this.reject('request', result.error);
      return { ok: false, error: result.error };
    }

    const topic = requestTopic(this.scheme, field);
    this.transport.publish(topic, encodeSetPayload(result.change.value));
    this.metrics?.recordCommand(FIELD_COMMAND_CODES[field], 'set');
    this.logger.debug({ topic, field }, 'Published setting');

    return { ok: true, topic };
  }

  private publishRequest(target: RequestTarget): CommandResult {
    const topic = requestTopic(this.scheme, target);
    this.transport.publish(topic, encodeRequestPayload());
    this.metrics?.recordCommand(
      target === 'state' ? CommandCode.STATE : FIELD_COMMAND_CODES[target],
      'request'
    );
    this.logger.debug({ topic, target }, 'Requested current value');

    return { ok: true, topic };
  }

  private publishMirror(): PushResult {
    const settings = this.mirror.getAll();
    const topics: string[] = [];

    for (const field of SETTINGS_FIELDS) {
      const topic = requestTopic(this.scheme, field);
      this.transport.publish(topic, encodeSetPayload(settings[field]));
      this.metrics?.recordCommand(FIELD_COMMAND_CODES[field], 'set');
      topics.push(topic);
    }

    this.logger.info({ count: topics.length }, 'Pushed settings to device');
    return { ok: true, topics };
  }

  private reject(operation: string, error: NotConnectedError | ValidationError): void {
    this.metrics?.recordRejection(operation, error.code);
    this.logger.warn({ operation, err: error }, 'Rejected outbound operation');
  }
}
