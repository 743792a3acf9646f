/**
 * Prometheus Metrics
 *
 * Metrics collection and export for monitoring.
 * Each engine owns its own registry so several engines (or tests) never share
 * counters.
 */

import {
  Registry,
  Counter,
  Gauge,
  collectDefaultMetrics,
} from 'prom-client';
import type { SettingsField, UpdateOrigin } from '../core/protocol/types.js';

export type ValidationDirection = 'inbound' | 'outbound';
export type CommandIntent = 'set' | 'request';

const CONNECTION_STATE_VALUES = {
  disconnected: 0,
  connecting: 1,
  connected: 2,
} as const;

export interface EngineMetricsOptions {
  /** Metric name prefix */
  prefix?: string;
  /** Also collect default Node.js metrics (memory, CPU, etc.) */
  collectDefaults?: boolean;
}

// -----------------------------------------------------------------------------
// Engine Metrics
// -----------------------------------------------------------------------------

export class EngineMetrics {
  readonly registry: Registry;

  private readonly inboundMessages: Counter<'kind'>;
  private readonly malformedPayloads: Counter;
  private readonly commandsPublished: Counter<'code' | 'intent'>;
  private readonly commandsRejected: Counter<'operation' | 'reason'>;
  private readonly validationFailures: Counter<'field' | 'direction'>;
  private readonly mirrorUpdates: Counter<'field' | 'origin'>;
  private readonly telemetryReadings: Counter<'field'>;
  private readonly connectionState: Gauge;
  private readonly connectionTransitions: Counter<'state'>;
  private readonly resyncs: Counter<'trigger'>;

  constructor(options: EngineMetricsOptions = {}) {
    const prefix = options.prefix ?? 'rf_source_sync';
    this.registry = new Registry();

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.inboundMessages = new Counter({
      name: `${prefix}_inbound_messages_total`,
      help: 'Inbound messages by classified kind',
      labelNames: ['kind'] as const,
      registers: [this.registry],
    });

    this.malformedPayloads = new Counter({
      name: `${prefix}_malformed_payloads_total`,
      help: 'Inbound payloads that could not be decoded',
      registers: [this.registry],
    });

    this.commandsPublished = new Counter({
      name: `${prefix}_commands_published_total`,
      help: 'Outbound commands by code and intent',
      labelNames: ['code', 'intent'] as const,
      registers: [this.registry],
    });

    this.commandsRejected = new Counter({
      name: `${prefix}_commands_rejected_total`,
      help: 'Outbound operations rejected before publishing',
      labelNames: ['operation', 'reason'] as const,
      registers: [this.registry],
    });

    this.validationFailures = new Counter({
      name: `${prefix}_validation_failures_total`,
      help: 'Values that failed validation by field and direction',
      labelNames: ['field', 'direction'] as const,
      registers: [this.registry],
    });

    this.mirrorUpdates = new Counter({
      name: `${prefix}_mirror_updates_total`,
      help: 'Accepted settings mirror updates by field and origin',
      labelNames: ['field', 'origin'] as const,
      registers: [this.registry],
    });

    this.telemetryReadings = new Counter({
      name: `${prefix}_telemetry_readings_total`,
      help: 'Telemetry readings forwarded to observers',
      labelNames: ['field'] as const,
      registers: [this.registry],
    });

    this.connectionState = new Gauge({
      name: `${prefix}_connection_state`,
      help: 'Transport session state (0 = disconnected, 1 = connecting, 2 = connected)',
      registers: [this.registry],
    });

    this.connectionTransitions = new Counter({
      name: `${prefix}_connection_transitions_total`,
      help: 'Connection state transitions by target state',
      labelNames: ['state'] as const,
      registers: [this.registry],
    });

    this.resyncs = new Counter({
      name: `${prefix}_resyncs_total`,
      help: 'Resync sequences issued by trigger',
      labelNames: ['trigger'] as const,
      registers: [this.registry],
    });
  }

  // ---------------------------------------------------------------------------
  // Recording
  // ---------------------------------------------------------------------------

  recordInbound(kind: string): void {
    this.inboundMessages.labels(kind).inc();
  }

  recordMalformedPayload(): void {
    this.malformedPayloads.inc();
  }

  recordCommand(code: string, intent: CommandIntent): void {
    this.commandsPublished.labels(code, intent).inc();
  }

  recordRejection(operation: string, reason: string): void {
    this.commandsRejected.labels(operation, reason).inc();
  }

  recordValidationFailure(field: SettingsField, direction: ValidationDirection): void {
    this.validationFailures.labels(field, direction).inc();
  }

  recordMirrorUpdate(field: SettingsField, origin: UpdateOrigin): void {
    this.mirrorUpdates.labels(field, origin).inc();
  }

  recordTelemetry(field: string): void {
    this.telemetryReadings.labels(field).inc();
  }

  recordConnectionState(state: keyof typeof CONNECTION_STATE_VALUES): void {
    this.connectionState.set(CONNECTION_STATE_VALUES[state]);
    this.connectionTransitions.labels(state).inc();
  }

  recordResync(trigger: string): void {
    this.resyncs.labels(trigger).inc();
  }

  // ---------------------------------------------------------------------------
  // Export
  // ---------------------------------------------------------------------------

  /**
   * Get metrics in Prometheus format.
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  /**
   * Get content type for Prometheus endpoint.
   */
  getContentType(): string {
    return this.registry.contentType;
  }
}
