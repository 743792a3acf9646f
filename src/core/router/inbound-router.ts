/**
 * Inbound Router
 *
 * Classifies every message the device publishes and dispatches it: settings
 * go to the mirror (validated), telemetry goes straight to observers, status
 * markers go to status observers and trigger resync.
 *
 * Inbound reports have no requester, so nothing here throws or answers back;
 * failures are logged where they are found.
 */

import type {
  DeviceStatus,
  ReportTarget,
  TelemetryReading,
} from '../protocol/types.js';
import { STATE_REPORT_KEYS, UpdateOrigin } from '../protocol/types.js';
import type { InboundClassification } from '../protocol/topics.js';
import { classifyTopic, InboundKind } from '../protocol/topics.js';
import type { PayloadRecord } from '../protocol/payload.js';
import { decodePayload, payloadText } from '../protocol/payload.js';
import type { SettingsMirror } from '../state/mirror.js';
import type { Logger } from '../../observability/logger.js';
import { withCallLogging } from '../../observability/logger.js';
import type { EngineMetrics } from '../../observability/metrics.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type TelemetryListener = (reading: TelemetryReading) => void;
export type DeviceStatusListener = (status: DeviceStatus) => void;

export interface InboundRouterOptions {
  mirror: SettingsMirror;
  logger: Logger;
  metrics?: EngineMetrics;
  /** Called after every device-connected marker; starts the resync sequence */
  onDeviceConnected?: () => void;
}

// -----------------------------------------------------------------------------
// Inbound Router
// -----------------------------------------------------------------------------

export class InboundRouter {
  private readonly mirror: SettingsMirror;
  private readonly logger: Logger;
  private readonly metrics: EngineMetrics | undefined;
  private readonly onDeviceConnected: (() => void) | undefined;

  private telemetryListeners: Set<TelemetryListener> = new Set();
  private statusListeners: Set<DeviceStatusListener> = new Set();

  private readonly loggedDispatch: (topic: string, payload: Buffer | string) => InboundClassification;

  constructor(options: InboundRouterOptions) {
    this.mirror = options.mirror;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.onDeviceConnected = options.onDeviceConnected;

    this.loggedDispatch = withCallLogging(this.logger, 'dispatch', (topic: string, payload: Buffer | string) =>
      this.route(topic, payload)
    );
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  /**
   * Classify and handle one inbound message. Never throws.
   */
  dispatch(topic: string, payload: Buffer | string): InboundClassification {
    return this.loggedDispatch(topic, payload);
  }

  private route(topic: string, payload: Buffer | string): InboundClassification {
    const classification = classifyTopic(topic);
    this.metrics?.recordInbound(classification.kind);

    if (classification.kind === InboundKind.IGNORED) {
      this.logger.debug({ topic }, 'Ignoring message on unknown topic');
      return classification;
    }

    const { record, error } = decodePayload(topic, payload);
    if (error) {
      this.metrics?.recordMalformedPayload();
      this.logger.debug({ topic, err: error }, 'Malformed payload, continuing with empty record');
    }

    try {
      switch (classification.kind) {
        case InboundKind.DEVICE_CONNECTED:
          this.handleDeviceConnected();
          break;

        case InboundKind.DEVICE_ERROR:
          this.handleDeviceError(topic, payloadText(payload));
          break;

        case InboundKind.DEVICE_STATE_REPORT:
          this.handleStateReport(record);
          break;

        case InboundKind.FIELD_REPORT:
          this.handleFieldReport(topic, classification.target, record);
          break;
      }
    } catch (err) {
      this.logger.error({ err, topic }, 'Inbound handler failed');
    }

    return classification;
  }

  // ---------------------------------------------------------------------------
  // Handlers
  // ---------------------------------------------------------------------------

  private handleDeviceConnected(): void {
    this.logger.info('Device connected');
    this.notifyStatus({ status: 'connected', at: Date.now() });
    this.onDeviceConnected?.();
  }

  private handleDeviceError(topic: string, detail: string): void {
    this.logger.warn({ topic, detail }, 'Device error');
    this.notifyStatus({ status: 'error', detail, at: Date.now() });
  }

  private handleStateReport(record: PayloadRecord): void {
    for (const [key, target] of STATE_REPORT_KEYS) {
      if (key in record) {
        this.applyReport(target, record[key], key);
      }
    }
  }

  private handleFieldReport(topic: string, target: ReportTarget, record: PayloadRecord): void {
    if (!('value' in record)) {
      this.logger.debug({ topic }, 'Field report without value');
      return;
    }

    this.applyReport(target, record['value'], topic);
  }

  private applyReport(target: ReportTarget, value: unknown, source: string): void {
    if (target.type === 'telemetry') {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        this.logger.debug({ field: target.field, source, value }, 'Dropping non-numeric telemetry');
        return;
      }

      this.metrics?.recordTelemetry(target.field);
      this.notifyTelemetry({ field: target.field, value, receivedAt: Date.now() });
      return;
    }

    const result = this.mirror.setIfValid(target.field, value, UpdateOrigin.DEVICE);
    if (!result.ok) {
      this.metrics?.recordValidationFailure(target.field, 'inbound');
      this.logger.warn(
        { field: target.field, source, kind: result.error.kind, err: result.error },
        'Dropping invalid value reported by device'
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Listeners
  // ---------------------------------------------------------------------------

  /**
   * Listen to telemetry readings. Returns a function that removes the listener.
   */
  onTelemetry(listener: TelemetryListener): () => void {
    this.telemetryListeners.add(listener);
    return () => {
      this.telemetryListeners.delete(listener);
    };
  }

  /**
   * Listen to device status markers. Returns a function that removes the listener.
   */
  onDeviceStatus(listener: DeviceStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  private notifyTelemetry(reading: TelemetryReading): void {
    for (const listener of this.telemetryListeners) {
      try {
        listener(reading);
      } catch (error) {
        this.logger.error({ err: error, field: reading.field }, 'Telemetry listener error');
      }
    }
  }

  private notifyStatus(status: DeviceStatus): void {
    for (const listener of this.statusListeners) {
      try {
        listener(status);
      } catch (error) {
        this.logger.error({ err: error }, 'Device status listener error');
      }
    }
  }
}
