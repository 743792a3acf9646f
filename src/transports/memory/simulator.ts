/**
 * Device Simulator
 *
 * Answers commands on a `MemoryBroker` the way the RF source does:
 *
 * - `{"value": V}` on `cmnd/{device}/{code}` stores V and echoes it on
 *   `response/{device}/{code}`
 * - `{}` replies with the stored value on the same response topic
 * - `cmnd/{device}/state` publishes the bulk report on `status/{device}/state`,
 *   which carries neither the DC offset nor the calibration curves
 * - values the device cannot take are answered on `error/{device}/{code}`
 */

import type { Settings, SettingsField, Telemetry } from '../../core/protocol/types.js';
import { CommandCode, DEFAULT_SETTINGS, FIELD_COMMAND_CODES, SETTINGS_FIELDS } from '../../core/protocol/types.js';
import type { TopicScheme } from '../../core/protocol/topics.js';
import { decodePayload, encodeSetPayload } from '../../core/protocol/payload.js';
import { validateField } from '../../core/validation/validator.js';
import type { MemoryBroker } from './broker.js';
import { MemoryTransport } from './broker.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface DeviceSimulatorOptions {
  scheme: TopicScheme;
  settings?: Partial<Settings>;
  telemetry?: Partial<Telemetry>;
  /** Include `dc_offst` in the bulk report, as some firmware does */
  reportDcOffset?: boolean;
}

export const DEFAULT_TELEMETRY: Readonly<Telemetry> = {
  maxMz: 2000,
  frequency: 1_000_000,
  rfAmplitude: 0,
  dc1: 0,
  dc2: 0,
  current: 0,
};

const CODE_FIELDS: ReadonlyMap<string, SettingsField> = new Map(
  SETTINGS_FIELDS.map((field) => [FIELD_COMMAND_CODES[field], field] as const)
);

// -----------------------------------------------------------------------------
// Simulator
// -----------------------------------------------------------------------------

export class DeviceSimulator {
  private readonly scheme: TopicScheme;
  private readonly transport: MemoryTransport;
  private readonly reportDcOffset: boolean;
  private settings: Settings;
  private telemetry: Telemetry;
  private reportTimer: ReturnType<typeof setInterval> | null = null;

  /** Every command code received, in order */
  readonly received: string[] = [];

  constructor(broker: MemoryBroker, options: DeviceSimulatorOptions) {
    this.scheme = options.scheme;
    this.reportDcOffset = options.reportDcOffset ?? false;
    this.settings = structuredClone({ ...DEFAULT_SETTINGS, ...options.settings });
    this.telemetry = { ...DEFAULT_TELEMETRY, ...options.telemetry };
    this.transport = new MemoryTransport(broker, { clientId: 'device-simulator' });

    this.transport.onEvent((event) => {
      if (event.type === 'message') {
        this.handleCommand(event.topic, event.payload);
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Go online and listen for commands. Does not announce itself; call
   * `announce()` for that.
   */
  start(): void {
    this.transport.connect();
    this.transport.subscribe([`${this.scheme.base}/cmnd/${this.scheme.device}/+`]);
  }

  async stop(): Promise<void> {
    this.stopReporting();
    await this.transport.end();
  }

  /** Publish the device-connected marker. */
  announce(): void {
    this.transport.publish(`${this.scheme.base}/connected/${this.scheme.device}`, '{}');
  }

  /** Publish a device error with a free-form detail. */
  raiseError(detail: string, code = 'io'): void {
    this.transport.publish(
      `${this.scheme.base}/error/${this.scheme.device}/${code}`,
      JSON.stringify({ error: detail })
    );
  }

  /** Publish the bulk report every `intervalMs`. */
  startReporting(intervalMs: number): void {
    this.stopReporting();
    this.reportTimer = setInterval(() => this.publishState(), intervalMs);
  }

  stopReporting(): void {
    if (this.reportTimer) {
      clearInterval(this.reportTimer);
      this.reportTimer = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Device State
  // ---------------------------------------------------------------------------

  getSettings(): Settings {
    return structuredClone(this.settings);
  }

  setTelemetry(telemetry: Partial<Telemetry>): void {
    this.telemetry = { ...this.telemetry, ...telemetry };
  }

  /** Publish the bulk state report. */
  publishState(): void {
    const report: Record<string, unknown> = {
      range: this.settings.massRange,
      frequency: this.telemetry.frequency,
      rf_amp: this.telemetry.rfAmplitude,
      dc1: this.telemetry.dc1,
      dc2: this.telemetry.dc2,
      current: this.telemetry.current,
      mz: this.settings.mz,
      is_dc_on: this.settings.dcOn,
      is_rod_polarity_positive: this.settings.rodPolarityPositive,
      max_mz: this.telemetry.maxMz,
    };

    if (this.reportDcOffset) {
      report['dc_offst'] = this.settings.dcOffset;
    }

    this.transport.publish(
      `${this.scheme.base}/status/${this.scheme.device}/state`,
      JSON.stringify(report)
    );
  }

  /** Change a value on the device side and report it, as a front-panel edit would. */
  changeLocally<K extends SettingsField>(field: K, value: Settings[K]): void {
    this.settings[field] = value;
    this.reportField(field);
  }

  // ---------------------------------------------------------------------------
  // Command Handling
  // ---------------------------------------------------------------------------

  private handleCommand(topic: string, payload: Buffer): void {
    const code = topic.split('/').at(-1) ?? '';
    this.received.push(code);

    if (code === CommandCode.STATE) {
      this.publishState();
      return;
    }

    const field = CODE_FIELDS.get(code);
    if (!field) {
      this.raiseError(`Unknown command ${code}`, code);
      return;
    }

    const { record } = decodePayload(topic, payload);
    if ('value' in record) {
      this.applyValue(field, code, record['value']);
    }

    this.reportField(field);
  }

  private applyValue(field: SettingsField, code: string, value: unknown): void {
    const result = validateField(field, value);
    if (!result.ok) {
      this.raiseError(result.error.message, code);
      return;
    }
    this.store(field, result.value);
  }

  private store<K extends SettingsField>(field: K, value: Settings[K]): void {
    this.settings[field] = value;
  }

  private reportField(field: SettingsField): void {
    this.transport.publish(
      `${this.scheme.base}/response/${this.scheme.device}/${FIELD_COMMAND_CODES[field]}`,
      encodeSetPayload(this.settings[field])
    );
  }
}
