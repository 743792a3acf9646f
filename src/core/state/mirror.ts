/**
 * Settings Mirror
 *
 * Local authoritative copy of the device-controlled settings. Every mutation
 * goes through the validator; every accepted mutation raises one change
 * notification per field, tagged with where it came from.
 *
 * Writers run on the event loop, so a validate-then-set is a single
 * synchronous step and per-field versions order concurrent writers
 * last-writer-wins.
 */

import type { Settings, SettingsField, UpdateOrigin } from '../protocol/types.js';
import { DEFAULT_SETTINGS, SETTINGS_FIELDS } from '../protocol/types.js';
import type { ValidationError } from '../errors.js';
import { validateField, validateSettings } from '../validation/validator.js';
import type { Logger } from '../../observability/logger.js';
import type { EngineMetrics } from '../../observability/metrics.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface SettingsChange<K extends SettingsField = SettingsField> {
  field: K;
  /** New value */
  value: Settings[K];
  /** Value before this update (may be equal to `value`) */
  previous: Settings[K];
  /** Who caused the update */
  origin: UpdateOrigin;
  /** Monotonic version of this field */
  version: number;
  /** Update timestamp (Unix ms) */
  updatedAt: number;
}

export type SettingsChangeListener = (change: SettingsChange) => void;

export type MirrorUpdateResult<K extends SettingsField = SettingsField> =
  | { ok: true; change: SettingsChange<K> }
  | { ok: false; error: ValidationError };

export type MirrorReplaceResult =
  | { ok: true; changes: SettingsChange[] }
  | { ok: false; errors: ValidationError[] };

export interface SettingsMirrorOptions {
  logger: Logger;
  metrics?: EngineMetrics;
  /** Starting values; defaults to the device's power-on settings */
  initial?: Settings;
}

// -----------------------------------------------------------------------------
// Settings Mirror
// -----------------------------------------------------------------------------

export class SettingsMirror {
  private values: Settings;
  private versions: Record<SettingsField, number>;
  private listeners: Set<SettingsChangeListener> = new Set();
  private readonly logger: Logger;
  private readonly metrics: EngineMetrics | undefined;

  constructor(options: SettingsMirrorOptions) {
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.values = structuredClone(options.initial ?? DEFAULT_SETTINGS);
    this.versions = {
      massRange: 0,
      mz: 0,
      dcOffset: 0,
      dcOn: 0,
      rodPolarityPositive: 0,
      calibPointsMz: 0,
      calibPointsResolution: 0,
    };
  }

  // ---------------------------------------------------------------------------
  // Read Operations
  // ---------------------------------------------------------------------------

  /**
   * Get the current value of a field. Array values are copies.
   */
  get<K extends SettingsField>(field: K): Settings[K] {
    return structuredClone(this.values[field]);
  }

  /**
   * Get a copy of all settings.
   */
  getAll(): Settings {
    return structuredClone(this.values);
  }

  /**
   * Get the version of a field (0 until first accepted update).
   */
  getVersion(field: SettingsField): number {
    return this.versions[field];
  }

  // ---------------------------------------------------------------------------
  // Write Operations
  // ---------------------------------------------------------------------------

  /**
   * Validate and apply a single field. An invalid value leaves the mirror
   * untouched. Equal values are applied and notified like any other.
   */
  setIfValid<K extends SettingsField>(
    field: K,
    value: unknown,
    origin: UpdateOrigin
  ): MirrorUpdateResult<K> {
    const result = validateField(field, value);
    if (!result.ok) {
      this.logger.debug({ field, origin, err: result.error }, 'Rejected settings update');
      return { ok: false, error: result.error };
    }

    const change = this.apply(field, result.value, origin, Date.now());
    this.notifyListeners(change);
    return { ok: true, change };
  }

  /**
   * Replace all seven fields at once. If any field fails validation nothing is
   * applied and every failure is returned.
   */
  replaceAll(candidate: Record<SettingsField, unknown>, origin: UpdateOrigin): MirrorReplaceResult {
    const result = validateSettings(candidate);
    if (!result.ok) {
      this.logger.debug(
        { origin, fields: result.errors.map((e) => e.field) },
        'Rejected settings replacement'
      );
      return { ok: false, errors: result.errors };
    }

    const now = Date.now();
    const changes: SettingsChange[] = [];

    for (const field of SETTINGS_FIELDS) {
      changes.push(this.apply(field, result.value[field], origin, now));
    }

    for (const change of changes) {
      this.notifyListeners(change);
    }

    return { ok: true, changes };
  }

  private apply<K extends SettingsField>(
    field: K,
    value: Settings[K],
    origin: UpdateOrigin,
    updatedAt: number
  ): SettingsChange<K> {
    const previous = this.values[field];
    this.values[field] = value;
    this.versions[field] += 1;
    this.metrics?.recordMirrorUpdate(field, origin);

    return {
      field,
      value: structuredClone(value),
      previous: structuredClone(previous),
      origin,
      version: this.versions[field],
      updatedAt,
    };
  }

  // ---------------------------------------------------------------------------
  // Change Listeners
  // ---------------------------------------------------------------------------

  /**
   * Add a listener for changes to any field.
   */
  addListener(listener: SettingsChangeListener): void {
    this.listeners.add(listener);
  }

  /**
   * Remove a change listener.
   */
  removeListener(listener: SettingsChangeListener): void {
    this.listeners.delete(listener);
  }

  /**
   * Listen to one field. Returns a function that removes the listener.
   */
  onField<K extends SettingsField>(
    field: K,
    listener: (change: SettingsChange<K>) => void
  ): () => void {
    const wrapped: SettingsChangeListener = (change) => {
      if (isChangeFor(change, field)) {
        listener(change);
      }
    };

    this.addListener(wrapped);
    return () => this.removeListener(wrapped);
  }

  private notifyListeners(change: SettingsChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        // One listener failing must not stop the others or the writer
        this.logger.error({ err: error, field: change.field }, 'Settings listener error');
      }
    }
  }
}

function isChangeFor<K extends SettingsField>(
  change: SettingsChange,
  field: K
): change is SettingsChange<K> {
  return change.field === field;
}
