/**
 * Device Protocol Types
 *
 * Settings and telemetry model of the RF source, plus the names those values
 * travel under on the wire and in persisted snapshots.
 */

// -----------------------------------------------------------------------------
// Settings
// -----------------------------------------------------------------------------

export type MassRange = 0 | 1 | 2;

/** One point of a calibration curve: [x, y] */
export type CalibrationPoint = [number, number];

export interface Settings {
  /** Mass range selector */
  massRange: MassRange;
  /** Target m/z */
  mz: number;
  /** DC offset applied to the rods */
  dcOffset: number;
  /** Whether the DC supply is on */
  dcOn: boolean;
  /** Rod polarity */
  rodPolarityPositive: boolean;
  /** m/z calibration curve, in order */
  calibPointsMz: CalibrationPoint[];
  /** Resolution calibration curve, in order */
  calibPointsResolution: CalibrationPoint[];
}

export type SettingsField = keyof Settings;

export const SETTINGS_FIELDS = [
  'massRange',
  'mz',
  'dcOffset',
  'dcOn',
  'rodPolarityPositive',
  'calibPointsMz',
  'calibPointsResolution',
] as const satisfies readonly SettingsField[];

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  massRange: 0,
  mz: 0,
  dcOffset: 0,
  dcOn: true,
  rodPolarityPositive: true,
  calibPointsMz: [[0, 0]],
  calibPointsResolution: [[0, 0]],
};

export function isSettingsField(value: string): value is SettingsField {
  return SETTINGS_FIELDS.some((field) => field === value);
}

// -----------------------------------------------------------------------------
// Telemetry
// -----------------------------------------------------------------------------

export interface Telemetry {
  maxMz: number;
  frequency: number;
  rfAmplitude: number;
  dc1: number;
  dc2: number;
  current: number;
}

export type TelemetryField = keyof Telemetry;

export const TELEMETRY_FIELDS = [
  'maxMz',
  'frequency',
  'rfAmplitude',
  'dc1',
  'dc2',
  'current',
] as const satisfies readonly TelemetryField[];

export interface TelemetryReading {
  field: TelemetryField;
  value: number;
  receivedAt: number;
}

// -----------------------------------------------------------------------------
// Wire Names
// -----------------------------------------------------------------------------

/**
 * Command codes, the last segment of `{base}/cmnd/{device}/{code}`.
 */
export const CommandCode = {
  RANGE: 'range',
  MZ: 'mz',
  DC_OFFSET: 'dc_offst',
  DC_ON: 'is_dc_on',
  ROD_POLARITY_POSITIVE: 'is_rod_polarity_positive',
  CALIB_POINTS_MZ: 'calib_pnts_rf',
  CALIB_POINTS_RESOLUTION: 'calib_pnts_dc',
  STATE: 'state',
} as const;

export type CommandCode = (typeof CommandCode)[keyof typeof CommandCode];

export const FIELD_COMMAND_CODES: Readonly<Record<SettingsField, CommandCode>> = {
  massRange: CommandCode.RANGE,
  mz: CommandCode.MZ,
  dcOffset: CommandCode.DC_OFFSET,
  dcOn: CommandCode.DC_ON,
  rodPolarityPositive: CommandCode.ROD_POLARITY_POSITIVE,
  calibPointsMz: CommandCode.CALIB_POINTS_MZ,
  calibPointsResolution: CommandCode.CALIB_POINTS_RESOLUTION,
};

/** Anything that can be pulled with a parameterless request. */
export type RequestTarget = SettingsField | 'state';

export type ReportTarget =
  | { type: 'setting'; field: SettingsField }
  | { type: 'telemetry'; field: TelemetryField };

/**
 * Keys of the bulk state report. dcOffset is absent from some firmware
 * variants' reports, and the calibration curves never appear here.
 */
export const STATE_REPORT_KEYS: ReadonlyArray<readonly [string, ReportTarget]> = [
  ['range', { type: 'setting', field: 'massRange' }],
  ['frequency', { type: 'telemetry', field: 'frequency' }],
  ['rf_amp', { type: 'telemetry', field: 'rfAmplitude' }],
  ['dc1', { type: 'telemetry', field: 'dc1' }],
  ['dc2', { type: 'telemetry', field: 'dc2' }],
  ['current', { type: 'telemetry', field: 'current' }],
  ['mz', { type: 'setting', field: 'mz' }],
  ['dc_offst', { type: 'setting', field: 'dcOffset' }],
  ['is_dc_on', { type: 'setting', field: 'dcOn' }],
  ['is_rod_polarity_positive', { type: 'setting', field: 'rodPolarityPositive' }],
  ['max_mz', { type: 'telemetry', field: 'maxMz' }],
];

/**
 * Last topic segments of single-value reports. The device echoes on its
 * command codes; older firmware used the field names.
 */
export const FIELD_REPORT_NAMES: ReadonlyMap<string, ReportTarget> = new Map<string, ReportTarget>([
  ['range', { type: 'setting', field: 'massRange' }],
  ['mass_range', { type: 'setting', field: 'massRange' }],
  ['mz', { type: 'setting', field: 'mz' }],
  ['dc_offst', { type: 'setting', field: 'dcOffset' }],
  ['dc_offset', { type: 'setting', field: 'dcOffset' }],
  ['is_dc_on', { type: 'setting', field: 'dcOn' }],
  ['dc_on', { type: 'setting', field: 'dcOn' }],
  ['is_rod_polarity_positive', { type: 'setting', field: 'rodPolarityPositive' }],
  ['rod_polarity_positive', { type: 'setting', field: 'rodPolarityPositive' }],
  ['calib_pnts_rf', { type: 'setting', field: 'calibPointsMz' }],
  ['calib_points_mz', { type: 'setting', field: 'calibPointsMz' }],
  ['calib_pnts_dc', { type: 'setting', field: 'calibPointsResolution' }],
  ['calib_points_resolution', { type: 'setting', field: 'calibPointsResolution' }],
  ['max_mz', { type: 'telemetry', field: 'maxMz' }],
]);

/** Keys of the persisted settings file. */
export const SNAPSHOT_KEYS: Readonly<Record<SettingsField, string>> = {
  massRange: 'mass_range',
  mz: 'mz',
  dcOffset: 'dc_offset',
  dcOn: 'dc_on',
  rodPolarityPositive: 'rod_polarity_positive',
  calibPointsMz: 'calib_points_mz',
  calibPointsResolution: 'calib_points_resolution',
};

// -----------------------------------------------------------------------------
// Notifications
// -----------------------------------------------------------------------------

/**
 * Who caused a mirror update. A front-end re-publishes only what the
 * operator typed, never what arrived with origin `device` or `snapshot`.
 */
export const UpdateOrigin = {
  OPERATOR: 'operator',
  DEVICE: 'device',
  SNAPSHOT: 'snapshot',
} as const;

export type UpdateOrigin = (typeof UpdateOrigin)[keyof typeof UpdateOrigin];

export type DeviceStatus =
  | { status: 'connected'; at: number }
  | { status: 'error'; detail: string; at: number };
