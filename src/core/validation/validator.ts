/**
 * Settings Validator
 *
 * One stateless validator per settings field. Shape is checked with zod,
 * domain with a type guard, so callers can tell a malformed value from an
 * out-of-range one.
 */

import { z } from 'zod';
import type { CalibrationPoint, MassRange, Settings, SettingsField } from '../protocol/types.js';
import { SETTINGS_FIELDS } from '../protocol/types.js';
import { ValidationError } from '../errors.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationError };

export type FieldValidator<T> = (value: unknown) => ValidationResult<T>;

export type FieldValidators = { [K in SettingsField]: FieldValidator<Settings[K]> };

export type SettingsValidationResult =
  | { ok: true; value: Settings }
  | { ok: false; errors: ValidationError[] };

// -----------------------------------------------------------------------------
// Schemas
// -----------------------------------------------------------------------------

// JSON has no encoding for the infinities.
export const CalibrationPointSchema = z.tuple([z.number().finite(), z.number().finite()]);

export const CalibrationPointsSchema = z.array(CalibrationPointSchema);

// -0 does not survive a JSON round trip.
const NumberSchema = z.number().transform((value) => (Object.is(value, -0) ? 0 : value));

function fieldValidator<S, T extends S>(
  field: SettingsField,
  shape: z.ZodType<S>,
  shapeMessage: string,
  inRange: (value: S) => value is T,
  rangeMessage: string
): FieldValidator<T> {
  return (value) => {
    const parsed = shape.safeParse(value);
    if (!parsed.success) {
      return {
        ok: false,
        error: new ValidationError(field, 'malformed-shape', value, shapeMessage),
      };
    }

    if (!inRange(parsed.data)) {
      return {
        ok: false,
        error: new ValidationError(field, 'out-of-range', value, rangeMessage),
      };
    }

    return { ok: true, value: parsed.data };
  };
}

function anyValue<S>(_value: S): _value is S {
  return true;
}

function isMassRange(value: number): value is MassRange {
  return value === 0 || value === 1 || value === 2;
}

function isNonNegativeFinite(value: number): value is number {
  return Number.isFinite(value) && value >= 0;
}

function isFiniteNumber(value: number): value is number {
  return Number.isFinite(value);
}

// -----------------------------------------------------------------------------
// Field Validators
// -----------------------------------------------------------------------------

export const validateMassRange: FieldValidator<MassRange> = fieldValidator(
  'massRange',
  z.number(),
  'must be a number',
  isMassRange,
  'must be 0, 1, or 2'
);

export const validateMz: FieldValidator<number> = fieldValidator(
  'mz',
  NumberSchema,
  'must be a number',
  isNonNegativeFinite,
  'must be a non-negative number'
);

export const validateDcOffset: FieldValidator<number> = fieldValidator(
  'dcOffset',
  NumberSchema,
  'must be a number',
  isFiniteNumber,
  'must be finite'
);

export const validateDcOn: FieldValidator<boolean> = fieldValidator(
  'dcOn',
  z.boolean(),
  'must be a boolean',
  anyValue,
  ''
);

export const validateRodPolarityPositive: FieldValidator<boolean> = fieldValidator(
  'rodPolarityPositive',
  z.boolean(),
  'must be a boolean',
  anyValue,
  ''
);

// Shape only: ordering and range of the points are not checked.
export const validateCalibPointsMz: FieldValidator<CalibrationPoint[]> = fieldValidator(
  'calibPointsMz',
  CalibrationPointsSchema,
  'must be a list of number pairs',
  anyValue,
  ''
);

export const validateCalibPointsResolution: FieldValidator<CalibrationPoint[]> = fieldValidator(
  'calibPointsResolution',
  CalibrationPointsSchema,
  'must be a list of number pairs',
  anyValue,
  ''
);

export const FIELD_VALIDATORS: Readonly<FieldValidators> = {
  massRange: validateMassRange,
  mz: validateMz,
  dcOffset: validateDcOffset,
  dcOn: validateDcOn,
  rodPolarityPositive: validateRodPolarityPositive,
  calibPointsMz: validateCalibPointsMz,
  calibPointsResolution: validateCalibPointsResolution,
};

/**
 * Validate a candidate value for a field. Never mutates the candidate; the
 * returned value is a fresh copy for array fields.
 */
export function validateField<K extends SettingsField>(
  field: K,
  value: unknown
): ValidationResult<Settings[K]> {
  const validator: FieldValidators[K] = FIELD_VALIDATORS[field];
  return validator(value);
}

/**
 * Validate all seven fields. Reports every failing field, not just the first.
 */
export function validateSettings(candidate: Record<SettingsField, unknown>): SettingsValidationResult {
  const errors: ValidationError[] = [];
  const value: Partial<Settings> = {};

  for (const field of SETTINGS_FIELDS) {
    const result = validateField(field, candidate[field]);
    if (result.ok) {
      assign(value, field, result.value);
    } else {
      errors.push(result.error);
    }
  }

  if (errors.length > 0 || !isComplete(value)) {
    return { ok: false, errors };
  }

  return { ok: true, value };
}

function assign<K extends SettingsField>(target: Partial<Settings>, field: K, value: Settings[K]): void {
  target[field] = value;
}

function isComplete(value: Partial<Settings>): value is Settings {
  return SETTINGS_FIELDS.every((field) => value[field] !== undefined);
}
