/**
 * Settings File
 *
 * Saves the mirror to a JSON file and loads one back through `replaceAll`.
 * The file holds exactly the seven settings under their persisted names.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import type { Settings, SettingsField } from '../protocol/types.js';
import { SETTINGS_FIELDS, SNAPSHOT_KEYS, UpdateOrigin } from '../protocol/types.js';
import { isRecord } from '../protocol/payload.js';
import { SnapshotLoadError } from '../errors.js';
import type { SettingsChange, SettingsMirror } from './mirror.js';

// -----------------------------------------------------------------------------
// Encoding
// -----------------------------------------------------------------------------

/**
 * Settings under their persisted key names, in field order.
 */
export function toSnapshotRecord(settings: Settings): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const field of SETTINGS_FIELDS) {
    record[SNAPSHOT_KEYS[field]] = settings[field];
  }
  return record;
}

/**
 * Map a decoded file onto field names. The record must carry every persisted
 * key and nothing else; values are left for the mirror to validate.
 */
export function fromSnapshotRecord(
  record: unknown
): { ok: true; candidate: Record<SettingsField, unknown> } | { ok: false; issues: string[] } {
  if (!isRecord(record)) {
    return { ok: false, issues: ['top-level value must be an object'] };
  }

  const issues: string[] = [];
  const known = new Set<string>(Object.values(SNAPSHOT_KEYS));

  for (const field of SETTINGS_FIELDS) {
    if (!(SNAPSHOT_KEYS[field] in record)) {
      issues.push(`missing key '${SNAPSHOT_KEYS[field]}'`);
    }
  }
  for (const key of Object.keys(record)) {
    if (!known.has(key)) {
      issues.push(`unexpected key '${key}'`);
    }
  }

  if (issues.length > 0) {
    return { ok: false, issues };
  }

  return {
    ok: true,
    candidate: {
      massRange: record[SNAPSHOT_KEYS.massRange],
      mz: record[SNAPSHOT_KEYS.mz],
      dcOffset: record[SNAPSHOT_KEYS.dcOffset],
      dcOn: record[SNAPSHOT_KEYS.dcOn],
      rodPolarityPositive: record[SNAPSHOT_KEYS.rodPolarityPositive],
      calibPointsMz: record[SNAPSHOT_KEYS.calibPointsMz],
      calibPointsResolution: record[SNAPSHOT_KEYS.calibPointsResolution],
    },
  };
}

// -----------------------------------------------------------------------------
// File Operations
// -----------------------------------------------------------------------------

/**
 * Write the mirror's current settings to `path` (pretty-printed JSON).
 * Returns the resolved path.
 */
export async function saveSettingsFile(mirror: SettingsMirror, path: string): Promise<string> {
  const resolved = resolve(path);
  await mkdir(dirname(resolved), { recursive: true });
  await writeFile(resolved, JSON.stringify(toSnapshotRecord(mirror.getAll()), null, 2) + '\n', 'utf-8');
  return resolved;
}

/**
 * Read `path` and replace every mirror field with its contents. Rejects with
 * `SnapshotLoadError`, leaving the mirror unchanged, when the file cannot be
 * read or decoded or any value fails validation.
 */
export async function loadSettingsFile(mirror: SettingsMirror, path: string): Promise<SettingsChange[]> {
  const resolved = resolve(path);

  let text: string;
  try {
    text = await readFile(resolved, 'utf-8');
  } catch (error) {
    throw new SnapshotLoadError(resolved, [error instanceof Error ? error.message : String(error)]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new SnapshotLoadError(resolved, [error instanceof Error ? error.message : 'invalid JSON']);
  }

  const decoded = fromSnapshotRecord(parsed);
  if (!decoded.ok) {
    throw new SnapshotLoadError(resolved, decoded.issues);
  }

  const result = mirror.replaceAll(decoded.candidate, UpdateOrigin.SNAPSHOT);
  if (!result.ok) {
    throw new SnapshotLoadError(
      resolved,
      result.errors.map((e) => e.message)
    );
  }

  return result.changes;
}
