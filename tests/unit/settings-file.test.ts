/**
 * Settings File Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  fromSnapshotRecord,
  loadSettingsFile,
  saveSettingsFile,
  toSnapshotRecord,
} from '../../src/core/state/settings-file.js';
import { SettingsMirror } from '../../src/core/state/mirror.js';
import { DEFAULT_SETTINGS, UpdateOrigin } from '../../src/core/protocol/types.js';
import type { Settings } from '../../src/core/protocol/types.js';
import { SnapshotLoadError, ErrorCode } from '../../src/core/errors.js';
import { createSilentLogger } from '../../src/observability/logger.js';

const SAMPLE: Settings = {
  massRange: 2,
  mz: 1234.5,
  dcOffset: -7.25,
  dcOn: false,
  rodPolarityPositive: false,
  calibPointsMz: [[0, 0], [500, 0.75], [250, 0.5]],
  calibPointsResolution: [[0, 1]],
};

describe('Settings file', () => {
  let dir: string;
  let mirror: SettingsMirror;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'rf-source-sync-'));
    mirror = new SettingsMirror({ logger: createSilentLogger() });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('encoding', () => {
    it('should use the persisted key names', () => {
      expect(toSnapshotRecord(SAMPLE)).toEqual({
        mass_range: 2,
        mz: 1234.5,
        dc_offset: -7.25,
        dc_on: false,
        rod_polarity_positive: false,
        calib_points_mz: [[0, 0], [500, 0.75], [250, 0.5]],
        calib_points_resolution: [[0, 1]],
      });
    });

    it('should report missing and unexpected keys', () => {
      const record = toSnapshotRecord(SAMPLE);
      delete record['dc_on'];
      record['dc_offst'] = 1;

      expect(fromSnapshotRecord(record)).toEqual({
        ok: false,
        issues: ["missing key 'dc_on'", "unexpected key 'dc_offst'"],
      });
    });

    it('should reject non-objects', () => {
      expect(fromSnapshotRecord([1, 2])).toEqual({
        ok: false,
        issues: ['top-level value must be an object'],
      });
    });
  });

  describe('save and load', () => {
    it('should reproduce the settings exactly', async () => {
      const source = new SettingsMirror({ logger: createSilentLogger(), initial: SAMPLE });
      const path = join(dir, 'settings.json');

      await saveSettingsFile(source, path);
      await loadSettingsFile(mirror, path);

      expect(mirror.getAll()).toEqual(SAMPLE);
    });

    it('should reproduce zero settings written as negative zero', async () => {
      const source = new SettingsMirror({ logger: createSilentLogger() });
      source.setIfValid('mz', -0, UpdateOrigin.OPERATOR);
      source.setIfValid('dcOffset', -0, UpdateOrigin.OPERATOR);
      const path = join(dir, 'zero.json');

      await saveSettingsFile(source, path);
      await loadSettingsFile(mirror, path);

      expect(Object.is(mirror.get('mz'), source.get('mz'))).toBe(true);
      expect(Object.is(mirror.get('dcOffset'), source.get('dcOffset'))).toBe(true);
    });

    it('should write pretty-printed JSON', async () => {
      const path = join(dir, 'nested', 'settings.json');
      await saveSettingsFile(mirror, path);

      const text = await readFile(path, 'utf-8');
      expect(text.split('\n')[1]).toBe('  "mass_range": 0,');
      expect(JSON.parse(text)).toEqual(toSnapshotRecord(DEFAULT_SETTINGS));
    });

    it('should load with snapshot origin', async () => {
      const path = join(dir, 'settings.json');
      await writeFile(path, JSON.stringify(toSnapshotRecord(SAMPLE)));

      const changes = await loadSettingsFile(mirror, path);

      expect(changes).toHaveLength(7);
      expect(changes.every((change) => change.origin === UpdateOrigin.SNAPSHOT)).toBe(true);
    });
  });

  describe('load failures', () => {
    it('should reject a missing file', async () => {
      await expect(loadSettingsFile(mirror, join(dir, 'absent.json'))).rejects.toBeInstanceOf(
        SnapshotLoadError
      );
    });

    it('should reject invalid JSON and leave the mirror unchanged', async () => {
      const path = join(dir, 'broken.json');
      await writeFile(path, '{"mass_range": ');

      await expect(loadSettingsFile(mirror, path)).rejects.toMatchObject({
        code: ErrorCode.SNAPSHOT_LOAD_FAILURE,
        path,
      });
      expect(mirror.getAll()).toEqual(DEFAULT_SETTINGS);
    });

    it('should reject invalid values and list them', async () => {
      const path = join(dir, 'invalid.json');
      await writeFile(
        path,
        JSON.stringify({ ...toSnapshotRecord(SAMPLE), mass_range: 4, calib_points_mz: [[1, 2], ['a', 3]] })
      );

      const error = await loadSettingsFile(mirror, path).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SnapshotLoadError);
      if (error instanceof SnapshotLoadError) {
        expect(error.issues).toEqual([
          'Invalid massRange value 4: must be 0, 1, or 2',
          'Invalid calibPointsMz value [[1,2],["a",3]]: must be a list of number pairs',
        ]);
      }
      expect(mirror.getAll()).toEqual(DEFAULT_SETTINGS);
    });

    it('should never hold a calibration curve it cannot save', async () => {
      const result = mirror.setIfValid('calibPointsMz', [[Infinity, 1]], UpdateOrigin.OPERATOR);
      const path = join(dir, 'calibration.json');

      await saveSettingsFile(mirror, path);
      await loadSettingsFile(mirror, path);

      expect(result.ok).toBe(false);
      expect(mirror.get('calibPointsMz')).toEqual(DEFAULT_SETTINGS.calibPointsMz);
    });

    it('should reject files with extra keys', async () => {
      const path = join(dir, 'extra.json');
      await writeFile(path, JSON.stringify({ ...toSnapshotRecord(SAMPLE), comment: 'bench A' }));

      const error = await loadSettingsFile(mirror, path).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SnapshotLoadError);
      if (error instanceof SnapshotLoadError) {
        expect(error.issues).toEqual(["unexpected key 'comment'"]);
      }
    });
  });
});
