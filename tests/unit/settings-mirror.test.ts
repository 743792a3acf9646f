/**
 * Settings Mirror Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SettingsMirror } from '../../src/core/state/mirror.js';
import type { SettingsChange } from '../../src/core/state/mirror.js';
import { DEFAULT_SETTINGS, UpdateOrigin } from '../../src/core/protocol/types.js';
import { createSilentLogger } from '../../src/observability/logger.js';
import { EngineMetrics } from '../../src/observability/metrics.js';

describe('SettingsMirror', () => {
  let mirror: SettingsMirror;

  beforeEach(() => {
    mirror = new SettingsMirror({ logger: createSilentLogger() });
  });

  describe('initial state', () => {
    it('should start with the power-on defaults', () => {
      expect(mirror.getAll()).toEqual({
        massRange: 0,
        mz: 0,
        dcOffset: 0,
        dcOn: true,
        rodPolarityPositive: true,
        calibPointsMz: [[0, 0]],
        calibPointsResolution: [[0, 0]],
      });
    });

    it('should start every field at version 0', () => {
      expect(mirror.getVersion('mz')).toBe(0);
      expect(mirror.getVersion('calibPointsMz')).toBe(0);
    });

    it('should not share arrays with the defaults', () => {
      const points = mirror.get('calibPointsMz');
      points.push([1, 1]);
      expect(mirror.get('calibPointsMz')).toEqual([[0, 0]]);
      expect(DEFAULT_SETTINGS.calibPointsMz).toEqual([[0, 0]]);
    });
  });

  describe('setIfValid', () => {
    it('should apply a valid value and report the change', () => {
      const result = mirror.setIfValid('mz', 250, UpdateOrigin.OPERATOR);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.change).toMatchObject({
          field: 'mz',
          value: 250,
          previous: 0,
          origin: 'operator',
          version: 1,
        });
      }
      expect(mirror.get('mz')).toBe(250);
    });

    it('should leave the mirror untouched on an invalid value', () => {
      mirror.setIfValid('massRange', 2, UpdateOrigin.DEVICE);
      const result = mirror.setIfValid('massRange', 5, UpdateOrigin.DEVICE);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('out-of-range');
      }
      expect(mirror.get('massRange')).toBe(2);
      expect(mirror.getVersion('massRange')).toBe(1);
    });

    it('should reject negative mz without mutation', () => {
      const result = mirror.setIfValid('mz', -1, UpdateOrigin.DEVICE);
      expect(result.ok).toBe(false);
      expect(mirror.get('mz')).toBe(0);
    });

    it('should keep calibration point order', () => {
      mirror.setIfValid('calibPointsResolution', [[300, 2], [100, 1]], UpdateOrigin.OPERATOR);
      expect(mirror.get('calibPointsResolution')).toEqual([[300, 2], [100, 1]]);
    });

    it('should notify equal values and bump the version', () => {
      const listener = vi.fn();
      mirror.addListener(listener);

      mirror.setIfValid('dcOn', true, UpdateOrigin.DEVICE);
      mirror.setIfValid('dcOn', true, UpdateOrigin.DEVICE);

      expect(listener).toHaveBeenCalledTimes(2);
      expect(mirror.getVersion('dcOn')).toBe(2);
    });

    it('should hand out copies of array values', () => {
      const points: [number, number][] = [[1, 2]];
      mirror.setIfValid('calibPointsMz', points, UpdateOrigin.OPERATOR);
      points.push([3, 4]);

      expect(mirror.get('calibPointsMz')).toEqual([[1, 2]]);
    });

    it('should record accepted updates in metrics', async () => {
      const metrics = new EngineMetrics();
      const measured = new SettingsMirror({ logger: createSilentLogger(), metrics });

      measured.setIfValid('mz', 10, UpdateOrigin.DEVICE);
      measured.setIfValid('mz', -10, UpdateOrigin.DEVICE);

      const text = await metrics.getMetrics();
      expect(text).toContain('rf_source_sync_mirror_updates_total{field="mz",origin="device"} 1');
    });
  });

  describe('replaceAll', () => {
    const snapshot = {
      massRange: 1,
      mz: 512,
      dcOffset: -3.5,
      dcOn: false,
      rodPolarityPositive: false,
      calibPointsMz: [[0, 0], [1000, 1.2]],
      calibPointsResolution: [[0, 0.5]],
    };

    it('should replace every field and notify each one', () => {
      const changes: SettingsChange[] = [];
      mirror.addListener((change) => changes.push(change));

      const result = mirror.replaceAll(snapshot, UpdateOrigin.SNAPSHOT);

      expect(result.ok).toBe(true);
      expect(mirror.getAll()).toEqual(snapshot);
      expect(changes.map((c) => c.field)).toEqual([
        'massRange',
        'mz',
        'dcOffset',
        'dcOn',
        'rodPolarityPositive',
        'calibPointsMz',
        'calibPointsResolution',
      ]);
      expect(changes.every((c) => c.origin === 'snapshot')).toBe(true);
    });

    it('should apply all fields before the first notification', () => {
      const seen: unknown[] = [];
      mirror.onField('massRange', () => {
        seen.push(mirror.get('calibPointsResolution'));
      });

      mirror.replaceAll(snapshot, UpdateOrigin.SNAPSHOT);

      expect(seen).toEqual([[[0, 0.5]]]);
    });

    it('should apply nothing when any field fails', () => {
      const listener = vi.fn();
      mirror.addListener(listener);

      const result = mirror.replaceAll(
        { ...snapshot, calibPointsMz: [[1, 2], ['a', 3]], mz: -4 },
        UpdateOrigin.SNAPSHOT
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.errors.map((e) => e.field)).toEqual(['mz', 'calibPointsMz']);
      }
      expect(mirror.getAll()).toEqual(DEFAULT_SETTINGS);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('listeners', () => {
    it('should scope onField listeners to one field', () => {
      const listener = vi.fn();
      mirror.onField('dcOffset', listener);

      mirror.setIfValid('mz', 5, UpdateOrigin.OPERATOR);
      mirror.setIfValid('dcOffset', 7, UpdateOrigin.OPERATOR);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(
        expect.objectContaining({ field: 'dcOffset', value: 7, previous: 0 })
      );
    });

    it('should stop notifying after unsubscribe', () => {
      const listener = vi.fn();
      const unsubscribe = mirror.onField('mz', listener);

      unsubscribe();
      mirror.setIfValid('mz', 5, UpdateOrigin.OPERATOR);

      expect(listener).not.toHaveBeenCalled();
    });

    it('should stop notifying after removeListener', () => {
      const listener = vi.fn();
      mirror.addListener(listener);
      mirror.removeListener(listener);

      mirror.setIfValid('mz', 5, UpdateOrigin.OPERATOR);

      expect(listener).not.toHaveBeenCalled();
    });

    it('should keep notifying when a listener throws', () => {
      const after = vi.fn();
      mirror.addListener(() => {
        throw new Error('listener failure');
      });
      mirror.addListener(after);

      const result = mirror.setIfValid('mz', 9, UpdateOrigin.OPERATOR);

      expect(result.ok).toBe(true);
      expect(after).toHaveBeenCalledTimes(1);
    });
  });
});
