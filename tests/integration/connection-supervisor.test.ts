/**
 * Connection Supervisor Integration Tests
 *
 * Drives the supervisor through its lifecycle over the in-process broker.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConnectionSupervisor, ConnectionState } from '../../src/core/connection/supervisor.js';
import type { ConnectionStateChange } from '../../src/core/connection/supervisor.js';
import { CommandPublisher } from '../../src/core/commands/publisher.js';
import { SettingsMirror } from '../../src/core/state/mirror.js';
import { MemoryBroker, MemoryTransport } from '../../src/transports/memory/broker.js';
import { NotConnectedError } from '../../src/core/errors.js';
import { createSilentLogger } from '../../src/observability/logger.js';
import { EngineMetrics } from '../../src/observability/metrics.js';

const scheme = { base: 'lab', device: 'rf1' };

const RESYNC_TOPICS = [
  'lab/cmnd/rf1/state',
  'lab/cmnd/rf1/dc_offst',
  'lab/cmnd/rf1/calib_pnts_rf',
  'lab/cmnd/rf1/calib_pnts_dc',
];

describe('ConnectionSupervisor Integration', () => {
  let broker: MemoryBroker;
  let transport: MemoryTransport;
  let mirror: SettingsMirror;
  let supervisor: ConnectionSupervisor;
  let publisher: CommandPublisher;
  let metrics: EngineMetrics;
  let transitions: ConnectionStateChange[];
  let messages: string[];

  beforeEach(() => {
    broker = new MemoryBroker();
    transport = new MemoryTransport(broker, { clientId: 'engine', autoAcknowledge: false });
    mirror = new SettingsMirror({ logger: createSilentLogger() });
    metrics = new EngineMetrics();
    messages = [];

    supervisor = new ConnectionSupervisor({
      transport,
      scheme,
      resyncFields: ['dcOffset', 'calibPointsMz', 'calibPointsResolution'],
      logger: createSilentLogger(),
      metrics,
      onMessage: (topic) => messages.push(topic),
    });

    publisher = new CommandPublisher({
      mirror,
      transport,
      gate: supervisor,
      scheme,
      logger: createSilentLogger(),
    });

    transitions = [];
    supervisor.onStateChange((change) => transitions.push(change));
  });

  afterEach(async () => {
    await supervisor.stop();
  });

  describe('lifecycle', () => {
    it('should start disconnected', () => {
      expect(supervisor.getState()).toBe(ConnectionState.DISCONNECTED);
      expect(supervisor.isConnected()).toBe(false);
    });

    it('should be connecting until the transport acknowledges', () => {
      supervisor.start(publisher);

      expect(supervisor.getState()).toBe(ConnectionState.CONNECTING);
      expect(supervisor.isConnected()).toBe(false);
      expect(broker.published).toHaveLength(0);
    });

    it('should subscribe and resync on acknowledgement', () => {
      supervisor.start(publisher);
      transport.acknowledge();

      expect(supervisor.getState()).toBe(ConnectionState.CONNECTED);
      expect(supervisor.isConnected()).toBe(true);
      expect([...transport.filters]).toEqual([
        'lab/response/rf1/#',
        'lab/connected/rf1',
        'lab/error/rf1/#',
        'lab/status/rf1/state',
      ]);
      expect(broker.published.map((m) => m.topic)).toEqual(RESYNC_TOPICS);
      expect(broker.published.every((m) => m.payload === '{}')).toBe(true);
    });

    it('should not start twice', () => {
      supervisor.start(publisher);
      expect(() => supervisor.start(publisher)).toThrow('Connection supervisor is already started');
    });

    it('should report transitions in order', () => {
      supervisor.start(publisher);
      transport.acknowledge();
      transport.drop();
      transport.reconnect();
      transport.acknowledge();

      expect(transitions.map((t) => [t.previous, t.state])).toEqual([
        ['disconnected', 'connecting'],
        ['connecting', 'connected'],
        ['connected', 'disconnected'],
        ['disconnected', 'connecting'],
        ['connecting', 'connected'],
      ]);
    });

    it('should end the session on stop', async () => {
      supervisor.start(publisher);
      transport.acknowledge();

      await supervisor.stop();

      expect(supervisor.getState()).toBe(ConnectionState.DISCONNECTED);
      expect(transport.connected).toBe(false);
      expect(transitions.at(-1)).toMatchObject({ state: 'disconnected', previous: 'connected' });
    });

    it('should ignore transport errors for state purposes', () => {
      supervisor.start(publisher);
      transport.acknowledge();
      transport.fail(new Error('socket hiccup'));

      expect(supervisor.getState()).toBe(ConnectionState.CONNECTED);
    });
  });

  describe('publish gate', () => {
    it('should reject requests after the session drops', () => {
      supervisor.start(publisher);
      transport.acknowledge();
      transport.drop();

      const result = publisher.request('mz', 10);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(NotConnectedError);
      }
      expect(mirror.get('mz')).toBe(0);
    });

    it('should accept requests again after reconnecting', () => {
      supervisor.start(publisher);
      transport.acknowledge();
      transport.drop();
      transport.reconnect();
      transport.acknowledge();

      expect(publisher.request('mz', 10).ok).toBe(true);
    });
  });

  describe('resync', () => {
    it('should repeat the full sequence after every reconnect', () => {
      supervisor.start(publisher);
      transport.acknowledge();
      transport.drop();
      transport.reconnect();
      transport.acknowledge();

      expect(broker.published.map((m) => m.topic)).toEqual([...RESYNC_TOPICS, ...RESYNC_TOPICS]);
    });

    it('should issue one sequence per call without de-duplication', () => {
      supervisor.start(publisher);
      transport.acknowledge();
      broker.clearHistory();

      supervisor.resync('device-connected');
      supervisor.resync('device-connected');

      expect(broker.published.map((m) => m.topic)).toEqual([...RESYNC_TOPICS, ...RESYNC_TOPICS]);
    });

    it('should return the outcome of each request', () => {
      supervisor.start(publisher);
      transport.acknowledge();

      const entries = supervisor.resync('manual');

      expect(entries.map((e) => e.target)).toEqual([
        'state',
        'dcOffset',
        'calibPointsMz',
        'calibPointsResolution',
      ]);
      expect(entries.every((e) => e.result.ok)).toBe(true);
    });

    it('should report failed requests when disconnected', () => {
      supervisor.start(publisher);

      const entries = supervisor.resync('manual');

      expect(entries).toHaveLength(4);
      expect(entries.every((e) => !e.result.ok)).toBe(true);
      expect(broker.published).toHaveLength(0);
    });

    it('should do nothing before start', () => {
      expect(supervisor.resync('manual')).toEqual([]);
    });

    it('should use the configured field list', () => {
      const custom = new ConnectionSupervisor({
        transport,
        scheme,
        resyncFields: ['mz'],
        logger: createSilentLogger(),
      });
      const customPublisher = new CommandPublisher({
        mirror,
        transport,
        gate: custom,
        scheme,
        logger: createSilentLogger(),
      });

      custom.start(customPublisher);
      transport.acknowledge();

      expect(broker.published.map((m) => m.topic)).toEqual(['lab/cmnd/rf1/state', 'lab/cmnd/rf1/mz']);
    });

    it('should count resyncs by trigger', async () => {
      supervisor.start(publisher);
      transport.acknowledge();
      supervisor.resync('device-connected');

      const text = await metrics.getMetrics();
      expect(text).toContain('rf_source_sync_resyncs_total{trigger="connect"} 1');
      expect(text).toContain('rf_source_sync_resyncs_total{trigger="device-connected"} 1');
      expect(text).toContain('rf_source_sync_connection_state 2');
    });
  });

  describe('messages', () => {
    it('should forward inbound messages', () => {
      supervisor.start(publisher);
      transport.acknowledge();

      broker.publish('device', 'lab/response/rf1/mz', '{"value": 1}');
      broker.publish('device', 'lab/cmnd/rf1/mz', '{"value": 1}');

      expect(messages).toEqual(['lab/response/rf1/mz']);
    });
  });

  describe('listeners', () => {
    it('should keep going when a state listener throws', () => {
      const after = vi.fn();
      supervisor.onStateChange(() => {
        throw new Error('listener failure');
      });
      supervisor.onStateChange(after);

      supervisor.start(publisher);

      expect(after).toHaveBeenCalledTimes(1);
    });

    it('should stop notifying after unsubscribe', () => {
      const listener = vi.fn();
      const unsubscribe = supervisor.onStateChange(listener);
      unsubscribe();

      supervisor.start(publisher);

      expect(listener).not.toHaveBeenCalled();
    });
  });
});
