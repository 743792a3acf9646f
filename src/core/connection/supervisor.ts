/**
 * Connection Supervisor
 *
 * Owns the transport session lifecycle:
 *   disconnected → connecting → connected → disconnected → ...
 *
 * On every connection acknowledgement it subscribes to the device topics and
 * issues the resync sequence. It is also the gate every outbound operation
 * checks before publishing.
 */

import type { RequestTarget, SettingsField } from '../protocol/types.js';
import type { TopicScheme } from '../protocol/topics.js';
import { subscriptionTopics } from '../protocol/topics.js';
import type { CommandResult } from '../commands/publisher.js';
import type { ConnectivityGate } from '../commands/guard.js';
import type { DeviceTransport, TransportEvent } from '../../transports/types.js';
import type { Logger } from '../../observability/logger.js';
import type { EngineMetrics } from '../../observability/metrics.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export const ConnectionState = {
  DISCONNECTED: 'disconnected',
  CONNECTING: 'connecting',
  CONNECTED: 'connected',
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

export interface ConnectionStateChange {
  state: ConnectionState;
  previous: ConnectionState;
  reason?: string;
  at: number;
}

export type ConnectionStateListener = (change: ConnectionStateChange) => void;

/** What resync needs from the publisher. */
export interface ResyncRequester {
  requestCurrent(target: RequestTarget): CommandResult;
}

export interface ResyncEntry {
  target: RequestTarget;
  result: CommandResult;
}

export type MessageHandler = (topic: string, payload: Buffer) => void;

export interface ConnectionSupervisorOptions {
  transport: DeviceTransport;
  scheme: TopicScheme;
  /**
   * Fields pulled individually after the state request because the bulk
   * report does not carry them.
   */
  resyncFields: readonly SettingsField[];
  logger: Logger;
  metrics?: EngineMetrics;
  /** Receives every inbound message */
  onMessage?: MessageHandler;
}

// -----------------------------------------------------------------------------
// Connection Supervisor
// -----------------------------------------------------------------------------

export class ConnectionSupervisor implements ConnectivityGate {
  private readonly transport: DeviceTransport;
  private readonly scheme: TopicScheme;
  private readonly resyncFields: readonly SettingsField[];
  private readonly logger: Logger;
  private readonly metrics: EngineMetrics | undefined;
  private readonly onMessage: MessageHandler | undefined;

  private state: ConnectionState = ConnectionState.DISCONNECTED;
  private requester: ResyncRequester | null = null;
  private detachTransport: (() => void) | null = null;
  private listeners: Set<ConnectionStateListener> = new Set();

  constructor(options: ConnectionSupervisorOptions) {
    this.transport = options.transport;
    this.scheme = options.scheme;
    this.resyncFields = [...options.resyncFields];
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.onMessage = options.onMessage;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start connecting. `requester` issues the resync requests once connected.
   */
  start(requester: ResyncRequester): void {
    if (this.detachTransport) {
      throw new Error('Connection supervisor is already started');
    }

    this.requester = requester;
    this.detachTransport = this.transport.onEvent((event) => this.handleTransportEvent(event));

    this.transition(ConnectionState.CONNECTING, 'start');
    this.transport.connect();
  }

  /**
   * Close the session. The supervisor can be started again afterwards.
   */
  async stop(): Promise<void> {
    try {
      await this.transport.end();
    } finally {
      this.detachTransport?.();
      this.detachTransport = null;
      this.requester = null;
      this.transition(ConnectionState.DISCONNECTED, 'stop');
    }
  }

  // ---------------------------------------------------------------------------
  // Transport Events
  // ---------------------------------------------------------------------------

  private handleTransportEvent(event: TransportEvent): void {
    switch (event.type) {
      case 'connect':
        this.handleConnect();
        break;

      case 'reconnect':
        this.transition(ConnectionState.CONNECTING, 'reconnect');
        break;

      case 'close':
      case 'offline':
        this.transition(ConnectionState.DISCONNECTED, event.type);
        break;

      case 'error':
        this.logger.warn({ err: event.error }, 'Transport error');
        break;

      case 'message':
        this.onMessage?.(event.topic, event.payload);
        break;
    }
  }

  private handleConnect(): void {
    this.transition(ConnectionState.CONNECTED, 'connect');

    const topics = subscriptionTopics(this.scheme);
    this.transport.subscribe(topics);
    this.logger.debug({ topics }, 'Subscribed to device topics');

    this.resync('connect');
  }

  // ---------------------------------------------------------------------------
  // Resync
  // ---------------------------------------------------------------------------

  /**
   * Issue the resync sequence: the full state request, then one request per
   * configured field. Every call issues the whole sequence; duplicates of
   * requests still in flight are fine.
   */
  resync(trigger: string): ResyncEntry[] {
    if (!this.requester) {
      this.logger.warn({ trigger }, 'Resync requested before the supervisor was started');
      return [];
    }

    const targets: RequestTarget[] = ['state', ...this.resyncFields];
    const entries: ResyncEntry[] = [];

    for (const target of targets) {
      entries.push({ target, result: this.requester.requestCurrent(target) });
    }

    const failed = entries.filter((entry) => !entry.result.ok).map((entry) => entry.target);
    this.metrics?.recordResync(trigger);

    if (failed.length > 0) {
      this.logger.warn({ trigger, failed }, 'Resync incomplete');
    } else {
      this.logger.info({ trigger, targets }, 'Resync requested');
    }

    return entries;
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  isConnected(): boolean {
    return this.state === ConnectionState.CONNECTED && this.transport.connected;
  }

  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Listen to state transitions. Returns a function that removes the listener.
   */
  onStateChange(listener: ConnectionStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private transition(state: ConnectionState, reason: string): void {
    if (this.state === state) {
      return;
    }

    const change: ConnectionStateChange = {
      state,
      previous: this.state,
      reason,
      at: Date.now(),
    };

    this.state = state;
    this.metrics?.recordConnectionState(state);
    this.logger.info({ state, previous: change.previous, reason }, 'Connection state changed');

    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        this.logger.error({ err: error }, 'Connection state listener error');
      }
    }
  }
}
