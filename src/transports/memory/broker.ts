/**
 * In-Process Broker
 *
 * A publish/subscribe broker that lives inside the process, with MQTT topic
 * filter matching. Delivery is synchronous: `publish` returns after every
 * matching subscriber has seen the message.
 */

import { topicMatchesFilter } from '../../core/protocol/topics.js';
import type { DeviceTransport, TransportEvent, TransportEventHandler } from '../types.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface PublishedMessage {
  topic: string;
  payload: string;
  /** Client id of the publisher */
  from: string;
}

interface BrokerClient {
  readonly clientId: string;
  readonly filters: ReadonlySet<string>;
  deliver(topic: string, payload: Buffer): void;
}

// -----------------------------------------------------------------------------
// Broker
// -----------------------------------------------------------------------------

export class MemoryBroker {
  private clients: Set<BrokerClient> = new Set();
  private history: PublishedMessage[] = [];

  attach(client: BrokerClient): void {
    this.clients.add(client);
  }

  detach(client: BrokerClient): void {
    this.clients.delete(client);
  }

  publish(from: string, topic: string, payload: string): void {
    this.history.push({ topic, payload, from });

    for (const client of [...this.clients]) {
      for (const filter of client.filters) {
        if (topicMatchesFilter(topic, filter)) {
          client.deliver(topic, Buffer.from(payload, 'utf-8'));
          break;
        }
      }
    }
  }

  /** Every message published through the broker, oldest first. */
  get published(): readonly PublishedMessage[] {
    return this.history;
  }

  /** Messages whose topic matches `filter`. */
  publishedTo(filter: string): PublishedMessage[] {
    return this.history.filter((message) => topicMatchesFilter(message.topic, filter));
  }

  clearHistory(): void {
    this.history = [];
  }
}

// -----------------------------------------------------------------------------
// Transport
// -----------------------------------------------------------------------------

export interface MemoryTransportOptions {
  clientId?: string;
  /** Acknowledge `connect()` immediately. Defaults to true. */
  autoAcknowledge?: boolean;
}

let clientCounter = 0;

/**
 * `DeviceTransport` backed by a `MemoryBroker`. Tests drive the session with
 * `acknowledge`, `drop` and `reconnect`.
 */
export class MemoryTransport implements DeviceTransport, BrokerClient {
  readonly clientId: string;
  private readonly broker: MemoryBroker;
  private readonly autoAcknowledge: boolean;
  private subscriptions: Set<string> = new Set();
  private handlers: Set<TransportEventHandler> = new Set();
  private isConnected = false;

  constructor(broker: MemoryBroker, options: MemoryTransportOptions = {}) {
    this.broker = broker;
    this.clientId = options.clientId ?? `memory-${++clientCounter}`;
    this.autoAcknowledge = options.autoAcknowledge ?? true;
  }

  get connected(): boolean {
    return this.isConnected;
  }

  get filters(): ReadonlySet<string> {
    return this.subscriptions;
  }

  connect(): void {
    this.broker.attach(this);
    if (this.autoAcknowledge) {
      this.acknowledge();
    }
  }

  async end(): Promise<void> {
    const wasConnected = this.isConnected;
    this.isConnected = false;
    this.subscriptions.clear();
    this.broker.detach(this);
    if (wasConnected) {
      this.emit({ type: 'close' });
    }
  }

  subscribe(topics: string[]): void {
    for (const topic of topics) {
      this.subscriptions.add(topic);
    }
  }

  publish(topic: string, payload: string): void {
    if (!this.isConnected) {
      this.emit({ type: 'error', error: new Error(`Cannot publish to ${topic}: not connected`) });
      return;
    }
    this.broker.publish(this.clientId, topic, payload);
  }

  onEvent(handler: TransportEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  deliver(topic: string, payload: Buffer): void {
    if (this.isConnected) {
      this.emit({ type: 'message', topic, payload });
    }
  }

  // ---------------------------------------------------------------------------
  // Session Control
  // ---------------------------------------------------------------------------

  /** Complete the connection handshake. */
  acknowledge(): void {
    this.isConnected = true;
    this.emit({ type: 'connect' });
  }

  /** Lose the session without the client asking for it. */
  drop(): void {
    this.isConnected = false;
    this.subscriptions.clear();
    this.emit({ type: 'offline' });
    this.emit({ type: 'close' });
  }

  /** Start reconnecting; acknowledged immediately unless `autoAcknowledge` is off. */
  reconnect(): void {
    this.emit({ type: 'reconnect' });
    if (this.autoAcknowledge) {
      this.acknowledge();
    }
  }

  /** Raise a transport error. */
  fail(error: Error): void {
    this.emit({ type: 'error', error });
  }

  private emit(event: TransportEvent): void {
    for (const handler of [...this.handlers]) {
      handler(event);
    }
  }
}
