/**
 * MQTT Transport
 *
 * `DeviceTransport` over an MQTT broker. Reconnection back-off is left to the
 * mqtt client (`reconnectPeriod`); the engine only sees the events.
 */

import { connect } from 'mqtt';
import type { IClientOptions, MqttClient } from 'mqtt';
import type { MqttConfig } from '../../config/schema.js';
import type { Logger } from '../../observability/logger.js';
import type { DeviceTransport, TransportEvent, TransportEventHandler } from '../types.js';

export interface MqttTransportOptions {
  config: MqttConfig;
  logger: Logger;
}

export class MqttTransport implements DeviceTransport {
  private readonly config: MqttConfig;
  private readonly logger: Logger;
  private client: MqttClient | null = null;
  private handlers: Set<TransportEventHandler> = new Set();

  constructor(options: MqttTransportOptions) {
    this.config = options.config;
    this.logger = options.logger;
  }

  get connected(): boolean {
    return this.client?.connected ?? false;
  }

  get url(): string {
    return `${this.config.protocol}://${this.config.host}:${this.config.port}`;
  }

  connect(): void {
    if (this.client) {
      throw new Error('MQTT transport is already connected');
    }

    const options: IClientOptions = {
      keepalive: this.config.keepalive,
      connectTimeout: this.config.connectTimeout,
      reconnectPeriod: this.config.reconnectPeriod,
      clean: true,
    };
    if (this.config.clientId) options.clientId = this.config.clientId;
    if (this.config.username !== undefined) options.username = this.config.username;
    if (this.config.password !== undefined) options.password = this.config.password;

    this.logger.info({ url: this.url }, 'Connecting to MQTT broker');

    const client = connect(this.url, options);
    this.client = client;

    client.on('connect', () => this.emit({ type: 'connect' }));
    client.on('reconnect', () => this.emit({ type: 'reconnect' }));
    client.on('close', () => this.emit({ type: 'close' }));
    client.on('offline', () => this.emit({ type: 'offline' }));
    client.on('error', (error) => this.emit({ type: 'error', error }));
    client.on('message', (topic, payload) => this.emit({ type: 'message', topic, payload }));
  }

  async end(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }

    this.client = null;
    await client.endAsync();
    this.logger.info('MQTT session closed');
  }

  subscribe(topics: string[]): void {
    if (!this.client) {
      this.emit({ type: 'error', error: new Error('Cannot subscribe: MQTT client not created') });
      return;
    }

    this.client.subscribe(topics, (error) => {
      if (error) {
        this.emit({ type: 'error', error });
      }
    });
  }

  publish(topic: string, payload: string): void {
    if (!this.client) {
      this.emit({ type: 'error', error: new Error(`Cannot publish to ${topic}: MQTT client not created`) });
      return;
    }

    this.client.publish(topic, payload, (error) => {
      if (error) {
        this.emit({ type: 'error', error });
      }
    });
  }

  onEvent(handler: TransportEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  private emit(event: TransportEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ err: error, event: event.type }, 'Transport event handler error');
      }
    }
  }
}
