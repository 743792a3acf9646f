/**
 * Sync Engine
 *
 * Builds and wires every component: mirror, inbound router, command publisher
 * and connection supervisor, plus the logger, metrics and transport they share.
 */

import { createServer, type Server } from 'http';
import type { EngineConfig } from './config/schema.js';
import type { RequestTarget, Settings, SettingsField } from './core/protocol/types.js';
import type { TopicScheme } from './core/protocol/topics.js';
import type { SettingsChange, SettingsChangeListener } from './core/state/mirror.js';
import { SettingsMirror } from './core/state/mirror.js';
import { loadSettingsFile, saveSettingsFile } from './core/state/settings-file.js';
import type { DeviceStatusListener, TelemetryListener } from './core/router/inbound-router.js';
import { InboundRouter } from './core/router/inbound-router.js';
import type { CommandResult, PushResult } from './core/commands/publisher.js';
import { CommandPublisher } from './core/commands/publisher.js';
import type { ConnectionStateListener, ResyncEntry } from './core/connection/supervisor.js';
import { ConnectionState, ConnectionSupervisor } from './core/connection/supervisor.js';
import type { DeviceTransport } from './transports/types.js';
import { MqttTransport } from './transports/mqtt/transport.js';
import type { Logger } from './observability/logger.js';
import { createRootLogger } from './observability/logger.js';
import { EngineMetrics } from './observability/metrics.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface SyncEngineDependencies {
  /** Defaults to an MQTT transport built from `config.mqtt` */
  transport?: DeviceTransport;
  /** Defaults to a root logger built from `config.logging` */
  logger?: Logger;
  metrics?: EngineMetrics;
}

export interface LoadSettingsOptions {
  /** Publish the loaded values to the device; defaults to `settings.pushOnLoad` */
  push?: boolean;
}

export interface LoadSettingsResult {
  changes: SettingsChange[];
  /** Outcome of the push, or null when no push was asked for */
  push: PushResult | null;
}

// -----------------------------------------------------------------------------
// Engine Class
// -----------------------------------------------------------------------------

export class SyncEngine {
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly metrics: EngineMetrics;
  private readonly scheme: TopicScheme;

  private readonly transport: DeviceTransport;
  private readonly mirror: SettingsMirror;
  private readonly router: InboundRouter;
  private readonly publisher: CommandPublisher;
  private readonly supervisor: ConnectionSupervisor;

  private metricsServer: Server | null = null;
  private pushOnConnect = false;
  private running = false;

  constructor(config: EngineConfig, deps: SyncEngineDependencies = {}) {
    this.config = config;
    this.logger =
      deps.logger ??
      createRootLogger({
        level: config.logging.level,
        pretty: config.logging.pretty,
        base: { engine: config.name },
      });
    this.metrics = deps.metrics ?? new EngineMetrics({ collectDefaults: config.metrics.enabled });
    this.scheme = { base: config.device.topicBase, device: config.device.deviceName };

    this.transport =
      deps.transport ??
      new MqttTransport({
        config: config.mqtt,
        logger: this.logger.child({ component: 'transport' }),
      });

    this.mirror = new SettingsMirror({
      logger: this.logger.child({ component: 'mirror' }),
      metrics: this.metrics,
    });

    this.router = new InboundRouter({
      mirror: this.mirror,
      logger: this.logger.child({ component: 'router' }),
      metrics: this.metrics,
      onDeviceConnected: () => {
        this.supervisor.resync('device-connected');
      },
    });

    this.supervisor = new ConnectionSupervisor({
      transport: this.transport,
      scheme: this.scheme,
      resyncFields: config.device.resyncFields,
      logger: this.logger.child({ component: 'supervisor' }),
      metrics: this.metrics,
      onMessage: (topic, payload) => {
        this.router.dispatch(topic, payload);
      },
    });

    this.publisher = new CommandPublisher({
      mirror: this.mirror,
      transport: this.transport,
      gate: this.supervisor,
      scheme: this.scheme,
      logger: this.logger.child({ component: 'publisher' }),
      metrics: this.metrics,
    });

    this.supervisor.onStateChange((change) => {
      if (change.state === ConnectionState.CONNECTED && this.pushOnConnect) {
        this.pushOnConnect = false;
        this.pushSettings();
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start the engine: metrics endpoint, optional settings load, then the
   * transport session.
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error('Sync engine is already running');
    }

    this.logger.info(
      { device: this.scheme.device, topicBase: this.scheme.base },
      'Starting sync engine...'
    );

    try {
      if (this.config.metrics.enabled) {
        await this.startMetricsServer();
      }

      if (this.config.settings.loadOnStart) {
        await this.loadSettings(this.config.settings.path, { push: false });
        this.pushOnConnect = this.config.settings.pushOnLoad;
      }

      this.supervisor.start(this.publisher);
      this.running = true;
      this.logger.info('Sync engine started');
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to start sync engine');
      await this.stopMetricsServer();
      throw error;
    }
  }

  /**
   * Stop the engine and close the transport session.
   */
  async stop(): Promise<void> {
    this.logger.info('Stopping sync engine...');

    if (this.running) {
      await this.supervisor.stop();
    }
    await this.stopMetricsServer();

    this.pushOnConnect = false;
    this.running = false;
    this.logger.info('Sync engine stopped');
  }

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  /**
   * Request a change to a field from the operator side.
   */
  request(field: SettingsField, value: unknown): CommandResult {
    return this.publisher.request(field, value);
  }

  /**
   * Ask the device for the current value of a field, or its full state.
   */
  requestCurrent(target: RequestTarget): CommandResult {
    return this.publisher.requestCurrent(target);
  }

  /**
   * Publish every mirror value to the device.
   */
  pushSettings(): PushResult {
    return this.publisher.pushAll();
  }

  /**
   * Issue the resync sequence now.
   */
  resync(): ResyncEntry[] {
    return this.supervisor.resync('manual');
  }

  // ---------------------------------------------------------------------------
  // Settings File
  // ---------------------------------------------------------------------------

  /**
   * Load a settings file into the mirror and, unless told otherwise, push the
   * loaded values to the device.
   */
  async loadSettings(path: string, options: LoadSettingsOptions = {}): Promise<LoadSettingsResult> {
    const push = options.push ?? this.config.settings.pushOnLoad;

    const changes = await loadSettingsFile(this.mirror, path);
    this.logger.info({ path, push }, 'Settings loaded');

    return { changes, push: push ? this.pushSettings() : null };
  }

  /**
   * Save the mirror to a settings file. Returns the resolved path.
   */
  async saveSettings(path: string = this.config.settings.path): Promise<string> {
    const resolved = await saveSettingsFile(this.mirror, path);
    this.logger.info({ path: resolved }, 'Settings saved');
    return resolved;
  }

  // ---------------------------------------------------------------------------
  // Observers
  // ---------------------------------------------------------------------------

  /**
   * Listen to every settings change. Returns a function that removes it.
   */
  onSettingsChange(listener: SettingsChangeListener): () => void {
    this.mirror.addListener(listener);
    return () => {
      this.mirror.removeListener(listener);
    };
  }

  /**
   * Listen to changes of one field. Returns a function that removes it.
   */
  onFieldChange<K extends SettingsField>(
    field: K,
    listener: (change: SettingsChange<K>) => void
  ): () => void {
    return this.mirror.onField(field, listener);
  }

  onTelemetry(listener: TelemetryListener): () => void {
    return this.router.onTelemetry(listener);
  }

  onDeviceStatus(listener: DeviceStatusListener): () => void {
    return this.router.onDeviceStatus(listener);
  }

  onConnectionStateChange(listener: ConnectionStateListener): () => void {
    return this.supervisor.onStateChange(listener);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getSettings(): Settings {
    return this.mirror.getAll();
  }

  getConnectionState(): ConnectionState {
    return this.supervisor.getState();
  }

  isConnected(): boolean {
    return this.supervisor.isConnected();
  }

  isRunning(): boolean {
    return this.running;
  }

  getConfig(): Readonly<EngineConfig> {
    return this.config;
  }

  getMetrics(): EngineMetrics {
    return this.metrics;
  }

  // ---------------------------------------------------------------------------
  // Metrics Endpoint
  // ---------------------------------------------------------------------------

  private async startMetricsServer(): Promise<void> {
    const { port, path } = this.config.metrics;

    const server = createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not found');
        return;
      }

      this.metrics
        .getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.metrics.getContentType());
          res.end(body);
        })
        .catch((error: unknown) => {
          this.logger.error({ err: error }, 'Failed to collect metrics');
          res.statusCode = 500;
          res.end('Internal error');
        });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.metricsServer = server;
    this.logger.info({ port, path }, 'Metrics endpoint started');
  }

  private async stopMetricsServer(): Promise<void> {
    const server = this.metricsServer;
    if (!server) {
      return;
    }

    this.metricsServer = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
