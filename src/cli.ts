#!/usr/bin/env node

/**
 * RF Source Sync CLI
 *
 * Command-line interface for running the sync engine.
 */

import { SyncEngine } from './engine.js';
import type { SyncEngineDependencies } from './engine.js';
import { loadConfig, validateConfig } from './config/loader.js';
import type { EngineConfig } from './config/schema.js';
import { createRootLogger } from './observability/logger.js';
import type { Logger } from './observability/logger.js';
import { MemoryBroker, MemoryTransport } from './transports/memory/broker.js';
import { DeviceSimulator } from './transports/memory/simulator.js';

const VERSION = '0.1.0';
const SIMULATOR_REPORT_INTERVAL_MS = 2000;

// -----------------------------------------------------------------------------
// CLI Arguments
// -----------------------------------------------------------------------------

interface CliArgs {
  configPath?: string;
  loadPath?: string;
  validate?: boolean;
  simulate?: boolean;
  help?: boolean;
  version?: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '-c':
      case '--config':
        result.configPath = args[++i];
        break;

      case '--load':
        result.loadPath = args[++i];
        break;

      case '--validate':
        result.validate = true;
        break;

      case '--simulate':
        result.simulate = true;
        break;

      case '-h':
      case '--help':
        result.help = true;
        break;

      case '-v':
      case '--version':
        result.version = true;
        break;
    }
  }

  return result;
}

// -----------------------------------------------------------------------------
// Help & Version
// -----------------------------------------------------------------------------

function printHelp(): void {
  console.log(`
RF Source Sync

Usage: rf-source-sync [options]

Options:
  -c, --config <path>   Path to configuration file
  --load <path>         Load a settings file on start and push it to the device
  --simulate            Run against an in-process device simulator
  --validate            Validate configuration and exit
  -h, --help            Show this help message
  -v, --version         Show version number

Environment Variables:
  RFSYNC_CONFIG_PATH    Path to configuration file
  RFSYNC_*              Configuration overrides, e.g. RFSYNC_MQTT_HOST

Examples:
  rf-source-sync                          Start with default config
  rf-source-sync -c ./lab.json            Start with custom config
  rf-source-sync --load settings.json     Restore saved settings on connect
  rf-source-sync --simulate               Try it without a broker
`);
}

function printVersion(): void {
  console.log(VERSION);
}

// -----------------------------------------------------------------------------
// Validation Mode
// -----------------------------------------------------------------------------

function runValidation(configPath?: string): void {
  try {
    const config = loadConfig({ configPath });
    const result = validateConfig(config);

    if (result.valid) {
      console.log('✓ Configuration is valid');
      console.log('\nLoaded configuration:');
      console.log(JSON.stringify(config, null, 2));
      process.exit(0);
    } else {
      console.error('✗ Configuration is invalid:');
      for (const error of result.errors ?? []) {
        console.error(`  - ${error}`);
      }
      process.exit(1);
    }
  } catch (error) {
    console.error('✗ Failed to load configuration:');
    console.error(`  ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

// -----------------------------------------------------------------------------
// Engine Setup
// -----------------------------------------------------------------------------

function buildOverrides(args: CliArgs): Record<string, unknown> {
  if (!args.loadPath) {
    return {};
  }
  return { settings: { path: args.loadPath, loadOnStart: true } };
}

function startSimulator(config: EngineConfig, logger: Logger): {
  deps: SyncEngineDependencies;
  simulator: DeviceSimulator;
} {
  const broker = new MemoryBroker();
  const simulator = new DeviceSimulator(broker, {
    scheme: { base: config.device.topicBase, device: config.device.deviceName },
  });
  simulator.start();
  simulator.startReporting(SIMULATOR_REPORT_INTERVAL_MS);

  logger.info('Running against the in-process device simulator');

  return {
    deps: { transport: new MemoryTransport(broker, { clientId: config.name }), logger },
    simulator,
  };
}

function attachNotificationLogging(engine: SyncEngine, logger: Logger): void {
  engine.onSettingsChange((change) => {
    logger.info(
      { field: change.field, value: change.value, origin: change.origin, version: change.version },
      'Setting updated'
    );
  });

  engine.onTelemetry((reading) => {
    logger.debug({ field: reading.field, value: reading.value }, 'Telemetry');
  });

  engine.onDeviceStatus((status) => {
    if (status.status === 'error') {
      logger.warn({ detail: status.detail }, 'Device reported an error');
    } else {
      logger.info('Device announced itself');
    }
  });
}

// -----------------------------------------------------------------------------
// Main
// -----------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    printVersion();
    process.exit(0);
  }

  if (args.validate) {
    runValidation(args.configPath);
    return;
  }

  const config = loadConfig({ configPath: args.configPath, overrides: buildOverrides(args) });
  const logger = createRootLogger({
    level: config.logging.level,
    pretty: config.logging.pretty || config.environment === 'development',
  });

  let simulator: DeviceSimulator | null = null;
  let deps: SyncEngineDependencies = { logger };

  if (args.simulate) {
    const simulation = startSimulator(config, logger);
    simulator = simulation.simulator;
    deps = simulation.deps;
  }

  const engine = new SyncEngine(config, deps);
  attachNotificationLogging(engine, logger);

  // Handle shutdown signals
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    if (config.settings.saveOnExit) {
      await engine.saveSettings();
    }
    await engine.stop();
    await simulator?.stop();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.fatal({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  try {
    await engine.start();
    simulator?.announce();

    console.log(`
╔══════════════════════════════════════════════════════════════╗
║                    RF Source Sync v${VERSION.padEnd(26)}║
╠══════════════════════════════════════════════════════════════╣
║  Broker:   ${(args.simulate ? 'in-process simulator' : `${config.mqtt.host}:${config.mqtt.port}`).padEnd(50)}║
║  Device:   ${`${config.device.topicBase}/*/${config.device.deviceName}`.padEnd(50)}║
║  Metrics:  ${(config.metrics.enabled ? `http://localhost:${config.metrics.port}${config.metrics.path}` : 'disabled').padEnd(50)}║
╚══════════════════════════════════════════════════════════════╝
`);
  } catch (error) {
    console.error('Failed to start sync engine:', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
