/**
 * RF Source Sync
 *
 * Keeps a local mirror of an MQTT-controlled RF source's settings in step
 * with operator requests and device reports.
 *
 * @packageDocumentation
 */

// Core components
export * from './core/index.js';

// Engine
export { SyncEngine } from './engine.js';
export type {
  SyncEngineDependencies,
  LoadSettingsOptions,
  LoadSettingsResult,
} from './engine.js';

// Transports
export * from './transports/index.js';

// Observability
export * from './observability/index.js';

// Configuration
export * from './config/index.js';

// Version
export const VERSION = '0.1.0';
