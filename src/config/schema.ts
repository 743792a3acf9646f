/**
 * Configuration Schema
 *
 * Zod schema definitions for configuration validation.
 */

import { z } from 'zod';
import { SETTINGS_FIELDS } from '../core/protocol/types.js';

// -----------------------------------------------------------------------------
// MQTT Config Schema
// -----------------------------------------------------------------------------

export const MqttConfigSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535).default(1883),
  protocol: z.enum(['mqtt', 'mqtts', 'ws', 'wss']).default('mqtt'),
  clientId: z.string().min(1).optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  keepalive: z.number().int().min(0).max(65535).default(60),
  connectTimeout: z.number().int().min(1000).max(120000).default(10000),
  reconnectPeriod: z.number().int().min(0).max(300000).default(5000),
});

// -----------------------------------------------------------------------------
// Device Config Schema
// -----------------------------------------------------------------------------

export const DeviceConfigSchema = z.object({
  topicBase: z.string().min(1).default('qsource3'),
  deviceName: z.string().min(1).default('qsource3'),
  resyncFields: z
    .array(z.enum(SETTINGS_FIELDS))
    .default(['dcOffset', 'calibPointsMz', 'calibPointsResolution']),
});

// -----------------------------------------------------------------------------
// Logging Config Schema
// -----------------------------------------------------------------------------

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  pretty: z.boolean().default(false),
});

// -----------------------------------------------------------------------------
// Metrics Config Schema
// -----------------------------------------------------------------------------

export const MetricsConfigSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().min(1).max(65535).default(9090),
  path: z.string().default('/metrics'),
});

// -----------------------------------------------------------------------------
// Settings File Config Schema
// -----------------------------------------------------------------------------

export const SettingsFileConfigSchema = z.object({
  path: z.string().min(1).default('data/settings.json'),
  loadOnStart: z.boolean().default(false),
  pushOnLoad: z.boolean().default(true),
  saveOnExit: z.boolean().default(false),
});

// -----------------------------------------------------------------------------
// Full Configuration Schema
// -----------------------------------------------------------------------------

export const EngineConfigSchema = z.object({
  // General
  name: z.string().min(1).default('rf-source-sync'),
  environment: z.enum(['development', 'production', 'test']).default('development'),

  // Transport
  mqtt: MqttConfigSchema.default({}),
  device: DeviceConfigSchema.default({}),

  // Observability
  logging: LoggingConfigSchema.default({}),
  metrics: MetricsConfigSchema.default({}),

  // Persistence
  settings: SettingsFileConfigSchema.default({}),
});

// -----------------------------------------------------------------------------
// Type Exports
// -----------------------------------------------------------------------------

export type MqttConfig = z.infer<typeof MqttConfigSchema>;
export type DeviceConfig = z.infer<typeof DeviceConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;
export type SettingsFileConfig = z.infer<typeof SettingsFileConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
