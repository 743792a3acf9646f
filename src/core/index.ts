/**
 * Core Module
 *
 * Re-exports all core components.
 */

export * from './errors.js';
export * from './protocol/index.js';
export * from './validation/index.js';
export * from './state/index.js';
export * from './router/index.js';
export * from './commands/index.js';
export * from './connection/index.js';
