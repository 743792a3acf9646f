/**
 * Device Protocol Module
 *
 * Re-exports the data model, topic scheme and payload codec.
 */

export * from './types.js';
export * from './topics.js';
export * from './payload.js';
