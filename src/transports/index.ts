/**
 * Transports Module
 *
 * The transport contract, the MQTT implementation and the in-process broker.
 */

export * from './types.js';
export * from './mqtt/transport.js';
export * from './memory/broker.js';
export * from './memory/simulator.js';
