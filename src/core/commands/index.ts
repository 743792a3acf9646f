export * from './guard.js';
export * from './publisher.js';
