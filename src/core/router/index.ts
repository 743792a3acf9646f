export * from './inbound-router.js';
