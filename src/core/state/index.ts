export * from './mirror.js';
export * from './settings-file.js';
