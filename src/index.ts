export * from './discovery/index.js';
