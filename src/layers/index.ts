export * from './resolver.js';
export * from './probe.js';
