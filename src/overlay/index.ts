/**
 * strata overlay core
 *
 * Layer resolution, hard-link overlay construction and the process-scoped
 * lifecycle of the merged directory.
 */

export * from '../types.js';
export * from '../errors.js';
export * from '../layers/index.js';
export * from './builder.js';
export * from './environment.js';
export * from './lifecycle.js';
export * from './janitor.js';
export * from './paths.js';
