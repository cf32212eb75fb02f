/**
 * @fileoverview Barrel file for shared utilities.
 * @module src/utils
 */
export * from './internal/index.js';
export * from './network/index.js';
export * from './security/index.js';
