/**
 * @fileoverview Barrel file for security utilities.
 * @module src/utils/security
 */
export * from './idGenerator.js';
export * from './sanitization.js';
