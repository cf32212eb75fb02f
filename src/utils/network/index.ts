/**
 * @fileoverview Barrel file for network utilities.
 * @module src/utils/network/index
 */

export * from './fetchWithTimeout.js';
