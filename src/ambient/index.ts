/**
 * @fileoverview Barrel file for the ambient credential and accessor layer.
 * @module src/ambient
 */
export * from './accessorRegistry.js';
export * from './credential.js';
export * from './credentialContext.js';
export * from './threadAffineResourceCache.js';
export * from './workerLane.js';
