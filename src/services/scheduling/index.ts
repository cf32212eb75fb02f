/**
 * @fileoverview Barrel file for the scheduling service.
 * @module src/services/scheduling
 */
export * from './core/ISchedulingWorkUnit.js';
export * from './createPublisherDaemon.js';
export * from './publisherDaemon.js';
export * from './types.js';
