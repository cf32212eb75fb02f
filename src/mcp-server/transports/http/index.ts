/**
 * @fileoverview Barrel file for the HTTP surface.
 * @module src/mcp-server/transports/http
 */
export * from './httpApp.js';
export * from './httpErrorHandler.js';
