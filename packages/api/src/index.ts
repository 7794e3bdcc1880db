/**
 * @recovery-roadmap/api - HTTP API for the projection engine
 */

export * from './config.js';
export * from './http/api-server.js';
export * from './http/cors.js';
export * from './http/responses.js';
export * from './http/simulate-handler.js';
