/**
 * @recovery-roadmap/shared - Shared types, schemas, and utilities
 *
 * This package contains code shared between the engine, the API and the CLI.
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './validation/simulation-config.js';
export * from './protocol/simulation-protocol.js';
export * from './logger.js';
export * from './utils/load-env.js';
