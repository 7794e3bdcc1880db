/**
 * @recovery-roadmap/engine - Perfect-execution projection engine
 */

export * from './projection-engine.js';
