/**
 * Shared types for recovery-roadmap
 */

export * from './simulation.js';
export * from './protocol.js';
