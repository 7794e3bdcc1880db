export * from './simulation.schema.js';
