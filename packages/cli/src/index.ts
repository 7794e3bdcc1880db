/**
 * @recovery-roadmap/cli - Command-line recovery roadmap report
 */

export * from './args.js';
export * from './format.js';
export * from './report.js';
export * from './run.js';
export * from './table.js';
