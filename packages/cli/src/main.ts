#!/usr/bin/env tsx
/**
 * CLI entry point for the Recovery Roadmap
 */

import { createLogger, loadEnvFromRoot, parseLogLevel } from '@recovery-roadmap/shared';
import { runCli } from './run.js';

const envPath = loadEnvFromRoot();

// Diagnostics go to stderr so stdout carries only the report
const logger = createLogger({
  service: 'cli',
  level: parseLogLevel(process.env.LOG_LEVEL, 'warn'),
  file: false,
  stderr: true,
});

logger.debug('Environment loaded', { envPath: envPath ?? '(working directory)' });

process.exitCode = runCli(process.argv.slice(2), {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  logger,
});
