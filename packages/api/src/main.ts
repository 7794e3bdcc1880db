#!/usr/bin/env tsx
/**
 * API Main - Entry point for the HTTP API
 */

import { createLogger, loadEnvFromRoot, type Logger } from '@recovery-roadmap/shared';
import { loadApiConfig, type ApiConfig } from './config.js';
import { ApiServer } from './http/api-server.js';

// Load environment variables from project root
const envPath = loadEnvFromRoot();

/**
 * Print configuration
 */
function printConfig(config: ApiConfig): void {
  console.log('⚙️  Configuration:');
  console.log(`   Host: ${config.host}`);
  console.log(`   Port: ${config.port}`);
  console.log(`   CORS Origins: ${config.corsOrigins.join(', ') || '(none)'}`);
  console.log(`   Max Projected Trades: ${config.maxProjectedTrades}`);
  console.log(`   Log Level: ${config.logLevel}`);
  console.log(`   File Logging: ${config.logToFile ? 'enabled' : 'disabled'}`);
  console.log();
}

/**
 * Close the server and flush logs on SIGINT/SIGTERM
 */
function registerShutdown(server: ApiServer, logger: Logger): void {
  let stopping = false;

  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;

    logger.info(`Received ${signal}, shutting down`);
    server
      .close()
      .then(() => logger.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const config = loadApiConfig();

  const logger = createLogger({
    service: 'api',
    level: config.logLevel,
    file: config.logToFile,
  });

  logger.info('Environment loaded', { envPath: envPath ?? '(working directory)' });
  printConfig(config);

  const server = new ApiServer({
    port: config.port,
    host: config.host,
    corsOrigins: config.corsOrigins,
    maxProjectedTrades: config.maxProjectedTrades,
    logger,
  });

  registerShutdown(server, logger);

  await server.start();
  logger.info('✅ API is ready', { url: `http://${config.host}:${server.getPort()}` });
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
