#!/usr/bin/env node

import 'dotenv/config';
import { RegistryError, logger, resolveConfig } from '@terrashelf/core';
import { RegistryServer } from '../server.js';

/**
 * Registry server entry point
 *
 * All settings come from the environment (a .env file in the working
 * directory is read first); the variables are listed in core/src/config/schema.ts.
 */

async function main(): Promise<void> {
  let server: RegistryServer;
  try {
    server = new RegistryServer({ config: resolveConfig(process.env) });
  } catch (err) {
    if (err instanceof RegistryError) {
      logger.fatal(`[server] ${err.message}`);
    } else {
      logger.fatal({ err }, '[server] Failed to load configuration');
    }
    process.exit(1);
  }

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`[server] Received ${signal}, shutting down gracefully...`);
    try {
      await server.stop();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, '[server] Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await server.initialize();
    await server.start();
  } catch (err) {
    logger.fatal({ err }, '[server] Failed to start');
    process.exit(1);
  }
}

void main();
