#!/usr/bin/env node
/**
 * OMP reference server entry point
 */

import type { Server } from 'node:http';
import { loadConfig, ConfigError } from './config/index.js';
import { createLogger, logger } from './logging/index.js';
import { createServer } from './http/server.js';

const SHUTDOWN_TIMEOUT_MS = 10_000;

function registerShutdown(server: Server, log = logger): void {
  let shuttingDown = false;

  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');

    const timer = setTimeout(() => {
      log.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    timer.unref();

    server.close((error) => {
      if (error) {
        log.error({ err: error }, 'Error while closing server');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

// configuration problems end the process with a single fatal line
function orExit<T>(build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, error.message);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = orExit(() => loadConfig());
  const log = createLogger(config.logLevel);
  const app = orExit(() => createServer({ config, logger: log }));

  const server = app.listen(config.server.port, config.server.host, () => {
    log.info(
      {
        host: config.server.host,
        port: config.server.port,
        signatureMode: config.signatures.mode,
        keyids: Object.keys(config.signatures.keys),
      },
      'OMP reference server listening'
    );
  });

  registerShutdown(server, log);
}

main();
