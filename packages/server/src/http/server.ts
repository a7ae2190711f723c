import express, { type Express } from 'express';
import helmet from 'helmet';
import type { Logger } from 'pino';
import { SignatureSettings, type KeyResolver } from '@omp/http-signatures';
import { signatureMiddleware } from '@omp/middleware-express';
import type { ServerConfig } from '../config/index.js';
import { correlationMiddleware, createLogger, requestLogger } from '../logging/index.js';
import { createDiscoveryRouter } from '../discovery/v1.js';
import { handleHealth, handleRoot } from '../health/handlers.js';
import { createObjectsRouter } from '../objects/routes.js';
import { MemoryStorage } from '../objects/memory-storage.js';
import type { StoragePort } from '../objects/storage.js';
import { createKeyRegistry } from '../security/keys.js';
import { errorHandler, notFoundHandler } from '../middleware/error.js';

export interface ServerOptions {
  config: ServerConfig;
  storage?: StoragePort;
  /** Defaults to a registry built from config.signatures */
  keys?: KeyResolver;
  /** Defaults to the configured mode; keep a handle to change it at runtime */
  settings?: SignatureSettings;
  logger?: Logger;
}

export function createServer(options: ServerOptions): Express {
  const { config } = options;
  const log = options.logger ?? createLogger(config.logLevel);
  const settings = options.settings ?? new SignatureSettings(config.signatures.mode);
  const keys = options.keys ?? createKeyRegistry(config.signatures);
  const storage = options.storage ?? new MemoryStorage();

  const app = express();

  // Disable X-Powered-By header
  app.disable('x-powered-by');
  app.set('trust proxy', config.http.trustProxy);

  app.use(correlationMiddleware);
  app.use(requestLogger(log));
  app.use(helmet());
  app.use(express.json({ limit: `${config.http.maxPayloadMb}mb` }));

  app.get('/', handleRoot);
  app.get('/health', handleHealth);
  app.use(createDiscoveryRouter({ config, settings }));

  const signatures = signatureMiddleware({
    settings,
    keyResolver: keys,
    logger: log.child({ component: 'signatures' }),
    publicBaseUrl: config.http.publicBaseUrl,
    rootPath: config.http.rootPath,
  });
  app.use('/objects', createObjectsRouter({ storage, signatures }));

  app.use(notFoundHandler);
  app.use(errorHandler(log));

  return app;
}
