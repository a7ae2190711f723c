import { AsyncLocalStorage } from 'node:async_hooks';
import pino, { type Logger } from 'pino';
import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

export const correlationStore = new AsyncLocalStorage<{ requestId: string }>();

const REDACT_PATHS = [
  // Headers in common shapes
  'req.headers.authorization',
  'headers.authorization',
  'req.headers.signature',
  'headers.signature',
  'req.headers["signature-input"]',
  'headers["signature-input"]',

  // Generic secret fields anywhere in objects we log
  '*.privateKey',
  '*.seed',
  '*.password',
  '*.secret',
];

export function createLogger(level: string = process.env['LOG_LEVEL'] || 'info'): Logger {
  return pino({
    name: 'omp-server',
    level,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    mixin() {
      const store = correlationStore.getStore();
      return store ? { requestId: store.requestId } : {};
    },
  });
}

export const logger = createLogger();

export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
  const ridHeader = req.headers['x-request-id'];
  const requestId = (Array.isArray(ridHeader) ? ridHeader[0] : ridHeader) || randomUUID();
  res.setHeader('x-request-id', requestId);
  correlationStore.run({ requestId }, () => next());
}

/**
 * Access log line per finished request.
 */
export function requestLogger(log: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1e6;
      log.info(
        { method: req.method, path: req.originalUrl, status: res.statusCode, duration_ms: durationMs },
        'request completed'
      );
    });
    next();
  };
}
