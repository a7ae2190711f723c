import pino from 'pino';
import type { Express } from 'express';
import { loadConfig, type Env, type ServerConfig } from '../src/config/index.js';
import { createServer, type ServerOptions } from '../src/http/server.js';

export const silentLogger = pino({ level: 'silent' });

export function testConfig(env: Env = {}): ServerConfig {
  return loadConfig({ LOG_LEVEL: 'silent', ...env });
}

export function testApp(
  env: Env = {},
  options: Omit<Partial<ServerOptions>, 'config'> = {}
): Express {
  return createServer({ config: testConfig(env), logger: silentLogger, ...options });
}
