import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, type Env } from '../../src/config/index.js';

function configError(env: Env): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected ConfigError');
}

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      server: { host: '0.0.0.0', port: 8080 },
      signatures: { mode: 'off', keys: {} },
      http: { trustProxy: false, maxPayloadMb: 5 },
      limits: { rateLimitPerMin: 60 },
      logLevel: 'info',
    });
  });

  it('reads server, http and logging settings', () => {
    const config = loadConfig({
      OMP_SERVER_HOST: '127.0.0.1',
      OMP_SERVER_PORT: '9000',
      OMP_PUBLIC_BASE_URL: 'https://api.example.com/',
      OMP_ROOT_PATH: '/v1/',
      OMP_TRUST_PROXY: 'true',
      OMP_MAX_PAYLOAD_MB: '2',
      OMP_RATE_LIMIT: '120',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.server).toEqual({ host: '127.0.0.1', port: 9000 });
    expect(config.http).toEqual({
      publicBaseUrl: 'https://api.example.com/',
      rootPath: '/v1',
      trustProxy: true,
      maxPayloadMb: 2,
    });
    expect(config.limits.rateLimitPerMin).toBe(120);
    expect(config.logLevel).toBe('debug');
  });

  it('treats "/" as no root path', () => {
    expect(loadConfig({ OMP_ROOT_PATH: '/' }).http.rootPath).toBeUndefined();
  });

  describe('signature mode', () => {
    it('normalizes case and whitespace', () => {
      expect(loadConfig({ OMP_SIG_MODE: ' Strict ' }).signatures.mode).toBe('strict');
    });

    it('rejects unknown modes', () => {
      expect(configError({ OMP_SIG_MODE: 'lenient' }).message).toBe(
        'Invalid signature mode "lenient" (expected one of: off, permissive, strict)'
      );
    });
  });

  describe('signature keys', () => {
    it('merges the JSON map with per-key variables', () => {
      const config = loadConfig({
        OMP_SIG_KEYS: '{"a":"key-a","b":"old-b"}',
        OMP_SIG_PUB_b: 'new-b',
        OMP_SIG_PUB_HEX_c: 'key-c',
      });

      expect(config.signatures.keys).toEqual({ a: 'key-a', b: 'new-b', c: 'key-c' });
    });

    it('ignores empty per-key variables', () => {
      expect(loadConfig({ OMP_SIG_PUB_a: '  ' }).signatures.keys).toEqual({});
    });

    it.each([
      ['not JSON', 'nope'],
      ['a JSON array', '["k"]'],
      ['non-string values', '{"a":1}'],
    ])('rejects OMP_SIG_KEYS that is %s', (_name, value) => {
      expect(configError({ OMP_SIG_KEYS: value }).message).toBe(
        'OMP_SIG_KEYS must be a JSON object of keyid -> public key'
      );
    });

    it('binds the default key to its keyid', () => {
      const config = loadConfig({ OMP_SIG_KEYID: 'sig1', OMP_SIG_ED25519_PUB: 'key-1' });

      expect(config.signatures.defaultKey).toEqual({ keyid: 'sig1', publicKey: 'key-1' });
    });

    it('needs both halves of the default key', () => {
      expect(loadConfig({ OMP_SIG_KEYID: 'sig1' }).signatures.defaultKey).toBeUndefined();
    });
  });

  it.each([
    ['OMP_SERVER_PORT', 'abc', 'server.port'],
    ['OMP_SERVER_PORT', '70000', 'server.port'],
    ['OMP_MAX_PAYLOAD_MB', '0', 'http.maxPayloadMb'],
    ['OMP_PUBLIC_BASE_URL', 'not a url', 'http.publicBaseUrl'],
    ['OMP_ROOT_PATH', 'v1', 'http.rootPath'],
    ['LOG_LEVEL', 'loud', 'logLevel'],
  ])('rejects %s=%s', (name, value, path) => {
    const error = configError({ [name]: value });

    expect(error.message.startsWith('Invalid configuration: ')).toBe(true);
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].startsWith(`${path}: `)).toBe(true);
  });
});
