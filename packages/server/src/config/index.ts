import { z } from 'zod';
import { parseSignatureMode, type SignatureMode } from '@omp/http-signatures';

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

function bool(v: string | undefined, d = false): boolean {
  const s = v?.trim().toLowerCase();
  return s === 'true' || s === '1' ? true : s === 'false' || s === '0' ? false : d;
}

// unset falls back to the default; anything else must parse
function num(v: string | undefined, d: number): number {
  return v === undefined || v.trim() === '' ? d : Number(v);
}

function str(v: string | undefined): string | undefined {
  const s = v?.trim();
  return s ? s : undefined;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const KeysSchema = z.record(z.string().min(1));

const ConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  }),
  signatures: z.object({
    mode: z.enum(['off', 'permissive', 'strict']),
    keys: KeysSchema,
    defaultKey: z.object({ keyid: z.string().min(1), publicKey: z.string().min(1) }).optional(),
  }),
  http: z.object({
    publicBaseUrl: z.string().url().optional(),
    rootPath: z
      .string()
      .regex(/^\/[^?#]*$/, 'must start with "/"')
      .optional(),
    trustProxy: z.boolean(),
    maxPayloadMb: z.number().positive(),
  }),
  limits: z.object({
    rateLimitPerMin: z.number().int().nonnegative(),
  }),
  logLevel: z.enum(LOG_LEVELS),
});

export type ServerConfig = z.infer<typeof ConfigSchema>;
export type LogLevel = ServerConfig['logLevel'];

const PUB_PREFIX = 'OMP_SIG_PUB_';
const PUB_HEX_PREFIX = 'OMP_SIG_PUB_HEX_';

/**
 * Collect keyid -> key material from OMP_SIG_KEYS and the per-key
 * OMP_SIG_PUB_<keyid> / OMP_SIG_PUB_HEX_<keyid> variables. Per-key
 * variables override the JSON map.
 */
function readKeys(env: Env): Record<string, string> {
  const keys: Record<string, string> = {};

  const json = str(env.OMP_SIG_KEYS);
  if (json) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch {
      throw new ConfigError('OMP_SIG_KEYS must be a JSON object of keyid -> public key');
    }
    const result = KeysSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigError(
        'OMP_SIG_KEYS must be a JSON object of keyid -> public key',
        result.error.issues.map(formatIssue)
      );
    }
    Object.assign(keys, result.data);
  }

  for (const [name, value] of Object.entries(env)) {
    const material = str(value);
    if (!material) {
      continue;
    }
    if (name.startsWith(PUB_HEX_PREFIX)) {
      keys[name.slice(PUB_HEX_PREFIX.length)] = material;
    } else if (name.startsWith(PUB_PREFIX)) {
      keys[name.slice(PUB_PREFIX.length)] = material;
    }
  }

  delete keys[''];
  return keys;
}

function readMode(env: Env): SignatureMode {
  try {
    return parseSignatureMode(env.OMP_SIG_MODE ?? 'off');
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

function normalizeRootPath(value: string | undefined): string | undefined {
  const path = str(value)?.replace(/\/+$/, '');
  return path ? path : undefined;
}

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Read server configuration from the environment.
 *
 * @throws ConfigError on any invalid value
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const keyid = str(env.OMP_SIG_KEYID);
  const defaultPub = str(env.OMP_SIG_ED25519_PUB);

  const raw = {
    server: {
      host: str(env.OMP_SERVER_HOST) ?? '0.0.0.0',
      port: num(env.OMP_SERVER_PORT, 8080),
    },
    signatures: {
      mode: readMode(env),
      keys: readKeys(env),
      defaultKey: keyid && defaultPub ? { keyid, publicKey: defaultPub } : undefined,
    },
    http: {
      publicBaseUrl: str(env.OMP_PUBLIC_BASE_URL),
      rootPath: normalizeRootPath(env.OMP_ROOT_PATH),
      trustProxy: bool(env.OMP_TRUST_PROXY, false),
      maxPayloadMb: num(env.OMP_MAX_PAYLOAD_MB, 5),
    },
    limits: {
      rateLimitPerMin: num(env.OMP_RATE_LIMIT, 60),
    },
    logLevel: str(env.LOG_LEVEL)?.toLowerCase() ?? 'info',
  };

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
