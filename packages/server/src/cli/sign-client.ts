/**
 * Client helpers behind the omp-sign CLI: key generation output and
 * signed POST requests.
 */

import { base64urlDecode, base64urlEncode, signRequest } from '@omp/http-signatures';

export class CliError extends Error {
  constructor(
    message: string,
    readonly exitCode = 2
  ) {
    super(message);
    this.name = 'CliError';
    Object.setPrototypeOf(this, CliError.prototype);
  }
}

/**
 * Shell lines configuring a server for strict mode and a client seed.
 */
export function formatKeyExports(keyid: string, publicKey: Uint8Array, seed: Uint8Array): string[] {
  return [
    '# Add these to your env (server needs the public key):',
    'export OMP_SIG_MODE=strict',
    `export OMP_SIG_KEYID=${keyid}`,
    `export OMP_SIG_PUB_${keyid}=${base64urlEncode(publicKey)}`,
    '# Client seed (KEEP PRIVATE):',
    `export SEED_B64U=${base64urlEncode(seed)}`,
  ];
}

export function decodeSeed(text: string | undefined): Uint8Array {
  if (!text || !text.trim()) {
    throw new CliError('SEED_B64U is required (or run gen-key first).');
  }
  const seed = base64urlDecode(text);
  if (!seed || seed.length !== 32) {
    throw new CliError('SEED_B64U must decode to 32 bytes.');
  }
  return seed;
}

export function parseContent(json: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    throw new CliError(`--json is not valid JSON: ${json}`);
  }
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new CliError('--json must be a JSON object');
  }
  return { ...value };
}

export interface SignedPostInput {
  /** Server origin, e.g. "http://127.0.0.1:8080" */
  host: string;
  path: string;
  seed: Uint8Array;
  keyid: string;
  namespace: string;
  content: Record<string, unknown>;
  created?: number;
}

export interface SignedPostResult {
  status: number;
  ok: boolean;
  body: string;
}

/**
 * Sign "POST {host}{path}" and send {namespace, content} as JSON.
 */
export async function sendSignedPost(
  input: SignedPostInput,
  fetchImpl: typeof fetch = fetch
): Promise<SignedPostResult> {
  const url = `${input.host.replace(/\/+$/, '')}${input.path}`;
  const signature = await signRequest({
    method: 'POST',
    url,
    keyid: input.keyid,
    privateKey: input.seed,
    created: input.created,
  });

  const response = await fetchImpl(url, {
    method: 'POST',
    headers: { ...signature, 'content-type': 'application/json' },
    body: JSON.stringify({ namespace: input.namespace, content: input.content }),
    signal: AbortSignal.timeout(10_000),
  });

  return { status: response.status, ok: response.ok, body: await response.text() };
}

/**
 * Pretty-print a JSON body; other bodies pass through unchanged.
 */
export function formatBody(body: string): string {
  try {
    return JSON.stringify(JSON.parse(body), null, 2);
  } catch {
    return body;
  }
}
