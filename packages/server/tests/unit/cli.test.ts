import { describe, it, expect, vi } from 'vitest';
import {
  base64urlDecode,
  base64urlEncode,
  generateSigningKey,
  KeyRegistry,
  verifyRequest,
} from '@omp/http-signatures';
import { createProgram, type CliIO } from '../../src/cli/program.js';
import {
  CliError,
  decodeSeed,
  formatBody,
  formatKeyExports,
  parseContent,
  sendSignedPost,
} from '../../src/cli/sign-client.js';

const SEED = new Uint8Array(32).fill(1);

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function headersOf(init: RequestInit | undefined): Record<string, string> {
  const headers = new Headers(init?.headers);
  return Object.fromEntries(headers.entries());
}

function testIO(fetchImpl: typeof fetch = vi.fn<typeof fetch>()) {
  const out: string[] = [];
  const err: string[] = [];
  let exitCode: number | undefined;
  const io: CliIO = {
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    fetch: fetchImpl,
    env: {},
    setExitCode: (code) => {
      exitCode = code;
    },
  };
  return { io, out, err, exitCode: () => exitCode };
}

describe('formatKeyExports', () => {
  it('prints server and client exports', () => {
    const lines = formatKeyExports('sig1', new Uint8Array(32), SEED);

    expect(lines).toEqual([
      '# Add these to your env (server needs the public key):',
      'export OMP_SIG_MODE=strict',
      'export OMP_SIG_KEYID=sig1',
      `export OMP_SIG_PUB_sig1=${'A'.repeat(43)}`,
      '# Client seed (KEEP PRIVATE):',
      `export SEED_B64U=${base64urlEncode(SEED)}`,
    ]);
  });
});

describe('decodeSeed', () => {
  it('decodes a 32-byte base64url seed', () => {
    expect(decodeSeed(base64urlEncode(SEED))).toEqual(SEED);
  });

  it.each([
    ['missing', undefined, 'SEED_B64U is required (or run gen-key first).'],
    ['blank', '  ', 'SEED_B64U is required (or run gen-key first).'],
    ['too short', base64urlEncode(new Uint8Array(16)), 'SEED_B64U must decode to 32 bytes.'],
    ['not base64url', 'seed?', 'SEED_B64U must decode to 32 bytes.'],
  ])('rejects a %s seed', (_name, value, message) => {
    expect(() => decodeSeed(value)).toThrow(new CliError(message));
  });
});

describe('parseContent', () => {
  it('accepts a JSON object', () => {
    expect(parseContent('{"x":1}')).toEqual({ x: 1 });
  });

  it.each(['[1]', '1', 'null', '{'])('rejects %s', (json) => {
    expect(() => parseContent(json)).toThrow(CliError);
  });
});

describe('formatBody', () => {
  it('pretty-prints JSON and passes text through', () => {
    expect(formatBody('{"a":1}')).toBe('{\n  "a": 1\n}');
    expect(formatBody('plain')).toBe('plain');
  });
});

describe('sendSignedPost', () => {
  it('sends a request the server-side verifier accepts', async () => {
    const { privateKey, publicKey } = await generateSigningKey();
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(201, { id: 'abc' }));

    const result = await sendSignedPost(
      {
        host: 'http://testserver/',
        path: '/objects',
        seed: privateKey,
        keyid: 'sig1',
        namespace: 'ns',
        content: { x: 1 },
      },
      fetchImpl
    );

    expect(result).toEqual({ status: 201, ok: true, body: '{"id":"abc"}' });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://testserver/objects');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"namespace":"ns","content":{"x":1}}');

    const headers = headersOf(init);
    expect(headers['content-type']).toBe('application/json');
    expect(headers['signature-input']).toMatch(/^sig1=\(\);created=\d+;keyid="sig1"$/);

    const keys = new KeyRegistry({ keys: { sig1: publicKey } });
    const outcome = await verifyRequest(
      {
        method: 'POST',
        path: '/objects',
        scheme: 'http',
        host: 'testserver',
        url: 'http://testserver/objects',
        baseUrl: 'http://testserver/',
        headers,
      },
      { keyResolver: keys }
    );
    expect(outcome.accepted).toBe(true);
  });
});

describe('omp-sign program', () => {
  it('gen-key prints a usable key pair', async () => {
    const { io, out } = testIO();

    await createProgram(io).parseAsync(['node', 'omp-sign', 'gen-key', '--keyid', 'k1']);

    expect(out).toHaveLength(6);
    expect(out[2]).toBe('export OMP_SIG_KEYID=k1');
    const seed = base64urlDecode(out[5].slice('export SEED_B64U='.length));
    expect(seed?.length).toBe(32);
  });

  it('post reports status and body, exiting 0 on success', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(201, { ok: true }));
    const { io, out, exitCode } = testIO(fetchImpl);

    await createProgram(io).parseAsync([
      'node',
      'omp-sign',
      'post',
      '--host',
      'http://127.0.0.1:8080',
      '--seed-b64u',
      base64urlEncode(SEED),
      '--namespace',
      'demo',
      '--json',
      '{"y":2}',
    ]);

    expect(out).toEqual(['Status: 201', '{\n  "ok": true\n}']);
    expect(exitCode()).toBe(0);
    expect(fetchImpl.mock.calls[0][0]).toBe('http://127.0.0.1:8080/objects');
  });

  it('post exits 1 on an error status', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse(401, { error: { code: 'unauthorized', status: 401, message: 'no valid signature' } })
    );
    const { io, exitCode } = testIO(fetchImpl);
    io.env = { SEED_B64U: base64urlEncode(SEED) };

    await createProgram(io).parseAsync(['node', 'omp-sign', 'post']);

    expect(exitCode()).toBe(1);
  });

  it('post exits 2 without a seed', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const { io, err, exitCode } = testIO(fetchImpl);

    await createProgram(io).parseAsync(['node', 'omp-sign', 'post']);

    expect(err).toEqual(['SEED_B64U is required (or run gen-key first).']);
    expect(exitCode()).toBe(2);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('post exits 2 on a path without a leading slash', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const { io, err, exitCode } = testIO(fetchImpl);
    io.env = { SEED_B64U: base64urlEncode(SEED) };

    await createProgram(io).parseAsync(['node', 'omp-sign', 'post', '--path', 'objects']);

    expect(err).toEqual(['Invalid --path: Invalid input: must start with "/"']);
    expect(exitCode()).toBe(2);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('gen-key exits 2 on an empty keyid', async () => {
    const { io, out, err, exitCode } = testIO();

    await createProgram(io).parseAsync(['node', 'omp-sign', 'gen-key', '--keyid', '']);

    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^Invalid --keyid: /);
    expect(exitCode()).toBe(2);
  });
});
