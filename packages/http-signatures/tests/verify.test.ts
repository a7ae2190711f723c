import { describe, it, expect, beforeAll } from 'vitest';
import { verifyOne, verifyAll, verifyRequest, getHeader } from '../src/verify.js';
import { parseSignatureInput, parseSignature } from '../src/parser.js';
import { ErrorCodes, HttpSignatureError } from '../src/errors.js';
import { KeyRegistry } from '../src/keys.js';
import { base64urlEncode } from '../src/base64url.js';
import { createSigner, makeRequest, type TestSigner } from './helpers.js';

const BASE_URL = 'http://testserver/objects';
const BOGUS = base64urlEncode(new TextEncoder().encode('not-a-real-signature'));

function sigValue(signatureHeader: string): string {
  const match = signatureHeader.match(/=:([^:]*):$/);
  if (!match) {
    throw new Error(`unexpected Signature header: ${signatureHeader}`);
  }
  return match[1];
}

async function rejection(promise: Promise<unknown>): Promise<HttpSignatureError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof HttpSignatureError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected HttpSignatureError');
}

let signerA: TestSigner;
let signerB: TestSigner;

beforeAll(async () => {
  signerA = await createSigner();
  signerB = await createSigner();
});

function registry(): KeyRegistry {
  const keys = new KeyRegistry();
  keys.register('sigA', signerA.publicKey);
  keys.register('sigB', signerB.publicKey);
  return keys;
}

describe('verifyOne', () => {
  it('accepts a signature over the canonical base', async () => {
    const { signature } = await signerA.sign(BASE_URL, 'sigA');

    expect(await verifyOne(makeRequest(), 'sigA', sigValue(signature), registry())).toBe(true);
  });

  it.each([
    ['an explicit default port', 'http://testserver:80/objects'],
    ['a trailing slash', 'http://testserver/objects/'],
    ['a doubled slash', 'http://testserver//objects'],
  ])('accepts a signature whose URL has %s', async (_name, url) => {
    const { signature } = await signerA.sign(url, 'sigA');

    expect(await verifyOne(makeRequest(), 'sigA', sigValue(signature), registry())).toBe(true);
  });

  it('accepts when the server renders the URL with a trailing slash', async () => {
    const { signature } = await signerA.sign(BASE_URL, 'sigA');
    const request = makeRequest({ path: '/objects/', url: 'http://testserver/objects/' });

    expect(await verifyOne(request, 'sigA', sigValue(signature), registry())).toBe(true);
  });

  it('rejects a signature over a different path', async () => {
    const { signature } = await signerA.sign('http://testserver/other', 'sigA');

    expect(await verifyOne(makeRequest(), 'sigA', sigValue(signature), registry())).toBe(false);
  });

  it('consults only the declared keyid', async () => {
    const { signature } = await signerB.sign(BASE_URL, 'sigA');

    expect(await verifyOne(makeRequest(), 'sigA', sigValue(signature), registry())).toBe(false);
  });

  it('rejects unknown keyids', async () => {
    const { signature } = await signerA.sign(BASE_URL, 'unknown');

    expect(await verifyOne(makeRequest(), 'unknown', sigValue(signature), registry())).toBe(false);
  });

  it.each([
    ['malformed base64url', 'not_base64url?'],
    ['a short signature', BOGUS],
    ['an empty signature', ''],
  ])('returns false for %s', async (_name, value) => {
    expect(await verifyOne(makeRequest(), 'sigA', value, registry())).toBe(false);
  });
});

describe('verifyAll', () => {
  it('accepts when one of several signatures verifies', async () => {
    const good = await signerB.sign(BASE_URL, 'sigB', 'sigB');
    const inputs = parseSignatureInput(
      `sigA=();created=1618884473;keyid="sigA", ${good.input}`
    );
    const signatures = parseSignature(`sigA=:${BOGUS}:, ${good.signature}`);

    const outcome = await verifyAll(makeRequest(), inputs, signatures, registry());

    expect(outcome).toEqual({ accepted: true, matchedLabel: 'sigB', failureKind: 'none' });
  });

  it('rejects with 401 when no signature verifies', async () => {
    const inputs = parseSignatureInput(
      'sigA=();created=1618884473;keyid="sigA", sigB=();created=1618884473;keyid="sigB"'
    );
    const signatures = parseSignature(`sigA=:${BOGUS}:, sigB=:${BOGUS}:`);

    const error = await rejection(verifyAll(makeRequest(), inputs, signatures, registry()));

    expect(error.code).toBe(ErrorCodes.SIGNATURE_INVALID);
    expect(error.httpStatus).toBe(401);
    expect(error.message).toBe('no valid signature');
  });

  it('reports KEY_NOT_FOUND when every label names an unknown key', async () => {
    const { input, signature } = await signerA.sign(BASE_URL, 'unknown', 'sigX');

    const error = await rejection(
      verifyAll(makeRequest(), parseSignatureInput(input), parseSignature(signature), registry())
    );

    expect(error.code).toBe(ErrorCodes.KEY_NOT_FOUND);
    expect(error.httpStatus).toBe(401);
  });

  it('rejects with 400 when labels do not match', async () => {
    const error = await rejection(
      verifyAll(
        makeRequest(),
        parseSignatureInput('sig1=();keyid="sigA"'),
        parseSignature(`sig2=:${BOGUS}:`),
        registry()
      )
    );

    expect(error.code).toBe(ErrorCodes.SIGNATURE_LABEL_MISMATCH);
    expect(error.message).toBe('signature label mismatch');
    expect(error.httpStatus).toBe(400);
  });

  it('rejects with 400 on a missing keyid even when another label verifies', async () => {
    const good = await signerB.sign(BASE_URL, 'sigB', 'sigB');
    const inputs = parseSignatureInput(`sigA=();created=1618884473, ${good.input}`);
    const signatures = parseSignature(`sigA=:${BOGUS}:, ${good.signature}`);

    const error = await rejection(verifyAll(makeRequest(), inputs, signatures, registry()));

    expect(error.code).toBe(ErrorCodes.SIGNATURE_PARAM_MISSING);
    expect(error.message).toBe('missing keyid for label sigA');
    expect(error.httpStatus).toBe(400);
  });

  it('ignores labels present in only one header', async () => {
    const good = await signerA.sign(BASE_URL, 'sigA');
    const inputs = parseSignatureInput(`${good.input}, extra=();created=1`);
    const signatures = parseSignature(`${good.signature}, stray=:${BOGUS}:`);

    const outcome = await verifyAll(makeRequest(), inputs, signatures, registry());

    expect(outcome.matchedLabel).toBe('sig1');
  });
});

describe('verifyRequest', () => {
  it('returns the same outcome when verifying twice', async () => {
    const { input, signature } = await signerA.sign(BASE_URL, 'sigA');
    const request = makeRequest({
      headers: { 'signature-input': input, signature },
    });
    const keys = registry();

    const first = await verifyRequest(request, { keyResolver: keys });
    const second = await verifyRequest(request, { keyResolver: keys });

    expect(first).toEqual({ accepted: true, matchedLabel: 'sig1', failureKind: 'none' });
    expect(second).toEqual(first);
  });

  it('describes failures instead of throwing', async () => {
    const request = makeRequest({
      headers: { 'signature-input': 'sig1=();keyid="sigA"', signature: `sig1=:${BOGUS}:` },
    });

    expect(await verifyRequest(request, { keyResolver: registry() })).toEqual({
      accepted: false,
      failureKind: 'bad_signature',
      errorCode: ErrorCodes.SIGNATURE_INVALID,
      errorMessage: 'no valid signature',
    });
  });

  it('reports missing headers as malformed', async () => {
    const result = await verifyRequest(makeRequest(), { keyResolver: registry() });

    expect(result.accepted).toBe(false);
    expect(result.failureKind).toBe('malformed');
    expect(result.errorCode).toBe(ErrorCodes.SIGNATURE_MISSING);
  });
});

describe('getHeader', () => {
  it('matches names case-insensitively and joins repeated lines', () => {
    const headers = { 'Signature-Input': ['a=()', 'b=()'], other: undefined };

    expect(getHeader(headers, 'signature-input')).toBe('a=(), b=()');
    expect(getHeader(headers, 'other')).toBe('');
    expect(getHeader(headers, 'missing')).toBe('');
  });
});
