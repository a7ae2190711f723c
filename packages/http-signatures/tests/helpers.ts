import type { SignatureRequest } from '../src/types.js';
import { generateSigningKey, signRequest } from '../src/sign.js';

/**
 * POST /objects as a test client addressing "testserver" sees it.
 */
export function makeRequest(overrides: Partial<SignatureRequest> = {}): SignatureRequest {
  return {
    method: 'POST',
    path: '/objects',
    scheme: 'http',
    host: 'testserver',
    url: 'http://testserver/objects',
    baseUrl: 'http://testserver/',
    headers: {},
    ...overrides,
  };
}

export interface TestSigner {
  privateKey: Uint8Array;
  publicKey: Uint8Array;
  /** Sign "POST {url}" under the given label/keyid */
  sign(url: string, keyid: string, label?: string): Promise<{ input: string; signature: string }>;
}

export async function createSigner(): Promise<TestSigner> {
  const { privateKey, publicKey } = await generateSigningKey();
  return {
    privateKey,
    publicKey,
    async sign(url, keyid, label = 'sig1') {
      const headers = await signRequest({
        method: 'POST',
        url,
        keyid,
        privateKey,
        label,
        created: 1618884473,
      });
      return { input: headers['Signature-Input'], signature: headers.Signature };
    },
  };
}
