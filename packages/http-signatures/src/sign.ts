/**
 * Client-side request signing.
 *
 * Produces the header pair the verifier expects for a request to an
 * absolute URL: the signature covers "{METHOD} {url}" only.
 */

import { base64urlEncode } from './base64url.js';
import { signatureBaseToBytes } from './base.js';
import { getPublicKey, randomSecretKey, sign } from './ed25519.js';

export interface SignRequestInput {
  method: string;
  /** Absolute URL exactly as the client sends it */
  url: string;
  keyid: string;
  /** 32-byte Ed25519 seed */
  privateKey: Uint8Array;
  /** Header label (defaults to "sig1") */
  label?: string;
  /** Unix seconds (defaults to now) */
  created?: number;
}

export type SignatureHeaders = {
  'Signature-Input': string;
  Signature: string;
};

/**
 * Sign a request and return its Signature-Input / Signature headers.
 */
export async function signRequest(input: SignRequestInput): Promise<SignatureHeaders> {
  const { method, url, keyid, privateKey, label = 'sig1' } = input;
  const created = input.created ?? Math.floor(Date.now() / 1000);

  const base = `${method.toUpperCase()} ${url}`;
  const signature = await sign(signatureBaseToBytes(base), privateKey);

  return {
    'Signature-Input': `${label}=();created=${created};keyid="${keyid}"`,
    Signature: `${label}=:${base64urlEncode(signature)}:`,
  };
}

/**
 * Generate a random signing key and its public key.
 */
export async function generateSigningKey(): Promise<{
  privateKey: Uint8Array;
  publicKey: Uint8Array;
}> {
  const privateKey = randomSecretKey();
  const publicKey = await getPublicKey(privateKey);
  return { privateKey, publicKey };
}

/**
 * Derive the public key for a seed.
 */
export async function publicKeyFor(privateKey: Uint8Array): Promise<Uint8Array> {
  return getPublicKey(privateKey);
}
