/**
 * Internal Ed25519 wrapper -- async-only surface
 *
 * Only the async methods of @noble/ed25519 are used: they hash with the
 * built-in Web Crypto and need no sha512 configuration. Every other
 * module imports from this file, never from '@noble/ed25519' directly.
 *
 * Key material:
 * - Private keys are 32-byte Uint8Array (Ed25519 seed)
 * - Public keys are 32-byte Uint8Array (compressed Ed25519 point)
 */

import { signAsync, verifyAsync, getPublicKeyAsync, utils } from '@noble/ed25519';

/** Sign a message with Ed25519 */
export const sign = signAsync;

/** Derive public key from private key */
export const getPublicKey = getPublicKeyAsync;

/** Generate a cryptographically random 32-byte secret key (CSPRNG) */
export const randomSecretKey = utils.randomPrivateKey;

/**
 * Verify an Ed25519 signature.
 *
 * Wrong-length signatures and keys that are not valid curve points are
 * reported as a failed verification, not thrown.
 */
export async function verify(
  signature: Uint8Array,
  message: Uint8Array,
  publicKey: Uint8Array
): Promise<boolean> {
  if (signature.length !== 64) {
    return false;
  }
  try {
    return await verifyAsync(signature, message, publicKey);
  } catch {
    return false;
  }
}
