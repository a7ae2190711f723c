/**
 * Base64 / base64url (RFC 4648 §4, §5) and hex codecs.
 *
 * Decoders are strict: any character outside the alphabet yields null
 * instead of being silently skipped.
 */

const BASE64URL_RE = /^[A-Za-z0-9_-]*={0,2}$/;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;
const HEX_RE = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Encode bytes to base64url string (no padding)
 */
export function base64urlEncode(bytes: Uint8Array): string {
  const base64 = Buffer.from(bytes).toString('base64');
  return base64.replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');
}

/**
 * Decode base64url string to bytes, padding optional.
 */
export function base64urlDecode(str: string): Uint8Array | null {
  const s = str.trim();
  if (!BASE64URL_RE.test(s) || !hasValidLength(s)) {
    return null;
  }
  const base64 = s.replace(/-/g, '+').replace(/_/g, '/');
  return new Uint8Array(Buffer.from(pad(base64), 'base64'));
}

/**
 * Decode standard base64 string to bytes, padding optional.
 */
export function base64Decode(str: string): Uint8Array | null {
  const s = str.trim();
  if (!BASE64_RE.test(s) || !hasValidLength(s)) {
    return null;
  }
  return new Uint8Array(Buffer.from(pad(s), 'base64'));
}

/**
 * Decode hex string to bytes.
 */
export function hexDecode(str: string): Uint8Array | null {
  const s = str.trim();
  if (!HEX_RE.test(s)) {
    return null;
  }
  return new Uint8Array(Buffer.from(s, 'hex'));
}

export function hexEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

function pad(s: string): string {
  const unpadded = s.replace(/=+$/, '');
  const mod = unpadded.length % 4;
  return mod > 0 ? unpadded + '='.repeat(4 - mod) : unpadded;
}

// A single leftover character cannot encode a whole byte.
function hasValidLength(s: string): boolean {
  return s.replace(/=+$/, '').length % 4 !== 1;
}
