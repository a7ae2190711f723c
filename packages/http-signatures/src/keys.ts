/**
 * Ed25519 public key material and keyid resolution.
 *
 * Resolution order (first match wins):
 * 1. registry entries added with register()
 * 2. named configuration entries bound to that keyid
 * 3. the default key, only when the requested keyid is the default keyid
 *
 * Only the declared keyid's key is ever consulted. A signature made with
 * some other registered key must not verify under an unrelated keyid.
 */

import { base64Decode, base64urlDecode, base64urlEncode, hexDecode } from './base64url.js';
import { KeyMaterialError } from './errors.js';
import type { KeyResolver } from './types.js';

/** Raw 32-byte key, or hex / base64url / base64 text */
export type KeyMaterial = string | Uint8Array;

export type KeyEncoding = 'raw' | 'hex' | 'base64url' | 'base64';

interface TextDecoding {
  encoding: Exclude<KeyEncoding, 'raw'>;
  decode: (text: string) => Uint8Array | null;
}

// hex first: a 64-char hex string is also valid base64 (of 48 bytes)
const TEXT_DECODINGS: readonly TextDecoding[] = [
  { encoding: 'hex', decode: hexDecode },
  { encoding: 'base64url', decode: base64urlDecode },
  { encoding: 'base64', decode: base64Decode },
];

/**
 * A validated Ed25519 public key.
 */
export class Ed25519PublicKey {
  static readonly LENGTH = 32;

  private constructor(
    private readonly raw: Uint8Array,
    /** Encoding the key was supplied in */
    readonly encoding: KeyEncoding
  ) {}

  /**
   * Decode key material into a public key.
   *
   * @throws KeyMaterialError if no encoding yields exactly 32 bytes
   */
  static decode(material: KeyMaterial): Ed25519PublicKey {
    if (material instanceof Uint8Array) {
      if (material.length !== Ed25519PublicKey.LENGTH) {
        throw new KeyMaterialError(
          `Ed25519 public key must be ${Ed25519PublicKey.LENGTH} bytes, got ${material.length}`
        );
      }
      return new Ed25519PublicKey(new Uint8Array(material), 'raw');
    }

    const text = material.trim().replace(/\s+/g, '');
    if (text) {
      for (const { encoding, decode } of TEXT_DECODINGS) {
        const bytes = decode(text);
        if (bytes && bytes.length === Ed25519PublicKey.LENGTH) {
          return new Ed25519PublicKey(bytes, encoding);
        }
      }
    }
    throw new KeyMaterialError('unsupported public key format');
  }

  /** Copy of the raw key bytes */
  get bytes(): Uint8Array {
    return new Uint8Array(this.raw);
  }

  equals(other: Ed25519PublicKey): boolean {
    return Buffer.from(this.raw).equals(Buffer.from(other.raw));
  }

  toBase64url(): string {
    return base64urlEncode(this.raw);
  }
}

export interface KeyRegistryOptions {
  /** Named configuration entries, keyid -> material */
  keys?: Record<string, KeyMaterial>;
  /** Single default key, bound to its own keyid */
  defaultKey?: { keyid: string; publicKey: KeyMaterial };
}

/**
 * In-process key registry backed by optional configuration entries.
 *
 * Configuration is decoded eagerly so that bad key material fails at
 * startup, not on the first signed request.
 */
export class KeyRegistry implements KeyResolver {
  private readonly registered = new Map<string, Ed25519PublicKey>();
  private readonly configured = new Map<string, Ed25519PublicKey>();
  private readonly defaultKey?: { keyid: string; key: Ed25519PublicKey };

  constructor(options: KeyRegistryOptions = {}) {
    for (const [keyid, material] of Object.entries(options.keys ?? {})) {
      this.configured.set(keyid, decodeFor(keyid, material));
    }
    if (options.defaultKey) {
      const { keyid, publicKey } = options.defaultKey;
      this.defaultKey = { keyid, key: decodeFor(keyid, publicKey) };
    }
  }

  /**
   * Register (or replace) the key for a keyid.
   *
   * @throws KeyMaterialError on empty keyid or bad material
   */
  register(keyid: string, material: KeyMaterial): Ed25519PublicKey {
    const key = decodeFor(keyid, material);
    this.registered.set(keyid, key);
    return key;
  }

  unregister(keyid: string): boolean {
    return this.registered.delete(keyid);
  }

  /** Drop every registered key; configuration entries stay. */
  clear(): void {
    this.registered.clear();
  }

  /**
   * Exact keyid first, then its upper- and lower-case spellings, so a key
   * configured as OMP_SIG_PUB_SIG1 serves keyid "sig1". The default key
   * matches its keyid ignoring case.
   */
  resolve(keyid: string): Ed25519PublicKey | undefined {
    if (!keyid) {
      return undefined;
    }
    for (const spelling of new Set([keyid, keyid.toUpperCase(), keyid.toLowerCase()])) {
      const key = this.registered.get(spelling) ?? this.configured.get(spelling);
      if (key) {
        return key;
      }
    }
    if (this.defaultKey && this.defaultKey.keyid.toLowerCase() === keyid.toLowerCase()) {
      return this.defaultKey.key;
    }
    return undefined;
  }

  /** Every keyid this registry can resolve */
  keyids(): string[] {
    const ids = new Set([...this.registered.keys(), ...this.configured.keys()]);
    if (this.defaultKey) {
      ids.add(this.defaultKey.keyid);
    }
    return [...ids];
  }
}

function decodeFor(keyid: string, material: KeyMaterial): Ed25519PublicKey {
  if (!keyid) {
    throw new KeyMaterialError('keyid must not be empty');
  }
  try {
    return Ed25519PublicKey.decode(material);
  } catch (error) {
    if (error instanceof KeyMaterialError) {
      throw new KeyMaterialError(`${error.message} (keyid "${keyid}")`);
    }
    throw error;
  }
}
