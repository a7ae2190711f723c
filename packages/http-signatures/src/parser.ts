/**
 * Parser for Signature-Input and Signature headers.
 *
 * Implements the subset of RFC 8941 Structured Field Dictionaries used
 * here: every Signature-Input member carries an empty inner list `()`
 * (the signature covers the request line only), followed by parameters.
 */

import type { SignatureInputEntry, SignatureEntry } from './types.js';
import { malformed } from './errors.js';

/**
 * Parse Signature-Input header value.
 *
 * Format: label=();created=1618884473;keyid="key-1"[, label2=...]
 *
 * @param headerValue - Raw Signature-Input header value
 * @returns Map of label to parsed entry
 * @throws HttpSignatureError (malformed) on any syntax violation
 */
export function parseSignatureInput(headerValue: string): Map<string, SignatureInputEntry> {
  if (!headerValue || !headerValue.includes('=')) {
    throw malformed('invalid Signature-Input');
  }

  const results = new Map<string, SignatureInputEntry>();

  for (const member of splitDictionaryMembers(headerValue)) {
    const split = splitKeyValue(member);
    if (!split) {
      throw malformed('invalid item in Signature-Input');
    }
    const label = split[0].trim();
    if (!label) {
      throw malformed('missing label');
    }

    const rest = split[1].trim();
    if (!rest.startsWith('(')) {
      throw malformed('missing covered components');
    }
    const close = rest.indexOf(')');
    if (close < 0) {
      throw malformed('unterminated covered components');
    }
    if (rest.slice(1, close).trim() !== '') {
      throw malformed('unsupported covered components');
    }

    results.set(label, buildEntry(label, parseParameters(rest.slice(close + 1))));
  }

  return results;
}

/**
 * Parse Signature header value.
 *
 * Format: label=:base64url:[, label2=:...:]
 *
 * @param headerValue - Raw Signature header value
 * @returns Map of label to signature text (colons removed, not decoded)
 * @throws HttpSignatureError (malformed) on any syntax violation
 */
export function parseSignature(headerValue: string): Map<string, string> {
  if (!headerValue || !headerValue.includes('=')) {
    throw malformed('invalid Signature');
  }

  const results = new Map<string, string>();

  for (const member of splitDictionaryMembers(headerValue)) {
    const split = splitKeyValue(member);
    if (!split) {
      throw malformed('invalid item in Signature');
    }
    const label = split[0].trim();
    if (!label) {
      throw malformed('missing label');
    }

    const match = split[1].trim().match(/^:([^:]*):$/);
    if (!match) {
      throw malformed('invalid signature value');
    }
    results.set(label, match[1]);
  }

  return results;
}

/**
 * Parse Signature header into entries, preserving header order.
 */
export function parseSignatureEntries(headerValue: string): SignatureEntry[] {
  return [...parseSignature(headerValue)].map(([label, value]) => ({ label, value }));
}

// --- Internal parsing helpers ---

function buildEntry(label: string, params: Record<string, string>): SignatureInputEntry {
  const entry: SignatureInputEntry = { label, params };

  if (params.keyid !== undefined) {
    entry.keyid = params.keyid;
  }
  if (params.created !== undefined && /^-?\d+$/.test(params.created)) {
    entry.created = parseInt(params.created, 10);
  }

  return entry;
}

/**
 * Split dictionary members by comma, respecting inner lists and strings.
 */
function splitDictionaryMembers(value: string): string[] {
  return splitTopLevel(value, ',');
}

/**
 * Split on a separator outside of quoted strings and parentheses.
 */
function splitTopLevel(value: string, separator: string): string[] {
  const members: string[] = [];
  let current = '';
  let depth = 0;
  let inString = false;

  for (let i = 0; i < value.length; i++) {
    const char = value[i];

    if (char === '"') {
      inString = !inString;
      current += char;
    } else if (char === '(' && !inString) {
      depth++;
      current += char;
    } else if (char === ')' && !inString) {
      depth = Math.max(0, depth - 1);
      current += char;
    } else if (char === separator && depth === 0 && !inString) {
      if (current.trim()) {
        members.push(current.trim());
      }
      current = '';
    } else {
      current += char;
    }
  }

  if (current.trim()) {
    members.push(current.trim());
  }

  return members;
}

/**
 * Split a member into key=value pair, or null when there is no "=".
 */
function splitKeyValue(member: string): [string, string] | null {
  const eqIndex = member.indexOf('=');
  if (eqIndex === -1) {
    return null;
  }
  return [member.slice(0, eqIndex), member.slice(eqIndex + 1)];
}

/**
 * Parse parameters from ;key=value;key2="value2" format.
 */
function parseParameters(paramsString: string): Record<string, string> {
  const params: Record<string, string> = {};

  for (const part of splitTopLevel(paramsString, ';')) {
    const split = splitKeyValue(part);
    const key = split?.[0].trim();
    if (!split || !key) {
      throw malformed('invalid param');
    }

    let value = split[1].trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    params[key] = value;
  }

  return params;
}
