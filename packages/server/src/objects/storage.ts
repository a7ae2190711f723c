import type { ObjectDataOut, ObjectListOut, ObjectOut } from './schemas.js';

export interface SearchFilter {
  namespace?: string | null;
  keyContains?: string | null;
  limit?: number;
  cursor?: string | null;
}

/**
 * Contract that every object storage adapter implements.
 *
 * - get / update / delete throw ObjectNotFoundError for unknown ids
 * - update replaces content wholesale; metadata only when given
 * - list / search order by creation time, then id
 */
export interface StoragePort {
  store(
    namespace: string,
    key: string | null | undefined,
    content: Record<string, unknown>,
    metadata: Record<string, unknown>
  ): Promise<ObjectOut>;
  get(id: string): Promise<ObjectDataOut>;
  update(
    id: string,
    content: unknown,
    metadata?: Record<string, unknown> | null
  ): Promise<ObjectOut>;
  delete(id: string): Promise<void>;
  list(limit?: number, cursor?: string | null): Promise<ObjectListOut>;
  search(filter: SearchFilter): Promise<ObjectListOut>;
}

export class ObjectNotFoundError extends Error {
  constructor(readonly id: string) {
    super(`Object not found: ${id}`);
    this.name = 'ObjectNotFoundError';
    Object.setPrototypeOf(this, ObjectNotFoundError.prototype);
  }
}

export class InvalidContentError extends Error {
  constructor(message = 'content must be an object') {
    super(message);
    this.name = 'InvalidContentError';
    Object.setPrototypeOf(this, InvalidContentError.prototype);
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
