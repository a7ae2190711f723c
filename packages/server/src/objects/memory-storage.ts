import { randomUUID } from 'node:crypto';
import type { ObjectDataOut, ObjectListOut, ObjectOut } from './schemas.js';
import { DEFAULT_LIMIT } from './schemas.js';
import {
  InvalidContentError,
  isPlainObject,
  ObjectNotFoundError,
  type SearchFilter,
  type StoragePort,
} from './storage.js';

interface StoredObject {
  id: string;
  namespace: string;
  key: string;
  createdAt: Date;
  metadata: Record<string, unknown>;
  content: Record<string, unknown>;
}

export interface MemoryStorageOptions {
  now?: () => Date;
  generateId?: () => string;
}

function byCreation(a: StoredObject, b: StoredObject): number {
  const diff = a.createdAt.getTime() - b.createdAt.getTime();
  if (diff !== 0) {
    return diff;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function toOut(r: StoredObject): ObjectOut {
  return {
    id: r.id,
    namespace: r.namespace,
    key: r.key,
    created_at: r.createdAt.toISOString(),
    metadata: structuredClone(r.metadata),
  };
}

function page(rows: StoredObject[], limit: number): ObjectListOut {
  const items = [...rows].sort(byCreation).slice(0, Math.max(0, limit)).map(toOut);
  return { count: items.length, items };
}

/**
 * Ephemeral in-process adapter. Contents are lost on restart.
 */
export class MemoryStorage implements StoragePort {
  private readonly db = new Map<string, StoredObject>();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: MemoryStorageOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async store(
    namespace: string,
    key: string | null | undefined,
    content: Record<string, unknown>,
    metadata: Record<string, unknown>
  ): Promise<ObjectOut> {
    if (!isPlainObject(content)) {
      throw new InvalidContentError();
    }
    const id = this.generateId();
    const record: StoredObject = {
      id,
      namespace,
      key: key || id,
      createdAt: this.now(),
      metadata: structuredClone(metadata),
      content: structuredClone(content),
    };
    this.db.set(id, record);
    return toOut(record);
  }

  async get(id: string): Promise<ObjectDataOut> {
    const record = this.require(id);
    return { ...toOut(record), content: structuredClone(record.content) };
  }

  async update(
    id: string,
    content: unknown,
    metadata?: Record<string, unknown> | null
  ): Promise<ObjectOut> {
    const record = this.require(id);
    if (!isPlainObject(content)) {
      throw new InvalidContentError();
    }
    record.content = structuredClone(content);
    if (metadata != null) {
      record.metadata = structuredClone(metadata);
    }
    return toOut(record);
  }

  async delete(id: string): Promise<void> {
    this.require(id);
    this.db.delete(id);
  }

  // TODO: honour cursor once a paging token format is chosen
  async list(limit: number = DEFAULT_LIMIT, _cursor?: string | null): Promise<ObjectListOut> {
    return page([...this.db.values()], limit);
  }

  async search(filter: SearchFilter): Promise<ObjectListOut> {
    const { namespace, keyContains, limit = DEFAULT_LIMIT } = filter;
    let rows = [...this.db.values()];
    if (namespace != null) {
      rows = rows.filter((r) => r.namespace === namespace);
    }
    if (keyContains) {
      rows = rows.filter((r) => r.key.includes(keyContains));
    }
    return page(rows, limit);
  }

  private require(id: string): StoredObject {
    const record = this.db.get(id);
    if (!record) {
      throw new ObjectNotFoundError(id);
    }
    return record;
  }
}
