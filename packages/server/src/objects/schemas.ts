import { z } from 'zod';

const JsonObject = z.record(z.unknown());

export const DEFAULT_LIMIT = 50;

// query strings arrive as text; JSON bodies as numbers
const Limit = z.coerce.number().int().default(DEFAULT_LIMIT);

export const ObjectInSchema = z.object({
  namespace: z.string(),
  key: z.string().nullish(),
  content: JsonObject,
  metadata: JsonObject.nullish(),
});

export const ObjectUpdateSchema = z.object({
  content: z.unknown(),
  metadata: JsonObject.nullish(),
});

export const ListQuerySchema = z.object({
  limit: Limit,
  cursor: z.string().optional(),
});

export const SearchQuerySchema = z.object({
  namespace: z.string().nullish(),
  key_contains: z.string().nullish(),
  limit: Limit,
  cursor: z.string().nullish(),
});

export type ObjectIn = z.infer<typeof ObjectInSchema>;
export type ObjectUpdate = z.infer<typeof ObjectUpdateSchema>;
export type SearchQuery = z.infer<typeof SearchQuerySchema>;

export interface ObjectOut {
  id: string;
  namespace: string;
  key: string;
  created_at: string;
  metadata: Record<string, unknown>;
}

export interface ObjectDataOut extends ObjectOut {
  content: Record<string, unknown>;
}

export interface ObjectListOut {
  count: number;
  items: ObjectOut[];
}
