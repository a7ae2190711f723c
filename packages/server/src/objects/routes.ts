import { Router, type Request, type Response, type NextFunction, type RequestHandler } from 'express';
import { ApiError } from '../errors/api-error.js';
import {
  ListQuerySchema,
  ObjectInSchema,
  ObjectUpdateSchema,
  SearchQuerySchema,
  type SearchQuery,
} from './schemas.js';
import { InvalidContentError, ObjectNotFoundError, type StoragePort } from './storage.js';

export interface ObjectsRouterOptions {
  storage: StoragePort;
  /** Guard for mutating routes (POST, PUT, DELETE) */
  signatures: RequestHandler;
}

function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

/**
 * Run a storage call, mapping adapter failures onto API errors.
 */
async function storageCall<T>(call: () => Promise<T>, failure: string): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof ObjectNotFoundError) {
      throw new ApiError(404, 'Object not found');
    }
    if (error instanceof InvalidContentError) {
      throw new ApiError(400, error.message);
    }
    throw new ApiError(500, failure, {
      cause: error instanceof Error ? error.name : 'unknown',
    });
  }
}

export function createObjectsRouter({ storage, signatures }: ObjectsRouterOptions): Router {
  const router = Router();

  const search = (query: SearchQuery) =>
    storageCall(
      () =>
        storage.search({
          namespace: query.namespace,
          keyContains: query.key_contains,
          limit: query.limit,
          cursor: query.cursor,
        }),
      'Search failed'
    );

  router.post(
    '/',
    signatures,
    route(async (req, res) => {
      const body = ObjectInSchema.parse(req.body);
      const out = await storageCall(
        () => storage.store(body.namespace, body.key, body.content, body.metadata ?? {}),
        'Store failed'
      );
      res.status(201).json(out);
    })
  );

  router.get(
    '/',
    route(async (req, res) => {
      const query = ListQuerySchema.parse(req.query);
      res.json(await storageCall(() => storage.list(query.limit, query.cursor), 'List failed'));
    })
  );

  router.get(
    '/search',
    route(async (req, res) => {
      res.json(await search(SearchQuerySchema.parse(req.query)));
    })
  );

  router.post(
    '/search',
    route(async (req, res) => {
      res.json(await search(SearchQuerySchema.parse(req.body)));
    })
  );

  router.get(
    '/:id',
    route(async (req, res) => {
      res.json(await storageCall(() => storage.get(req.params.id), 'Get failed'));
    })
  );

  router.put(
    '/:id',
    signatures,
    route(async (req, res) => {
      const body = ObjectUpdateSchema.parse(req.body);
      const out = await storageCall(
        () => storage.update(req.params.id, body.content, body.metadata),
        'Update failed'
      );
      res.json(out);
    })
  );

  router.delete(
    '/:id',
    signatures,
    route(async (req, res) => {
      await storageCall(() => storage.delete(req.params.id), 'Delete failed');
      res.status(204).end();
    })
  );

  return router;
}
