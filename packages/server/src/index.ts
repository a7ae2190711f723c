/**
 * OMP reference server
 * Objects API with signature enforcement on mutating routes
 */

export { createServer } from './http/server.js';
export type { ServerOptions } from './http/server.js';
export { loadConfig, ConfigError } from './config/index.js';
export type { ServerConfig, LogLevel, Env } from './config/index.js';
export { createLogger, logger, correlationMiddleware, correlationStore } from './logging/index.js';
export { ApiError, codeForStatus } from './errors/api-error.js';
export type { ErrorBody } from './errors/api-error.js';
export { errorHandler, notFoundHandler, toApiError } from './middleware/error.js';
export { MemoryStorage } from './objects/memory-storage.js';
export type { MemoryStorageOptions } from './objects/memory-storage.js';
export { ObjectNotFoundError, InvalidContentError } from './objects/storage.js';
export type { StoragePort, SearchFilter } from './objects/storage.js';
export type { ObjectOut, ObjectDataOut, ObjectListOut } from './objects/schemas.js';
export { createObjectsRouter } from './objects/routes.js';
export { buildDiscoveryDocument, createDiscoveryRouter } from './discovery/v1.js';
export { createKeyRegistry } from './security/keys.js';
export { OMP_VERSION, PACKAGE_VERSION } from './version.js';
