import { KeyMaterialError, KeyRegistry } from '@omp/http-signatures';
import { ConfigError, type ServerConfig } from '../config/index.js';

/**
 * Build the key registry from configured key material.
 *
 * @throws ConfigError when any configured key does not decode
 */
export function createKeyRegistry(signatures: ServerConfig['signatures']): KeyRegistry {
  try {
    return new KeyRegistry({ keys: signatures.keys, defaultKey: signatures.defaultKey });
  } catch (error) {
    if (error instanceof KeyMaterialError) {
      throw new ConfigError(`Invalid signature key: ${error.message}`);
    }
    throw error;
  }
}
