import { Router } from 'express';
import type { SignatureSettings } from '@omp/http-signatures';
import type { ServerConfig } from '../config/index.js';
import { OMP_VERSION } from '../version.js';

export interface DiscoveryOptions {
  config: ServerConfig;
  /** Live settings: the advertised mode follows runtime changes */
  settings: SignatureSettings;
}

export function buildDiscoveryDocument({ config, settings }: DiscoveryOptions): Record<string, unknown> {
  return {
    omp_version: OMP_VERSION,
    transport: ['http/1.1'],
    endpoints: {
      objects: { href: '/objects', methods: ['POST', 'GET'] },
      object: { href: '/objects/{id}', methods: ['GET', 'PUT', 'DELETE'] },
      search: { href: '/objects/search', methods: ['GET', 'POST'] },
      health: { href: '/health', methods: ['GET'] },
    },
    capabilities: ['data.write', 'data.read', 'data.delete', 'data.search'],
    limits: {
      max_payload_mb: config.http.maxPayloadMb,
      rate_limit_per_min: config.limits.rateLimitPerMin,
    },
    signatures: {
      mode: settings.mode,
      algorithm: 'ed25519',
      headers: ['Signature-Input', 'Signature'],
      covered_components: [],
      base: '{METHOD} {absolute request URL}',
      applies_to: ['POST /objects', 'PUT /objects/{id}', 'DELETE /objects/{id}'],
    },
    server: { port: config.server.port },
  };
}

export function createDiscoveryRouter(options: DiscoveryOptions): Router {
  const router = Router();

  router.get('/.well-known/omp.json', (_req, res) => {
    res.set('cache-control', 'no-store');
    res.status(200).json(buildDiscoveryDocument(options));
  });

  return router;
}
