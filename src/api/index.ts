import type { FastifyInstance } from 'fastify';
import type { ConfigStatus } from '../config/index.js';
import type { LibraryManager } from '../services/operations/manager.js';
import { albumsRoutes } from './albums.js';
import { dashboardRoutes } from './dashboard.js';
import { statusRoutes } from './status.js';

export interface RouteDependencies {
  manager: LibraryManager;
  configStatus: ConfigStatus;
}

export async function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies) {
  // Health check
  fastify.get('/api/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Register all route modules
  await fastify.register(albumsRoutes, { prefix: '/api', manager: deps.manager });
  await fastify.register(statusRoutes, { prefix: '/api', ...deps });
  await fastify.register(dashboardRoutes, deps);
}
