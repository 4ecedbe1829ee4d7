import Fastify, { type FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';
import { registerRoutes, type RouteDependencies } from './api/index.js';

export interface BuildServerOptions extends RouteDependencies {
  logger?: FastifyBaseLogger | boolean;
}

export async function buildServer(options: BuildServerOptions) {
  const server = Fastify({
    logger: options.logger ?? false,
  });

  // Register CORS
  await server.register(cors, {
    origin: true,
  });

  // Register routes
  await registerRoutes(server, { manager: options.manager, configStatus: options.configStatus });

  return server;
}
