import type { FastifyInstance } from 'fastify';
import type { ConfigStatus } from '../config/index.js';
import { isLogLevel } from '../services/operations/activity.js';
import type { LibraryManager } from '../services/operations/manager.js';

interface StatusRoutesOptions {
  manager: LibraryManager;
  configStatus: ConfigStatus;
}

interface ActivityQuery {
  level?: string;
  limit?: string;
}

export async function statusRoutes(fastify: FastifyInstance, opts: StatusRoutesOptions) {
  const { manager, configStatus } = opts;

  // GET /api/status - Credentials present, operation statuses, cached stats
  fastify.get('/status', async () => {
    return {
      config: configStatus,
      ...manager.status(),
    };
  });

  // POST /api/operations/reset - Put every operation back to idle
  fastify.post('/operations/reset', async () => {
    manager.resetStatus();
    return { success: true, ...manager.status() };
  });

  // GET /api/activity - Activity log, newest first
  fastify.get<{ Querystring: ActivityQuery }>('/activity', async (request, reply) => {
    const { level, limit } = request.query;
    if (level !== undefined && !isLogLevel(level)) {
      return reply.code(400).send({ error: 'Invalid level', message: `Unknown log level: ${level}` });
    }

    const parsedLimit = limit !== undefined ? parseInt(limit, 10) : undefined;
    if (parsedLimit !== undefined && (!Number.isInteger(parsedLimit) || parsedLimit < 1)) {
      return reply.code(400).send({ error: 'Invalid limit', message: 'limit must be a positive integer' });
    }

    return { entries: manager.activity.list(level, parsedLimit) };
  });

  // DELETE /api/activity - Clear the activity log
  fastify.delete('/activity', async () => {
    manager.clearActivity();
    return { success: true };
  });
}
