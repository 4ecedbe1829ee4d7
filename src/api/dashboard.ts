import formbody from '@fastify/formbody';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z, ZodError } from 'zod';
import type { ConfigStatus } from '../config/index.js';
import { SORT_KEYS, sortRequestSchema, type SortRequest } from '../services/library/types.js';
import { isLogLevel } from '../services/operations/activity.js';
import type { LibraryManager } from '../services/operations/manager.js';
import { errorMessage } from '../utils/errors.js';
import { renderDashboard } from '../views/dashboard.js';
import { zodIssues } from './errors.js';

interface DashboardRoutesOptions {
  manager: LibraryManager;
  configStatus: ConfigStatus;
}

interface DashboardQuery {
  level?: string;
}

// Unchecked checkboxes are simply absent from the form body
const checkbox = z
  .string()
  .optional()
  .transform((value) => value === 'on');

const sortFormSchema = z.object({
  key: z.enum(SORT_KEYS).default('rank'),
  direction: z.enum(['asc', 'desc']).default('asc'),
  compact: checkbox,
  startingRank: z.coerce.number().int().min(1).default(1),
  listenedOnly: checkbox,
});

const coversFormSchema = z.object({
  mode: z.enum(['missing', 'all']).default('missing'),
});

export function parseSortForm(body: unknown): SortRequest {
  const form = sortFormSchema.parse(body ?? {});
  return sortRequestSchema.parse(form);
}

export async function dashboardRoutes(fastify: FastifyInstance, opts: DashboardRoutesOptions) {
  const { manager, configStatus } = opts;

  await fastify.register(formbody);

  // Post/redirect/get: every action lands back on the dashboard, results are in the log
  async function runAction(request: FastifyRequest, reply: FastifyReply, action: () => Promise<unknown>) {
    try {
      await action();
    } catch (error) {
      if (error instanceof ZodError) {
        manager.activity.error(`Invalid form input: ${zodIssues(error).join('; ')}`);
      }
      request.log.warn({ err: error }, `Dashboard action failed: ${errorMessage(error)}`);
    }
    return reply.code(303).redirect('/');
  }

  fastify.get<{ Querystring: DashboardQuery }>('/', async (request, reply) => {
    const level = isLogLevel(request.query.level) ? request.query.level : null;
    const html = renderDashboard({
      config: configStatus,
      status: manager.status(),
      entries: manager.activity.list(level ?? undefined, level ? 10 : 20),
      totalEntries: manager.activity.size,
      level,
    });
    return reply.type('text/html; charset=utf-8').send(html);
  });

  fastify.post<{ Body: unknown }>('/actions/sort', async (request, reply) =>
    runAction(request, reply, () => manager.sortAlbums(parseSortForm(request.body)))
  );

  fastify.post<{ Body: unknown }>('/actions/covers', async (request, reply) =>
    runAction(request, reply, () => {
      const { mode } = coversFormSchema.parse(request.body ?? {});
      return manager.setCovers({ updateExisting: mode === 'all' });
    })
  );

  fastify.post('/actions/stats', async (request, reply) => runAction(request, reply, () => manager.refreshStats()));

  fastify.post('/actions/prune-ranks', async (request, reply) =>
    runAction(request, reply, () => manager.pruneRanks())
  );

  fastify.post('/actions/reset', async (request, reply) =>
    runAction(request, reply, async () => manager.resetStatus())
  );

  fastify.post('/actions/clear-logs', async (request, reply) =>
    runAction(request, reply, async () => manager.clearActivity())
  );
}
