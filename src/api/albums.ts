import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { sortRequestSchema } from '../services/library/types.js';
import type { LibraryManager } from '../services/operations/manager.js';
import { sendError } from './errors.js';

interface AlbumRoutesOptions {
  manager: LibraryManager;
}

const coversBodySchema = z.object({
  updateExisting: z.boolean().default(false),
});

export async function albumsRoutes(fastify: FastifyInstance, opts: AlbumRoutesOptions) {
  const { manager } = opts;

  // GET /api/albums - List all albums as stored in the workspace
  fastify.get('/albums', async (request, reply) => {
    try {
      const albums = await manager.listAlbums();
      return { albums, total: albums.length };
    } catch (error) {
      return sendError(reply, 'Failed to fetch albums', error);
    }
  });

  // GET /api/albums/stats - Recount albums, covers and ranks
  fastify.get('/albums/stats', async (request, reply) => {
    try {
      return await manager.refreshStats();
    } catch (error) {
      return sendError(reply, 'Failed to update album stats', error);
    }
  });

  // POST /api/albums/sort - Rank albums and write the ranks back
  fastify.post<{ Body: unknown }>('/albums/sort', async (request, reply) => {
    try {
      const sortRequest = sortRequestSchema.parse(request.body ?? {});
      const result = await manager.sortAlbums(sortRequest);
      return {
        success: result.failed.length === 0,
        total: result.total,
        updated: result.updated,
        unchanged: result.unchanged,
        failed: result.failed,
        albums: result.albums.map(({ album, rank, label }) => ({
          id: album.id,
          title: album.title,
          artist: album.artist,
          rank,
          label,
        })),
      };
    } catch (error) {
      return sendError(reply, 'Album sorting failed', error);
    }
  });

  // POST /api/albums/covers - Fetch artwork for albums missing a cover or icon
  fastify.post<{ Body: unknown }>('/albums/covers', async (request, reply) => {
    try {
      const { updateExisting } = coversBodySchema.parse(request.body ?? {});
      const summary = await manager.setCovers({ updateExisting });
      return {
        success: summary.results.every((r) => r.outcome === 'updated'),
        ...summary,
      };
    } catch (error) {
      return sendError(reply, 'Album decoration failed', error);
    }
  });

  // POST /api/albums/ranks/prune - Drop rank options no album uses
  fastify.post('/albums/ranks/prune', async (request, reply) => {
    try {
      const result = await manager.pruneRanks();
      return { success: true, ...result };
    } catch (error) {
      return sendError(reply, 'Pruning rank options failed', error);
    }
  });
}
