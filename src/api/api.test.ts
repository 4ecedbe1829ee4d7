import { afterEach, describe, test, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../app.js';
import type { ConfigStatus } from '../config/index.js';
import { ActivityLog } from '../services/operations/activity.js';
import { LibraryManager } from '../services/operations/manager.js';
import type { Album } from '../services/library/types.js';
import { InMemoryAlbumRepository, StubArtworkSource, makeAlbum } from '../testing/in-memory.js';
import { ApiError, ConfigurationError, RateLimitError } from '../utils/errors.js';

const configured: ConfigStatus = { notionApiKey: true, notionDatabase: true, spotify: true };

/** Holds fetchAlbums until `release` is called */
class GatedRepository extends InMemoryAlbumRepository {
  release: () => void = () => {};
  private gate = new Promise<void>((resolve) => (this.release = resolve));

  async fetchAlbums(): Promise<Album[]> {
    await this.gate;
    return super.fetchAlbums();
  }
}

let server: FastifyInstance | null = null;

afterEach(async () => {
  await server?.close();
  server = null;
});

async function setup(repository: InMemoryAlbumRepository, configStatus = configured) {
  const manager = new LibraryManager({
    repository: () => repository,
    artwork: () => new StubArtworkSource({}),
    activity: new ActivityLog(),
    decorateDelayMs: 0,
    wait: async () => {},
  });
  server = await buildServer({ manager, configStatus });
  return { server, manager };
}

describe('API routes', () => {
  test('GET /api/health', async () => {
    const { server } = await setup(new InMemoryAlbumRepository([]));
    const response = await server.inject({ method: 'GET', url: '/api/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('ok');
  });

  test('GET /api/albums lists albums', async () => {
    const { server } = await setup(new InMemoryAlbumRepository([makeAlbum({ id: 'a', rank: 1 })]));
    const response = await server.inject({ method: 'GET', url: '/api/albums' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ total: 1, albums: [{ id: 'a', rankLabel: '01' }] });
  });

  test('POST /api/albums/sort returns the new ranking', async () => {
    const repository = new InMemoryAlbumRepository([
      makeAlbum({ id: 'z', title: 'Zebra' }),
      makeAlbum({ id: 'a', title: 'Apple' }),
    ]);
    const { server } = await setup(repository);

    const response = await server.inject({ method: 'POST', url: '/api/albums/sort', payload: { key: 'title' } });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      success: true,
      total: 2,
      updated: 2,
      unchanged: 0,
      failed: [],
      albums: [
        { id: 'a', title: 'Apple', artist: 'Test Artist', rank: 1, label: '01' },
        { id: 'z', title: 'Zebra', artist: 'Test Artist', rank: 2, label: '02' },
      ],
    });
  });

  test('POST /api/albums/sort rejects an unknown key', async () => {
    const { server } = await setup(new InMemoryAlbumRepository([]));
    const response = await server.inject({ method: 'POST', url: '/api/albums/sort', payload: { key: 'year' } });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Album sorting failed', message: 'Invalid request' });
  });

  test('POST /api/albums/sort rejects a descending rank sort', async () => {
    const { server } = await setup(new InMemoryAlbumRepository([]));
    const response = await server.inject({
      method: 'POST',
      url: '/api/albums/sort',
      payload: { key: 'rank', direction: 'desc' },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json().issues).toEqual(['direction: Ranking by existing rank is always ascending']);
  });

  test('missing credentials answer 503 with the missing variables', async () => {
    const manager = new LibraryManager({
      repository: () => {
        throw new ConfigurationError(['NOTION_API_KEY', 'NOTION_DATABASE_ID']);
      },
      artwork: () => new StubArtworkSource({}),
      activity: new ActivityLog(),
      decorateDelayMs: 0,
    });
    server = await buildServer({ manager, configStatus: { notionApiKey: false, notionDatabase: false, spotify: true } });

    const response = await server.inject({ method: 'GET', url: '/api/albums/stats' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({
      error: 'Failed to update album stats',
      message: 'Missing configuration: NOTION_API_KEY, NOTION_DATABASE_ID',
      missing: ['NOTION_API_KEY', 'NOTION_DATABASE_ID'],
    });
  });

  test('upstream failures answer 502', async () => {
    const repository = new InMemoryAlbumRepository([]);
    repository.failFetch = new ApiError('notion', 'Notion request failed (500): boom', 500);
    const { server } = await setup(repository);

    const response = await server.inject({ method: 'GET', url: '/api/albums' });

    expect(response.statusCode).toBe(502);
    expect(response.json().message).toBe('Notion request failed (500): boom');
  });

  test('rate limits answer 429 with Retry-After', async () => {
    const repository = new InMemoryAlbumRepository([]);
    repository.failFetch = new RateLimitError('notion', 'Notion rate limit exceeded: slow down', 3);
    const { server } = await setup(repository);

    const response = await server.inject({ method: 'GET', url: '/api/albums' });

    expect(response.statusCode).toBe(429);
    expect(response.headers['retry-after']).toBe('3');
  });

  test('a second operation while one runs answers 409', async () => {
    const repository = new GatedRepository([makeAlbum({ id: 'a' })]);
    const { server, manager } = await setup(repository);

    const sorting = manager.sortAlbums({ key: 'rank', direction: 'asc', compact: false, startingRank: 1, listenedOnly: true });
    const response = await server.inject({ method: 'POST', url: '/api/albums/covers', payload: {} });

    expect(response.statusCode).toBe(409);
    expect(response.json().message).toBe('Another operation is already running: sort_albums');

    repository.release();
    await sorting;
  });

  test('a reset while an operation runs does not let another one start', async () => {
    const repository = new GatedRepository([makeAlbum({ id: 'a' })]);
    const { server, manager } = await setup(repository);

    const sorting = manager.sortAlbums({ key: 'rank', direction: 'asc', compact: false, startingRank: 1, listenedOnly: true });
    const reset = await server.inject({ method: 'POST', url: '/api/operations/reset' });
    expect(reset.json()).toMatchObject({ success: true, isRunning: true, running: 'sort_albums' });

    const response = await server.inject({ method: 'POST', url: '/api/albums/covers', payload: {} });
    expect(response.statusCode).toBe(409);

    repository.release();
    await sorting;
  });

  test('GET /api/status reports config and operation statuses', async () => {
    const { server } = await setup(new InMemoryAlbumRepository([]));
    const response = await server.inject({ method: 'GET', url: '/api/status' });
    expect(response.json()).toEqual({
      config: configured,
      isRunning: false,
      running: null,
      lastOperation: null,
      statuses: { set_covers: 'idle', sort_albums: 'idle', prune_ranks: 'idle' },
      stats: null,
    });
  });

  test('GET /api/activity filters and validates', async () => {
    const { server, manager } = await setup(new InMemoryAlbumRepository([]));
    manager.activity.info('one');
    manager.activity.error('two');
    manager.activity.info('three');

    const filtered = await server.inject({ method: 'GET', url: '/api/activity?level=INFO&limit=1' });
    expect(filtered.json().entries.map((e: { message: string }) => e.message)).toEqual(['three']);

    expect((await server.inject({ method: 'GET', url: '/api/activity?level=DEBUG' })).statusCode).toBe(400);
    expect((await server.inject({ method: 'GET', url: '/api/activity?limit=0' })).statusCode).toBe(400);

    await server.inject({ method: 'DELETE', url: '/api/activity' });
    expect(manager.activity.list().map((e) => e.message)).toEqual(['Logs cleared']);
  });
});
