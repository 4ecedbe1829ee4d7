import { afterEach, describe, test, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../app.js';
import { ActivityLog } from '../services/operations/activity.js';
import { LibraryManager } from '../services/operations/manager.js';
import { InMemoryAlbumRepository, StubArtworkSource, makeAlbum } from '../testing/in-memory.js';
import { parseSortForm } from './dashboard.js';

const form = { 'content-type': 'application/x-www-form-urlencoded' };

let server: FastifyInstance | null = null;

afterEach(async () => {
  await server?.close();
  server = null;
});

async function setup(repository: InMemoryAlbumRepository) {
  const manager = new LibraryManager({
    repository: () => repository,
    artwork: () => new StubArtworkSource({}),
    activity: new ActivityLog(),
    decorateDelayMs: 0,
    wait: async () => {},
  });
  server = await buildServer({
    manager,
    configStatus: { notionApiKey: true, notionDatabase: false, spotify: true },
  });
  return { server, manager };
}

describe('parseSortForm', () => {
  test('maps checkboxes and coerces the starting rank', () => {
    expect(parseSortForm({ compact: 'on', startingRank: '5' })).toEqual({
      key: 'rank',
      direction: 'asc',
      compact: true,
      startingRank: 5,
      listenedOnly: false,
    });
  });

  test('rejects a starting rank below one', () => {
    expect(() => parseSortForm({ startingRank: '0' })).toThrow();
  });
});

describe('Dashboard', () => {
  test('renders configuration and escaped activity', async () => {
    const { server, manager } = await setup(new InMemoryAlbumRepository([]));
    manager.activity.info('<b>Kid A</b>');

    const response = await server.inject({ method: 'GET', url: '/' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(response.body).toContain('<title>🎵 Album Desk</title>');
    expect(response.body).toContain('❌ Missing');
    expect(response.body).toContain('[INFO] &lt;b&gt;Kid A&lt;/b&gt;');
  });

  test('shows an empty state for a filtered level', async () => {
    const { server } = await setup(new InMemoryAlbumRepository([]));
    const response = await server.inject({ method: 'GET', url: '/?level=ERROR' });
    expect(response.body).toContain('<p>No ERROR logs</p>');
  });

  test('sort form runs the sorter and redirects back', async () => {
    const repository = new InMemoryAlbumRepository([
      makeAlbum({ id: 'z', title: 'Zebra' }),
      makeAlbum({ id: 'a', title: 'Apple' }),
    ]);
    const { server } = await setup(repository);

    const response = await server.inject({
      method: 'POST',
      url: '/actions/sort',
      headers: form,
      payload: 'key=title&direction=asc&startingRank=1&listenedOnly=on',
    });

    expect(response.statusCode).toBe(303);
    expect(response.headers.location).toBe('/');
    expect(repository.rankWrites).toEqual([
      { albumId: 'a', label: '01' },
      { albumId: 'z', label: '02' },
    ]);
  });

  test('invalid form input is logged and still redirects', async () => {
    const { server, manager } = await setup(new InMemoryAlbumRepository([]));

    const response = await server.inject({ method: 'POST', url: '/actions/sort', headers: form, payload: 'key=year' });

    expect(response.statusCode).toBe(303);
    expect(manager.activity.list('ERROR')[0].message.startsWith('Invalid form input: key:')).toBe(true);
  });

  test('covers form overwrites everything in "all" mode', async () => {
    const repository = new InMemoryAlbumRepository([makeAlbum({ id: 'y', hasCover: true, hasIcon: true })]);
    const { server, manager } = await setup(repository);

    await server.inject({ method: 'POST', url: '/actions/covers', headers: form, payload: 'mode=all' });

    expect(manager.activity.list('INFO').map((e) => e.message)).toContain(
      'Starting album decoration (updateExisting=true)...'
    );
  });
});
