import { describe, test, expect } from 'vitest';
import { fakeAdapter } from '../../testing/axios-adapter.js';
import { ValidationError } from '../../utils/errors.js';
import { NotionAlbumRepository, fileUrl, parseAlbumPage, parseRank, propertyText } from './albums.js';
import { NotionClient } from './client.js';

const names = { title: 'Album', artist: 'Artist', rank: 'Rank', status: 'Status' };

function page(id: string, extra: Record<string, unknown> = {}, properties: Record<string, unknown> = {}) {
  return {
    object: 'page',
    id,
    cover: null,
    icon: null,
    properties: {
      Album: { id: 'title', type: 'title', title: [{ type: 'text', plain_text: 'In ' }, { type: 'text', plain_text: 'Rainbows' }] },
      Artist: { id: 'a', type: 'select', select: { id: 'x', name: 'Radiohead', color: 'blue' } },
      Rank: { id: 'r', type: 'select', select: { id: 'y', name: '07', color: 'default' } },
      Status: { id: 's', type: 'status', status: { id: 'z', name: 'Listened', color: 'green' } },
      ...properties,
    },
    ...extra,
  };
}

describe('parseAlbumPage', () => {
  test('reads title, artist, rank and status', () => {
    expect(parseAlbumPage(page('page-1'), names)).toEqual({
      id: 'page-1',
      title: 'In Rainbows',
      artist: 'Radiohead',
      rank: 7,
      rankLabel: '07',
      status: 'Listened',
      coverUrl: null,
      iconUrl: null,
      hasCover: false,
      hasIcon: false,
    });
  });

  test('reads cover and icon files', () => {
    const album = parseAlbumPage(
      page('page-2', {
        cover: { type: 'external', external: { url: 'https://images.example.com/cover.jpg' } },
        icon: { type: 'emoji', emoji: '🎵' },
      }),
      names
    );
    expect(album?.coverUrl).toBe('https://images.example.com/cover.jpg');
    expect(album?.hasCover).toBe(true);
    expect(album?.iconUrl).toBeNull();
    expect(album?.hasIcon).toBe(true);
  });

  test('falls back when properties are empty or missing', () => {
    const album = parseAlbumPage(
      page('page-3', {}, {
        Album: { type: 'title', title: [] },
        Artist: { type: 'select', select: null },
        Rank: { type: 'select', select: { name: 'Top' } },
        Status: undefined,
      }),
      names
    );
    expect(album).toMatchObject({ title: 'Untitled', artist: 'Unknown', rank: null, rankLabel: 'Top', status: null });
  });

  test('ignores results that are not pages', () => {
    expect(parseAlbumPage({ object: 'database', id: 'db' }, names)).toBeNull();
    expect(parseAlbumPage(null, names)).toBeNull();
  });
});

describe('property helpers', () => {
  test('propertyText joins rich text and multi-select values', () => {
    expect(propertyText({ type: 'rich_text', rich_text: [{ plain_text: 'Boards of ' }, { plain_text: 'Canada' }] })).toBe(
      'Boards of Canada'
    );
    expect(propertyText({ type: 'multi_select', multi_select: [{ name: 'Eno' }, { name: 'Byrne' }] })).toBe('Eno, Byrne');
    expect(propertyText({ type: 'number', number: 4 })).toBeNull();
  });

  test('fileUrl reads hosted files', () => {
    expect(fileUrl({ type: 'file', file: { url: 'https://files.example.com/a.png', expiry_time: '2026-01-01' } })).toBe(
      'https://files.example.com/a.png'
    );
    expect(fileUrl(null)).toBeNull();
  });

  test('parseRank accepts digits only', () => {
    expect(parseRank('012')).toBe(12);
    expect(parseRank('1a')).toBeNull();
    expect(parseRank(null)).toBeNull();
  });

  test('parseRank treats ranks past the safe integer range as unranked', () => {
    expect(parseRank('9007199254740991')).toBe(9007199254740991);
    expect(parseRank('9007199254740992')).toBeNull();
    expect(parseRank('1000000000000000000000')).toBeNull();
  });
});

describe('NotionAlbumRepository', () => {
  const settings = { databaseId: 'db-1', properties: names, listenedStatus: 'Listened' };

  test('fetches every page and writes ranks and decorations', async () => {
    const { adapter, requests } = fakeAdapter((request) => {
      if (request.url.endsWith('/databases/db-1/query')) {
        return { status: 200, data: { object: 'list', results: [page('p1'), { object: 'page', id: 'partial' }], has_more: false, next_cursor: null } };
      }
      return { status: 200, data: { object: 'page' } };
    });
    const repository = new NotionAlbumRepository(new NotionClient({ apiKey: 'test-secret', version: '2022-06-28', adapter }), settings);

    const albums = await repository.fetchAlbums();
    expect(albums.map((a) => a.id)).toEqual(['p1']);
    expect(repository.isListened(albums[0])).toBe(true);

    await repository.updateRank('p1', '03');
    await repository.updateDecorations('p1', { coverUrl: 'https://images.example.com/big.jpg' });

    expect(requests.slice(1)).toMatchObject([
      { method: 'PATCH', url: 'https://api.notion.com/v1/pages/p1', data: { properties: { Rank: { select: { name: '03' } } } } },
      {
        method: 'PATCH',
        url: 'https://api.notion.com/v1/pages/p1',
        data: { cover: { type: 'external', external: { url: 'https://images.example.com/big.jpg' } } },
      },
    ]);
  });

  test('reads and replaces rank options', async () => {
    const { adapter, requests } = fakeAdapter((request) => {
      if (request.method === 'GET') {
        return {
          status: 200,
          data: {
            object: 'database',
            id: 'db-1',
            properties: { Rank: { id: 'r', type: 'select', select: { options: [{ id: '1', name: '01', color: 'default' }] } } },
          },
        };
      }
      return { status: 200, data: { object: 'database', id: 'db-1' } };
    });
    const repository = new NotionAlbumRepository(new NotionClient({ apiKey: 'test-secret', version: '2022-06-28', adapter }), settings);

    expect(await repository.getRankOptions()).toEqual(['01']);
    await repository.setRankOptions(['01', '02']);
    expect(requests[1]).toMatchObject({
      method: 'PATCH',
      url: 'https://api.notion.com/v1/databases/db-1',
      data: { properties: { Rank: { select: { options: [{ name: '01' }, { name: '02' }] } } } },
    });
  });

  test('rejects a rank property that is not a select', async () => {
    const { adapter } = fakeAdapter(() => ({
      status: 200,
      data: { object: 'database', id: 'db-1', properties: { Rank: { id: 'r', type: 'number', number: {} } } },
    }));
    const repository = new NotionAlbumRepository(new NotionClient({ apiKey: 'test-secret', version: '2022-06-28', adapter }), settings);

    await expect(repository.getRankOptions()).rejects.toBeInstanceOf(ValidationError);
  });
});
