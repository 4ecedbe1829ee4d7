import { z } from 'zod';
import { ValidationError } from '../../utils/errors.js';
import type { Album, AlbumRepository, PageDecoration } from '../library/types.js';
import type { NotionClient } from './client.js';

export interface AlbumPropertyNames {
  title: string;
  artist: string;
  rank: string;
  status: string;
}

export interface NotionAlbumSettings {
  databaseId: string;
  properties: AlbumPropertyNames;
  listenedStatus: string;
}

const richTextSchema = z.array(z.object({ plain_text: z.string() }));
const namedOptionSchema = z.object({ name: z.string() });

const propertySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('title'), title: richTextSchema }),
  z.object({ type: z.literal('rich_text'), rich_text: richTextSchema }),
  z.object({ type: z.literal('select'), select: namedOptionSchema.nullable() }),
  z.object({ type: z.literal('multi_select'), multi_select: z.array(namedOptionSchema) }),
  z.object({ type: z.literal('status'), status: namedOptionSchema.nullable() }),
]);

const fileReferenceSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('external'), external: z.object({ url: z.string() }) }),
  z.object({ type: z.literal('file'), file: z.object({ url: z.string() }) }),
  z.object({ type: z.literal('emoji'), emoji: z.string() }),
]);

const pageSchema = z.object({
  object: z.literal('page'),
  id: z.string(),
  properties: z.record(z.unknown()),
  cover: z.unknown().optional(),
  icon: z.unknown().optional(),
});

const selectDefinitionSchema = z.object({
  type: z.literal('select'),
  select: z.object({ options: z.array(namedOptionSchema) }),
});

type NotionProperty = z.infer<typeof propertySchema>;

function rawText(property: NotionProperty): string {
  switch (property.type) {
    case 'title':
      return property.title.map((part) => part.plain_text).join('');
    case 'rich_text':
      return property.rich_text.map((part) => part.plain_text).join('');
    case 'select':
      return property.select?.name ?? '';
    case 'multi_select':
      return property.multi_select.map((option) => option.name).join(', ');
    case 'status':
      return property.status?.name ?? '';
  }
}

/** Plain text of a title, rich text, select, multi-select or status property */
export function propertyText(value: unknown): string | null {
  const parsed = propertySchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  const text = rawText(parsed.data).trim();
  return text.length > 0 ? text : null;
}

/** URL of a page cover or icon; emoji icons have none */
export function fileUrl(value: unknown): string | null {
  const parsed = fileReferenceSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  switch (parsed.data.type) {
    case 'external':
      return parsed.data.external.url;
    case 'file':
      return parsed.data.file.url;
    case 'emoji':
      return null;
  }
}

// Ranks past the safe integer range count as unranked
export function parseRank(label: string | null): number | null {
  if (label === null || !/^\d+$/.test(label)) {
    return null;
  }
  const rank = parseInt(label, 10);
  return Number.isSafeInteger(rank) ? rank : null;
}

/** Returns null for anything that is not a page (e.g. a partial or database result) */
export function parseAlbumPage(value: unknown, names: AlbumPropertyNames): Album | null {
  const parsed = pageSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }

  const page = parsed.data;
  const rankLabel = propertyText(page.properties[names.rank]);

  return {
    id: page.id,
    title: propertyText(page.properties[names.title]) ?? 'Untitled',
    artist: propertyText(page.properties[names.artist]) ?? 'Unknown',
    rank: parseRank(rankLabel),
    rankLabel,
    status: propertyText(page.properties[names.status]),
    coverUrl: fileUrl(page.cover),
    iconUrl: fileUrl(page.icon),
    hasCover: page.cover !== undefined && page.cover !== null,
    hasIcon: page.icon !== undefined && page.icon !== null,
  };
}

function externalFile(url: string) {
  return { type: 'external', external: { url } };
}

export class NotionAlbumRepository implements AlbumRepository {
  constructor(
    private readonly client: NotionClient,
    private readonly settings: NotionAlbumSettings
  ) {}

  isListened(album: Album): boolean {
    return album.status === this.settings.listenedStatus;
  }

  async fetchAlbums(): Promise<Album[]> {
    const pages = await this.client.queryAll(this.settings.databaseId);
    const albums: Album[] = [];
    for (const page of pages) {
      const album = parseAlbumPage(page, this.settings.properties);
      if (album) {
        albums.push(album);
      }
    }
    return albums;
  }

  async updateRank(albumId: string, label: string): Promise<void> {
    await this.client.updatePage(albumId, {
      properties: {
        [this.settings.properties.rank]: { select: { name: label } },
      },
    });
  }

  async updateDecorations(albumId: string, decoration: PageDecoration): Promise<void> {
    const body: Record<string, unknown> = {};
    if (decoration.coverUrl) {
      body.cover = externalFile(decoration.coverUrl);
    }
    if (decoration.iconUrl) {
      body.icon = externalFile(decoration.iconUrl);
    }
    if (Object.keys(body).length === 0) {
      return;
    }
    await this.client.updatePage(albumId, body);
  }

  async getRankOptions(): Promise<string[]> {
    const database = await this.client.retrieveDatabase(this.settings.databaseId);
    const name = this.settings.properties.rank;
    const definition = selectDefinitionSchema.safeParse(database.properties[name]);
    if (!definition.success) {
      throw new ValidationError(`Property '${name}' is not a select property`);
    }
    return definition.data.select.options.map((option) => option.name);
  }

  async setRankOptions(names: string[]): Promise<void> {
    await this.client.updateDatabase(this.settings.databaseId, {
      properties: {
        [this.settings.properties.rank]: {
          select: { options: names.map((name) => ({ name })) },
        },
      },
    });
  }
}
