import { chunk, sleep } from '../../utils/index.js';
import type { Album, AlbumRepository } from './types.js';

// Notion rejects select updates that add more than 100 options at once
export const OPTIONS_PER_WRITE = 100;

export interface PruneResult {
  used: string[];
  removed: string[];
}

export interface PruneSettings {
  pauseMs?: number;
  wait?: (ms: number) => Promise<void>;
  onChunk?: (written: number, total: number) => void;
}

export function usedRankLabels(albums: readonly Album[]): string[] {
  const used = new Set<string>();
  for (const album of albums) {
    if (album.rankLabel) {
      used.add(album.rankLabel);
    }
  }
  return [...used].sort();
}

/**
 * Rebuilds the rank property's option list from the labels albums actually
 * use: clear it, then add the used labels back cumulatively in chunks.
 */
export async function pruneRankOptions(
  repository: AlbumRepository,
  settings: PruneSettings = {}
): Promise<PruneResult> {
  const wait = settings.wait ?? sleep;
  const pauseMs = settings.pauseMs ?? 200;

  const [albums, existing] = await Promise.all([repository.fetchAlbums(), repository.getRankOptions()]);
  const used = usedRankLabels(albums);
  const usedSet = new Set(used);
  const removed = existing.filter((name) => !usedSet.has(name));

  if (removed.length === 0) {
    return { used, removed };
  }

  await repository.setRankOptions([]);

  const cumulative: string[] = [];
  for (const [i, names] of chunk(used, OPTIONS_PER_WRITE).entries()) {
    if (i > 0) {
      await wait(pauseMs);
    }
    cumulative.push(...names);
    await repository.setRankOptions([...cumulative]);
    settings.onChunk?.(cumulative.length, used.length);
  }

  return { used, removed };
}
