import type { Album, RankedAlbum, SortKey, SortRequest } from './types.js';

const collator = new Intl.Collator('en', { sensitivity: 'base', numeric: true });

interface Indexed {
  album: Album;
  index: number;
}

/**
 * Albums in their current order: ranked albums by rank, then unranked ones,
 * each group keeping the order the workspace returned them in.
 */
export function originalOrder(albums: readonly Album[]): Album[] {
  return albums
    .map((album, index) => ({ album, index }))
    .sort((a, b) => {
      const ra = a.album.rank ?? Number.POSITIVE_INFINITY;
      const rb = b.album.rank ?? Number.POSITIVE_INFINITY;
      if (ra !== rb) {
        return ra < rb ? -1 : 1;
      }
      return a.index - b.index;
    })
    .map(({ album }) => album);
}

function textKey(album: Album, key: Exclude<SortKey, 'rank'>): string {
  return key === 'title' ? album.title : album.artist;
}

export function rankWidth(maxRank: number): number {
  return Math.max(2, String(maxRank).length);
}

export function formatRank(rank: number, width: number): string {
  return String(rank).padStart(width, '0');
}

function withLabels(ordered: Array<{ album: Album; rank: number }>): RankedAlbum[] {
  const maxRank = ordered.reduce((max, entry) => Math.max(max, entry.rank), 0);
  const width = rankWidth(maxRank);
  return ordered.map(({ album, rank }) => ({ album, rank, label: formatRank(rank, width) }));
}

/**
 * Hands out strictly increasing positions of at least `atLeast`, skipping the
 * ones held by albums left out of the run.
 */
function positions(reserved: ReadonlySet<number>): (atLeast: number) => number {
  let last = Number.NEGATIVE_INFINITY;
  return (atLeast) => {
    let rank = Math.max(atLeast, last + 1);
    while (reserved.has(rank)) rank++;
    last = rank;
    return rank;
  };
}

function numberFrom(
  albums: Album[],
  start: number,
  reserved: ReadonlySet<number>
): Array<{ album: Album; rank: number }> {
  const next = positions(reserved);
  return albums.map((album) => ({ album, rank: next(start) }));
}

/**
 * Existing ranks are kept; duplicates are pushed down one slot at a time and
 * unranked albums are appended after the highest rank.
 */
function byExistingRank(
  ordered: Album[],
  startingRank: number,
  reserved: ReadonlySet<number>
): Array<{ album: Album; rank: number }> {
  const next = positions(reserved);
  const result: Array<{ album: Album; rank: number }> = [];

  for (const album of ordered) {
    if (album.rank === null) continue;
    result.push({ album, rank: next(album.rank) });
  }

  const unranked = ordered.filter((album) => album.rank === null);
  return result.concat(unranked.map((album) => ({ album, rank: next(startingRank) })));
}

export function selectCandidates(
  albums: readonly Album[],
  listenedOnly: boolean,
  isListened: (album: Album) => boolean
): Album[] {
  return listenedOnly ? albums.filter(isListened) : [...albums];
}

/** Ranks held by albums outside `candidates`; a run must not hand them out again */
export function reservedRanks(albums: readonly Album[], candidates: readonly Album[]): Set<number> {
  const included = new Set(candidates);
  const reserved = new Set<number>();
  for (const album of albums) {
    if (!included.has(album) && album.rank !== null) {
      reserved.add(album.rank);
    }
  }
  return reserved;
}

/**
 * Computes the new ranking for `albums`. Ties always fall back to the current
 * order, so running the same request twice yields the same ranks.
 */
export function rankAlbums(
  albums: readonly Album[],
  request: SortRequest,
  reserved: ReadonlySet<number> = new Set()
): RankedAlbum[] {
  const ordered = originalOrder(albums);

  if (request.key === 'rank') {
    const ranked = byExistingRank(ordered, request.startingRank, reserved);
    if (!request.compact) {
      return withLabels(ranked);
    }
    return withLabels(numberFrom(ranked.map(({ album }) => album), request.startingRank, reserved));
  }

  const key = request.key;
  const sign = request.direction === 'desc' ? -1 : 1;
  const sorted = ordered
    .map((album, index): Indexed => ({ album, index }))
    .sort((a, b) => {
      const cmp = collator.compare(textKey(a.album, key), textKey(b.album, key));
      return cmp !== 0 ? cmp * sign : a.index - b.index;
    })
    .map(({ album }) => album);

  return withLabels(numberFrom(sorted, request.startingRank, reserved));
}

export function needsUpdate(entry: RankedAlbum): boolean {
  return entry.album.rankLabel !== entry.label;
}
