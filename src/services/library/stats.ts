import type { Album, AlbumStats } from './types.js';

export function computeStats(albums: readonly Album[], isListened: (album: Album) => boolean): AlbumStats {
  const listened = albums.filter(isListened);
  const rated = listened.filter((album) => album.rank !== null);
  const withCovers = albums.filter((album) => album.hasCover).length;
  const withIcons = albums.filter((album) => album.hasIcon).length;

  return {
    totalAlbums: albums.length,
    listenedAlbums: listened.length,
    ratedAlbums: rated.length,
    unratedAlbums: listened.length - rated.length,
    albumsWithCovers: withCovers,
    albumsWithoutCovers: albums.length - withCovers,
    albumsWithIcons: withIcons,
    albumsWithoutIcons: albums.length - withIcons,
  };
}
