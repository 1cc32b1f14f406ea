import type { LibraryRemote } from "./StreamingService";
import type {
  Device,
  LibraryItem,
  Page,
  PageRequest,
  PlaylistSummary,
} from "../types";

// The contains endpoint takes at most 50 ids per call
const CHECK_SAVED_BATCH = 50;

export class LibraryService {
  private remote: LibraryRemote;

  constructor(remote: LibraryRemote) {
    this.remote = remote;
  }

  async search(query: string): Promise<LibraryItem[]> {
    const trimmed = query.trim();
    if (!trimmed) {
      return [];
    }
    const items = await this.remote.searchTracks(trimmed);
    return this.annotateLiked(items);
  }

  async likedTracks(page: PageRequest = {}): Promise<Page<LibraryItem>> {
    return this.remote.getLikedTracks(page);
  }

  async playlists(page: PageRequest = {}): Promise<Page<PlaylistSummary>> {
    return this.remote.getPlaylists(page);
  }

  async playlistTracks(
    playlistId: string,
    page: PageRequest = {},
  ): Promise<Page<LibraryItem>> {
    const result = await this.remote.getPlaylistTracks(playlistId, page);
    return { ...result, items: await this.annotateLiked(result.items) };
  }

  /**
   * Flips the liked flag of one track and returns the updated item.
   */
  async toggleLike(item: LibraryItem): Promise<LibraryItem> {
    if (item.liked) {
      await this.remote.removeTracks([item.id]);
    } else {
      await this.remote.saveTracks([item.id]);
    }
    return { ...item, liked: !item.liked };
  }

  /**
   * Like toggling for a track known only by id, such as the one playing.
   * Returns the new liked state.
   */
  async toggleLikeTrack(trackId: string): Promise<boolean> {
    const [liked = false] = await this.remote.checkSavedTracks([trackId]);
    if (liked) {
      await this.remote.removeTracks([trackId]);
    } else {
      await this.remote.saveTracks([trackId]);
    }
    return !liked;
  }

  async devices(): Promise<Device[]> {
    return this.remote.getDevices();
  }

  private async annotateLiked(items: LibraryItem[]): Promise<LibraryItem[]> {
    if (items.length === 0) {
      return items;
    }
    const ids = items.map((item) => item.id);
    const flags: boolean[] = [];
    for (let i = 0; i < ids.length; i += CHECK_SAVED_BATCH) {
      flags.push(...(await this.remote.checkSavedTracks(ids.slice(i, i + CHECK_SAVED_BATCH))));
    }
    return items.map((item, index) => ({ ...item, liked: flags[index] ?? false }));
  }
}
