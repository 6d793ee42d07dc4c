import type {
  BasePlaylist,
  BasePlaylistCreate,
  ChildPlaylist,
  ChildPlaylistCreate,
  ChildPlaylistUpdate,
} from '@root/types/playlist.types.js'

declare module '../../database.service.js' {
  interface DatabaseService {
    // BASE PLAYLISTS
    /**
     * Registers a base playlist for a user
     * @param data - Owner, name and remote playlist id
     * @returns Promise resolving to the created base playlist
     */
    createBasePlaylist(data: BasePlaylistCreate): Promise<BasePlaylist>

    /**
     * Retrieves a base playlist owned by the user
     * @returns Promise resolving to the base playlist if found
     */
    getBasePlaylist(
      userId: number,
      basePlaylistId: number,
    ): Promise<BasePlaylist | undefined>

    /**
     * Lists a user's base playlists in creation order
     */
    getBasePlaylists(userId: number): Promise<BasePlaylist[]>

    /**
     * Deletes a base playlist with its children and sync history
     * @returns Promise resolving to true if a row was deleted
     */
    deleteBasePlaylist(userId: number, basePlaylistId: number): Promise<boolean>

    // CHILD PLAYLISTS
    /**
     * Creates a child playlist record
     * @param data - Child fields including its remote playlist id
     * @returns Promise resolving to the created child
     */
    createChildPlaylist(data: ChildPlaylistCreate): Promise<ChildPlaylist>

    getChildPlaylist(
      userId: number,
      childPlaylistId: number,
    ): Promise<ChildPlaylist | undefined>

    /**
     * Lists every child of a base playlist in creation order
     */
    getChildPlaylists(
      userId: number,
      basePlaylistId: number,
    ): Promise<ChildPlaylist[]>

    /**
     * Lists the active children of a base playlist in creation order
     */
    getActiveChildPlaylists(
      userId: number,
      basePlaylistId: number,
    ): Promise<ChildPlaylist[]>

    /**
     * Applies a partial update to a child playlist
     * @returns Promise resolving to the updated child, undefined if not found
     */
    updateChildPlaylist(
      userId: number,
      childPlaylistId: number,
      update: ChildPlaylistUpdate,
    ): Promise<ChildPlaylist | undefined>

    /**
     * Points a child playlist at a new remote playlist
     * @returns Promise resolving to true if the child was updated
     */
    updateChildPlaylistSpotifyId(
      userId: number,
      childPlaylistId: number,
      spotifyPlaylistId: string,
    ): Promise<boolean>

    deleteChildPlaylist(
      userId: number,
      childPlaylistId: number,
    ): Promise<boolean>
  }
}
