export interface TrackAlbum {
  id: string
  name: string
  releaseDate: string
  uri: string
}

/**
 * A track from the base playlist, with fields derived from its album and
 * artists at aggregation time.
 */
export interface Track {
  id: string
  name: string
  uri: string
  durationMs: number
  popularity: number
  explicit: boolean
  album: TrackAlbum
  /** Artist ids in credit order */
  artists: string[]
  releaseYear: number
  /** Lower-cased union of the artists' genres */
  genres: string[]
  artistNames: string[]
  maxArtistPopularity: number
}

export interface ArtistInfo {
  id: string
  name: string
  genres: string[]
  popularity: number
  uri: string
}

export interface PlaylistTrackSet {
  playlistId: number
  remotePlaylistId: string
  tracks: Track[]
  artists: Map<string, ArtistInfo>
  apiCallCount: number
}

export interface BasePlaylist {
  id: number
  userId: number
  name: string
  spotifyPlaylistId: string
  isActive: boolean
  createdAt: string
  updatedAt: string
}

export interface ChildPlaylist {
  id: number
  userId: number
  basePlaylistId: number
  name: string
  description: string
  spotifyPlaylistId: string
  /**
   * Decoded rule set as stored, or null when the child takes every track.
   * Validated when read for routing.
   */
  filterRules: unknown
  isActive: boolean
  createdAt: string
  updatedAt: string
}

export type BasePlaylistCreate = Pick<
  BasePlaylist,
  'userId' | 'name' | 'spotifyPlaylistId'
> & { isActive?: boolean }

export type ChildPlaylistCreate = Pick<
  ChildPlaylist,
  'userId' | 'basePlaylistId' | 'name' | 'description' | 'spotifyPlaylistId'
> & { filterRules?: unknown; isActive?: boolean }

export type ChildPlaylistUpdate = Partial<
  Pick<ChildPlaylist, 'name' | 'description' | 'filterRules' | 'isActive'>
>
