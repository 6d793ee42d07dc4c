/**
 * Spotify Web API response shapes, trimmed to the fields the service reads.
 */

export interface SpotifyArtistRef {
  id: string | null
  name: string
  uri: string
}

export interface SpotifyAlbum {
  id: string | null
  name: string
  release_date: string
  uri: string
}

export interface SpotifyTrack {
  id: string | null
  name: string
  uri: string
  duration_ms: number
  popularity: number
  explicit: boolean
  is_local?: boolean
  type?: 'track' | 'episode'
  album: SpotifyAlbum
  artists: SpotifyArtistRef[]
}

export interface SpotifyPlaylistItem {
  added_at: string | null
  track: SpotifyTrack | null
}

export interface SpotifyPaging<T> {
  href?: string
  items: T[]
  limit: number
  offset: number
  total: number
  next: string | null
  previous?: string | null
}

export interface SpotifyArtist {
  id: string
  name: string
  genres: string[]
  popularity: number
  uri: string
}

export interface SpotifySeveralArtistsResponse {
  artists: Array<SpotifyArtist | null>
}

export interface SpotifyPlaylist {
  id: string
  name: string
  description: string | null
  public: boolean | null
  uri: string
  snapshot_id: string
}

export interface SpotifySnapshotResponse {
  snapshot_id: string
}

export interface SpotifyErrorResponse {
  error: {
    status: number
    message: string
  }
}

export function isSpotifyErrorResponse(
  value: unknown,
): value is SpotifyErrorResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    typeof value.error === 'object' &&
    value.error !== null &&
    'message' in value.error &&
    typeof value.error.message === 'string'
  )
}

/**
 * Credentials used to act on behalf of one user
 */
export interface SpotifyCredentials {
  accessToken: string
  spotifyUserId: string
}
