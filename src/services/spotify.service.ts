/**
 * Spotify Service
 *
 * Thin typed client over the Spotify Web API covering the playlist and artist
 * endpoints the sync engine needs. Every call is made on behalf of one user,
 * whose stored access token and Spotify user id are looked up per request.
 *
 * Non-2xx responses are raised as {@link SpotifyApiError}. Nothing is retried;
 * callers decide how a failure ends their work.
 *
 * @example
 * const client = fastify.spotify.forUser(userId)
 * const page = await client.listPlaylistTracks('37i9dQZF1DX0XUsuxWHRQd', 50, 0)
 */
import type {
  SpotifyArtist,
  SpotifyCredentials,
  SpotifyPaging,
  SpotifyPlaylist,
  SpotifyPlaylistItem,
  SpotifySeveralArtistsResponse,
  SpotifySnapshotResponse,
} from '@root/types/spotify.types.js'
import { isSpotifyErrorResponse } from '@root/types/spotify.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export const MAX_TRACKS_PER_ADD = 100
export const MAX_ARTISTS_PER_LOOKUP = 50

export class SpotifyApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body: unknown,
  ) {
    super(message)
    this.name = 'SpotifyApiError'
  }
}

/**
 * The user has no stored Spotify credentials
 */
export class SpotifyCredentialsError extends Error {
  constructor(readonly userId: number) {
    super(`No Spotify integration configured for user ${userId}`)
    this.name = 'SpotifyCredentialsError'
  }
}

export interface PlaylistDetails {
  name?: string
  description?: string
  public?: boolean
}

/**
 * Remote playlist operations bound to a single user.
 */
export interface SpotifyPlaylistClient {
  listPlaylistTracks(
    playlistId: string,
    limit: number,
    offset: number,
    signal?: AbortSignal,
  ): Promise<SpotifyPaging<SpotifyPlaylistItem>>
  getSeveralArtists(
    artistIds: string[],
    signal?: AbortSignal,
  ): Promise<SpotifyArtist[]>
  createPlaylist(
    details: Required<PlaylistDetails>,
    signal?: AbortSignal,
  ): Promise<SpotifyPlaylist>
  deletePlaylist(playlistId: string, signal?: AbortSignal): Promise<void>
  updatePlaylistDetails(
    playlistId: string,
    details: PlaylistDetails,
    signal?: AbortSignal,
  ): Promise<void>
  addTracksToPlaylist(
    playlistId: string,
    uris: string[],
    signal?: AbortSignal,
  ): Promise<string>
}

export interface SpotifyClientConfig {
  apiBaseUrl: string
  requestTimeout: number
}

export type SpotifyCredentialsResolver = (
  userId: number,
) => Promise<SpotifyCredentials>

interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE'
  query?: Record<string, string | number>
  body?: unknown
  signal?: AbortSignal
}

function parseBody(text: string): unknown {
  if (!text) return null
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

export class SpotifyService {
  /** Creates a fresh service logger that inherits current log level */
  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'SPOTIFY')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly config: SpotifyClientConfig,
    private readonly resolveCredentials: SpotifyCredentialsResolver,
  ) {}

  /**
   * Returns the playlist operations bound to one user's credentials
   */
  forUser(userId: number): SpotifyPlaylistClient {
    return {
      listPlaylistTracks: (playlistId, limit, offset, signal) =>
        this.listPlaylistTracks(userId, playlistId, limit, offset, signal),
      getSeveralArtists: (artistIds, signal) =>
        this.getSeveralArtists(userId, artistIds, signal),
      createPlaylist: (details, signal) =>
        this.createPlaylist(userId, details, signal),
      deletePlaylist: (playlistId, signal) =>
        this.deletePlaylist(userId, playlistId, signal),
      updatePlaylistDetails: (playlistId, details, signal) =>
        this.updatePlaylistDetails(userId, playlistId, details, signal),
      addTracksToPlaylist: (playlistId, uris, signal) =>
        this.addTracksToPlaylist(userId, playlistId, uris, signal),
    }
  }

  /**
   * Fetches one page of the playlists in the user's library, owned or followed
   */
  async listUserPlaylists(
    userId: number,
    limit: number,
    offset: number,
    signal?: AbortSignal,
  ): Promise<SpotifyPaging<SpotifyPlaylist>> {
    const response = await this.send(userId, '/me/playlists', {
      query: { limit, offset },
      signal,
    })
    return (await response.json()) as SpotifyPaging<SpotifyPlaylist>
  }

  /**
   * Fetches one page of a playlist's items
   */
  async listPlaylistTracks(
    userId: number,
    playlistId: string,
    limit: number,
    offset: number,
    signal?: AbortSignal,
  ): Promise<SpotifyPaging<SpotifyPlaylistItem>> {
    const response = await this.send(
      userId,
      `/playlists/${encodeURIComponent(playlistId)}/tracks`,
      { query: { limit, offset }, signal },
    )
    return (await response.json()) as SpotifyPaging<SpotifyPlaylistItem>
  }

  /**
   * Looks up to 50 artists in one call. Unknown ids are dropped from the result.
   */
  async getSeveralArtists(
    userId: number,
    artistIds: string[],
    signal?: AbortSignal,
  ): Promise<SpotifyArtist[]> {
    if (artistIds.length === 0) {
      return []
    }
    if (artistIds.length > MAX_ARTISTS_PER_LOOKUP) {
      throw new RangeError(
        `Cannot look up more than ${MAX_ARTISTS_PER_LOOKUP} artists per request (got ${artistIds.length})`,
      )
    }

    const response = await this.send(userId, '/artists', {
      query: { ids: artistIds.join(',') },
      signal,
    })
    const data = (await response.json()) as SpotifySeveralArtistsResponse
    return data.artists.filter(
      (artist): artist is SpotifyArtist => artist !== null,
    )
  }

  async createPlaylist(
    userId: number,
    details: Required<PlaylistDetails>,
    signal?: AbortSignal,
  ): Promise<SpotifyPlaylist> {
    const { spotifyUserId } = await this.resolveCredentials(userId)
    const response = await this.send(
      userId,
      `/users/${encodeURIComponent(spotifyUserId)}/playlists`,
      {
        method: 'POST',
        body: {
          name: details.name,
          description: details.description,
          public: details.public,
        },
        signal,
      },
    )
    const playlist = (await response.json()) as SpotifyPlaylist
    this.log.debug(
      { playlistId: playlist.id, userId },
      `Created playlist "${details.name}"`,
    )
    return playlist
  }

  /**
   * Removes a playlist from the user's library.
   *
   * Spotify has no hard delete; unfollowing the owner's playlist is how it is
   * deleted from the user's point of view.
   */
  async deletePlaylist(
    userId: number,
    playlistId: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.send(
      userId,
      `/playlists/${encodeURIComponent(playlistId)}/followers`,
      { method: 'DELETE', signal },
    )
    this.log.debug({ playlistId, userId }, 'Unfollowed playlist')
  }

  async updatePlaylistDetails(
    userId: number,
    playlistId: string,
    details: PlaylistDetails,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.send(userId, `/playlists/${encodeURIComponent(playlistId)}`, {
      method: 'PUT',
      body: details,
      signal,
    })
  }

  /**
   * Appends up to 100 track URIs to a playlist
   *
   * @returns The playlist snapshot id after the change
   */
  async addTracksToPlaylist(
    userId: number,
    playlistId: string,
    uris: string[],
    signal?: AbortSignal,
  ): Promise<string> {
    if (uris.length === 0 || uris.length > MAX_TRACKS_PER_ADD) {
      throw new RangeError(
        `Expected between 1 and ${MAX_TRACKS_PER_ADD} track URIs per request (got ${uris.length})`,
      )
    }

    const response = await this.send(
      userId,
      `/playlists/${encodeURIComponent(playlistId)}/tracks`,
      { method: 'POST', body: { uris }, signal },
    )
    const data = (await response.json()) as SpotifySnapshotResponse
    return data.snapshot_id
  }

  private async send(
    userId: number,
    path: string,
    options: RequestOptions = {},
  ): Promise<Response> {
    const { accessToken } = await this.resolveCredentials(userId)
    const method = options.method ?? 'GET'

    const url = new URL(`${this.config.apiBaseUrl}${path}`)
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.append(key, String(value))
    }

    const timeout = AbortSignal.timeout(this.config.requestTimeout)
    const signal = options.signal
      ? AbortSignal.any([options.signal, timeout])
      : timeout

    const headers: Record<string, string> = {
      Authorization: `Bearer ${accessToken}`,
      Accept: 'application/json',
    }
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    this.log.trace({ method, path }, 'Spotify request')

    const response = await fetch(url.toString(), {
      method,
      headers,
      body:
        options.body === undefined ? undefined : JSON.stringify(options.body),
      signal,
    })

    if (!response.ok) {
      const body = parseBody(await response.text())
      const detail = isSpotifyErrorResponse(body)
        ? body.error.message
        : response.statusText
      throw new SpotifyApiError(
        `Spotify API error ${response.status} on ${method} ${path}: ${detail}`,
        response.status,
        body,
      )
    }

    return response
  }
}
