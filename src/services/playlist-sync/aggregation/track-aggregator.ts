import { AggregationError } from '@root/types/errors.js'
import type {
  ArtistInfo,
  BasePlaylist,
  PlaylistTrackSet,
} from '@root/types/playlist.types.js'
import type {
  SpotifyPaging,
  SpotifyPlaylistItem,
  SpotifyTrack,
} from '@root/types/spotify.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { errorMessage } from '@services/playlist-sync/utils/index.js'
import {
  MAX_ARTISTS_PER_LOOKUP,
  type SpotifyPlaylistClient,
} from '@services/spotify.service.js'
import type { FastifyBaseLogger } from 'fastify'
import { isRoutableTrack, toArtistInfo, toTrack } from './track-mapper.js'

export interface TrackAggregatorDeps {
  db: Pick<DatabaseService, 'getBasePlaylist'>
  spotify: Pick<SpotifyPlaylistClient, 'listPlaylistTracks' | 'getSeveralArtists'>
  logger: FastifyBaseLogger
  pageSize: number
  signal?: AbortSignal
}

/**
 * Retrieves every track of a base playlist with its artists' metadata.
 *
 * Pages are requested in order until the number of items received reaches the
 * total Spotify reports, or a page comes back empty. Artist lookups follow in
 * batches of 50. One remote call is counted per page and per artist batch.
 *
 * @throws AggregationError carrying the tracks fetched and calls made before
 * the failure
 */
export async function aggregatePlaylistTracks(
  deps: TrackAggregatorDeps,
  userId: number,
  basePlaylistId: number,
): Promise<PlaylistTrackSet> {
  const { db, spotify, logger, pageSize, signal } = deps

  let basePlaylist: BasePlaylist | undefined
  try {
    basePlaylist = await db.getBasePlaylist(userId, basePlaylistId)
  } catch (error) {
    throw new AggregationError(
      `Failed to load base playlist ${basePlaylistId}: ${errorMessage(error)}`,
      0,
      0,
      { cause: error },
    )
  }

  if (!basePlaylist) {
    throw new AggregationError(
      `Base playlist ${basePlaylistId} not found for user ${userId}`,
      0,
      0,
    )
  }

  const remotePlaylistId = basePlaylist.spotifyPlaylistId
  const rawTracks: Array<SpotifyTrack & { id: string }> = []
  let apiCallCount = 0
  let received = 0
  let skipped = 0

  while (true) {
    let page: SpotifyPaging<SpotifyPlaylistItem>
    try {
      signal?.throwIfAborted()
      apiCallCount++
      page = await spotify.listPlaylistTracks(
        remotePlaylistId,
        pageSize,
        received,
        signal,
      )
    } catch (error) {
      throw new AggregationError(
        `Failed to fetch tracks of playlist ${remotePlaylistId} at offset ${received}: ${errorMessage(error)}`,
        rawTracks.length,
        apiCallCount,
        { cause: error },
      )
    }

    for (const item of page.items) {
      if (isRoutableTrack(item.track)) {
        rawTracks.push(item.track)
      } else {
        skipped++
      }
    }

    received += page.items.length
    logger.debug(
      `Fetched ${received}/${page.total} items of playlist ${remotePlaylistId}`,
    )

    if (page.items.length === 0 || received >= page.total) {
      break
    }
  }

  if (skipped > 0) {
    logger.debug(
      `Skipped ${skipped} unavailable or local items in playlist ${remotePlaylistId}`,
    )
  }

  const artistIds: string[] = []
  const seenArtists = new Set<string>()
  for (const track of rawTracks) {
    for (const artist of track.artists) {
      if (artist.id !== null && !seenArtists.has(artist.id)) {
        seenArtists.add(artist.id)
        artistIds.push(artist.id)
      }
    }
  }

  const artists = new Map<string, ArtistInfo>()
  for (let i = 0; i < artistIds.length; i += MAX_ARTISTS_PER_LOOKUP) {
    const batch = artistIds.slice(i, i + MAX_ARTISTS_PER_LOOKUP)
    try {
      signal?.throwIfAborted()
      apiCallCount++
      const found = await spotify.getSeveralArtists(batch, signal)
      for (const artist of found) {
        artists.set(artist.id, toArtistInfo(artist))
      }
    } catch (error) {
      throw new AggregationError(
        `Failed to fetch artists for playlist ${remotePlaylistId}: ${errorMessage(error)}`,
        rawTracks.length,
        apiCallCount,
        { cause: error },
      )
    }
  }

  logger.info(
    `Aggregated ${rawTracks.length} tracks and ${artists.size} artists from playlist ${remotePlaylistId} in ${apiCallCount} API calls`,
  )

  return {
    playlistId: basePlaylist.id,
    remotePlaylistId,
    tracks: rawTracks.map((track) => toTrack(track, artists)),
    artists,
    apiCallCount,
  }
}
