import {
  AggregationError,
  SyncCancelledError,
  SyncConflictError,
  SyncError,
  SyncPersistenceError,
} from '@root/types/errors.js'
import type { TrackEvaluator } from '@root/types/router.types.js'
import type { SyncEvent } from '@root/types/sync-event.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { aggregatePlaylistTracks } from '@services/playlist-sync/aggregation/index.js'
import { reconcileChildPlaylist } from '@services/playlist-sync/reconciliation/index.js'
import { routeTracks } from '@services/playlist-sync/routing/index.js'
import {
  errorMessage,
  SyncCounters,
} from '@services/playlist-sync/utils/index.js'
import type { SpotifyPlaylistClient } from '@services/spotify.service.js'
import type { FastifyBaseLogger } from 'fastify'

export interface SyncOrchestratorDeps {
  db: Pick<
    DatabaseService,
    | 'hasInProgressSync'
    | 'createSyncEvent'
    | 'updateSyncEvent'
    | 'getActiveChildPlaylists'
    | 'getBasePlaylist'
    | 'updateChildPlaylistSpotifyId'
  >
  spotify: SpotifyPlaylistClient
  logger: FastifyBaseLogger
  config: {
    trackPageSize: number
  }
  evaluators?: readonly TrackEvaluator[]
  signal?: AbortSignal
}

/**
 * Maps whatever ended the sync onto a sync error kind. Once the signal has
 * fired every failure counts as a cancellation.
 */
function toSyncError(error: unknown, signal?: AbortSignal): SyncError {
  if (signal?.aborted) {
    return new SyncCancelledError(
      `Sync cancelled: ${errorMessage(signal.reason)}`,
      { cause: error },
    )
  }
  if (error instanceof SyncError) {
    return error
  }
  return new SyncPersistenceError(`Sync failed: ${errorMessage(error)}`, {
    cause: error,
  })
}

/**
 * Runs one sync of a base playlist and returns its completed event.
 *
 * The sync is a single sequential pipeline: guard against a concurrent run,
 * open the event, load the active children, aggregate the base playlist once,
 * route once, then rebuild each routed child in routing order. Remote calls
 * and processed tracks are accumulated on the event, including on failure.
 *
 * @throws SyncConflictError when a sync of the base playlist is in progress;
 * no event is created
 * @throws The failure's SyncError after the event has been marked failed
 * @throws SyncPersistenceError when the completed event cannot be written
 */
export async function syncBasePlaylist(
  deps: SyncOrchestratorDeps,
  userId: number,
  basePlaylistId: number,
): Promise<SyncEvent> {
  const { db, spotify, logger, config, signal } = deps

  if (await db.hasInProgressSync(userId, basePlaylistId)) {
    throw new SyncConflictError(basePlaylistId)
  }

  let event: SyncEvent
  try {
    event = await db.createSyncEvent({
      userId,
      basePlaylistId,
      status: 'in_progress',
      startedAt: new Date().toISOString(),
    })
  } catch (error) {
    if (error instanceof SyncConflictError) {
      throw error
    }
    throw new SyncPersistenceError(
      `Failed to create sync event for base playlist ${basePlaylistId}: ${errorMessage(error)}`,
      { cause: error },
    )
  }

  logger.info(
    `Started sync ${event.id} of base playlist ${basePlaylistId} for user ${userId}`,
  )

  const counters = new SyncCounters()

  try {
    const children = await db.getActiveChildPlaylists(userId, basePlaylistId)
    await db.updateSyncEvent(event.id, {
      childPlaylistIds: children.map((child) => child.id),
    })

    if (children.length === 0) {
      logger.info(
        `Base playlist ${basePlaylistId} has no active child playlists, nothing to sync`,
      )
    } else {
      const trackSet = await aggregatePlaylistTracks(
        {
          db,
          spotify,
          logger,
          pageSize: config.trackPageSize,
          signal,
        },
        userId,
        basePlaylistId,
      )
      counters.addApiCalls(trackSet.apiCallCount)
      counters.addTracksProcessed(trackSet.tracks.length)

      const routes = routeTracks(trackSet, children, deps.evaluators)

      const basePlaylist = await db.getBasePlaylist(userId, basePlaylistId)
      if (!basePlaylist) {
        throw new AggregationError(
          `Base playlist ${basePlaylistId} no longer exists`,
          0,
          0,
        )
      }

      const childrenByRemoteId = new Map(
        children.map((child) => [child.spotifyPlaylistId, child]),
      )

      for (const [remotePlaylistId, uris] of routes) {
        const child = childrenByRemoteId.get(remotePlaylistId)
        if (!child) {
          logger.warn(
            `No child playlist matches routed playlist ${remotePlaylistId}, skipping`,
          )
          continue
        }

        await reconcileChildPlaylist(
          { db, spotify, logger, counters, signal },
          child,
          basePlaylist.name,
          uris,
        )
      }
    }
  } catch (error) {
    if (error instanceof AggregationError) {
      counters.addApiCalls(error.apiCallCount)
      counters.addTracksProcessed(error.tracksFetched)
    }

    const syncError = toSyncError(error, signal)
    logger.error(
      { error: syncError, eventId: event.id },
      `Sync ${event.id} of base playlist ${basePlaylistId} failed (${syncError.kind})`,
    )

    try {
      await db.updateSyncEvent(event.id, {
        status: 'failed',
        completedAt: new Date().toISOString(),
        errorMessage: syncError.message,
        errorKind: syncError.kind,
        ...counters.toEventUpdate(),
      })
    } catch (persistError) {
      logger.error(
        { error: persistError, eventId: event.id },
        `Failed to record failure of sync ${event.id}`,
      )
    }

    throw syncError
  }

  try {
    const completed = await db.updateSyncEvent(event.id, {
      status: 'completed',
      completedAt: new Date().toISOString(),
      ...counters.toEventUpdate(),
    })

    logger.info(
      `Sync ${event.id} completed: ${counters.tracksProcessed} tracks processed, ${counters.childrenReconciled} child playlists rebuilt with ${counters.tracksAdded} tracks, ${counters.apiCalls} API calls`,
    )
    return completed
  } catch (error) {
    throw new SyncPersistenceError(
      `Failed to record completion of sync ${event.id}: ${errorMessage(error)}`,
      { cause: error },
    )
  }
}
