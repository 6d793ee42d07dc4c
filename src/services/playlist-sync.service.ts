/**
 * Playlist Sync Service
 *
 * Binds the sync orchestrator to the database, the Spotify client and the
 * configured limits. Exposed as `fastify.playlistSync`.
 *
 * Each sync runs under its own timeout signal (`syncTimeoutMs`); when it fires,
 * the in-flight Spotify call is aborted and the sync ends as cancelled.
 *
 * @example
 * const event = await fastify.playlistSync.syncBasePlaylist(userId, basePlaylistId)
 */
import type { SyncEvent } from '@root/types/sync-event.types.js'
import type { TrackEvaluator } from '@root/types/router.types.js'
import { syncBasePlaylist } from '@services/playlist-sync/orchestration/index.js'
import {
  createTrackEvaluators,
  describeFilterAttributes,
  type FilterAttributeDescription,
} from '@services/playlist-sync/routing/index.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'

export class PlaylistSyncService {
  private readonly evaluators: readonly TrackEvaluator[] =
    createTrackEvaluators()

  /** Creates a fresh service logger that inherits current log level */
  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'PLAYLIST_SYNC')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {}

  private get config() {
    return this.fastify.config
  }

  /**
   * Syncs every active child of a base playlist
   *
   * @returns The completed sync event
   * @throws SyncConflictError when a sync of the base playlist is running
   * @throws SyncError subclasses when the sync fails; the event is marked failed
   */
  async syncBasePlaylist(
    userId: number,
    basePlaylistId: number,
  ): Promise<SyncEvent> {
    return syncBasePlaylist(
      {
        db: this.fastify.db,
        spotify: this.fastify.spotify.forUser(userId),
        logger: this.log,
        config: { trackPageSize: this.config.trackPageSize },
        evaluators: this.evaluators,
        signal: AbortSignal.timeout(this.config.syncTimeoutMs),
      },
      userId,
      basePlaylistId,
    )
  }

  /**
   * Filter attributes the router understands, with their predicate kind
   */
  getFilterAttributes(): FilterAttributeDescription[] {
    return describeFilterAttributes(this.evaluators)
  }
}
