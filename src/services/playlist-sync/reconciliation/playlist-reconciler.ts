import {
  ReconciliationError,
  type ReconciliationStep,
} from '@root/types/errors.js'
import type { ChildPlaylist } from '@root/types/playlist.types.js'
import type { DatabaseService } from '@services/database.service.js'
import {
  MAX_TRACKS_PER_ADD,
  type SpotifyPlaylistClient,
} from '@services/spotify.service.js'
import {
  buildChildPlaylistDescription,
  buildChildPlaylistName,
  errorMessage,
  type SyncCounters,
} from '@services/playlist-sync/utils/index.js'
import type { FastifyBaseLogger } from 'fastify'

export interface PlaylistReconcilerDeps {
  db: Pick<DatabaseService, 'updateChildPlaylistSpotifyId'>
  spotify: Pick<
    SpotifyPlaylistClient,
    'deletePlaylist' | 'createPlaylist' | 'addTracksToPlaylist'
  >
  logger: FastifyBaseLogger
  counters: SyncCounters
  signal?: AbortSignal
}

/**
 * Splits URIs into consecutive batches of at most `size`
 */
export function chunkUris(uris: readonly string[], size: number): string[][] {
  const batches: string[][] = []
  for (let i = 0; i < uris.length; i += size) {
    batches.push(uris.slice(i, i + size))
  }
  return batches
}

/**
 * Rebuilds one child's remote playlist so it holds exactly `uris`.
 *
 * Steps, in order: delete the current remote playlist, create a new private
 * one named after the base playlist, point the child record at it, then add
 * the URIs in batches of 100. Each remote call is counted on `counters` when
 * it is issued, so a failed step is still counted.
 *
 * @returns The new remote playlist id
 * @throws ReconciliationError naming the child and the failed step
 */
export async function reconcileChildPlaylist(
  deps: PlaylistReconcilerDeps,
  child: ChildPlaylist,
  basePlaylistName: string,
  uris: readonly string[],
): Promise<string> {
  const { db, spotify, logger, counters, signal } = deps

  const runStep = async <T>(
    step: ReconciliationStep,
    remote: boolean,
    action: () => Promise<T>,
  ): Promise<T> => {
    try {
      signal?.throwIfAborted()
      if (remote) counters.addApiCalls()
      return await action()
    } catch (error) {
      throw new ReconciliationError(
        `Failed to ${step} playlist for child ${child.id} ("${child.name}"): ${errorMessage(error)}`,
        child.id,
        step,
        { cause: error },
      )
    }
  }

  await runStep('delete', true, () =>
    spotify.deletePlaylist(child.spotifyPlaylistId, signal),
  )

  const created = await runStep('create', true, () =>
    spotify.createPlaylist(
      {
        name: buildChildPlaylistName(basePlaylistName, child.name),
        description: buildChildPlaylistDescription(child.description),
        public: false,
      },
      signal,
    ),
  )

  await runStep('persist', false, async () => {
    const updated = await db.updateChildPlaylistSpotifyId(
      child.userId,
      child.id,
      created.id,
    )
    if (!updated) {
      throw new Error('child playlist record no longer exists')
    }
  })

  for (const batch of chunkUris(uris, MAX_TRACKS_PER_ADD)) {
    await runStep('add', true, () =>
      spotify.addTracksToPlaylist(created.id, batch, signal),
    )
  }

  counters.recordChildReconciled(uris.length)
  logger.debug(
    `Rebuilt playlist for child ${child.id} as ${created.id} with ${uris.length} tracks`,
  )

  return created.id
}
