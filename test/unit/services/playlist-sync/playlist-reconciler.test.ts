import { ReconciliationError } from '@root/types/errors.js'
import type { DatabaseService } from '@services/database.service.js'
import {
  chunkUris,
  reconcileChildPlaylist,
} from '@services/playlist-sync/reconciliation/index.js'
import { SyncCounters } from '@services/playlist-sync/utils/index.js'
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'
import {
  createChildPlaylist,
  createMockSpotifyClient,
} from '../../../mocks/spotify.js'

const uris = (count: number) =>
  Array.from({ length: count }, (_, i) => `spotify:track:t${i}`)

describe('playlist-reconciler', () => {
  let db: {
    updateChildPlaylistSpotifyId: Mock<
      DatabaseService['updateChildPlaylistSpotifyId']
    >
  }
  let spotify: ReturnType<typeof createMockSpotifyClient>
  let counters: SyncCounters

  const deps = (signal?: AbortSignal) => ({
    db,
    spotify,
    logger: createMockLogger(),
    counters,
    signal,
  })

  const reconcileError = async (promise: Promise<unknown>) => {
    const error = await promise.catch((err: unknown) => err)
    expect(error).toBeInstanceOf(ReconciliationError)
    if (!(error instanceof ReconciliationError)) {
      throw new Error('expected a ReconciliationError')
    }
    return error
  }

  beforeEach(() => {
    db = {
      updateChildPlaylistSpotifyId: vi
        .fn<DatabaseService['updateChildPlaylistSpotifyId']>()
        .mockResolvedValue(true),
    }
    spotify = createMockSpotifyClient()
    counters = new SyncCounters()
  })

  describe('chunkUris', () => {
    it('should split into batches of at most the given size', () => {
      expect(chunkUris(uris(5), 2).map((batch) => batch.length)).toEqual([2, 2, 1])
      expect(chunkUris([], 100)).toEqual([])
    })
  })

  describe('reconcileChildPlaylist', () => {
    it('should delete, recreate, persist, then add tracks in batches of 100', async () => {
      const child = createChildPlaylist(1)

      const newId = await reconcileChildPlaylist(deps(), child, 'Road Trip', uris(150))

      expect(newId).toBe('new-1')
      expect(spotify.deletePlaylist).toHaveBeenCalledWith('child-remote-1', undefined)
      expect(spotify.createPlaylist).toHaveBeenCalledWith(
        {
          name: '[Road Trip] > Child 1',
          description: '[PLAYLIST GENERATED AND MANAGED BY PlaylistRouter] ',
          public: false,
        },
        undefined,
      )
      expect(db.updateChildPlaylistSpotifyId).toHaveBeenCalledWith(1, 1, 'new-1')
      expect(
        spotify.addTracksToPlaylist.mock.calls.map(([id, batch]) => [id, batch.length]),
      ).toEqual([
        ['new-1', 100],
        ['new-1', 50],
      ])
      expect(spotify.addTracksToPlaylist.mock.calls[1][1][0]).toBe('spotify:track:t100')

      const deleteOrder = spotify.deletePlaylist.mock.invocationCallOrder[0]
      const createOrder = spotify.createPlaylist.mock.invocationCallOrder[0]
      const persistOrder = db.updateChildPlaylistSpotifyId.mock.invocationCallOrder[0]
      const addOrder = spotify.addTracksToPlaylist.mock.invocationCallOrder[0]
      expect(deleteOrder).toBeLessThan(createOrder)
      expect(createOrder).toBeLessThan(persistOrder)
      expect(persistOrder).toBeLessThan(addOrder)

      expect(counters.apiCalls).toBe(4)
      expect(counters.childrenReconciled).toBe(1)
      expect(counters.tracksAdded).toBe(150)
    })

    it('should use the child description after the managed prefix', async () => {
      await reconcileChildPlaylist(
        deps(),
        createChildPlaylist(1, { description: 'Only the slow ones' }),
        'Road Trip',
        uris(1),
      )

      expect(spotify.createPlaylist.mock.calls[0][0].description).toBe(
        '[PLAYLIST GENERATED AND MANAGED BY PlaylistRouter] Only the slow ones',
      )
    })

    it('should stop at a failed delete without creating anything', async () => {
      spotify.deletePlaylist.mockRejectedValueOnce(new Error('gone'))

      const error = await reconcileError(
        reconcileChildPlaylist(deps(), createChildPlaylist(1), 'Road Trip', uris(3)),
      )

      expect(error.step).toBe('delete')
      expect(error.childPlaylistId).toBe(1)
      expect(error.message).toBe('Failed to delete playlist for child 1 ("Child 1"): gone')
      expect(spotify.createPlaylist).not.toHaveBeenCalled()
      expect(counters.apiCalls).toBe(1)
    })

    it('should fail the persist step when the child record is gone', async () => {
      db.updateChildPlaylistSpotifyId.mockResolvedValueOnce(false)

      const error = await reconcileError(
        reconcileChildPlaylist(deps(), createChildPlaylist(2), 'Road Trip', uris(3)),
      )

      expect(error.step).toBe('persist')
      expect(error.message).toBe(
        'Failed to persist playlist for child 2 ("Child 2"): child playlist record no longer exists',
      )
      expect(spotify.addTracksToPlaylist).not.toHaveBeenCalled()
      expect(counters.apiCalls).toBe(2)
    })

    it('should count the failed add batch', async () => {
      spotify.addTracksToPlaylist
        .mockResolvedValueOnce('snapshot-1')
        .mockRejectedValueOnce(new Error('rate limited'))

      const error = await reconcileError(
        reconcileChildPlaylist(deps(), createChildPlaylist(1), 'Road Trip', uris(250)),
      )

      expect(error.step).toBe('add')
      expect(spotify.addTracksToPlaylist).toHaveBeenCalledTimes(2)
      expect(counters.apiCalls).toBe(4)
      expect(counters.childrenReconciled).toBe(0)
    })

    it('should make no call once the signal is aborted', async () => {
      const controller = new AbortController()
      controller.abort()

      const error = await reconcileError(
        reconcileChildPlaylist(
          deps(controller.signal),
          createChildPlaylist(1),
          'Road Trip',
          uris(3),
        ),
      )

      expect(error.step).toBe('delete')
      expect(spotify.deletePlaylist).not.toHaveBeenCalled()
      expect(counters.apiCalls).toBe(0)
    })
  })
})
