import { AggregationError } from '@root/types/errors.js'
import type { DatabaseService } from '@services/database.service.js'
import { aggregatePlaylistTracks } from '@services/playlist-sync/aggregation/index.js'
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'
import {
  createBasePlaylist,
  createMockSpotifyClient,
  createPage,
  createPlaylistItem,
  createSpotifyArtist,
  createSpotifyTrack,
} from '../../../mocks/spotify.js'

describe('track-aggregator', () => {
  let db: { getBasePlaylist: Mock<DatabaseService['getBasePlaylist']> }
  let spotify: ReturnType<typeof createMockSpotifyClient>

  const deps = (pageSize = 2) => ({
    db,
    spotify,
    logger: createMockLogger(),
    pageSize,
  })

  beforeEach(() => {
    db = {
      getBasePlaylist: vi
        .fn<DatabaseService['getBasePlaylist']>()
        .mockResolvedValue(createBasePlaylist()),
    }
    spotify = createMockSpotifyClient()
  })

  it('should page through the playlist and look up each artist once', async () => {
    spotify.listPlaylistTracks
      .mockResolvedValueOnce(
        createPage(
          [
            createPlaylistItem(createSpotifyTrack('t1', {}, ['a1', 'a2'])),
            createPlaylistItem(createSpotifyTrack('t2', {}, ['a2'])),
          ],
          5,
          0,
          2,
        ),
      )
      .mockResolvedValueOnce(
        createPage(
          [
            createPlaylistItem(createSpotifyTrack('t3', {}, ['a3'])),
            createPlaylistItem(createSpotifyTrack('t4', {}, ['a1'])),
          ],
          5,
          2,
          2,
        ),
      )
      .mockResolvedValueOnce(
        createPage([createPlaylistItem(createSpotifyTrack('t5', {}, ['a4']))], 5, 4, 2),
      )
    spotify.getSeveralArtists.mockResolvedValue([
      createSpotifyArtist('a1'),
      createSpotifyArtist('a2'),
      createSpotifyArtist('a3'),
      createSpotifyArtist('a4'),
    ])

    const result = await aggregatePlaylistTracks(deps(), 1, 1)

    expect(spotify.listPlaylistTracks.mock.calls.map((call) => call.slice(0, 3))).toEqual([
      ['base-remote', 2, 0],
      ['base-remote', 2, 2],
      ['base-remote', 2, 4],
    ])
    expect(spotify.getSeveralArtists).toHaveBeenCalledTimes(1)
    expect(spotify.getSeveralArtists.mock.calls[0][0]).toEqual(['a1', 'a2', 'a3', 'a4'])
    expect(result.tracks.map((track) => track.id)).toEqual(['t1', 't2', 't3', 't4', 't5'])
    expect(result.artists.size).toBe(4)
    expect(result.apiCallCount).toBe(4)
    expect(result.playlistId).toBe(1)
    expect(result.remotePlaylistId).toBe('base-remote')
  })

  it('should skip removed, local and episode items but count them as received', async () => {
    spotify.listPlaylistTracks.mockResolvedValueOnce(
      createPage(
        [
          createPlaylistItem(createSpotifyTrack('t1')),
          createPlaylistItem(null),
          createPlaylistItem(createSpotifyTrack('t2', { is_local: true })),
          createPlaylistItem(createSpotifyTrack('t3', { type: 'episode' })),
          createPlaylistItem(createSpotifyTrack('t4', { id: null })),
        ],
        5,
        0,
        50,
      ),
    )

    const result = await aggregatePlaylistTracks(deps(50), 1, 1)

    expect(spotify.listPlaylistTracks).toHaveBeenCalledTimes(1)
    expect(result.tracks.map((track) => track.id)).toEqual(['t1'])
    expect(result.apiCallCount).toBe(2)
  })

  it('should stop at an empty page even when the total promises more', async () => {
    spotify.listPlaylistTracks
      .mockResolvedValueOnce(
        createPage([createPlaylistItem(createSpotifyTrack('t1'))], 10, 0, 2),
      )
      .mockResolvedValueOnce(createPage([], 10, 1, 2))

    const result = await aggregatePlaylistTracks(deps(), 1, 1)

    expect(spotify.listPlaylistTracks).toHaveBeenCalledTimes(2)
    expect(result.tracks).toHaveLength(1)
    expect(result.apiCallCount).toBe(3)
  })

  it('should make no artist lookup for an empty playlist', async () => {
    spotify.listPlaylistTracks.mockResolvedValueOnce(createPage([], 0, 0, 2))

    const result = await aggregatePlaylistTracks(deps(), 1, 1)

    expect(spotify.getSeveralArtists).not.toHaveBeenCalled()
    expect(result.tracks).toEqual([])
    expect(result.apiCallCount).toBe(1)
  })

  it('should look up artists in batches of 50', async () => {
    const artistIds = Array.from({ length: 120 }, (_, i) => `a${i}`)
    spotify.listPlaylistTracks.mockResolvedValueOnce(
      createPage([createPlaylistItem(createSpotifyTrack('t1', {}, artistIds))], 1, 0, 50),
    )

    const result = await aggregatePlaylistTracks(deps(50), 1, 1)

    expect(spotify.getSeveralArtists.mock.calls.map((call) => call[0].length)).toEqual([
      50, 50, 20,
    ])
    expect(result.apiCallCount).toBe(4)
  })

  it('should report the tracks and calls made before a page fails', async () => {
    spotify.listPlaylistTracks
      .mockResolvedValueOnce(
        createPage(
          [
            createPlaylistItem(createSpotifyTrack('t1')),
            createPlaylistItem(createSpotifyTrack('t2')),
          ],
          6,
          0,
          2,
        ),
      )
      .mockRejectedValueOnce(new Error('boom'))

    const error = await aggregatePlaylistTracks(deps(), 1, 1).catch(
      (err: unknown) => err,
    )

    expect(error).toBeInstanceOf(AggregationError)
    if (error instanceof AggregationError) {
      expect(error.tracksFetched).toBe(2)
      expect(error.apiCallCount).toBe(2)
      expect(error.kind).toBe('aggregation')
      expect(error.message).toBe(
        'Failed to fetch tracks of playlist base-remote at offset 2: boom',
      )
    }
    expect(spotify.listPlaylistTracks).toHaveBeenCalledTimes(2)
    expect(spotify.getSeveralArtists).not.toHaveBeenCalled()
  })

  it('should fail without remote calls when the base playlist is missing', async () => {
    db.getBasePlaylist.mockResolvedValue(undefined)

    const error = await aggregatePlaylistTracks(deps(), 1, 7).catch(
      (err: unknown) => err,
    )

    expect(error).toBeInstanceOf(AggregationError)
    if (error instanceof AggregationError) {
      expect(error.message).toBe('Base playlist 7 not found for user 1')
      expect(error.apiCallCount).toBe(0)
    }
    expect(spotify.listPlaylistTracks).not.toHaveBeenCalled()
  })
})
