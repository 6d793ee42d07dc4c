import type { ArtistInfo } from '@root/types/playlist.types.js'
import {
  isRoutableTrack,
  parseReleaseYear,
  toArtistInfo,
  toTrack,
} from '@services/playlist-sync/aggregation/index.js'
import { describe, expect, it } from 'vitest'
import { createSpotifyArtist, createSpotifyTrack } from '../../../mocks/spotify.js'

describe('track-mapper', () => {
  describe('parseReleaseYear', () => {
    it('should read the year of every release date precision', () => {
      expect(parseReleaseYear('1999-03-21')).toBe(1999)
      expect(parseReleaseYear('1987-06')).toBe(1987)
      expect(parseReleaseYear('1975')).toBe(1975)
    })

    it('should return 0 for missing or malformed dates', () => {
      expect(parseReleaseYear('')).toBe(0)
      expect(parseReleaseYear(null)).toBe(0)
      expect(parseReleaseYear(undefined)).toBe(0)
      expect(parseReleaseYear('unknown')).toBe(0)
    })
  })

  describe('isRoutableTrack', () => {
    it('should accept catalogue tracks', () => {
      expect(isRoutableTrack(createSpotifyTrack('t1'))).toBe(true)
    })

    it('should reject removed, local and episode entries', () => {
      expect(isRoutableTrack(null)).toBe(false)
      expect(isRoutableTrack(createSpotifyTrack('t1', { id: null }))).toBe(false)
      expect(isRoutableTrack(createSpotifyTrack('t2', { is_local: true }))).toBe(
        false,
      )
      expect(isRoutableTrack(createSpotifyTrack('t3', { type: 'episode' }))).toBe(
        false,
      )
    })
  })

  describe('toTrack', () => {
    const artists = new Map<string, ArtistInfo>([
      [
        'a1',
        toArtistInfo(
          createSpotifyArtist('a1', { genres: ['Synthwave', 'Retro'], popularity: 60 }),
        ),
      ],
      [
        'a2',
        toArtistInfo(
          createSpotifyArtist('a2', { genres: ['synthwave', 'Pop'], popularity: 80 }),
        ),
      ],
    ])

    it('should merge artist genres in credit order, lower-cased and deduplicated', () => {
      const track = toTrack(
        { ...createSpotifyTrack('t1', {}, ['a1', 'a2']), id: 't1' },
        artists,
      )

      expect(track.genres).toEqual(['synthwave', 'retro', 'pop'])
      expect(track.maxArtistPopularity).toBe(80)
      expect(track.artists).toEqual(['a1', 'a2'])
      expect(track.artistNames).toEqual(['Artist a1', 'Artist a2'])
    })

    it('should copy the track fields and derive the release year', () => {
      const track = toTrack(
        {
          ...createSpotifyTrack('t1', {
            name: 'Nightcall',
            duration_ms: 258000,
            popularity: 71,
            explicit: true,
          }),
          id: 't1',
        },
        artists,
      )

      expect(track).toMatchObject({
        id: 't1',
        name: 'Nightcall',
        uri: 'spotify:track:t1',
        durationMs: 258000,
        popularity: 71,
        explicit: true,
        releaseYear: 2001,
        album: {
          id: 'album-t1',
          name: 'Album t1',
          releaseDate: '2001-05-14',
          uri: 'spotify:album:album-t1',
        },
      })
    })

    it('should keep names of artists that were not looked up', () => {
      const spotifyTrack = createSpotifyTrack('t1', {}, ['unknown'])
      spotifyTrack.artists.push({ id: null, name: 'Local Hero', uri: '' })

      const track = toTrack({ ...spotifyTrack, id: 't1' }, artists)

      expect(track.genres).toEqual([])
      expect(track.maxArtistPopularity).toBe(0)
      expect(track.artists).toEqual(['unknown'])
      expect(track.artistNames).toEqual(['Artist unknown', 'Local Hero'])
    })

    it('should use an empty album id when Spotify has none', () => {
      const spotifyTrack = createSpotifyTrack('t1')
      spotifyTrack.album.id = null

      expect(toTrack({ ...spotifyTrack, id: 't1' }, artists).album.id).toBe('')
    })
  })
})
