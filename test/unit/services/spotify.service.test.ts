import {
  SpotifyApiError,
  SpotifyCredentialsError,
  SpotifyService,
} from '@services/spotify.service.js'
import { HttpResponse, http } from 'msw'
import { beforeEach, describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'
import {
  createPage,
  createPlaylistItem,
  createRemotePlaylist,
  createSpotifyArtist,
  createSpotifyTrack,
} from '../../mocks/spotify.js'
import { server } from '../../setup/msw-setup.js'

const API = 'https://api.spotify.test/v1'

describe('SpotifyService', () => {
  let service: SpotifyService

  beforeEach(() => {
    service = new SpotifyService(
      createMockLogger(),
      { apiBaseUrl: API, requestTimeout: 2000 },
      async (userId) => {
        if (userId !== 1) {
          throw new SpotifyCredentialsError(userId)
        }
        return { accessToken: 'test-token', spotifyUserId: 'listener-1' }
      },
    )
  })

  describe('listPlaylistTracks', () => {
    it('should request one page with the bearer token', async () => {
      let seen: { auth: string | null; limit: string | null; offset: string | null } | undefined
      server.use(
        http.get(`${API}/playlists/base-remote/tracks`, ({ request }) => {
          const url = new URL(request.url)
          seen = {
            auth: request.headers.get('authorization'),
            limit: url.searchParams.get('limit'),
            offset: url.searchParams.get('offset'),
          }
          return HttpResponse.json(
            createPage([createPlaylistItem(createSpotifyTrack('t1'))], 3, 2, 1),
          )
        }),
      )

      const page = await service.forUser(1).listPlaylistTracks('base-remote', 1, 2)

      expect(seen).toEqual({ auth: 'Bearer test-token', limit: '1', offset: '2' })
      expect(page.total).toBe(3)
      expect(page.items[0].track?.id).toBe('t1')
    })

    it('should raise the Spotify error message with the status', async () => {
      server.use(
        http.get(`${API}/playlists/missing/tracks`, () =>
          HttpResponse.json(
            { error: { status: 404, message: 'Not found.' } },
            { status: 404 },
          ),
        ),
      )

      const error = await service
        .forUser(1)
        .listPlaylistTracks('missing', 50, 0)
        .catch((err: unknown) => err)

      expect(error).toBeInstanceOf(SpotifyApiError)
      if (error instanceof SpotifyApiError) {
        expect(error.status).toBe(404)
        expect(error.message).toBe(
          'Spotify API error 404 on GET /playlists/missing/tracks: Not found.',
        )
        expect(error.body).toEqual({ error: { status: 404, message: 'Not found.' } })
      }
    })

    it('should fall back to the status text for non-JSON errors', async () => {
      server.use(
        http.get(`${API}/playlists/base-remote/tracks`, () =>
          new HttpResponse('upstream down', {
            status: 502,
            statusText: 'Bad Gateway',
          }),
        ),
      )

      await expect(
        service.forUser(1).listPlaylistTracks('base-remote', 50, 0),
      ).rejects.toThrow(
        'Spotify API error 502 on GET /playlists/base-remote/tracks: Bad Gateway',
      )
    })
  })

  describe('listUserPlaylists', () => {
    it("should page through the user's library", async () => {
      let seen: { auth: string | null; limit: string | null; offset: string | null } | undefined
      server.use(
        http.get(`${API}/me/playlists`, ({ request }) => {
          const url = new URL(request.url)
          seen = {
            auth: request.headers.get('authorization'),
            limit: url.searchParams.get('limit'),
            offset: url.searchParams.get('offset'),
          }
          return HttpResponse.json({
            items: [createRemotePlaylist('library-3')],
            limit: 2,
            offset: 2,
            total: 3,
            next: null,
          })
        }),
      )

      const page = await service.listUserPlaylists(1, 2, 2)

      expect(seen).toEqual({ auth: 'Bearer test-token', limit: '2', offset: '2' })
      expect(page.total).toBe(3)
      expect(page.items.map((playlist) => playlist.id)).toEqual(['library-3'])
    })

    it('should raise an expired token as an API error', async () => {
      server.use(
        http.get(`${API}/me/playlists`, () =>
          HttpResponse.json(
            { error: { status: 401, message: 'The access token expired' } },
            { status: 401 },
          ),
        ),
      )

      await expect(service.listUserPlaylists(1, 20, 0)).rejects.toThrow(
        'Spotify API error 401 on GET /me/playlists: The access token expired',
      )
    })
  })

  describe('getSeveralArtists', () => {
    it('should send the ids comma separated and drop unknown artists', async () => {
      let ids: string | null = null
      server.use(
        http.get(`${API}/artists`, ({ request }) => {
          ids = new URL(request.url).searchParams.get('ids')
          return HttpResponse.json({
            artists: [createSpotifyArtist('a1'), null],
          })
        }),
      )

      const artists = await service.forUser(1).getSeveralArtists(['a1', 'gone'])

      expect(ids).toBe('a1,gone')
      expect(artists.map((artist) => artist.id)).toEqual(['a1'])
    })

    it('should make no request for an empty id list', async () => {
      await expect(service.forUser(1).getSeveralArtists([])).resolves.toEqual([])
    })

    it('should refuse more than 50 ids', async () => {
      const ids = Array.from({ length: 51 }, (_, i) => `a${i}`)

      await expect(service.forUser(1).getSeveralArtists(ids)).rejects.toThrow(
        RangeError,
      )
    })
  })

  describe('playlist changes', () => {
    it('should create the playlist under the stored Spotify user', async () => {
      let body: unknown
      server.use(
        http.post(`${API}/users/listener-1/playlists`, async ({ request }) => {
          body = await request.json()
          return HttpResponse.json(createRemotePlaylist('created-1'), { status: 201 })
        }),
      )

      const playlist = await service.forUser(1).createPlaylist({
        name: '[Road Trip] > Slow',
        description: 'managed',
        public: false,
      })

      expect(playlist.id).toBe('created-1')
      expect(body).toEqual({
        name: '[Road Trip] > Slow',
        description: 'managed',
        public: false,
      })
    })

    it('should delete a playlist by unfollowing it', async () => {
      let unfollowed = false
      server.use(
        http.delete(`${API}/playlists/child-remote-1/followers`, () => {
          unfollowed = true
          return new HttpResponse(null, { status: 200 })
        }),
      )

      await service.forUser(1).deletePlaylist('child-remote-1')

      expect(unfollowed).toBe(true)
    })

    it('should update playlist details', async () => {
      let body: unknown
      server.use(
        http.put(`${API}/playlists/child-remote-1`, async ({ request }) => {
          body = await request.json()
          return new HttpResponse(null, { status: 200 })
        }),
      )

      await service.forUser(1).updatePlaylistDetails('child-remote-1', {
        name: '[Road Trip] > Fast',
      })

      expect(body).toEqual({ name: '[Road Trip] > Fast' })
    })

    it('should add tracks and return the snapshot id', async () => {
      let body: unknown
      server.use(
        http.post(`${API}/playlists/child-remote-1/tracks`, async ({ request }) => {
          body = await request.json()
          return HttpResponse.json({ snapshot_id: 'snap-2' }, { status: 201 })
        }),
      )

      const snapshot = await service
        .forUser(1)
        .addTracksToPlaylist('child-remote-1', ['spotify:track:t1'])

      expect(snapshot).toBe('snap-2')
      expect(body).toEqual({ uris: ['spotify:track:t1'] })
    })

    it('should refuse more than 100 tracks per request', async () => {
      const uris = Array.from({ length: 101 }, (_, i) => `spotify:track:t${i}`)

      await expect(
        service.forUser(1).addTracksToPlaylist('child-remote-1', uris),
      ).rejects.toThrow(
        'Expected between 1 and 100 track URIs per request (got 101)',
      )
    })
  })

  it('should fail before any request when the user has no credentials', async () => {
    await expect(
      service.forUser(2).listPlaylistTracks('base-remote', 50, 0),
    ).rejects.toThrow(new SpotifyCredentialsError(2))
  })
})
