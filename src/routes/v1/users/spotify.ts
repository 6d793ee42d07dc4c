import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import { MANAGED_DESCRIPTION_PREFIX } from '@services/playlist-sync/utils/index.js'
import { SpotifyApiError } from '@services/spotify.service.js'
import {
  type UserParams,
  UserParamsSchema,
} from '@schemas/common/params.schema.js'
import {
  type SpotifyIntegrationBody,
  SpotifyIntegrationBodySchema,
  type SpotifyIntegrationResponse,
  SpotifyIntegrationResponseSchema,
  type SpotifyPlaylistsQuery,
  SpotifyPlaylistsQuerySchema,
  type SpotifyPlaylistsResponse,
  SpotifyPlaylistsResponseSchema,
} from '@schemas/spotify/spotify-integration.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.put<{
    Params: UserParams
    Body: SpotifyIntegrationBody
    Reply: SpotifyIntegrationResponse
  }>(
    '/:userId/spotify',
    {
      schema: {
        summary: 'Store Spotify credentials',
        description:
          "Stores the user's Spotify account id and access token. The user record is created when it does not exist.",
        params: UserParamsSchema,
        body: SpotifyIntegrationBodySchema,
        response: {
          200: SpotifyIntegrationResponseSchema,
          400: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Spotify'],
      },
    },
    async (request, reply) => {
      const { userId } = request.params
      const { spotifyUserId, accessToken, displayName, userName } =
        request.body

      try {
        await fastify.db.ensureUser(userId, userName ?? `user-${userId}`)
        const integration = await fastify.db.upsertSpotifyIntegration({
          user_id: userId,
          spotify_user_id: spotifyUserId,
          access_token: accessToken,
          display_name: displayName ?? null,
        })

        request.log.info(
          { userId, spotifyUserId },
          'Stored Spotify integration',
        )

        return {
          userId: integration.user_id,
          spotifyUserId: integration.spotify_user_id,
          displayName: integration.display_name,
          updatedAt: integration.updated_at,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to store Spotify integration',
          userId,
        })
        return reply.internalServerError('Unable to store Spotify integration')
      }
    },
  )

  fastify.get<{
    Params: UserParams
    Querystring: SpotifyPlaylistsQuery
    Reply: SpotifyPlaylistsResponse
  }>(
    '/:userId/spotify/playlists',
    {
      schema: {
        summary: 'List Spotify playlists',
        description:
          "Returns one page of the playlists in the user's Spotify library, to pick a base playlist from. Playlists created by a sync are flagged as managed.",
        params: UserParamsSchema,
        querystring: SpotifyPlaylistsQuerySchema,
        response: {
          200: SpotifyPlaylistsResponseSchema,
          400: ErrorSchema,
          500: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Spotify'],
      },
    },
    async (request, reply) => {
      const { userId } = request.params
      const { limit, offset } = request.query

      try {
        const integration = await fastify.db.getSpotifyIntegration(userId)
        if (!integration) {
          return reply.badRequest('No Spotify integration stored for this user')
        }

        const page = await fastify.spotify.listUserPlaylists(
          userId,
          limit,
          offset,
        )
        return {
          playlists: page.items.map((playlist) => ({
            id: playlist.id,
            name: playlist.name,
            description: playlist.description,
            public: playlist.public,
            uri: playlist.uri,
            managed:
              playlist.description?.startsWith(MANAGED_DESCRIPTION_PREFIX) ??
              false,
          })),
          total: page.total,
          limit: page.limit,
          offset: page.offset,
          hasMore: page.next !== null,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to list Spotify playlists',
          userId,
        })
        if (error instanceof SpotifyApiError) {
          return reply.badGateway('Spotify request failed')
        }
        return reply.internalServerError('Unable to list Spotify playlists')
      }
    },
  )
}

export default plugin
