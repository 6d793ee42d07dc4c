/**
 * Spotify Service Plugin
 *
 * Registers the SpotifyService, resolving each user's credentials from their
 * stored Spotify integration.
 */
import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import {
  SpotifyCredentialsError,
  SpotifyService,
} from '@services/spotify.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    spotify: SpotifyService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const service = new SpotifyService(
      fastify.log,
      {
        apiBaseUrl: fastify.config.spotifyApiBaseUrl,
        requestTimeout: fastify.config.spotifyRequestTimeout,
      },
      async (userId) => {
        const integration = await fastify.db.getSpotifyIntegration(userId)
        if (!integration) {
          throw new SpotifyCredentialsError(userId)
        }
        return {
          accessToken: integration.access_token,
          spotifyUserId: integration.spotify_user_id,
        }
      },
    )
    fastify.decorate('spotify', service)
  },
  {
    name: 'spotify',
    dependencies: ['config', 'database'],
  },
)
