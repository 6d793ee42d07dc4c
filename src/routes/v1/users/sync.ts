import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import { SyncConflictError } from '@root/types/errors.js'
import {
  type BasePlaylistParams,
  BasePlaylistParamsSchema,
  type SyncEventParams,
  SyncEventParamsSchema,
} from '@schemas/common/params.schema.js'
import {
  type SyncEventListResponse,
  SyncEventListSchema,
  type SyncEventResponse,
  SyncEventSchema,
  type SyncEventsQuery,
  SyncEventsQuerySchema,
} from '@schemas/sync/sync.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.post<{
    Params: BasePlaylistParams
    Reply: SyncEventResponse
  }>(
    '/:userId/base-playlists/:basePlaylistId/sync',
    {
      config: {
        rateLimit: {
          max: fastify.config.syncRateLimitMax,
          timeWindow: '1 minute',
        },
      },
      schema: {
        summary: 'Sync a base playlist',
        description:
          'Routes the tracks of the base playlist into its active child playlists and rebuilds them. Returns the completed sync event.',
        params: BasePlaylistParamsSchema,
        response: {
          200: SyncEventSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          409: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async (request, reply) => {
      const { userId, basePlaylistId } = request.params

      try {
        const basePlaylist = await fastify.db.getBasePlaylist(
          userId,
          basePlaylistId,
        )
        if (!basePlaylist) {
          return reply.notFound('Base playlist not found')
        }

        const integration = await fastify.db.getSpotifyIntegration(userId)
        if (!integration) {
          return reply.badRequest('No Spotify integration stored for this user')
        }

        return await fastify.playlistSync.syncBasePlaylist(
          userId,
          basePlaylistId,
        )
      } catch (error) {
        if (error instanceof SyncConflictError) {
          return reply.conflict(error.message)
        }
        logRouteError(fastify.log, request, error, {
          message: 'Playlist sync failed',
          userId,
          basePlaylistId,
        })
        return reply.internalServerError('Playlist sync failed')
      }
    },
  )

  fastify.get<{
    Params: BasePlaylistParams
    Querystring: SyncEventsQuery
    Reply: SyncEventListResponse
  }>(
    '/:userId/base-playlists/:basePlaylistId/sync-events',
    {
      schema: {
        summary: 'List sync events',
        description:
          'Returns the sync history of a base playlist, newest first, including the error message and kind of failed syncs.',
        params: BasePlaylistParamsSchema,
        querystring: SyncEventsQuerySchema,
        response: {
          200: SyncEventListSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async (request, reply) => {
      const { userId, basePlaylistId } = request.params

      try {
        const basePlaylist = await fastify.db.getBasePlaylist(
          userId,
          basePlaylistId,
        )
        if (!basePlaylist) {
          return reply.notFound('Base playlist not found')
        }
        const syncEvents = await fastify.db.getSyncEvents(
          userId,
          basePlaylistId,
          request.query,
        )
        return { syncEvents }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to list sync events',
          userId,
          basePlaylistId,
        })
        return reply.internalServerError('Unable to list sync events')
      }
    },
  )

  fastify.get<{
    Params: SyncEventParams
    Reply: SyncEventResponse
  }>(
    '/:userId/base-playlists/:basePlaylistId/sync-events/:syncEventId',
    {
      schema: {
        summary: 'Get a sync event',
        description:
          'Returns one sync event of a base playlist, e.g. to poll the outcome of a sync.',
        params: SyncEventParamsSchema,
        response: {
          200: SyncEventSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async (request, reply) => {
      const { userId, basePlaylistId, syncEventId } = request.params

      try {
        const syncEvent = await fastify.db.getSyncEvent(userId, syncEventId)
        if (!syncEvent || syncEvent.basePlaylistId !== basePlaylistId) {
          return reply.notFound('Sync event not found')
        }
        return syncEvent
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to get sync event',
          userId,
          basePlaylistId,
          syncEventId,
        })
        return reply.internalServerError('Unable to get sync event')
      }
    },
  )
}

export default plugin
