import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import {
  type BasePlaylistParams,
  BasePlaylistParamsSchema,
  type UserParams,
  UserParamsSchema,
} from '@schemas/common/params.schema.js'
import {
  type BasePlaylistListResponse,
  BasePlaylistListSchema,
  type BasePlaylistResponse,
  BasePlaylistSchema,
  type CreateBasePlaylistBody,
  CreateBasePlaylistBodySchema,
} from '@schemas/playlists/playlists.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.post<{
    Params: UserParams
    Body: CreateBasePlaylistBody
    Reply: BasePlaylistResponse
  }>(
    '/:userId/base-playlists',
    {
      schema: {
        summary: 'Register a base playlist',
        params: UserParamsSchema,
        body: CreateBasePlaylistBodySchema,
        response: {
          201: BasePlaylistSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          409: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Base Playlists'],
      },
    },
    async (request, reply) => {
      const { userId } = request.params

      try {
        const user = await fastify.db.getUser(userId)
        if (!user) {
          return reply.notFound('User not found')
        }

        const existing = await fastify.db.getBasePlaylists(userId)
        if (
          existing.some(
            (playlist) =>
              playlist.spotifyPlaylistId === request.body.spotifyPlaylistId,
          )
        ) {
          return reply.conflict(
            'This Spotify playlist is already registered as a base playlist',
          )
        }

        const basePlaylist = await fastify.db.createBasePlaylist({
          userId,
          ...request.body,
        })
        reply.status(201)
        return basePlaylist
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to create base playlist',
          userId,
        })
        return reply.internalServerError('Unable to create base playlist')
      }
    },
  )

  fastify.get<{
    Params: UserParams
    Reply: BasePlaylistListResponse
  }>(
    '/:userId/base-playlists',
    {
      schema: {
        summary: 'List base playlists',
        params: UserParamsSchema,
        response: {
          200: BasePlaylistListSchema,
          400: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Base Playlists'],
      },
    },
    async (request, reply) => {
      try {
        const basePlaylists = await fastify.db.getBasePlaylists(
          request.params.userId,
        )
        return { basePlaylists }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to list base playlists',
          userId: request.params.userId,
        })
        return reply.internalServerError('Unable to list base playlists')
      }
    },
  )

  fastify.get<{
    Params: BasePlaylistParams
    Reply: BasePlaylistResponse
  }>(
    '/:userId/base-playlists/:basePlaylistId',
    {
      schema: {
        summary: 'Get a base playlist',
        params: BasePlaylistParamsSchema,
        response: {
          200: BasePlaylistSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Base Playlists'],
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
        return basePlaylist
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to get base playlist',
          userId,
          basePlaylistId,
        })
        return reply.internalServerError('Unable to get base playlist')
      }
    },
  )

  fastify.delete<{
    Params: BasePlaylistParams
  }>(
    '/:userId/base-playlists/:basePlaylistId',
    {
      schema: {
        summary: 'Delete a base playlist',
        description:
          'Deletes the base playlist together with its child playlist and sync history records. Remote playlists are left in place.',
        params: BasePlaylistParamsSchema,
        response: {
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Base Playlists'],
      },
    },
    async (request, reply) => {
      const { userId, basePlaylistId } = request.params

      try {
        const deleted = await fastify.db.deleteBasePlaylist(
          userId,
          basePlaylistId,
        )
        if (!deleted) {
          return reply.notFound('Base playlist not found')
        }
        return reply.status(204).send()
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to delete base playlist',
          userId,
          basePlaylistId,
        })
        return reply.internalServerError('Unable to delete base playlist')
      }
    },
  )
}

export default plugin
