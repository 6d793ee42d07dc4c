import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import {
  type BasePlaylistParams,
  BasePlaylistParamsSchema,
  type ChildPlaylistParams,
  ChildPlaylistParamsSchema,
} from '@schemas/common/params.schema.js'
import {
  type ChildPlaylistListResponse,
  ChildPlaylistListSchema,
  type ChildPlaylistResponse,
  ChildPlaylistSchema,
  type CreateChildPlaylistBody,
  CreateChildPlaylistBodySchema,
  type UpdateChildPlaylistBody,
  UpdateChildPlaylistBodySchema,
} from '@schemas/playlists/playlists.schema.js'
import { SpotifyCredentialsError } from '@services/spotify.service.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.post<{
    Params: BasePlaylistParams
    Body: CreateChildPlaylistBody
    Reply: ChildPlaylistResponse
  }>(
    '/:userId/base-playlists/:basePlaylistId/children',
    {
      schema: {
        summary: 'Create a child playlist',
        description:
          'Creates a private Spotify playlist for the child and stores its filter rules.',
        params: BasePlaylistParamsSchema,
        body: CreateChildPlaylistBodySchema,
        response: {
          201: ChildPlaylistSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Child Playlists'],
      },
    },
    async (request, reply) => {
      const { userId, basePlaylistId } = request.params

      try {
        const child = await fastify.playlists.createChildPlaylist(
          userId,
          basePlaylistId,
          request.body,
        )
        if (!child) {
          return reply.notFound('Base playlist not found')
        }
        reply.status(201)
        return child
      } catch (error) {
        if (error instanceof SpotifyCredentialsError) {
          return reply.badRequest(error.message)
        }
        logRouteError(fastify.log, request, error, {
          message: 'Failed to create child playlist',
          userId,
          basePlaylistId,
        })
        return reply.internalServerError('Unable to create child playlist')
      }
    },
  )

  fastify.get<{
    Params: BasePlaylistParams
    Reply: ChildPlaylistListResponse
  }>(
    '/:userId/base-playlists/:basePlaylistId/children',
    {
      schema: {
        summary: 'List child playlists',
        params: BasePlaylistParamsSchema,
        response: {
          200: ChildPlaylistListSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Child Playlists'],
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
        const childPlaylists = await fastify.db.getChildPlaylists(
          userId,
          basePlaylistId,
        )
        return { childPlaylists }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to list child playlists',
          userId,
          basePlaylistId,
        })
        return reply.internalServerError('Unable to list child playlists')
      }
    },
  )

  fastify.get<{
    Params: ChildPlaylistParams
    Reply: ChildPlaylistResponse
  }>(
    '/:userId/child-playlists/:childPlaylistId',
    {
      schema: {
        summary: 'Get a child playlist',
        params: ChildPlaylistParamsSchema,
        response: {
          200: ChildPlaylistSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Child Playlists'],
      },
    },
    async (request, reply) => {
      const { userId, childPlaylistId } = request.params

      try {
        const child = await fastify.db.getChildPlaylist(userId, childPlaylistId)
        if (!child) {
          return reply.notFound('Child playlist not found')
        }
        return child
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to get child playlist',
          userId,
          childPlaylistId,
        })
        return reply.internalServerError('Unable to get child playlist')
      }
    },
  )

  fastify.patch<{
    Params: ChildPlaylistParams
    Body: UpdateChildPlaylistBody
    Reply: ChildPlaylistResponse
  }>(
    '/:userId/child-playlists/:childPlaylistId',
    {
      schema: {
        summary: 'Update a child playlist',
        description:
          'Updates the child record. Name and description changes are mirrored to its Spotify playlist.',
        params: ChildPlaylistParamsSchema,
        body: UpdateChildPlaylistBodySchema,
        response: {
          200: ChildPlaylistSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Child Playlists'],
      },
    },
    async (request, reply) => {
      const { userId, childPlaylistId } = request.params

      try {
        const child = await fastify.playlists.updateChildPlaylist(
          userId,
          childPlaylistId,
          request.body,
        )
        if (!child) {
          return reply.notFound('Child playlist not found')
        }
        return child
      } catch (error) {
        if (error instanceof SpotifyCredentialsError) {
          return reply.badRequest(error.message)
        }
        logRouteError(fastify.log, request, error, {
          message: 'Failed to update child playlist',
          userId,
          childPlaylistId,
        })
        return reply.internalServerError('Unable to update child playlist')
      }
    },
  )

  fastify.delete<{
    Params: ChildPlaylistParams
  }>(
    '/:userId/child-playlists/:childPlaylistId',
    {
      schema: {
        summary: 'Delete a child playlist',
        description: 'Removes the Spotify playlist, then the child record.',
        params: ChildPlaylistParamsSchema,
        response: {
          400: ErrorSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Child Playlists'],
      },
    },
    async (request, reply) => {
      const { userId, childPlaylistId } = request.params

      try {
        const deleted = await fastify.playlists.deleteChildPlaylist(
          userId,
          childPlaylistId,
        )
        if (!deleted) {
          return reply.notFound('Child playlist not found')
        }
        return reply.status(204).send()
      } catch (error) {
        if (error instanceof SpotifyCredentialsError) {
          return reply.badRequest(error.message)
        }
        logRouteError(fastify.log, request, error, {
          message: 'Failed to delete child playlist',
          userId,
          childPlaylistId,
        })
        return reply.internalServerError('Unable to delete child playlist')
      }
    },
  )
}

export default plugin
