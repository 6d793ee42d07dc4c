import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * 404 handler for unknown routes, rate limited so that probing for routes
 * stays cheap.
 */
async function notFoundHandler(fastify: FastifyInstance) {
  fastify.setNotFoundHandler(
    {
      preHandler: fastify.rateLimit({
        max: 3,
        timeWindow: 500,
      }),
    },
    (request, reply) => {
      const path = request.url.split('?')[0]
      request.log.warn(
        { request: { id: request.id, method: request.method, path } },
        'Route not found',
      )
      reply.code(404)
      const response: ErrorResponse = {
        statusCode: 404,
        code: 'NOT_FOUND',
        error: 'Not Found',
        message: `Route ${request.method} ${path} not found`,
      }
      return response
    },
  )
}

export default fp(notFoundHandler, {
  name: 'not-found',
  dependencies: ['@fastify/rate-limit'],
})
