import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * Global error handler plugin.
 *
 * Every failure leaves the API as `{ statusCode, code, error, message }`.
 * Server errors are masked; their details only reach the log.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    const statusCode = err.statusCode ?? 500
    // Path only: query strings may carry tokens
    const logData = {
      err,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
        route: request.routeOptions.url,
      },
    }

    if (statusCode >= 500) {
      request.log.error(logData, 'Internal server error occurred')
    } else if (err.validation) {
      request.log.info(logData, 'Request validation failed')
    } else {
      request.log.warn(logData, 'Client error occurred')
    }

    reply.code(statusCode)
    const isServerError = statusCode >= 500
    let error = 'Client Error'
    if (isServerError) {
      error = 'Internal Server Error'
    } else if (err.validation) {
      error = 'Bad Request'
    } else if ('error' in err && typeof err.error === 'string') {
      error = err.error
    }

    const payload: ErrorResponse = {
      statusCode,
      code: err.code || 'GENERIC_ERROR',
      error,
      message: isServerError
        ? 'Internal Server Error'
        : err.message || 'An error occurred',
    }
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
