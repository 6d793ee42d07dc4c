import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

export interface RouteErrorOptions {
  message?: string
  level?: 'error' | 'warn' | 'info'
  context?: Record<string, unknown>
  [key: string]: unknown
}

function getParamsUserId(request: FastifyRequest): number | undefined {
  const params = request.params
  if (
    typeof params === 'object' &&
    params !== null &&
    'userId' in params &&
    typeof params.userId === 'number'
  ) {
    return params.userId
  }
  return undefined
}

/**
 * Logs an error caught inside a route handler with the route and the user it
 * concerns. Only the route pattern is logged, never the query string.
 *
 * @example
 * logRouteError(fastify.log, request, error, {
 *   message: 'Failed to list base playlists',
 *   basePlaylistId,
 * })
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  options: RouteErrorOptions = {},
): void {
  const { message, level = 'error', context, ...fields } = options
  const route = `${request.method} ${request.routeOptions?.url ?? request.url.split('?')[0]}`
  const userId = getParamsUserId(request)

  const payload: Record<string, unknown> = {
    error,
    route,
    ...(userId !== undefined ? { userId } : {}),
    ...context,
    ...fields,
  }

  log[level](payload, message ?? `Error in route ${route}`)
}
