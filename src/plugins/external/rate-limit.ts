import fastifyRateLimit from '@fastify/rate-limit'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * Low overhead rate limiter for routes. Routes can tighten the global limit
 * through their `config.rateLimit` option, as the sync route does.
 *
 * @see {@link https://github.com/fastify/fastify-rate-limit}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(fastifyRateLimit, {
      max: fastify.config.rateLimitMax,
      timeWindow: '1 minute',
    })
  },
  {
    dependencies: ['config'],
  },
)
