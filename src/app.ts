import path from 'node:path'
import fastifyAutoload from '@fastify/autoload'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'

/**
 * Configures the Fastify server: external plugins (config, rate limiting,
 * zod compilers), then the custom plugins that decorate the instance with the
 * database and services, then the route tree under `routes/`.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  opts: FastifyPluginOptions,
) {
  // Load external plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(import.meta.dirname, 'plugins/external'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load custom plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(import.meta.dirname, 'plugins/custom'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load routes
  await fastify.register(fastifyAutoload, {
    dir: path.join(import.meta.dirname, 'routes'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })
}
