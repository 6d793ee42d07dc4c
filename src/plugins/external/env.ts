import fp from 'fastify-plugin'
import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import type { Config } from '@root/types/config.types.js'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    baseUrl: {
      type: 'string',
      default: 'http://localhost',
    },
    port: {
      type: 'number',
      default: 3003,
    },
    dbPath: {
      type: 'string',
      default: './data/db/playlist-router.db',
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 500,
    },
    syncRateLimitMax: {
      type: 'number',
      default: 10,
    },
    spotifyApiBaseUrl: {
      type: 'string',
      default: 'https://api.spotify.com/v1',
    },
    spotifyRequestTimeout: {
      type: 'number',
      minimum: 1,
      default: 15000,
    },
    syncTimeoutMs: {
      type: 'number',
      minimum: 1,
      default: 300000,
    },
    // Spotify caps playlist item pages at 100
    trackPageSize: {
      type: 'integer',
      minimum: 1,
      maximum: 100,
      default: 50,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    // Strip a trailing slash so request paths can be appended directly
    fastify.config.spotifyApiBaseUrl = fastify.config.spotifyApiBaseUrl.replace(
      /\/+$/,
      '',
    )
  },
  {
    name: 'config',
  },
)
