import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { PlaylistService } from '@services/playlist.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    playlists: PlaylistService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    fastify.decorate('playlists', new PlaylistService(fastify.log, fastify))
  },
  {
    name: 'playlists',
    dependencies: ['database', 'spotify'],
  },
)
