/**
 * Playlist Sync Service Plugin
 *
 * Registers the PlaylistSyncService used by the sync routes.
 */
import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { PlaylistSyncService } from '@services/playlist-sync.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    playlistSync: PlaylistSyncService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    fastify.log.info('Initializing playlist sync plugin')
    fastify.decorate(
      'playlistSync',
      new PlaylistSyncService(fastify.log, fastify),
    )
  },
  {
    name: 'playlist-sync',
    dependencies: ['config', 'database', 'spotify'],
  },
)
