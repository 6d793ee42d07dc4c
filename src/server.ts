import Fastify from 'fastify'
import fp from 'fastify-plugin'
import closeWithGrace from 'close-with-grace'
import serviceApp from './app.js'
import { createLoggerConfig } from '@utils/logger.js'

/**
 * Initializes and starts the Fastify server with its plugins, logging and
 * graceful shutdown handling.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    pluginTimeout: 60000,
    // A running sync holds its request open; do not wait for it on shutdown
    forceCloseConnections: true,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  app.log.level = app.config.logLevel

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error(err)
      }
      await app.close()
    },
  )

  try {
    await app.listen({
      port: app.config.port,
      host: '0.0.0.0',
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }
}

init().catch((err: unknown) => {
  console.error('Failed to start server', err)
  process.exit(1)
})
