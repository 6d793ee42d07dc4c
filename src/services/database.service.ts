/**
 * Database Service
 *
 * Primary interface to the application's better-sqlite3 database. Exposed to
 * the application via the 'database' Fastify plugin as `fastify.db`.
 *
 * Responsible for:
 * - Users and their Spotify integrations (credentials used for API calls)
 * - Base playlists and the child playlists derived from them
 * - Sync event history, including the single in-progress guard
 *
 * Query methods live in `database/methods/*.ts`, grouped per table, and are
 * attached to the prototype below. Their signatures are declared on the class
 * through the module augmentations in `database/types/*-methods.ts`.
 *
 * @example
 * const children = await fastify.db.getActiveChildPlaylists(userId, basePlaylistId)
 */
import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import type { Config } from '@root/types/config.types.js'
import type Database from 'better-sqlite3'
import type { FastifyBaseLogger } from 'fastify'
import knex, { type Knex } from 'knex'
import * as basePlaylistMethods from './database/methods/base-playlists.js'
import * as childPlaylistMethods from './database/methods/child-playlists.js'
import * as spotifyIntegrationMethods from './database/methods/spotify-integrations.js'
import * as syncEventMethods from './database/methods/sync-events.js'
import * as userMethods from './database/methods/users.js'

const MIGRATIONS_DIRECTORY = resolve(
  import.meta.dirname,
  '..',
  '..',
  'migrations',
  'migrations',
)

export class DatabaseService {
  readonly knex: Knex

  private constructor(
    readonly log: FastifyBaseLogger,
    dbPath: string,
  ) {
    this.knex = knex(DatabaseService.createKnexConfig(dbPath, log))
  }

  /**
   * Opens the database and applies any pending migrations
   *
   * @param log - Logger for database operations
   * @param config - Configuration holding the SQLite file path
   */
  static async create(
    log: FastifyBaseLogger,
    config: Pick<Config, 'dbPath'>,
  ): Promise<DatabaseService> {
    const dbDirectory = dirname(resolve(config.dbPath))
    if (!fs.existsSync(dbDirectory)) {
      fs.mkdirSync(dbDirectory, { recursive: true })
    }

    const service = new DatabaseService(log, config.dbPath)
    const [batch, applied] = await service.knex.migrate.latest({
      directory: MIGRATIONS_DIRECTORY,
      loadExtensions: ['.ts', '.js'],
    })
    if (applied.length > 0) {
      log.info(`Applied ${applied.length} migration(s) in batch ${batch}`)
    }
    return service
  }

  /**
   * Creates Knex configuration for better-sqlite3
   *
   * Uses a single pooled connection with WAL journaling and foreign keys on.
   */
  private static createKnexConfig(
    dbPath: string,
    log: FastifyBaseLogger,
  ): Knex.Config {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
        afterCreate: (
          conn: Database.Database,
          done: (err: Error | null, conn: Database.Database) => void,
        ) => {
          conn.pragma('journal_mode = WAL')
          conn.pragma('foreign_keys = ON')
          done(null, conn)
        },
      },
      log: {
        warn: (message: string) => log.warn(message),
        error: (message: string | Error) => {
          log.error(message instanceof Error ? message.message : message)
        },
        debug: (message: string) => log.debug(message),
      },
      debug: false,
    }
  }

  /**
   * Current time as an ISO-8601 string, used for every timestamp column
   */
  get timestamp(): string {
    return new Date().toISOString()
  }

  /**
   * Extracts the inserted id from a `.returning('id')` result, which is either
   * an array of values or an array of `{ id }` rows depending on the driver.
   */
  extractId(result: unknown[]): number {
    const first = result[0]
    const id =
      typeof first === 'object' && first !== null && 'id' in first
        ? first.id
        : first
    const numeric = Number(id)
    if (id === undefined || id === null || !Number.isInteger(numeric)) {
      throw new Error('Failed to extract inserted id')
    }
    return numeric
  }

  /**
   * Closes the database connection
   */
  async close(): Promise<void> {
    await this.knex.destroy()
  }
}

Object.assign(
  DatabaseService.prototype,
  userMethods,
  spotifyIntegrationMethods,
  basePlaylistMethods,
  childPlaylistMethods,
  syncEventMethods,
)
