/**
 * Playlist Service
 *
 * Manages base and child playlists for the HTTP API. Child playlists own a
 * remote Spotify playlist: it is created with the child, renamed when the
 * child is renamed and removed when the child is deleted.
 *
 * Methods return undefined (or false) when the record does not exist for the
 * user, leaving the HTTP mapping to the routes.
 */
import type {
  BasePlaylist,
  ChildPlaylist,
  ChildPlaylistUpdate,
} from '@root/types/playlist.types.js'
import {
  buildChildPlaylistDescription,
  buildChildPlaylistName,
} from '@services/playlist-sync/utils/index.js'
import type { PlaylistDetails } from '@services/spotify.service.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'

export interface ChildPlaylistInput {
  name: string
  description?: string
  filterRules?: unknown
  isActive?: boolean
}

export class PlaylistService {
  /** Creates a fresh service logger that inherits current log level */
  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'PLAYLISTS')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {}

  private get db() {
    return this.fastify.db
  }

  /**
   * Creates the child record together with its private remote playlist.
   * If the record cannot be stored the remote playlist is removed again.
   *
   * @returns The created child, or undefined when the base playlist does not exist
   */
  async createChildPlaylist(
    userId: number,
    basePlaylistId: number,
    input: ChildPlaylistInput,
  ): Promise<ChildPlaylist | undefined> {
    const basePlaylist = await this.db.getBasePlaylist(userId, basePlaylistId)
    if (!basePlaylist) {
      return undefined
    }

    const description = input.description ?? ''
    const spotify = this.fastify.spotify.forUser(userId)
    const remote = await spotify.createPlaylist({
      name: buildChildPlaylistName(basePlaylist.name, input.name),
      description: buildChildPlaylistDescription(description),
      public: false,
    })

    try {
      const child = await this.db.createChildPlaylist({
        userId,
        basePlaylistId,
        name: input.name,
        description,
        spotifyPlaylistId: remote.id,
        filterRules: input.filterRules ?? null,
        isActive: input.isActive ?? true,
      })
      this.log.info(
        `Created child playlist ${child.id} "${child.name}" of base playlist ${basePlaylistId}`,
      )
      return child
    } catch (error) {
      try {
        await spotify.deletePlaylist(remote.id)
      } catch (cleanupError) {
        this.log.error(
          { error: cleanupError, spotifyPlaylistId: remote.id },
          'Failed to remove remote playlist after the child record could not be stored',
        )
      }
      throw error
    }
  }

  /**
   * Updates a child and mirrors name or description changes to its remote playlist
   *
   * @returns The updated child, or undefined when it does not exist
   */
  async updateChildPlaylist(
    userId: number,
    childPlaylistId: number,
    update: ChildPlaylistUpdate,
  ): Promise<ChildPlaylist | undefined> {
    const child = await this.db.updateChildPlaylist(
      userId,
      childPlaylistId,
      update,
    )
    if (!child) {
      return undefined
    }

    const details: PlaylistDetails = {}
    if (update.name !== undefined) {
      const basePlaylist: BasePlaylist | undefined =
        await this.db.getBasePlaylist(userId, child.basePlaylistId)
      if (basePlaylist) {
        details.name = buildChildPlaylistName(basePlaylist.name, update.name)
      }
    }
    if (update.description !== undefined) {
      details.description = buildChildPlaylistDescription(update.description)
    }

    if (details.name !== undefined || details.description !== undefined) {
      await this.fastify.spotify
        .forUser(userId)
        .updatePlaylistDetails(child.spotifyPlaylistId, details)
      this.log.debug(
        { childPlaylistId, spotifyPlaylistId: child.spotifyPlaylistId },
        'Updated remote playlist details',
      )
    }

    return child
  }

  /**
   * Removes the child's remote playlist, then its record
   *
   * @returns false when the child does not exist
   */
  async deleteChildPlaylist(
    userId: number,
    childPlaylistId: number,
  ): Promise<boolean> {
    const child = await this.db.getChildPlaylist(userId, childPlaylistId)
    if (!child) {
      return false
    }

    await this.fastify.spotify
      .forUser(userId)
      .deletePlaylist(child.spotifyPlaylistId)
    const deleted = await this.db.deleteChildPlaylist(userId, childPlaylistId)
    this.log.info(`Deleted child playlist ${childPlaylistId}`)
    return deleted
  }
}
