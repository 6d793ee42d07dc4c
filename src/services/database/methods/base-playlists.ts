import type {
  BasePlaylist,
  BasePlaylistCreate,
} from '@root/types/playlist.types.js'
import type { DatabaseService } from '@services/database.service.js'

interface BasePlaylistRow {
  id: number
  user_id: number
  name: string
  spotify_playlist_id: string
  is_active: boolean | number
  created_at: string
  updated_at: string
}

function mapRowToBasePlaylist(row: BasePlaylistRow): BasePlaylist {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    spotifyPlaylistId: row.spotify_playlist_id,
    isActive: Boolean(row.is_active),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

/**
 * Registers a base playlist for a user
 */
export async function createBasePlaylist(
  this: DatabaseService,
  data: BasePlaylistCreate,
): Promise<BasePlaylist> {
  const now = this.timestamp
  const result = await this.knex('base_playlists')
    .insert({
      user_id: data.userId,
      name: data.name,
      spotify_playlist_id: data.spotifyPlaylistId,
      is_active: data.isActive ?? true,
      created_at: now,
      updated_at: now,
    })
    .returning('id')

  return {
    id: this.extractId(result),
    userId: data.userId,
    name: data.name,
    spotifyPlaylistId: data.spotifyPlaylistId,
    isActive: data.isActive ?? true,
    createdAt: now,
    updatedAt: now,
  }
}

/**
 * Retrieves a base playlist owned by the given user
 */
export async function getBasePlaylist(
  this: DatabaseService,
  userId: number,
  basePlaylistId: number,
): Promise<BasePlaylist | undefined> {
  const row = await this.knex<BasePlaylistRow>('base_playlists')
    .where({ id: basePlaylistId, user_id: userId })
    .first()
  return row ? mapRowToBasePlaylist(row) : undefined
}

export async function getBasePlaylists(
  this: DatabaseService,
  userId: number,
): Promise<BasePlaylist[]> {
  const rows = await this.knex<BasePlaylistRow>('base_playlists')
    .where({ user_id: userId })
    .orderBy('id', 'asc')
  return rows.map(mapRowToBasePlaylist)
}

/**
 * Deletes a base playlist; its children and sync events cascade
 *
 * @returns true when a row was deleted
 */
export async function deleteBasePlaylist(
  this: DatabaseService,
  userId: number,
  basePlaylistId: number,
): Promise<boolean> {
  const deleted = await this.knex('base_playlists')
    .where({ id: basePlaylistId, user_id: userId })
    .delete()
  return deleted > 0
}
