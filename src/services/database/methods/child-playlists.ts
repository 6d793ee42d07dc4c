import type {
  ChildPlaylist,
  ChildPlaylistCreate,
  ChildPlaylistUpdate,
} from '@root/types/playlist.types.js'
import type { DatabaseService } from '@services/database.service.js'

interface ChildPlaylistRow {
  id: number
  user_id: number
  base_playlist_id: number
  name: string
  description: string
  spotify_playlist_id: string
  filter_rules: string | null
  is_active: boolean | number
  created_at: string
  updated_at: string
}

/**
 * Decodes the stored rule set. Text that is not valid JSON is handed back
 * unchanged so routing reports it instead of treating the child as unfiltered.
 */
function decodeFilterRules(text: string | null): unknown {
  if (text === null) {
    return null
  }
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

function encodeFilterRules(rules: unknown): string | null {
  return rules === null || rules === undefined ? null : JSON.stringify(rules)
}

function mapRowToChildPlaylist(row: ChildPlaylistRow): ChildPlaylist {
  return {
    id: row.id,
    userId: row.user_id,
    basePlaylistId: row.base_playlist_id,
    name: row.name,
    description: row.description,
    spotifyPlaylistId: row.spotify_playlist_id,
    filterRules: decodeFilterRules(row.filter_rules),
    isActive: Boolean(row.is_active),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export async function createChildPlaylist(
  this: DatabaseService,
  data: ChildPlaylistCreate,
): Promise<ChildPlaylist> {
  const now = this.timestamp
  const result = await this.knex('child_playlists')
    .insert({
      user_id: data.userId,
      base_playlist_id: data.basePlaylistId,
      name: data.name,
      description: data.description,
      spotify_playlist_id: data.spotifyPlaylistId,
      filter_rules: encodeFilterRules(data.filterRules),
      is_active: data.isActive ?? true,
      created_at: now,
      updated_at: now,
    })
    .returning('id')

  return {
    id: this.extractId(result),
    userId: data.userId,
    basePlaylistId: data.basePlaylistId,
    name: data.name,
    description: data.description,
    spotifyPlaylistId: data.spotifyPlaylistId,
    filterRules: data.filterRules ?? null,
    isActive: data.isActive ?? true,
    createdAt: now,
    updatedAt: now,
  }
}

/**
 * Retrieves a child playlist owned by the given user
 */
export async function getChildPlaylist(
  this: DatabaseService,
  userId: number,
  childPlaylistId: number,
): Promise<ChildPlaylist | undefined> {
  const row = await this.knex<ChildPlaylistRow>('child_playlists')
    .where({ id: childPlaylistId, user_id: userId })
    .first()
  return row ? mapRowToChildPlaylist(row) : undefined
}

/**
 * Lists every child of a base playlist, active or not, in creation order
 */
export async function getChildPlaylists(
  this: DatabaseService,
  userId: number,
  basePlaylistId: number,
): Promise<ChildPlaylist[]> {
  const rows = await this.knex<ChildPlaylistRow>('child_playlists')
    .where({ user_id: userId, base_playlist_id: basePlaylistId })
    .orderBy('id', 'asc')
  return rows.map(mapRowToChildPlaylist)
}

/**
 * Lists the active children of a base playlist in creation order
 */
export async function getActiveChildPlaylists(
  this: DatabaseService,
  userId: number,
  basePlaylistId: number,
): Promise<ChildPlaylist[]> {
  const rows = await this.knex<ChildPlaylistRow>('child_playlists')
    .where({
      user_id: userId,
      base_playlist_id: basePlaylistId,
      is_active: true,
    })
    .orderBy('id', 'asc')
  return rows.map(mapRowToChildPlaylist)
}

/**
 * Applies a partial update to a child playlist
 *
 * @returns The updated child, or undefined when it does not exist for the user
 */
export async function updateChildPlaylist(
  this: DatabaseService,
  userId: number,
  childPlaylistId: number,
  update: ChildPlaylistUpdate,
): Promise<ChildPlaylist | undefined> {
  const changes: Record<string, unknown> = { updated_at: this.timestamp }
  if (update.name !== undefined) changes.name = update.name
  if (update.description !== undefined)
    changes.description = update.description
  if (update.isActive !== undefined) changes.is_active = update.isActive
  if ('filterRules' in update)
    changes.filter_rules = encodeFilterRules(update.filterRules)

  const updated = await this.knex('child_playlists')
    .where({ id: childPlaylistId, user_id: userId })
    .update(changes)

  if (updated === 0) {
    return undefined
  }
  return this.getChildPlaylist(userId, childPlaylistId)
}

/**
 * Points a child playlist at a new remote playlist
 *
 * @returns true when the child was found and updated
 */
export async function updateChildPlaylistSpotifyId(
  this: DatabaseService,
  userId: number,
  childPlaylistId: number,
  spotifyPlaylistId: string,
): Promise<boolean> {
  const updated = await this.knex('child_playlists')
    .where({ id: childPlaylistId, user_id: userId })
    .update({
      spotify_playlist_id: spotifyPlaylistId,
      updated_at: this.timestamp,
    })
  return updated > 0
}

export async function deleteChildPlaylist(
  this: DatabaseService,
  userId: number,
  childPlaylistId: number,
): Promise<boolean> {
  const deleted = await this.knex('child_playlists')
    .where({ id: childPlaylistId, user_id: userId })
    .delete()
  return deleted > 0
}
