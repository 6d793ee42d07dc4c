import { SyncConflictError, type SyncErrorKind } from '@root/types/errors.js'
import type {
  SyncEvent,
  SyncEventCreate,
  SyncEventUpdate,
  SyncStatus,
} from '@root/types/sync-event.types.js'
import type { DatabaseService } from '@services/database.service.js'

interface SyncEventRow {
  id: number
  user_id: number
  base_playlist_id: number
  child_playlist_ids: string
  status: SyncStatus
  started_at: string
  completed_at: string | null
  tracks_processed: number
  total_api_requests: number
  error_message: string | null
  error_kind: SyncErrorKind | null
  created_at: string
  updated_at: string
}

function parseIdList(value: string): number[] {
  const parsed: unknown = JSON.parse(value)
  if (!Array.isArray(parsed)) {
    throw new Error(`Expected a JSON array of ids, got: ${value}`)
  }
  return parsed.filter((id): id is number => typeof id === 'number')
}

function mapRowToSyncEvent(row: SyncEventRow): SyncEvent {
  return {
    id: row.id,
    userId: row.user_id,
    basePlaylistId: row.base_playlist_id,
    childPlaylistIds: parseIdList(row.child_playlist_ids),
    status: row.status,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    tracksProcessed: row.tracks_processed,
    totalApiRequests: row.total_api_requests,
    errorMessage: row.error_message,
    errorKind: row.error_kind,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === '23505')
  )
}

/**
 * Checks whether a sync of the base playlist is currently in progress
 */
export async function hasInProgressSync(
  this: DatabaseService,
  userId: number,
  basePlaylistId: number,
): Promise<boolean> {
  const row = await this.knex('sync_events')
    .where({
      user_id: userId,
      base_playlist_id: basePlaylistId,
      status: 'in_progress',
    })
    .first('id')
  return row !== undefined
}

/**
 * Records the start of a sync.
 *
 * @throws SyncConflictError when another in-progress event exists for the
 * same base playlist (enforced by a partial unique index)
 */
export async function createSyncEvent(
  this: DatabaseService,
  data: SyncEventCreate,
): Promise<SyncEvent> {
  const now = this.timestamp
  const childPlaylistIds = data.childPlaylistIds ?? []

  try {
    const result = await this.knex('sync_events')
      .insert({
        user_id: data.userId,
        base_playlist_id: data.basePlaylistId,
        child_playlist_ids: JSON.stringify(childPlaylistIds),
        status: data.status,
        started_at: data.startedAt,
        tracks_processed: 0,
        total_api_requests: 0,
        created_at: now,
        updated_at: now,
      })
      .returning('id')

    return {
      id: this.extractId(result),
      userId: data.userId,
      basePlaylistId: data.basePlaylistId,
      childPlaylistIds,
      status: data.status,
      startedAt: data.startedAt,
      completedAt: null,
      tracksProcessed: 0,
      totalApiRequests: 0,
      errorMessage: null,
      errorKind: null,
      createdAt: now,
      updatedAt: now,
    }
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new SyncConflictError(data.basePlaylistId, { cause: error })
    }
    throw error
  }
}

/**
 * Applies changes to a sync event
 *
 * @throws When the event does not exist
 */
export async function updateSyncEvent(
  this: DatabaseService,
  id: number,
  update: SyncEventUpdate,
): Promise<SyncEvent> {
  const changes: Record<string, unknown> = { updated_at: this.timestamp }
  if (update.childPlaylistIds !== undefined)
    changes.child_playlist_ids = JSON.stringify(update.childPlaylistIds)
  if (update.status !== undefined) changes.status = update.status
  if (update.completedAt !== undefined)
    changes.completed_at = update.completedAt
  if (update.tracksProcessed !== undefined)
    changes.tracks_processed = update.tracksProcessed
  if (update.totalApiRequests !== undefined)
    changes.total_api_requests = update.totalApiRequests
  if (update.errorMessage !== undefined)
    changes.error_message = update.errorMessage
  if (update.errorKind !== undefined) changes.error_kind = update.errorKind

  const updated = await this.knex('sync_events').where({ id }).update(changes)
  if (updated === 0) {
    throw new Error(`Sync event ${id} not found`)
  }

  const row = await this.knex<SyncEventRow>('sync_events')
    .where({ id })
    .first()
  if (!row) {
    throw new Error(`Sync event ${id} not found`)
  }
  return mapRowToSyncEvent(row)
}

export async function getSyncEvent(
  this: DatabaseService,
  userId: number,
  id: number,
): Promise<SyncEvent | undefined> {
  const row = await this.knex<SyncEventRow>('sync_events')
    .where({ id, user_id: userId })
    .first()
  return row ? mapRowToSyncEvent(row) : undefined
}

/**
 * Lists sync events of a base playlist, newest first
 */
export async function getSyncEvents(
  this: DatabaseService,
  userId: number,
  basePlaylistId: number,
  options: { limit?: number; offset?: number } = {},
): Promise<SyncEvent[]> {
  const rows = await this.knex<SyncEventRow>('sync_events')
    .where({ user_id: userId, base_playlist_id: basePlaylistId })
    .orderBy([
      { column: 'started_at', order: 'desc' },
      { column: 'id', order: 'desc' },
    ])
    .limit(options.limit ?? 50)
    .offset(options.offset ?? 0)
  return rows.map(mapRowToSyncEvent)
}
