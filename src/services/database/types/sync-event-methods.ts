import type {
  SyncEvent,
  SyncEventCreate,
  SyncEventUpdate,
} from '@root/types/sync-event.types.js'

declare module '../../database.service.js' {
  interface DatabaseService {
    // SYNC EVENTS
    /**
     * Checks whether a sync of the base playlist is in progress
     */
    hasInProgressSync(userId: number, basePlaylistId: number): Promise<boolean>

    /**
     * Records the start of a sync
     * @throws SyncConflictError if another in-progress event exists
     */
    createSyncEvent(data: SyncEventCreate): Promise<SyncEvent>

    /**
     * Applies changes to a sync event
     * @returns Promise resolving to the updated event
     */
    updateSyncEvent(id: number, update: SyncEventUpdate): Promise<SyncEvent>

    getSyncEvent(userId: number, id: number): Promise<SyncEvent | undefined>

    /**
     * Lists sync events of a base playlist, newest first
     * @param options - Page size (default 50) and offset
     */
    getSyncEvents(
      userId: number,
      basePlaylistId: number,
      options?: { limit?: number; offset?: number },
    ): Promise<SyncEvent[]>
  }
}
