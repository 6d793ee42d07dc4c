import type { SyncErrorKind } from '@root/types/errors.js'

export type SyncStatus = 'in_progress' | 'completed' | 'failed'

export interface SyncEvent {
  id: number
  userId: number
  basePlaylistId: number
  childPlaylistIds: number[]
  status: SyncStatus
  startedAt: string
  completedAt: string | null
  tracksProcessed: number
  totalApiRequests: number
  errorMessage: string | null
  errorKind: SyncErrorKind | null
  createdAt: string
  updatedAt: string
}

export type SyncEventCreate = Pick<
  SyncEvent,
  'userId' | 'basePlaylistId' | 'status' | 'startedAt'
> & { childPlaylistIds?: number[] }

export type SyncEventUpdate = Partial<
  Pick<
    SyncEvent,
    | 'childPlaylistIds'
    | 'status'
    | 'completedAt'
    | 'tracksProcessed'
    | 'totalApiRequests'
    | 'errorMessage'
    | 'errorKind'
  >
>
