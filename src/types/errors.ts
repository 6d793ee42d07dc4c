export type SyncErrorKind =
  | 'conflict'
  | 'aggregation'
  | 'routing'
  | 'reconciliation'
  | 'persistence'
  | 'cancelled'

/**
 * Base class for every failure that ends a playlist sync.
 */
export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Another sync of the same base playlist is still in progress.
 */
export class SyncConflictError extends SyncError {
  readonly kind = 'conflict'

  constructor(
    readonly basePlaylistId: number,
    options?: { cause?: unknown },
  ) {
    super(
      `A sync is already in progress for base playlist ${basePlaylistId}`,
      options,
    )
  }
}

/**
 * Retrieving or enriching the base playlist's tracks failed.
 * Carries the counters reached before the failure.
 */
export class AggregationError extends SyncError {
  readonly kind = 'aggregation'

  constructor(
    message: string,
    readonly tracksFetched: number,
    readonly apiCallCount: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

export class RoutingError extends SyncError {
  readonly kind = 'routing'

  constructor(
    message: string,
    readonly childPlaylistId?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

export type ReconciliationStep = 'delete' | 'create' | 'persist' | 'add'

export class ReconciliationError extends SyncError {
  readonly kind = 'reconciliation'

  constructor(
    message: string,
    readonly childPlaylistId: number,
    readonly step: ReconciliationStep,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/**
 * Writing the sync event failed.
 */
export class SyncPersistenceError extends SyncError {
  readonly kind = 'persistence'
}

export class SyncCancelledError extends SyncError {
  readonly kind = 'cancelled'
}
