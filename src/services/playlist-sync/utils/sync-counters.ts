/**
 * Tracks the counters a sync reports on its event while it runs
 */
export class SyncCounters {
  private _apiCalls = 0
  private _tracksProcessed = 0
  private _childrenReconciled = 0
  private _tracksAdded = 0

  get apiCalls(): number {
    return this._apiCalls
  }
  get tracksProcessed(): number {
    return this._tracksProcessed
  }
  get childrenReconciled(): number {
    return this._childrenReconciled
  }
  get tracksAdded(): number {
    return this._tracksAdded
  }

  /**
   * Add remote calls made (default one)
   */
  addApiCalls(count = 1): void {
    this._apiCalls += count
  }

  addTracksProcessed(count: number): void {
    this._tracksProcessed += count
  }

  /**
   * Record a child playlist rebuilt with the given number of tracks
   */
  recordChildReconciled(trackCount: number): void {
    this._childrenReconciled++
    this._tracksAdded += trackCount
  }

  /**
   * Snapshot of the fields persisted on the sync event
   */
  toEventUpdate(): { tracksProcessed: number; totalApiRequests: number } {
    return {
      tracksProcessed: this._tracksProcessed,
      totalApiRequests: this._apiCalls,
    }
  }
}
