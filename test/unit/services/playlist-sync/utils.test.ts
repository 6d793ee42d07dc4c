import {
  buildChildPlaylistDescription,
  buildChildPlaylistName,
  errorMessage,
  MANAGED_DESCRIPTION_PREFIX,
  SyncCounters,
} from '@services/playlist-sync/utils/index.js'
import { describe, expect, it } from 'vitest'

describe('playlist-naming', () => {
  it('should prefix the child name with the base playlist name', () => {
    expect(buildChildPlaylistName('Road Trip', 'Slow Songs')).toBe(
      '[Road Trip] > Slow Songs',
    )
  })

  it('should mark the description as managed', () => {
    expect(buildChildPlaylistDescription('Mellow picks')).toBe(
      `${MANAGED_DESCRIPTION_PREFIX} Mellow picks`,
    )
  })
})

describe('SyncCounters', () => {
  it('should start at zero', () => {
    const counters = new SyncCounters()

    expect(counters.toEventUpdate()).toEqual({
      tracksProcessed: 0,
      totalApiRequests: 0,
    })
  })

  it('should accumulate calls, tracks and rebuilt children', () => {
    const counters = new SyncCounters()

    counters.addApiCalls(4)
    counters.addApiCalls()
    counters.addTracksProcessed(12)
    counters.recordChildReconciled(7)
    counters.recordChildReconciled(3)

    expect(counters.apiCalls).toBe(5)
    expect(counters.childrenReconciled).toBe(2)
    expect(counters.tracksAdded).toBe(10)
    expect(counters.toEventUpdate()).toEqual({
      tracksProcessed: 12,
      totalApiRequests: 5,
    })
  })
})

describe('errorMessage', () => {
  it('should use the message of an Error and stringify anything else', () => {
    expect(errorMessage(new Error('quota exceeded'))).toBe('quota exceeded')
    expect(errorMessage('timed out')).toBe('timed out')
    expect(errorMessage(undefined)).toBe('undefined')
  })
})
