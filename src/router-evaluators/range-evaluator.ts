import type {
  FilterAttribute,
  Predicate,
  RangeAttribute,
} from '@schemas/filter-rules/filter-rules.schema.js'
import type { Track } from '@root/types/playlist.types.js'
import type { AttributeInfo, TrackEvaluator } from '@root/types/router.types.js'

const RANGE_READERS: Record<RangeAttribute, (track: Track) => number> = {
  popularity: (track) => track.popularity,
  duration_ms: (track) => track.durationMs,
  release_year: (track) => track.releaseYear,
  artist_popularity: (track) => track.maxArtistPopularity,
}

function isRangeAttribute(attribute: string): attribute is RangeAttribute {
  return attribute in RANGE_READERS
}

/**
 * Creates the evaluator for numeric attributes with inclusive min/max bounds.
 * Either bound may be omitted.
 */
export default function createRangeEvaluator(): TrackEvaluator {
  const supportedAttributes: AttributeInfo[] = [
    {
      name: 'popularity',
      kind: 'range',
      description: 'Track popularity on a 0-100 scale',
      valueTypes: ['number'],
      valueFormat: 'Object with min and/or max, e.g. { min: 40, max: 90 }',
    },
    {
      name: 'duration_ms',
      kind: 'range',
      description: 'Track length in milliseconds',
      valueTypes: ['number'],
      valueFormat: 'Object with min and/or max, e.g. { max: 240000 }',
    },
    {
      name: 'release_year',
      kind: 'range',
      description: 'Year the album was released, 0 when unknown',
      valueTypes: ['number'],
      valueFormat: 'Object with min and/or max, e.g. { min: 1980, max: 1989 }',
    },
    {
      name: 'artist_popularity',
      kind: 'range',
      description: 'Highest popularity among the track artists',
      valueTypes: ['number'],
      valueFormat: 'Object with min and/or max, e.g. { min: 70 }',
    },
  ]

  return {
    name: 'Range Evaluator',
    description: 'Matches numeric track attributes against a range',
    supportedAttributes,

    canEvaluate(attribute: FilterAttribute): boolean {
      return isRangeAttribute(attribute)
    },

    evaluate(predicate: Predicate, track: Track): boolean {
      if (predicate.kind !== 'range') {
        return false
      }

      const value = RANGE_READERS[predicate.attribute](track)

      if (predicate.min !== undefined && value < predicate.min) {
        return false
      }
      if (predicate.max !== undefined && value > predicate.max) {
        return false
      }
      return true
    },
  }
}
