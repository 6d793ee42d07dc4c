import type {
  FilterAttribute,
  Predicate,
} from '@schemas/filter-rules/filter-rules.schema.js'
import type { Track } from '@root/types/playlist.types.js'
import type { AttributeInfo, TrackEvaluator } from '@root/types/router.types.js'
import { matchesSetPredicate, normalizeString } from './set-matching.js'

/**
 * Creates the evaluator for the genres attribute.
 *
 * A track's genres are the union of its artists' genres. Matching is exact
 * per genre and case-insensitive, so "rock" does not match "indie rock".
 */
export default function createGenreEvaluator(): TrackEvaluator {
  const supportedAttributes: AttributeInfo[] = [
    {
      name: 'genres',
      kind: 'set',
      description: 'Genres of the track artists',
      valueTypes: ['string[]'],
      valueFormat:
        'include and/or exclude lists, e.g. { include: ["synthwave"], exclude: ["pop"] }',
    },
  ]

  return {
    name: 'Genre Evaluator',
    description: 'Matches tracks by the genres of their artists',
    supportedAttributes,

    canEvaluate(attribute: FilterAttribute): boolean {
      return attribute === 'genres'
    },

    evaluate(predicate: Predicate, track: Track): boolean {
      if (predicate.kind !== 'set') {
        return false
      }

      const trackGenres = new Set(track.genres.map(normalizeString))
      return matchesSetPredicate(predicate, (genre) => trackGenres.has(genre))
    },
  }
}
