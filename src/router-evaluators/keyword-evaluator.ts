import type {
  FilterAttribute,
  Predicate,
} from '@schemas/filter-rules/filter-rules.schema.js'
import type { Track } from '@root/types/playlist.types.js'
import type { AttributeInfo, TrackEvaluator } from '@root/types/router.types.js'
import { matchesSetPredicate, normalizeString } from './set-matching.js'

type KeywordAttribute = 'track_keywords' | 'artist_keywords'

const KEYWORD_SOURCES: Record<KeywordAttribute, (track: Track) => string> = {
  track_keywords: (track) => track.name,
  artist_keywords: (track) => track.artistNames.join(' '),
}

function isKeywordAttribute(attribute: string): attribute is KeywordAttribute {
  return attribute in KEYWORD_SOURCES
}

/**
 * Creates the evaluator for keyword attributes.
 *
 * Keywords are case-insensitive substrings of the track name or of the
 * artist names joined with spaces.
 */
export default function createKeywordEvaluator(): TrackEvaluator {
  const supportedAttributes: AttributeInfo[] = [
    {
      name: 'track_keywords',
      kind: 'set',
      description: 'Words or phrases in the track name',
      valueTypes: ['string[]'],
      valueFormat: 'e.g. { exclude: ["remix", "live"] }',
    },
    {
      name: 'artist_keywords',
      kind: 'set',
      description: 'Words or phrases in the artist names',
      valueTypes: ['string[]'],
      valueFormat: 'e.g. { include: ["orchestra"] }',
    },
  ]

  return {
    name: 'Keyword Evaluator',
    description: 'Matches tracks by text in their name or artist names',
    supportedAttributes,

    canEvaluate(attribute: FilterAttribute): boolean {
      return isKeywordAttribute(attribute)
    },

    evaluate(predicate: Predicate, track: Track): boolean {
      if (predicate.kind !== 'set' || !isKeywordAttribute(predicate.attribute)) {
        return false
      }

      const text = normalizeString(KEYWORD_SOURCES[predicate.attribute](track))
      return matchesSetPredicate(predicate, (keyword) => text.includes(keyword))
    },
  }
}
