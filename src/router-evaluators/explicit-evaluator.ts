import type {
  FilterAttribute,
  Predicate,
} from '@schemas/filter-rules/filter-rules.schema.js'
import type { Track } from '@root/types/playlist.types.js'
import type { AttributeInfo, TrackEvaluator } from '@root/types/router.types.js'
import { matchesSetPredicate } from './set-matching.js'

export default function createExplicitEvaluator(): TrackEvaluator {
  const supportedAttributes: AttributeInfo[] = [
    {
      name: 'explicit',
      kind: 'set',
      description: 'Whether the track is marked explicit',
      valueTypes: ['string[]'],
      valueFormat: 'Values "true" or "false", e.g. { exclude: ["true"] }',
    },
  ]

  return {
    name: 'Explicit Evaluator',
    description: 'Matches tracks by their explicit flag',
    supportedAttributes,

    canEvaluate(attribute: FilterAttribute): boolean {
      return attribute === 'explicit'
    },

    evaluate(predicate: Predicate, track: Track): boolean {
      if (predicate.kind !== 'set') {
        return false
      }

      const flag = String(track.explicit)
      return matchesSetPredicate(predicate, (value) => value === flag)
    },
  }
}
