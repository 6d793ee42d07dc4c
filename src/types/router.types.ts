import type {
  FilterAttribute,
  Predicate,
} from '@schemas/filter-rules/filter-rules.schema.js'
import type { Track } from '@root/types/playlist.types.js'

/**
 * Information about an attribute a track evaluator handles
 */
export interface AttributeInfo {
  name: FilterAttribute
  kind: Predicate['kind']
  description: string
  valueTypes: string[]
  valueFormat?: string
}

export interface TrackEvaluator {
  name: string
  description: string
  supportedAttributes: AttributeInfo[]

  canEvaluate(attribute: FilterAttribute): boolean

  /**
   * Returns true when the track satisfies the predicate.
   * Only called for predicates whose attribute passed canEvaluate.
   */
  evaluate(predicate: Predicate, track: Track): boolean
}

/**
 * Ordered routing result: remote child playlist id to matching track URIs.
 * Iteration order follows the order of the children given to the router.
 */
export type RoutingMap = Map<string, string[]>
