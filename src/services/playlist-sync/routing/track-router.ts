import { RoutingError } from '@root/types/errors.js'
import type {
  ChildPlaylist,
  PlaylistTrackSet,
  Track,
} from '@root/types/playlist.types.js'
import type { RoutingMap, TrackEvaluator } from '@root/types/router.types.js'
import {
  FilterRuleSetSchema,
  formatFilterRuleIssues,
  type Predicate,
} from '@schemas/filter-rules/filter-rules.schema.js'
import { createTrackEvaluators, findEvaluator } from './evaluator-registry.js'

export type TrackMatcher = (track: Track) => boolean

/**
 * Validates a child's stored rules and binds each predicate to its evaluator.
 * A child without rules matches every track.
 *
 * @throws RoutingError naming the child when the rules are invalid
 */
export function compileChildFilter(
  child: ChildPlaylist,
  evaluators: readonly TrackEvaluator[],
): TrackMatcher {
  if (child.filterRules === null || child.filterRules === undefined) {
    return () => true
  }

  const parsed = FilterRuleSetSchema.safeParse(child.filterRules)
  if (!parsed.success) {
    throw new RoutingError(
      `Invalid filter rules for child playlist ${child.id} ("${child.name}"): ${formatFilterRuleIssues(parsed.error)}`,
      child.id,
      { cause: parsed.error },
    )
  }

  const bound: Array<[Predicate, TrackEvaluator]> = parsed.data.predicates.map(
    (predicate) => {
      const evaluator = findEvaluator(evaluators, predicate.attribute)
      if (!evaluator) {
        throw new RoutingError(
          `No evaluator handles attribute "${predicate.attribute}" used by child playlist ${child.id} ("${child.name}")`,
          child.id,
        )
      }
      return [predicate, evaluator]
    },
  )

  return (track) =>
    bound.every(([predicate, evaluator]) => evaluator.evaluate(predicate, track))
}

/**
 * Routes the base playlist's tracks to the active children whose rules they
 * satisfy.
 *
 * Every active child's rules are validated before any track is routed, so an
 * invalid rule set yields no partial result. URIs keep the base playlist's
 * order, children with no matches get no entry, and entries follow the order
 * of `childPlaylists`.
 *
 * @returns Map of remote child playlist id to matching track URIs
 * @throws RoutingError when a child's rules are invalid
 */
export function routeTracks(
  trackSet: PlaylistTrackSet,
  childPlaylists: readonly ChildPlaylist[],
  evaluators: readonly TrackEvaluator[] = createTrackEvaluators(),
): RoutingMap {
  const matchers = childPlaylists
    .filter((child) => child.isActive)
    .map((child) => ({ child, matches: compileChildFilter(child, evaluators) }))

  const routes: RoutingMap = new Map()
  for (const { child, matches } of matchers) {
    const uris = trackSet.tracks.filter(matches).map((track) => track.uri)
    if (uris.length > 0) {
      routes.set(child.spotifyPlaylistId, uris)
    }
  }
  return routes
}
