import createExplicitEvaluator from '@root/router-evaluators/explicit-evaluator.js'
import createGenreEvaluator from '@root/router-evaluators/genre-evaluator.js'
import createKeywordEvaluator from '@root/router-evaluators/keyword-evaluator.js'
import createRangeEvaluator from '@root/router-evaluators/range-evaluator.js'
import type { FilterAttribute } from '@schemas/filter-rules/filter-rules.schema.js'
import type { AttributeInfo, TrackEvaluator } from '@root/types/router.types.js'

export interface FilterAttributeDescription extends AttributeInfo {
  evaluator: string
}

/**
 * Creates the evaluators handling every filter attribute, one per predicate family
 */
export function createTrackEvaluators(): TrackEvaluator[] {
  return [
    createRangeEvaluator(),
    createGenreEvaluator(),
    createExplicitEvaluator(),
    createKeywordEvaluator(),
  ]
}

export function findEvaluator(
  evaluators: readonly TrackEvaluator[],
  attribute: FilterAttribute,
): TrackEvaluator | undefined {
  return evaluators.find((evaluator) => evaluator.canEvaluate(attribute))
}

/**
 * Flattens the evaluators' self-description into one entry per attribute
 */
export function describeFilterAttributes(
  evaluators: readonly TrackEvaluator[],
): FilterAttributeDescription[] {
  return evaluators.flatMap((evaluator) =>
    evaluator.supportedAttributes.map((attribute) => ({
      ...attribute,
      evaluator: evaluator.name,
    })),
  )
}
