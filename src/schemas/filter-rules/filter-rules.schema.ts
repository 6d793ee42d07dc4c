import { z } from 'zod'

export const FILTER_RULES_VERSION = 1

export const RANGE_ATTRIBUTES = [
  'popularity',
  'duration_ms',
  'release_year',
  'artist_popularity',
] as const

export const SET_ATTRIBUTES = [
  'genres',
  'explicit',
  'track_keywords',
  'artist_keywords',
] as const

export type RangeAttribute = (typeof RANGE_ATTRIBUTES)[number]
export type SetAttribute = (typeof SET_ATTRIBUTES)[number]
export type FilterAttribute = RangeAttribute | SetAttribute

export const RangePredicateSchema = z
  .object({
    kind: z.literal('range'),
    attribute: z.enum(RANGE_ATTRIBUTES),
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
  })
  .strict()

export const SetPredicateSchema = z
  .object({
    kind: z.literal('set'),
    attribute: z.enum(SET_ATTRIBUTES),
    include: z.array(z.string()).optional(),
    exclude: z.array(z.string()).optional(),
  })
  .strict()

export const PredicateSchema = z.discriminatedUnion('kind', [
  RangePredicateSchema,
  SetPredicateSchema,
])

export const FilterRuleSetSchema = z
  .object({
    version: z.literal(FILTER_RULES_VERSION),
    predicates: z.array(PredicateSchema),
  })
  .strict()
  .superRefine((ruleSet, ctx) => {
    ruleSet.predicates.forEach((predicate, index) => {
      if (predicate.kind === 'range') {
        if (
          predicate.min !== undefined &&
          predicate.max !== undefined &&
          predicate.min > predicate.max
        ) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['predicates', index],
            message: `min (${predicate.min}) is greater than max (${predicate.max})`,
          })
        }
        return
      }

      if (predicate.include === undefined && predicate.exclude === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['predicates', index],
          message: 'set predicate needs include or exclude',
        })
      }

      if (predicate.attribute === 'explicit') {
        const values = [...(predicate.include ?? []), ...(predicate.exclude ?? [])]
        for (const value of values) {
          if (value !== 'true' && value !== 'false') {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ['predicates', index],
              message: `explicit values must be "true" or "false", got "${value}"`,
            })
          }
        }
      }
    })
  })

export type RangePredicate = z.infer<typeof RangePredicateSchema>
export type SetPredicate = z.infer<typeof SetPredicateSchema>
export type Predicate = z.infer<typeof PredicateSchema>
export type FilterRuleSet = z.infer<typeof FilterRuleSetSchema>

/**
 * Formats zod issues as `path: message` pairs joined by semicolons.
 */
export function formatFilterRuleIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ')
}
