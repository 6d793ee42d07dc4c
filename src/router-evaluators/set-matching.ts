import type { SetPredicate } from '@schemas/filter-rules/filter-rules.schema.js'

export function normalizeString(value: string): string {
  return value.trim().toLowerCase()
}

/**
 * Applies the include/exclude halves of a set predicate.
 *
 * `hasValue` receives each normalized predicate value and reports whether the
 * track carries it. An empty `include` list matches nothing.
 */
export function matchesSetPredicate(
  predicate: SetPredicate,
  hasValue: (normalized: string) => boolean,
): boolean {
  if (
    predicate.include !== undefined &&
    !predicate.include.some((value) => hasValue(normalizeString(value)))
  ) {
    return false
  }

  if (
    predicate.exclude !== undefined &&
    predicate.exclude.some((value) => hasValue(normalizeString(value)))
  ) {
    return false
  }

  return true
}
