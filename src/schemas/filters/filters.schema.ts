import {
  RANGE_ATTRIBUTES,
  SET_ATTRIBUTES,
} from '@schemas/filter-rules/filter-rules.schema.js'
import { z } from 'zod'

export const FilterAttributeSchema = z.object({
  name: z.enum([...RANGE_ATTRIBUTES, ...SET_ATTRIBUTES]),
  kind: z.enum(['range', 'set']),
  description: z.string(),
  valueTypes: z.array(z.string()),
  valueFormat: z.string().optional(),
  evaluator: z.string(),
})

export const FilterAttributesResponseSchema = z.object({
  version: z.number(),
  attributes: z.array(FilterAttributeSchema),
})

export type FilterAttributesResponse = z.infer<
  typeof FilterAttributesResponseSchema
>
