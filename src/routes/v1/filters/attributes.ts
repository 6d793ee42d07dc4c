import { FILTER_RULES_VERSION } from '@schemas/filter-rules/filter-rules.schema.js'
import {
  type FilterAttributesResponse,
  FilterAttributesResponseSchema,
} from '@schemas/filters/filters.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: FilterAttributesResponse
  }>(
    '/attributes',
    {
      schema: {
        summary: 'List filter attributes',
        description:
          'Returns every attribute child playlist filter rules can use, with its predicate kind and value format.',
        response: {
          200: FilterAttributesResponseSchema,
        },
        tags: ['Filters'],
      },
    },
    async () => {
      return {
        version: FILTER_RULES_VERSION,
        attributes: fastify.playlistSync.getFilterAttributes(),
      }
    },
  )
}

export default plugin
