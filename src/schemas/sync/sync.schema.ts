import { z } from 'zod'

export const SyncEventSchema = z.object({
  id: z.number(),
  userId: z.number(),
  basePlaylistId: z.number(),
  childPlaylistIds: z.array(z.number()),
  status: z.enum(['in_progress', 'completed', 'failed']),
  startedAt: z.string(),
  completedAt: z.string().nullable(),
  tracksProcessed: z.number(),
  totalApiRequests: z.number(),
  errorMessage: z.string().nullable(),
  errorKind: z
    .enum([
      'conflict',
      'aggregation',
      'routing',
      'reconciliation',
      'persistence',
      'cancelled',
    ])
    .nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
})

export const SyncEventsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
})

export const SyncEventListSchema = z.object({
  syncEvents: z.array(SyncEventSchema),
})

export type SyncEventResponse = z.infer<typeof SyncEventSchema>
export type SyncEventsQuery = z.infer<typeof SyncEventsQuerySchema>
export type SyncEventListResponse = z.infer<typeof SyncEventListSchema>
