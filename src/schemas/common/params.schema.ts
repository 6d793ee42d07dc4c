import { z } from 'zod'

const IdSchema = z.coerce.number().int().positive()

export const UserParamsSchema = z.object({
  userId: IdSchema,
})

export const BasePlaylistParamsSchema = UserParamsSchema.extend({
  basePlaylistId: IdSchema,
})

export const ChildPlaylistParamsSchema = UserParamsSchema.extend({
  childPlaylistId: IdSchema,
})

export const SyncEventParamsSchema = BasePlaylistParamsSchema.extend({
  syncEventId: IdSchema,
})

export type UserParams = z.infer<typeof UserParamsSchema>
export type BasePlaylistParams = z.infer<typeof BasePlaylistParamsSchema>
export type ChildPlaylistParams = z.infer<typeof ChildPlaylistParamsSchema>
export type SyncEventParams = z.infer<typeof SyncEventParamsSchema>
