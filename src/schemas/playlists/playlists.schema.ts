import { FilterRuleSetSchema } from '@schemas/filter-rules/filter-rules.schema.js'
import { z } from 'zod'

export const CreateBasePlaylistBodySchema = z.object({
  name: z.string().min(1),
  spotifyPlaylistId: z.string().min(1),
  isActive: z.boolean().optional(),
})

export const BasePlaylistSchema = z.object({
  id: z.number(),
  userId: z.number(),
  name: z.string(),
  spotifyPlaylistId: z.string(),
  isActive: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
})

export const BasePlaylistListSchema = z.object({
  basePlaylists: z.array(BasePlaylistSchema),
})

export const CreateChildPlaylistBodySchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  filterRules: FilterRuleSetSchema.nullable().optional(),
  isActive: z.boolean().optional(),
})

export const UpdateChildPlaylistBodySchema = z
  .object({
    name: z.string().min(1).optional(),
    description: z.string().optional(),
    filterRules: FilterRuleSetSchema.nullable().optional(),
    isActive: z.boolean().optional(),
  })
  .refine((body) => Object.keys(body).length > 0, {
    message: 'At least one field must be provided',
  })

export const ChildPlaylistSchema = z.object({
  id: z.number(),
  userId: z.number(),
  basePlaylistId: z.number(),
  name: z.string(),
  description: z.string(),
  spotifyPlaylistId: z.string(),
  filterRules: z.unknown(),
  isActive: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
})

export const ChildPlaylistListSchema = z.object({
  childPlaylists: z.array(ChildPlaylistSchema),
})

export type CreateBasePlaylistBody = z.infer<typeof CreateBasePlaylistBodySchema>
export type BasePlaylistResponse = z.infer<typeof BasePlaylistSchema>
export type BasePlaylistListResponse = z.infer<typeof BasePlaylistListSchema>
export type CreateChildPlaylistBody = z.infer<
  typeof CreateChildPlaylistBodySchema
>
export type UpdateChildPlaylistBody = z.infer<
  typeof UpdateChildPlaylistBodySchema
>
export type ChildPlaylistResponse = z.infer<typeof ChildPlaylistSchema>
export type ChildPlaylistListResponse = z.infer<typeof ChildPlaylistListSchema>
