import { z } from 'zod'

export const SpotifyIntegrationBodySchema = z.object({
  spotifyUserId: z.string().min(1),
  accessToken: z.string().min(1),
  displayName: z.string().nullable().optional(),
  // Name for the user record when it does not exist yet
  userName: z.string().min(1).optional(),
})

// The access token is never echoed back
export const SpotifyIntegrationResponseSchema = z.object({
  userId: z.number(),
  spotifyUserId: z.string(),
  displayName: z.string().nullable(),
  updatedAt: z.string(),
})

// Spotify serves at most 50 playlists per page
export const SpotifyPlaylistsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(20),
  offset: z.coerce.number().int().min(0).default(0),
})

export const SpotifyPlaylistSummarySchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  public: z.boolean().nullable(),
  uri: z.string(),
  // Created by a sync as a child playlist
  managed: z.boolean(),
})

export const SpotifyPlaylistsResponseSchema = z.object({
  playlists: z.array(SpotifyPlaylistSummarySchema),
  total: z.number(),
  limit: z.number(),
  offset: z.number(),
  hasMore: z.boolean(),
})

export type SpotifyIntegrationBody = z.infer<
  typeof SpotifyIntegrationBodySchema
>
export type SpotifyIntegrationResponse = z.infer<
  typeof SpotifyIntegrationResponseSchema
>
export type SpotifyPlaylistsQuery = z.infer<typeof SpotifyPlaylistsQuerySchema>
export type SpotifyPlaylistsResponse = z.infer<
  typeof SpotifyPlaylistsResponseSchema
>
