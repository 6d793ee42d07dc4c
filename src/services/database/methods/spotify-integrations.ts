import type { SpotifyIntegration } from '@root/types/config.types.js'
import type { DatabaseService } from '@services/database.service.js'

export type SpotifyIntegrationUpsert = Pick<
  SpotifyIntegration,
  'user_id' | 'spotify_user_id' | 'access_token'
> & { display_name?: string | null }

/**
 * Retrieves the Spotify integration for a user
 */
export async function getSpotifyIntegration(
  this: DatabaseService,
  userId: number,
): Promise<SpotifyIntegration | undefined> {
  return this.knex<SpotifyIntegration>('spotify_integrations')
    .where({ user_id: userId })
    .first()
}

/**
 * Creates or replaces the Spotify integration of a user
 *
 * @returns The stored integration
 */
export async function upsertSpotifyIntegration(
  this: DatabaseService,
  data: SpotifyIntegrationUpsert,
): Promise<SpotifyIntegration> {
  const now = this.timestamp
  await this.knex('spotify_integrations')
    .insert({
      user_id: data.user_id,
      spotify_user_id: data.spotify_user_id,
      display_name: data.display_name ?? null,
      access_token: data.access_token,
      created_at: now,
      updated_at: now,
    })
    .onConflict('user_id')
    .merge(['spotify_user_id', 'display_name', 'access_token', 'updated_at'])

  const stored = await this.getSpotifyIntegration(data.user_id)
  if (!stored) {
    throw new Error(
      `Failed to store Spotify integration for user ${data.user_id}`,
    )
  }
  return stored
}
