import type { Knex } from 'knex'

const SEED_TIMESTAMP = '2024-01-01T00:00:00.000Z'

export const SEED_USERS = [
  { id: 1, name: 'test-listener' },
  { id: 2, name: 'other-listener' },
] as const

export const SEED_SPOTIFY_INTEGRATIONS = [
  {
    user_id: 1,
    spotify_user_id: 'listener-1',
    display_name: 'Test Listener',
    access_token: 'test-token',
  },
] as const

export const SEED_BASE_PLAYLISTS = [
  { id: 1, user_id: 1, name: 'Road Trip', spotify_playlist_id: 'base-remote' },
] as const

/**
 * Seeds two users, a Spotify integration for the first and one base playlist
 * Call this after resetDatabase() in beforeEach hooks
 */
export async function seedAll(knex: Knex): Promise<void> {
  await knex('users').insert(
    SEED_USERS.map((user) => ({
      ...user,
      created_at: SEED_TIMESTAMP,
      updated_at: SEED_TIMESTAMP,
    })),
  )
  await knex('spotify_integrations').insert(
    SEED_SPOTIFY_INTEGRATIONS.map((integration) => ({
      ...integration,
      created_at: SEED_TIMESTAMP,
      updated_at: SEED_TIMESTAMP,
    })),
  )
  await knex('base_playlists').insert(
    SEED_BASE_PLAYLISTS.map((playlist) => ({
      ...playlist,
      is_active: true,
      created_at: SEED_TIMESTAMP,
      updated_at: SEED_TIMESTAMP,
    })),
  )
}
