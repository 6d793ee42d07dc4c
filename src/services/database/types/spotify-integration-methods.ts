import type { SpotifyIntegration } from '@root/types/config.types.js'
import type { SpotifyIntegrationUpsert } from '../methods/spotify-integrations.js'

declare module '../../database.service.js' {
  interface DatabaseService {
    // SPOTIFY INTEGRATIONS
    /**
     * Retrieves the Spotify integration for a user
     * @param userId - ID of the user
     * @returns Promise resolving to the integration if configured
     */
    getSpotifyIntegration(
      userId: number,
    ): Promise<SpotifyIntegration | undefined>

    /**
     * Creates or replaces the Spotify integration of a user
     * @param data - Spotify user id, access token and display name
     * @returns Promise resolving to the stored integration
     */
    upsertSpotifyIntegration(
      data: SpotifyIntegrationUpsert,
    ): Promise<SpotifyIntegration>
  }
}
