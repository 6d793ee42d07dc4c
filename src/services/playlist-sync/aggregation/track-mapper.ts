import type { ArtistInfo, Track } from '@root/types/playlist.types.js'
import type { SpotifyArtist, SpotifyTrack } from '@root/types/spotify.types.js'

/**
 * Year from the leading four digits of a Spotify release date.
 * Dates come as `YYYY`, `YYYY-MM` or `YYYY-MM-DD`; anything else is 0.
 */
export function parseReleaseYear(releaseDate: string | null | undefined): number {
  const match = /^(\d{4})/.exec(releaseDate ?? '')
  return match ? Number(match[1]) : 0
}

export function toArtistInfo(artist: SpotifyArtist): ArtistInfo {
  return {
    id: artist.id,
    name: artist.name,
    genres: artist.genres,
    popularity: artist.popularity,
    uri: artist.uri,
  }
}

/**
 * Whether a playlist item can be routed: a catalogue track with an id.
 * Removed entries, local files and podcast episodes are not.
 */
export function isRoutableTrack(
  track: SpotifyTrack | null,
): track is SpotifyTrack & { id: string } {
  return (
    track !== null &&
    track.id !== null &&
    track.is_local !== true &&
    track.type !== 'episode'
  )
}

/**
 * Builds the routed track, deriving genres and artist popularity from the
 * looked-up artists. Artists missing from the lookup contribute their name only.
 */
export function toTrack(
  track: SpotifyTrack & { id: string },
  artists: ReadonlyMap<string, ArtistInfo>,
): Track {
  const artistIds = track.artists
    .map((artist) => artist.id)
    .filter((id): id is string => id !== null)

  const genres: string[] = []
  const seenGenres = new Set<string>()
  let maxArtistPopularity = 0

  for (const id of artistIds) {
    const artist = artists.get(id)
    if (!artist) continue

    maxArtistPopularity = Math.max(maxArtistPopularity, artist.popularity)
    for (const genre of artist.genres) {
      const normalized = genre.toLowerCase()
      if (!seenGenres.has(normalized)) {
        seenGenres.add(normalized)
        genres.push(normalized)
      }
    }
  }

  return {
    id: track.id,
    name: track.name,
    uri: track.uri,
    durationMs: track.duration_ms,
    popularity: track.popularity,
    explicit: track.explicit,
    album: {
      id: track.album.id ?? '',
      name: track.album.name,
      releaseDate: track.album.release_date,
      uri: track.album.uri,
    },
    artists: artistIds,
    releaseYear: parseReleaseYear(track.album.release_date),
    genres,
    artistNames: track.artists.map((artist) => artist.name),
    maxArtistPopularity,
  }
}
