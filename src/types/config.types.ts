export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  baseUrl: string
  port: number
  dbPath: string
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  syncRateLimitMax: number
  // Spotify Config
  spotifyApiBaseUrl: string
  spotifyRequestTimeout: number
  // Sync Config
  syncTimeoutMs: number
  trackPageSize: number
}

export interface User {
  id: number
  name: string
  created_at: string
  updated_at: string
}

export interface SpotifyIntegration {
  id: number
  user_id: number
  spotify_user_id: string
  display_name: string | null
  access_token: string
  created_at: string
  updated_at: string
}
