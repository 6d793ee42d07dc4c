export type { TrackAggregatorDeps } from './track-aggregator.js'
export { aggregatePlaylistTracks } from './track-aggregator.js'
export {
  isRoutableTrack,
  parseReleaseYear,
  toArtistInfo,
  toTrack,
} from './track-mapper.js'
