export type { PlaylistReconcilerDeps } from './playlist-reconciler.js'
export { chunkUris, reconcileChildPlaylist } from './playlist-reconciler.js'
