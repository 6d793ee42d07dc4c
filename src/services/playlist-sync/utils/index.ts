export {
  buildChildPlaylistDescription,
  buildChildPlaylistName,
  MANAGED_DESCRIPTION_PREFIX,
} from './playlist-naming.js'
export { SyncCounters } from './sync-counters.js'
export { errorMessage } from './error-message.js'
