export type { SyncOrchestratorDeps } from './sync-orchestrator.js'
export { syncBasePlaylist } from './sync-orchestrator.js'
