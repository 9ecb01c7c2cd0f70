/**
 * Sync module barrel exports
 */

export { GitOperations } from './git-operations.js';
export { SyncEngine, countActions } from './sync-engine.js';
export type { SyncEngineOptions, SyncRunOptions } from './sync-engine.js';
export { StatusInspector, formatStatus } from './status-inspector.js';
export { isCheckoutName, isRemoteUrl, repositoryName, sameRemote } from './remote-url.js';
