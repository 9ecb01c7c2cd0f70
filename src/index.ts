/**
 * repotree public API
 */

export { LayoutParser } from './services/layout/index.js';
export {
  GitOperations,
  SyncEngine,
  StatusInspector,
  countActions,
  formatStatus,
  isRemoteUrl,
  repositoryName,
  sameRemote,
} from './services/sync/index.js';
export type { SyncEngineOptions, SyncRunOptions } from './services/sync/index.js';
export { HistoryStore, runStatus } from './services/database/store.js';
export { runCli, resolveCommand } from './cli/program.js';
export * from './shared/errors.js';
export type * from './shared/types.js';
