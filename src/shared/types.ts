/**
 * Type definitions for repotree
 */

// ============================================================================
// Layout Types
// ============================================================================

export interface RootNode {
  kind: 'root';
  /** Absolute path */
  label: string;
  line: number;
  children: ContainerChild[];
}

export interface DirectoryNode {
  kind: 'directory';
  /** Single relative path segment */
  label: string;
  line: number;
  children: ContainerChild[];
}

export interface RepositoryNode {
  kind: 'repository';
  /** Remote URL */
  label: string;
  line: number;
}

export type ContainerNode = RootNode | DirectoryNode;
export type ContainerChild = DirectoryNode | RepositoryNode;
export type LayoutNode = RootNode | DirectoryNode | RepositoryNode;
export type LayoutForest = RootNode[];

export interface ParseOptions {
  /** Characters per indentation level; detected from the first indented line when omitted */
  indentWidth?: number;
}

// ============================================================================
// Sync Types
// ============================================================================

export type SyncMode = 'clone' | 'pull';

export interface SyncContext {
  mode: SyncMode;
  force: boolean;
  /** Absolute path of the directory currently being walked */
  path: string;
}

export type SyncAction =
  | 'created'
  | 'exists'
  | 'recreated'
  | 'missing'
  | 'cloned'
  | 'satisfied'
  | 'pulled'
  | 'skipped'
  | 'conflict'
  | 'failed';

export interface NodeOutcome {
  nodeKind: LayoutNode['kind'];
  /** Directory path, or the checkout directory for repositories */
  path: string;
  url?: string;
  action: SyncAction;
  message: string;
}

export interface SyncReport {
  mode: SyncMode;
  force: boolean;
  outcomes: NodeOutcome[];
  counts: Record<SyncAction, number>;
}

// ============================================================================
// Version Control Types
// ============================================================================

export type RemoteQuery =
  | { state: 'bound'; url: string }
  | { state: 'unbound' }
  | { state: 'not-a-working-copy' };

/**
 * Capabilities the sync engine needs from the version-control tool.
 * Implementations throw on failure.
 */
export interface VersionControl {
  clone(url: string, destination: string): void;
  pull(directory: string): void;
  queryRemote(directory: string): RemoteQuery;
  discardLocalChanges(directory: string): void;
}

// ============================================================================
// Status Types
// ============================================================================

export type RepositoryState =
  | 'missing'
  | 'empty'
  | 'not-a-working-copy'
  | 'unbound'
  | 'matching'
  | 'mismatched'
  | 'unusable-url';

export interface RepositoryStatus {
  url: string;
  /** Directory the repository is bound to */
  parent: string;
  checkout: string;
  state: RepositoryState;
  actualRemote?: string;
}

// ============================================================================
// History Types
// ============================================================================

export interface SyncRunRow {
  id: number;
  layout_file: string;
  mode: SyncMode;
  force: number;
  status: 'success' | 'partial' | 'failed';
  node_count: number;
  failed_count: number;
  conflict_count: number;
  started_at: string;
  finished_at: string;
  created_at_epoch: number;
}

export interface SyncEventRow {
  id: number;
  run_id: number;
  seq: number;
  node_kind: LayoutNode['kind'];
  path: string;
  url: string | null;
  action: SyncAction;
  message: string;
}
