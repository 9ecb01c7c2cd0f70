/**
 * Sync Engine - walks the layout forest and brings the filesystem in line with it
 */

import { existsSync, mkdirSync, readdirSync, rmSync, statSync } from 'fs';
import { join, resolve } from 'path';
import { isCheckoutName, repositoryName, sameRemote } from './remote-url.js';
import {
  DirectoryConflictError,
  ExternalToolFailureError,
  PullFailureError,
  RepositoryNameError,
  toError,
} from '../../shared/errors.js';
import { logger } from '../../utils/logger.js';
import type {
  ContainerNode,
  LayoutForest,
  LayoutNode,
  NodeOutcome,
  RepositoryNode,
  SyncAction,
  SyncContext,
  SyncMode,
  SyncReport,
  VersionControl,
} from '../../shared/types.js';

export interface SyncEngineOptions {
  /** Called once per visited node, in walk order */
  onOutcome?: (outcome: NodeOutcome) => void;
}

export interface SyncRunOptions {
  mode: SyncMode;
  force: boolean;
}

export function countActions(outcomes: NodeOutcome[]): Record<SyncAction, number> {
  const counts: Record<SyncAction, number> = {
    created: 0,
    exists: 0,
    recreated: 0,
    missing: 0,
    cloned: 0,
    satisfied: 0,
    pulled: 0,
    skipped: 0,
    conflict: 0,
    failed: 0,
  };
  for (const outcome of outcomes) {
    counts[outcome.action]++;
  }
  return counts;
}

export class SyncEngine {
  private vcs: VersionControl;
  private options: SyncEngineOptions;

  constructor(vcs: VersionControl, options: SyncEngineOptions = {}) {
    this.vcs = vcs;
    this.options = options;
  }

  /**
   * Depth-first walk of every root. Per-node failures are recorded in the
   * report; only programming errors escape.
   */
  run(forest: LayoutForest, { mode, force }: SyncRunOptions): SyncReport {
    logger.info('SYNC', `Starting ${mode}${force ? ' (force)' : ''}`, { roots: forest.length });

    const outcomes: NodeOutcome[] = [];
    for (const root of forest) {
      this.walkContainer(root, { mode, force, path: resolve(root.label) }, outcomes);
    }

    const report: SyncReport = { mode, force, outcomes, counts: countActions(outcomes) };
    logger.info('SYNC', `Finished ${mode}`, {
      nodes: outcomes.length,
      conflicts: report.counts.conflict,
      failed: report.counts.failed,
    });
    return report;
  }

  private walkContainer(node: ContainerNode, ctx: SyncContext, outcomes: NodeOutcome[]): void {
    this.record(outcomes, this.guard(node, ctx.path, () => this.ensureDirectory(node, ctx)));

    for (const child of node.children) {
      if (child.kind === 'directory') {
        this.walkContainer(child, { ...ctx, path: join(ctx.path, child.label) }, outcomes);
      } else {
        this.record(outcomes, this.visitRepositoryNode(child, ctx));
      }
    }
  }

  // ============================================================================
  // Directories
  // ============================================================================

  private ensureDirectory(node: ContainerNode, ctx: SyncContext): NodeOutcome {
    const outcome = (action: SyncAction, message: string): NodeOutcome => ({
      nodeKind: node.kind,
      path: ctx.path,
      action,
      message,
    });

    if (ctx.mode === 'pull') {
      // Pull never materializes anything
      return existsSync(ctx.path)
        ? outcome('exists', `Directory ${ctx.path} exists`)
        : outcome('missing', `Directory ${ctx.path} does not exist, skipping`);
    }

    if (ctx.force) {
      rmSync(ctx.path, { recursive: true, force: true });
      mkdirSync(ctx.path, { recursive: true });
      return outcome('recreated', `Recreated directory ${ctx.path}`);
    }

    if (!existsSync(ctx.path)) {
      mkdirSync(ctx.path, { recursive: true });
      return outcome('created', `Created directory ${ctx.path}`);
    }
    if (!statSync(ctx.path).isDirectory()) {
      const conflict = new DirectoryConflictError(ctx.path, 'exists but is not a directory');
      return outcome('conflict', conflict.message);
    }
    return outcome('exists', `Directory ${ctx.path} already exists`);
  }

  // ============================================================================
  // Repositories
  // ============================================================================

  private visitRepositoryNode(node: RepositoryNode, ctx: SyncContext): NodeOutcome {
    const name = repositoryName(node.label);
    if (!isCheckoutName(name)) {
      // Joining such a name would land on the parent or above it
      return {
        nodeKind: 'repository',
        path: ctx.path,
        url: node.label,
        action: 'failed',
        message: new RepositoryNameError(node.label).message,
      };
    }

    const checkout = join(ctx.path, name);
    return this.guard(node, checkout, () => this.visitRepository(node, checkout, ctx));
  }

  private visitRepository(node: RepositoryNode, checkout: string, ctx: SyncContext): NodeOutcome {
    return ctx.mode === 'clone'
      ? this.cloneRepository(node, checkout, ctx.force)
      : this.pullRepository(node, checkout, ctx.force);
  }

  private cloneRepository(node: RepositoryNode, checkout: string, force: boolean): NodeOutcome {
    const url = node.label;
    const outcome = (action: SyncAction, message: string): NodeOutcome => ({
      nodeKind: 'repository',
      path: checkout,
      url,
      action,
      message,
    });

    if (force) {
      rmSync(checkout, { recursive: true, force: true });
      this.vcs.clone(url, checkout);
      return outcome('cloned', `Cloned ${url} into ${checkout}`);
    }

    if (!existsSync(checkout) || isEmptyDirectory(checkout)) {
      this.vcs.clone(url, checkout);
      return outcome('cloned', `Cloned ${url} into ${checkout}`);
    }

    if (!statSync(checkout).isDirectory()) {
      return outcome('conflict', new DirectoryConflictError(checkout, 'exists but is not a directory').message);
    }

    const remote = this.vcs.queryRemote(checkout);
    switch (remote.state) {
      case 'bound':
        if (sameRemote(remote.url, url)) {
          return outcome('satisfied', `Repository ${checkout} already cloned from ${url}`);
        }
        return outcome(
          'conflict',
          new DirectoryConflictError(checkout, `working copy is bound to ${remote.url}, not ${url}`).message
        );
      case 'unbound':
        return outcome(
          'conflict',
          new DirectoryConflictError(checkout, 'working copy has no origin remote').message
        );
      case 'not-a-working-copy':
        return outcome(
          'conflict',
          new DirectoryConflictError(checkout, 'exists but is not a git working copy').message
        );
    }
  }

  private pullRepository(node: RepositoryNode, checkout: string, force: boolean): NodeOutcome {
    const url = node.label;
    const outcome = (action: SyncAction, message: string): NodeOutcome => ({
      nodeKind: 'repository',
      path: checkout,
      url,
      action,
      message,
    });

    if (!existsSync(checkout)) {
      return outcome('skipped', `Repository directory ${checkout} does not exist, skipping pull`);
    }
    if (this.vcs.queryRemote(checkout).state === 'not-a-working-copy') {
      return outcome('skipped', `Directory ${checkout} is not a git working copy, skipping pull`);
    }

    try {
      if (force) {
        this.vcs.discardLocalChanges(checkout);
      }
      this.vcs.pull(checkout);
    } catch (error) {
      if (error instanceof ExternalToolFailureError) {
        throw error;
      }
      const failure = new PullFailureError(checkout, { cause: error });
      return outcome('failed', `${failure.message}: ${toError(error).message}`);
    }

    return outcome('pulled', `Pulled latest changes into ${checkout}`);
  }

  // ============================================================================
  // Outcome bookkeeping
  // ============================================================================

  /**
   * Node boundary: anything thrown while handling one node becomes that node's failure.
   */
  private guard(node: LayoutNode, path: string, visit: () => NodeOutcome): NodeOutcome {
    try {
      return visit();
    } catch (error) {
      return {
        nodeKind: node.kind,
        path,
        url: node.kind === 'repository' ? node.label : undefined,
        action: 'failed',
        message: toError(error).message,
      };
    }
  }

  private record(outcomes: NodeOutcome[], outcome: NodeOutcome): void {
    outcomes.push(outcome);

    switch (outcome.action) {
      case 'created':
      case 'recreated':
      case 'cloned':
      case 'pulled':
        logger.success('SYNC', outcome.message);
        break;
      case 'exists':
      case 'satisfied':
        logger.info('SYNC', outcome.message);
        break;
      case 'missing':
      case 'skipped':
      case 'conflict':
        logger.warn('SYNC', outcome.message);
        break;
      case 'failed':
        logger.failure('SYNC', outcome.message);
        break;
    }

    this.options.onOutcome?.(outcome);
  }
}

function isEmptyDirectory(path: string): boolean {
  return statSync(path).isDirectory() && readdirSync(path).length === 0;
}
