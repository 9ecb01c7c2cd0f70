/**
 * Git operations wrapper: the VersionControl capabilities backed by the git binary
 */

import { spawnSync } from 'child_process';
import { existsSync } from 'fs';
import { join } from 'path';
import { getSetting } from '../../shared/config.js';
import { ExternalToolFailureError, GitCommandError } from '../../shared/errors.js';
import { logger } from '../../utils/logger.js';
import type { RemoteQuery, VersionControl } from '../../shared/types.js';

interface GitResult {
  status: number | null;
  stdout: string;
  stderr: string;
}

export class GitOperations implements VersionControl {
  private binary: string;

  constructor(binary?: string) {
    this.binary = binary || getSetting('GIT_BINARY');
  }

  clone(url: string, destination: string): void {
    logger.debug('GIT', `Cloning ${url}`, { destination });
    this.exec(['clone', '--', url, destination]);
  }

  pull(directory: string): void {
    logger.debug('GIT', `Pulling in ${directory}`);
    this.exec(['pull'], directory);
  }

  /**
   * Configured origin URL of a working copy
   */
  queryRemote(directory: string): RemoteQuery {
    if (!existsSync(join(directory, '.git'))) {
      return { state: 'not-a-working-copy' };
    }

    const result = this.run(['config', '--get', 'remote.origin.url'], directory);
    // `git config --get` exits 1 when the key is not set
    if (result.status === 1) {
      return { state: 'unbound' };
    }
    if (result.status !== 0) {
      throw new GitCommandError(['config', '--get', 'remote.origin.url'], result.status, result.stderr);
    }
    const url = result.stdout.trim();
    return url ? { state: 'bound', url } : { state: 'unbound' };
  }

  /**
   * Stash local modifications, then drop that stash entry.
   * Older stash entries are left alone when there was nothing to stash.
   */
  discardLocalChanges(directory: string): void {
    const before = this.stashHead(directory);
    this.exec(['stash'], directory);
    const after = this.stashHead(directory);

    if (after !== null && after !== before) {
      this.exec(['stash', 'drop'], directory);
      logger.debug('GIT', `Discarded local changes in ${directory}`);
    } else {
      logger.debug('GIT', `No local changes to discard in ${directory}`);
    }
  }

  // ============================================================================
  // Private helpers
  // ============================================================================

  private stashHead(directory: string): string | null {
    const result = this.run(['rev-parse', '-q', '--verify', 'refs/stash'], directory);
    return result.status === 0 ? result.stdout.trim() : null;
  }

  private exec(args: string[], cwd?: string): string {
    const result = this.run(args, cwd);
    if (result.status !== 0) {
      throw new GitCommandError(args, result.status, result.stderr);
    }
    return result.stdout;
  }

  private run(args: string[], cwd?: string): GitResult {
    const result = spawnSync(this.binary, args, {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    if (result.error) {
      throw new ExternalToolFailureError(`${this.binary} ${args[0] ?? ''}`.trim(), { cause: result.error });
    }

    return {
      status: result.status,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }
}
