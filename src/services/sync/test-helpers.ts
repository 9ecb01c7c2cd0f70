/**
 * In-process stand-in for git, backed by marker files under a temporary directory
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ExternalToolFailureError, GitCommandError } from '../../shared/errors.js';
import type { RemoteQuery, VersionControl } from '../../shared/types.js';

export type FakeOperation = 'clone' | 'pull' | 'queryRemote' | 'discardLocalChanges';

export interface FakeCall {
  op: FakeOperation;
  args: string[];
}

const REMOTE_FILE = 'remote';
const DIRTY_FILE = 'LOCAL_CHANGES';

export class FakeVersionControl implements VersionControl {
  readonly calls: FakeCall[] = [];
  readonly failingClones = new Set<string>();
  readonly failingPulls = new Set<string>();
  /** Simulates a git binary that cannot be started */
  unavailable = false;

  clone(url: string, destination: string): void {
    this.track('clone', url, destination);
    if (this.failingClones.has(url)) {
      throw new GitCommandError(['clone', '--', url, destination], 128, `fatal: repository '${url}' not found`);
    }
    makeWorkingCopy(destination, url);
    writeFileSync(join(destination, 'README.md'), `cloned from ${url}\n`);
  }

  pull(directory: string): void {
    this.track('pull', directory);
    if (this.failingPulls.has(directory) || existsSync(join(directory, DIRTY_FILE))) {
      throw new GitCommandError(['pull'], 1, 'error: Your local changes would be overwritten by merge.');
    }
  }

  queryRemote(directory: string): RemoteQuery {
    this.track('queryRemote', directory);
    const gitDir = join(directory, '.git');
    if (!existsSync(gitDir)) return { state: 'not-a-working-copy' };
    const remoteFile = join(gitDir, REMOTE_FILE);
    if (!existsSync(remoteFile)) return { state: 'unbound' };
    return { state: 'bound', url: readFileSync(remoteFile, 'utf-8') };
  }

  discardLocalChanges(directory: string): void {
    this.track('discardLocalChanges', directory);
    rmSync(join(directory, DIRTY_FILE), { force: true });
  }

  callsOf(op: FakeOperation): string[][] {
    return this.calls.filter(call => call.op === op).map(call => call.args);
  }

  private track(op: FakeOperation, ...args: string[]): void {
    if (this.unavailable) {
      throw new ExternalToolFailureError(`git ${op}`, { cause: new Error('spawnSync git ENOENT') });
    }
    this.calls.push({ op, args });
  }
}

/**
 * Lay down a fake working copy; `url === null` leaves it without an origin remote
 */
export function makeWorkingCopy(directory: string, url: string | null): void {
  mkdirSync(join(directory, '.git'), { recursive: true });
  if (url !== null) {
    writeFileSync(join(directory, '.git', REMOTE_FILE), url);
  }
}

export function makeDirty(directory: string): void {
  writeFileSync(join(directory, DIRTY_FILE), 'uncommitted work\n');
}

export function createTempDir(prefix: string = 'repotree-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}
