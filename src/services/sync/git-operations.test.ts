import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { spawnSync } from 'child_process';
import { readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { GitOperations } from './git-operations.js';
import { createTempDir } from './test-helpers.js';
import { ExternalToolFailureError, GitCommandError } from '../../shared/errors.js';
import { logger, LogLevel } from '../../utils/logger.js';

const MISSING_BINARY = 'repotree-no-such-git-binary';

const gitAvailable = spawnSync('git', ['--version']).status === 0;

/** Setup commands, outside the class under test */
function git(cwd: string, ...args: string[]): string {
  const result = spawnSync('git', args, { cwd, encoding: 'utf-8' });
  if (result.status !== 0) {
    throw new Error(`git ${args.join(' ')} failed: ${result.stderr}`);
  }
  return result.stdout.trim();
}

describe('GitOperations', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reports a directory without .git as not a working copy without running git', () => {
    dir = createTempDir();
    const ops = new GitOperations(MISSING_BINARY);

    expect(ops.queryRemote(dir)).toEqual({ state: 'not-a-working-copy' });
  });

  it('raises ExternalToolFailureError when the binary cannot be started', () => {
    const target = createTempDir();
    dir = target;
    const ops = new GitOperations(MISSING_BINARY);

    expect(() => ops.clone('https://host/a.git', join(target, 'a'))).toThrow(ExternalToolFailureError);
    expect(() => ops.pull(target)).toThrow(`Could not run ${MISSING_BINARY} pull`);
  });
});

describe.skipIf(!gitAvailable)('GitOperations against a local repository', () => {
  const ENV_KEYS = [
    'GIT_CONFIG_GLOBAL',
    'GIT_CONFIG_NOSYSTEM',
    'GIT_AUTHOR_NAME',
    'GIT_AUTHOR_EMAIL',
    'GIT_COMMITTER_NAME',
    'GIT_COMMITTER_EMAIL',
  ];
  const saved: Record<string, string | undefined> = {};

  let tmp: string;
  let origin: string;
  let checkout: string;
  let ops: GitOperations;

  beforeAll(() => {
    logger.setLevel(LogLevel.SILENT);
    for (const key of ENV_KEYS) saved[key] = process.env[key];
  });

  afterAll(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  beforeEach(() => {
    tmp = createTempDir();
    // Keep the developer's own git config out of the way
    const emptyConfig = join(tmp, 'gitconfig');
    writeFileSync(emptyConfig, '');
    process.env.GIT_CONFIG_GLOBAL = emptyConfig;
    process.env.GIT_CONFIG_NOSYSTEM = '1';
    process.env.GIT_AUTHOR_NAME = 'Test User';
    process.env.GIT_AUTHOR_EMAIL = 'test@example.com';
    process.env.GIT_COMMITTER_NAME = 'Test User';
    process.env.GIT_COMMITTER_EMAIL = 'test@example.com';

    origin = join(tmp, 'origin');
    checkout = join(tmp, 'work', 'origin');
    git(tmp, 'init', '-q', origin);
    writeFileSync(join(origin, 'f'), 'x');
    git(origin, 'add', 'f');
    git(origin, 'commit', '-q', '-m', 'initial');

    ops = new GitOperations('git');
  });

  afterEach(() => {
    rmSync(tmp, { recursive: true, force: true });
  });

  it('clones a repository bound to its origin', () => {
    ops.clone(origin, checkout);

    expect(readFileSync(join(checkout, 'f'), 'utf-8')).toBe('x');
    expect(ops.queryRemote(checkout)).toEqual({ state: 'bound', url: origin });
  });

  it('reports a working copy without an origin remote as unbound', () => {
    ops.clone(origin, checkout);
    git(checkout, 'remote', 'remove', 'origin');

    expect(ops.queryRemote(checkout)).toEqual({ state: 'unbound' });
  });

  it('pulls new commits from the origin', () => {
    ops.clone(origin, checkout);
    writeFileSync(join(origin, 'g'), 'new');
    git(origin, 'add', 'g');
    git(origin, 'commit', '-q', '-m', 'second');

    ops.pull(checkout);

    expect(readFileSync(join(checkout, 'g'), 'utf-8')).toBe('new');
  });

  it('raises GitCommandError when pulling a working copy without a remote', () => {
    const plain = join(tmp, 'plain');
    git(tmp, 'init', '-q', plain);

    expect(() => ops.pull(plain)).toThrow(GitCommandError);
  });

  it('discards local changes and keeps older stash entries', () => {
    ops.clone(origin, checkout);
    writeFileSync(join(checkout, 'f'), 'kept aside');
    git(checkout, 'stash', '-q');
    const olderStash = git(checkout, 'rev-parse', 'refs/stash');
    writeFileSync(join(checkout, 'f'), 'dirty');

    ops.discardLocalChanges(checkout);

    expect(readFileSync(join(checkout, 'f'), 'utf-8')).toBe('x');
    expect(git(checkout, 'rev-parse', 'refs/stash')).toBe(olderStash);
    expect(git(checkout, 'stash', 'list').split('\n')).toHaveLength(1);
  });

  it('drops nothing when there is nothing to discard', () => {
    ops.clone(origin, checkout);
    writeFileSync(join(checkout, 'f'), 'kept aside');
    git(checkout, 'stash', '-q');
    const olderStash = git(checkout, 'rev-parse', 'refs/stash');

    ops.discardLocalChanges(checkout);

    expect(git(checkout, 'rev-parse', 'refs/stash')).toBe(olderStash);
    expect(git(checkout, 'stash', 'list').split('\n')).toHaveLength(1);
  });
});
