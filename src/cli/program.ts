/**
 * Command-line surface: option parsing, command selection and exit codes
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { Command, CommanderError } from 'commander';
import { LayoutParser } from '../services/layout/layout-parser.js';
import { GitOperations } from '../services/sync/git-operations.js';
import { SyncEngine } from '../services/sync/sync-engine.js';
import { StatusInspector, formatStatus } from '../services/sync/status-inspector.js';
import { HistoryStore } from '../services/database/store.js';
import { getSetting, getSettingBool, getSettingInt } from '../shared/config.js';
import { LayoutParseError, errorMessage, toError } from '../shared/errors.js';
import { logger } from '../utils/logger.js';
import type { LayoutForest, SyncAction, SyncMode, SyncReport, SyncRunRow, VersionControl } from '../shared/types.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const DEFAULT_HISTORY_LIMIT = 10;

export interface CliOptions {
  clone?: boolean;
  pull?: boolean;
  force?: boolean;
  status?: boolean;
  history?: string | boolean;
}

export type CliCommand =
  | { kind: 'sync'; mode: SyncMode; force: boolean }
  | { kind: 'status' }
  | { kind: 'history'; limit: number };

export interface CliDependencies {
  vcs?: VersionControl;
  /** `null` turns history off regardless of settings */
  historyStore?: HistoryStore | null;
  cwd?: string;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Exactly one of clone, pull, status or history; force only alongside clone or pull.
 */
export function resolveCommand(options: CliOptions): CliCommand {
  const historyRequested = options.history !== undefined && options.history !== false;
  const selected = [options.clone, options.pull, options.status, historyRequested].filter(Boolean).length;

  if (selected === 0) {
    throw new UsageError('Choose one of --clone, --pull, --status or --history');
  }
  if (selected > 1) {
    throw new UsageError('--clone, --pull, --status and --history cannot be combined');
  }

  const force = options.force === true;
  if (options.clone) return { kind: 'sync', mode: 'clone', force };
  if (options.pull) return { kind: 'sync', mode: 'pull', force };

  if (force) {
    throw new UsageError('--force only applies to --clone or --pull');
  }
  if (options.status) return { kind: 'status' };

  return { kind: 'history', limit: parseLimit(options.history) };
}

function parseLimit(value: string | boolean | undefined): number {
  if (typeof value !== 'string') return DEFAULT_HISTORY_LIMIT;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new UsageError(`--history expects a positive whole number, got "${value}"`);
  }
  return limit;
}

const SUMMARY_ORDER: SyncAction[] = [
  'created', 'recreated', 'exists', 'missing', 'cloned',
  'satisfied', 'pulled', 'skipped', 'conflict', 'failed',
];

export function formatSummary(report: SyncReport): string {
  const parts = SUMMARY_ORDER
    .filter(action => report.counts[action] > 0)
    .map(action => `${report.counts[action]} ${action}`);
  return `${report.mode} finished: ${parts.length > 0 ? parts.join(', ') : 'nothing to do'}`;
}

export function formatRun(run: SyncRunRow): string {
  const force = run.force ? ' --force' : '';
  return `#${run.id} ${run.started_at} ${run.mode}${force} ${run.status} ` +
    `nodes=${run.node_count} failed=${run.failed_count} conflicts=${run.conflict_count} ${run.layout_file}`;
}

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug('CLI', 'Could not read package version', {}, toError(error));
  }
  return '0.0.0';
}

// ============================================================================
// Command handlers
// ============================================================================

class CliRunner {
  private out: (line: string) => void;
  private err: (line: string) => void;
  private cwd: string;

  constructor(private deps: CliDependencies) {
    this.out = deps.out ?? (line => console.log(line));
    this.err = deps.err ?? (line => console.error(line));
    this.cwd = deps.cwd ?? process.cwd();
  }

  execute(layoutArg: string | undefined, options: CliOptions): number {
    let command: CliCommand;
    try {
      command = resolveCommand(options);
    } catch (error) {
      if (error instanceof UsageError) {
        this.err(`error: ${error.message}`);
        this.err(`Run 'repotree --help' for usage.`);
        return EXIT_USAGE;
      }
      throw error;
    }

    if (command.kind === 'history') {
      return this.showHistory(command.limit);
    }

    const layoutFile = resolve(this.cwd, layoutArg ?? getSetting('LAYOUT_FILE'));
    const forest = this.loadLayout(layoutFile);
    if (!forest) return EXIT_FAILURE;

    if (command.kind === 'status') {
      return this.showStatus(forest);
    }
    return this.sync(layoutFile, forest, command.mode, command.force);
  }

  private loadLayout(layoutFile: string): LayoutForest | null {
    if (!existsSync(layoutFile)) {
      this.err(`Layout file ${layoutFile} not found`);
      return null;
    }
    try {
      return LayoutParser.readFile(layoutFile, { indentWidth: getSettingInt('INDENT_WIDTH') });
    } catch (error) {
      if (error instanceof LayoutParseError) {
        this.err(`${layoutFile}: ${error.message}`);
        return null;
      }
      this.err(`Could not read ${layoutFile}: ${errorMessage(error)}`);
      return null;
    }
  }

  private getVcs(): VersionControl {
    return this.deps.vcs ?? new GitOperations();
  }

  /**
   * Injected stores belong to the caller and stay open; stores opened here are closed after use.
   */
  private openHistory(): { store: HistoryStore; owned: boolean } | null {
    if (this.deps.historyStore === null) return null;
    if (this.deps.historyStore) return { store: this.deps.historyStore, owned: false };
    return getSettingBool('HISTORY_ENABLED') ? { store: new HistoryStore(), owned: true } : null;
  }

  private sync(layoutFile: string, forest: LayoutForest, mode: SyncMode, force: boolean): number {
    const startedAt = new Date();
    const report = new SyncEngine(this.getVcs()).run(forest, { mode, force });
    this.out(formatSummary(report));

    const history = this.openHistory();
    if (history) {
      try {
        history.store.initialize();
        const runId = history.store.recordRun(layoutFile, report, startedAt);
        logger.debug('HISTORY', `Recorded run #${runId}`);
      } catch (error) {
        logger.warn('HISTORY', 'Could not record sync history', {}, toError(error));
      } finally {
        if (history.owned) history.store.close();
      }
    }

    return report.counts.failed > 0 ? EXIT_FAILURE : EXIT_OK;
  }

  private showStatus(forest: LayoutForest): number {
    const statuses = new StatusInspector(this.getVcs()).inspect(forest);
    if (statuses.length === 0) {
      this.out('No repositories declared.');
      return EXIT_OK;
    }
    for (const status of statuses) {
      this.out(formatStatus(status));
    }
    return EXIT_OK;
  }

  private showHistory(limit: number): number {
    const history = this.openHistory();
    if (!history) {
      this.err('Sync history is disabled (HISTORY_ENABLED=false)');
      return EXIT_FAILURE;
    }

    try {
      history.store.initialize();
      const runs = history.store.getRecentRuns(limit);
      if (runs.length === 0) {
        this.out('No sync runs recorded.');
      }
      for (const run of runs) {
        this.out(formatRun(run));
      }
      return EXIT_OK;
    } finally {
      if (history.owned) history.store.close();
    }
  }
}

// ============================================================================
// Program
// ============================================================================

export function createProgram(deps: CliDependencies = {}, onExit: (code: number) => void = () => {}): Command {
  const runner = new CliRunner(deps);
  const program = new Command();

  program
    .name('repotree')
    .description('Create a directory tree and clone or pull the git repositories declared in a layout file')
    .version(readVersion(), '-V, --version')
    .argument('[layout-file]', 'layout file (defaults to LAYOUT_FILE, repotree.txt)')
    .option('-c, --clone', 'create directories and clone missing repositories')
    .option('-p, --pull', 'pull every existing repository')
    .option('-f, --force', 'clone: wipe and re-clone; pull: discard local changes first')
    .option('-s, --status', 'report the state of every declared repository')
    .option('--history [limit]', 'show recent sync runs')
    .action((layoutFile: string | undefined, options: CliOptions) => {
      onExit(runner.execute(layoutFile, options));
    });

  const { out, err } = deps;
  program.configureOutput({
    ...(out ? { writeOut: (text: string) => out(text.trimEnd()) } : {}),
    ...(err ? { writeErr: (text: string) => err(text.trimEnd()) } : {}),
  });

  return program;
}

/**
 * Parse user arguments (without the node/script prefix) and run; returns the exit code.
 */
export function runCli(args: string[], deps: CliDependencies = {}): number {
  let exitCode = EXIT_OK;
  const program = createProgram(deps, code => {
    exitCode = code;
  });
  program.exitOverride();

  try {
    program.parse(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit with 0; anything else is a usage problem
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw error;
  }
  return exitCode;
}
