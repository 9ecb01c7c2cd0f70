import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { HistoryStore, IN_MEMORY, runStatus } from './store.js';
import { countActions } from '../sync/sync-engine.js';
import { logger, LogLevel } from '../../utils/logger.js';
import type { NodeOutcome, SyncReport } from '../../shared/types.js';

function report(outcomes: NodeOutcome[], mode: SyncReport['mode'] = 'clone', force = false): SyncReport {
  return { mode, force, outcomes, counts: countActions(outcomes) };
}

const created: NodeOutcome = { nodeKind: 'root', path: '/ws', action: 'created', message: 'Created directory /ws' };
const cloned: NodeOutcome = {
  nodeKind: 'repository',
  path: '/ws/a',
  url: 'git@host:a.git',
  action: 'cloned',
  message: 'Cloned git@host:a.git into /ws/a',
};
const conflict: NodeOutcome = {
  nodeKind: 'repository',
  path: '/ws/b',
  url: 'https://host/b.git',
  action: 'conflict',
  message: '/ws/b: exists but is not a git working copy',
};
const failed: NodeOutcome = {
  nodeKind: 'repository',
  path: '/ws/c',
  url: 'https://host/c.git',
  action: 'failed',
  message: 'Pull failed in /ws/c',
};

describe('HistoryStore', () => {
  let store: HistoryStore;

  beforeAll(() => {
    logger.setLevel(LogLevel.SILENT);
  });

  beforeEach(() => {
    store = new HistoryStore(IN_MEMORY);
    store.initialize();
  });

  afterEach(() => {
    store.close();
  });

  it('records a run with its events in walk order', () => {
    const startedAt = new Date('2026-03-01T10:00:00.000Z');
    const finishedAt = new Date('2026-03-01T10:00:05.000Z');

    const runId = store.recordRun('/home/dev/repotree.txt', report([created, cloned, conflict]), startedAt, finishedAt);

    expect(store.getRecentRuns()).toEqual([{
      id: runId,
      layout_file: '/home/dev/repotree.txt',
      mode: 'clone',
      force: 0,
      status: 'partial',
      node_count: 3,
      failed_count: 0,
      conflict_count: 1,
      started_at: '2026-03-01T10:00:00.000Z',
      finished_at: '2026-03-01T10:00:05.000Z',
      created_at_epoch: startedAt.getTime(),
    }]);

    const events = store.getRunEvents(runId);
    expect(events.map(event => [event.seq, event.node_kind, event.path, event.url, event.action])).toEqual([
      [0, 'root', '/ws', null, 'created'],
      [1, 'repository', '/ws/a', 'git@host:a.git', 'cloned'],
      [2, 'repository', '/ws/b', 'https://host/b.git', 'conflict'],
    ]);
  });

  it('lists the most recent runs first', () => {
    const first = store.recordRun('a.txt', report([created]), new Date('2026-01-01T00:00:00Z'));
    const second = store.recordRun('b.txt', report([failed], 'pull', true), new Date('2026-01-02T00:00:00Z'));
    const third = store.recordRun('c.txt', report([cloned]), new Date('2026-01-03T00:00:00Z'));

    expect(store.getRecentRuns(2).map(run => run.id)).toEqual([third, second]);
    expect(store.getRecentRuns().map(run => run.id)).toEqual([third, second, first]);

    const pullRun = store.getRecentRuns().find(run => run.id === second);
    expect(pullRun?.mode).toBe('pull');
    expect(pullRun?.force).toBe(1);
    expect(pullRun?.status).toBe('failed');
  });

  it('returns no events for an unknown run', () => {
    expect(store.getRunEvents(999)).toEqual([]);
  });

  it('keeps the same connection when initialized twice', () => {
    const runId = store.recordRun('a.txt', report([created]), new Date());
    store.initialize();
    expect(store.getRecentRuns().map(run => [run.id, run.layout_file])).toEqual([[runId, 'a.txt']]);
  });

  it('refuses to work before initialize', () => {
    const fresh = new HistoryStore(IN_MEMORY);
    expect(() => fresh.getRecentRuns()).toThrow('History database not initialized');
  });
});

describe('runStatus', () => {
  it('derives the run status from node outcomes', () => {
    expect(runStatus(report([]))).toBe('success');
    expect(runStatus(report([created, cloned]))).toBe('success');
    expect(runStatus(report([created, conflict]))).toBe('partial');
    expect(runStatus(report([cloned, failed]))).toBe('partial');
    expect(runStatus(report([failed]))).toBe('failed');
  });
});
