/**
 * Sync history store: one row per run, one event row per visited node
 */

import Database from 'better-sqlite3';
import { getHistoryDbPath, ensureDataDir } from '../../shared/config.js';
import { SCHEMA_VERSION, getMigrationSQL } from './schema.js';
import { logger } from '../../utils/logger.js';
import type { SyncEventRow, SyncReport, SyncRunRow } from '../../shared/types.js';

export const IN_MEMORY = ':memory:';

export function runStatus(report: SyncReport): SyncRunRow['status'] {
  const total = report.outcomes.length;
  const { failed, conflict } = report.counts;
  if (total > 0 && failed === total) return 'failed';
  if (failed > 0 || conflict > 0) return 'partial';
  return 'success';
}

export class HistoryStore {
  private db: Database.Database | null = null;
  private dbPath: string;

  constructor(dbPath?: string) {
    this.dbPath = dbPath || getHistoryDbPath();
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  initialize(): void {
    if (this.db) return;

    if (this.dbPath !== IN_MEMORY) {
      ensureDataDir();
    }

    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    this.db = db;

    const version = this.getSchemaVersion(db);
    if (version < SCHEMA_VERSION) {
      logger.debug('HISTORY', `Migrating from v${version} to v${SCHEMA_VERSION}`);
      const statements = getMigrationSQL(version, SCHEMA_VERSION);
      const migrate = db.transaction(() => {
        for (const sql of statements) {
          db.exec(sql);
        }
      });
      migrate();
    }

    logger.debug('HISTORY', `Initialized at ${this.dbPath}`);
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private getSchemaVersion(db: Database.Database): number {
    try {
      const row = db
        .prepare<[], { version: number }>(`SELECT version FROM schema_version LIMIT 1`)
        .get();
      return row?.version ?? 0;
    } catch {
      // schema_version does not exist yet
      return 0;
    }
  }

  private getDb(): Database.Database {
    if (!this.db) {
      throw new Error('History database not initialized');
    }
    return this.db;
  }

  // ============================================================================
  // Runs
  // ============================================================================

  recordRun(layoutFile: string, report: SyncReport, startedAt: Date, finishedAt: Date = new Date()): number {
    const db = this.getDb();

    const insertRun = db.prepare(`
      INSERT INTO sync_runs (
        layout_file, mode, force, status, node_count, failed_count,
        conflict_count, started_at, finished_at, created_at_epoch
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertEvent = db.prepare(`
      INSERT INTO sync_events (run_id, seq, node_kind, path, url, action, message)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    const record = db.transaction((): number => {
      const result = insertRun.run(
        layoutFile,
        report.mode,
        report.force ? 1 : 0,
        runStatus(report),
        report.outcomes.length,
        report.counts.failed,
        report.counts.conflict,
        startedAt.toISOString(),
        finishedAt.toISOString(),
        startedAt.getTime()
      );
      const runId = Number(result.lastInsertRowid);

      report.outcomes.forEach((outcome, seq) => {
        insertEvent.run(
          runId,
          seq,
          outcome.nodeKind,
          outcome.path,
          outcome.url ?? null,
          outcome.action,
          outcome.message
        );
      });

      return runId;
    });

    return record();
  }

  getRecentRuns(limit: number = 10): SyncRunRow[] {
    const db = this.getDb();
    return db
      .prepare<[number], SyncRunRow>(`
        SELECT * FROM sync_runs
        ORDER BY created_at_epoch DESC, id DESC
        LIMIT ?
      `)
      .all(limit);
  }

  getRunEvents(runId: number): SyncEventRow[] {
    const db = this.getDb();
    return db
      .prepare<[number], SyncEventRow>(`
        SELECT * FROM sync_events
        WHERE run_id = ?
        ORDER BY seq ASC
      `)
      .all(runId);
  }
}
