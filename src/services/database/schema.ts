/**
 * Database schema and migrations for the sync history
 */

export const SCHEMA_VERSION = 1;

export const MIGRATIONS: Record<number, string[]> = {
  1: [
    `CREATE TABLE IF NOT EXISTS sync_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      layout_file TEXT NOT NULL,
      mode TEXT NOT NULL CHECK(mode IN ('clone', 'pull')),
      force INTEGER NOT NULL DEFAULT 0,
      status TEXT NOT NULL CHECK(status IN ('success', 'partial', 'failed')),
      node_count INTEGER NOT NULL,
      failed_count INTEGER NOT NULL,
      conflict_count INTEGER NOT NULL,
      started_at TEXT NOT NULL,
      finished_at TEXT NOT NULL,
      created_at_epoch INTEGER NOT NULL
    )`,

    `CREATE INDEX IF NOT EXISTS idx_sync_runs_created_at ON sync_runs(created_at_epoch DESC)`,

    `CREATE TABLE IF NOT EXISTS sync_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id INTEGER NOT NULL,
      seq INTEGER NOT NULL,
      node_kind TEXT NOT NULL CHECK(node_kind IN ('root', 'directory', 'repository')),
      path TEXT NOT NULL,
      url TEXT,
      action TEXT NOT NULL,
      message TEXT NOT NULL,
      FOREIGN KEY (run_id) REFERENCES sync_runs(id) ON DELETE CASCADE
    )`,

    `CREATE INDEX IF NOT EXISTS idx_sync_events_run ON sync_events(run_id, seq)`,

    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER NOT NULL
    )`,
  ],
};

/**
 * Statements taking the schema from `fromVersion` to `toVersion`, ending with the version bump
 */
export function getMigrationSQL(fromVersion: number, toVersion: number): string[] {
  const statements: string[] = [];
  for (let v = fromVersion + 1; v <= toVersion; v++) {
    statements.push(...(MIGRATIONS[v] ?? []));
  }
  statements.push(`DELETE FROM schema_version`);
  statements.push(`INSERT INTO schema_version (version) VALUES (${toVersion})`);
  return statements;
}
