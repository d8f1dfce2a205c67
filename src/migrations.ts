/**
 * Schema versioning for the status store
 */

import Database from 'better-sqlite3';
import { AppError, logger } from './logger.js';

export interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
}

export class MigrationManager {
  constructor(private readonly db: Database.Database) {
    this.ensureMigrationsTable();
  }

  private ensureMigrationsTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  getCurrentVersion(): number {
    const result = this.db
      .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
      .get();
    return result?.version ?? 0;
  }

  /**
   * Apply every migration newer than the recorded version, each in its own transaction
   */
  runPendingMigrations(migrations: Migration[]): number {
    const currentVersion = this.getCurrentVersion();
    const latest = Math.max(0, ...migrations.map(migration => migration.version));

    if (currentVersion > latest) {
      throw new AppError(
        `Status store schema v${currentVersion} is newer than supported v${latest}`,
        'STATUS_STORE_CORRUPT',
        500,
        { currentVersion, latest }
      );
    }

    const pending = migrations
      .filter(migration => migration.version > currentVersion)
      .sort((a, b) => a.version - b.version);

    if (pending.length === 0) {
      logger.debug('No pending migrations', { currentVersion }, 'MigrationManager');
      return currentVersion;
    }

    for (const migration of pending) {
      const apply = this.db.transaction(() => {
        migration.up(this.db);
        this.db
          .prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
          .run(migration.version, migration.name);
      });
      apply();
      logger.info(`Migration ${migration.version}: ${migration.name}`, undefined, 'MigrationManager');
    }

    return latest;
  }
}

export const statusStoreMigrations: Migration[] = [
  {
    version: 1,
    name: 'assignments_and_outcomes',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS disk_assignments (
          course_key TEXT PRIMARY KEY,
          course TEXT NOT NULL,
          volume_id TEXT NOT NULL,
          reason TEXT NOT NULL,
          assigned_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS transfer_outcomes (
          course_key TEXT NOT NULL,
          asset_type TEXT NOT NULL,
          course TEXT NOT NULL,
          status TEXT NOT NULL,
          volume_id TEXT NOT NULL,
          remote_id TEXT,
          detail TEXT,
          updated_at TEXT NOT NULL,
          PRIMARY KEY (course_key, asset_type)
        );

        CREATE INDEX IF NOT EXISTS idx_assignments_volume ON disk_assignments(volume_id);
        CREATE INDEX IF NOT EXISTS idx_outcomes_status ON transfer_outcomes(status);
      `);
    }
  },
  {
    version: 2,
    name: 'course_and_run_state',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS course_runs (
          course_key TEXT PRIMARY KEY,
          course TEXT NOT NULL,
          status TEXT NOT NULL,
          volume_id TEXT,
          detail TEXT,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS transfer_runs (
          id TEXT PRIMARY KEY,
          status TEXT NOT NULL,
          dry_run INTEGER NOT NULL DEFAULT 0,
          started_at TEXT NOT NULL,
          completed_at TEXT,
          summary TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_transfer_runs_started ON transfer_runs(started_at);
      `);
    }
  }
];
