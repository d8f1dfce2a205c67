/**
 * Durable record of disk assignments and per-asset transfer outcomes
 */

import { randomUUID } from 'crypto';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { AppError, errorMessage, logger } from './logger.js';
import { MigrationManager, statusStoreMigrations } from './migrations.js';
import { courseKey } from './naming.js';
import type {
  AssetTypeKey,
  AssignmentReason,
  Clock,
  CourseRunState,
  CourseRunStatus,
  DiskAssignment,
  TransferOutcome,
  TransferRunRecord,
  TransferRunStatus,
  TransferStatus,
} from './types.js';
import { ASSET_TYPE_KEYS } from './asset-types.js';

export type NewTransferOutcome = Omit<TransferOutcome, 'updatedAt'>;
export type NewCourseRunState = Omit<CourseRunState, 'updatedAt'>;

export interface StatusStore {
  getAssignment(course: string): DiskAssignment | undefined;
  listAssignments(): DiskAssignment[];
  /** Insert-only: an existing assignment always wins and is returned */
  recordAssignment(course: string, volumeId: string, reason: AssignmentReason): DiskAssignment;

  getOutcome(course: string, assetType: AssetTypeKey): TransferOutcome | undefined;
  listOutcomes(course?: string): TransferOutcome[];
  /** Upsert one outcome; returns false when the stored record already matched */
  recordOutcome(outcome: NewTransferOutcome): boolean;

  getCourseState(course: string): CourseRunState | undefined;
  listCourseStates(): CourseRunState[];
  setCourseState(state: NewCourseRunState): void;

  startRun(dryRun: boolean): TransferRunRecord;
  finishRun(id: string, status: TransferRunStatus, summary: Record<string, unknown>): void;
  listRuns(): TransferRunRecord[];

  close(): void;
}

type AssignmentRow = {
  course: string;
  volume_id: string;
  reason: string;
  assigned_at: string;
};

type OutcomeRow = {
  course: string;
  asset_type: string;
  status: string;
  volume_id: string;
  remote_id: string | null;
  detail: string | null;
  updated_at: string;
};

type CourseRunRow = {
  course: string;
  status: string;
  volume_id: string | null;
  detail: string | null;
  updated_at: string;
};

type TransferRunRow = {
  id: string;
  status: string;
  dry_run: number;
  started_at: string;
  completed_at: string | null;
  summary: string | null;
};

const TRANSFER_STATUSES: readonly TransferStatus[] = ['ok', 'skipped-present', 'no-link', 'failed', 'not-started'];
const COURSE_RUN_STATUSES: readonly CourseRunStatus[] = ['pending', 'in-progress', 'complete', 'partial', 'failed', 'skipped'];
const RUN_STATUSES: readonly TransferRunStatus[] = ['running', 'completed', 'interrupted'];
const ASSIGNMENT_REASONS: readonly AssignmentReason[] = ['existing', 'reuse-in-place', 'most-free-space', 'round-robin'];

function member<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const found = allowed.find(candidate => candidate === value);
  if (found === undefined) {
    throw new AppError(`Unexpected ${column} value in status store: ${value}`, 'STATUS_STORE_CORRUPT', 500);
  }
  return found;
}

function parseSummary(value: string | null): Record<string, unknown> {
  if (!value) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return {};
  }
}

export class SqliteStatusStore implements StatusStore {
  private readonly db: Database.Database;
  private readonly clock: Clock;

  constructor(dbPath: string = './db/course-sync.db', clock: Clock = () => new Date()) {
    this.clock = clock;
    this.db = SqliteStatusStore.open(dbPath);
    logger.debug('Status store opened', { dbPath }, 'StatusStore');
  }

  /**
   * Open, integrity-check and migrate; any failure here is fatal for the run
   */
  private static open(dbPath: string): Database.Database {
    let db: Database.Database | null = null;
    try {
      if (dbPath !== ':memory:') {
        mkdirSync(dirname(dbPath), { recursive: true });
      }
      db = new Database(dbPath);
      const check: unknown = db.pragma('quick_check', { simple: true });
      if (check !== 'ok') {
        throw new Error(`integrity check reported: ${String(check)}`);
      }
      if (dbPath !== ':memory:') {
        db.pragma('journal_mode = WAL');
      }
      db.pragma('synchronous = FULL');
      new MigrationManager(db).runPendingMigrations(statusStoreMigrations);
      return db;
    } catch (error) {
      db?.close();
      if (error instanceof AppError) throw error;
      throw new AppError(
        `Status store unreadable at ${dbPath}: ${errorMessage(error)}`,
        'STATUS_STORE_CORRUPT',
        500,
        { dbPath }
      );
    }
  }

  private now(): string {
    return this.clock().toISOString();
  }

  getAssignment(course: string): DiskAssignment | undefined {
    const row = this.db
      .prepare<[string], AssignmentRow>(
        `
        SELECT course, volume_id, reason, assigned_at
        FROM disk_assignments
        WHERE course_key = ?
        `
      )
      .get(courseKey(course));
    return row ? this.toAssignment(row) : undefined;
  }

  listAssignments(): DiskAssignment[] {
    return this.db
      .prepare<[], AssignmentRow>(
        `
        SELECT course, volume_id, reason, assigned_at
        FROM disk_assignments
        ORDER BY assigned_at, course_key
        `
      )
      .all()
      .map(row => this.toAssignment(row));
  }

  recordAssignment(course: string, volumeId: string, reason: AssignmentReason): DiskAssignment {
    this.db
      .prepare(
        `
        INSERT INTO disk_assignments (course_key, course, volume_id, reason, assigned_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(course_key) DO NOTHING
        `
      )
      .run(courseKey(course), course, volumeId, reason, this.now());

    const stored = this.getAssignment(course);
    if (!stored) {
      throw new AppError(`Assignment for ${course} was not persisted`, 'STATUS_STORE_CORRUPT', 500);
    }
    if (stored.volumeId !== volumeId) {
      logger.warn(
        `Kept existing assignment for ${course}`,
        { stored: stored.volumeId, requested: volumeId },
        'StatusStore'
      );
    }
    return stored;
  }

  getOutcome(course: string, assetType: AssetTypeKey): TransferOutcome | undefined {
    const row = this.db
      .prepare<[string, string], OutcomeRow>(
        `
        SELECT course, asset_type, status, volume_id, remote_id, detail, updated_at
        FROM transfer_outcomes
        WHERE course_key = ? AND asset_type = ?
        `
      )
      .get(courseKey(course), assetType);
    return row ? this.toOutcome(row) : undefined;
  }

  listOutcomes(course?: string): TransferOutcome[] {
    const rows = course === undefined
      ? this.db
          .prepare<[], OutcomeRow>(
            `
            SELECT course, asset_type, status, volume_id, remote_id, detail, updated_at
            FROM transfer_outcomes
            ORDER BY course_key
            `
          )
          .all()
      : this.db
          .prepare<[string], OutcomeRow>(
            `
            SELECT course, asset_type, status, volume_id, remote_id, detail, updated_at
            FROM transfer_outcomes
            WHERE course_key = ?
            `
          )
          .all(courseKey(course));

    const order = (key: AssetTypeKey) => ASSET_TYPE_KEYS.indexOf(key);
    return rows
      .map(row => this.toOutcome(row))
      .sort((a, b) => courseKey(a.course).localeCompare(courseKey(b.course)) || order(a.assetType) - order(b.assetType));
  }

  recordOutcome(outcome: NewTransferOutcome): boolean {
    const existing = this.getOutcome(outcome.course, outcome.assetType);
    if (
      existing &&
      existing.status === outcome.status &&
      existing.volumeId === outcome.volumeId &&
      existing.remoteId === outcome.remoteId &&
      existing.detail === outcome.detail
    ) {
      return false;
    }

    this.db
      .prepare(
        `
        INSERT INTO transfer_outcomes (
          course_key, asset_type, course, status, volume_id, remote_id, detail, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(course_key, asset_type) DO UPDATE SET
          course = excluded.course,
          status = excluded.status,
          volume_id = excluded.volume_id,
          remote_id = excluded.remote_id,
          detail = excluded.detail,
          updated_at = excluded.updated_at
        `
      )
      .run(
        courseKey(outcome.course),
        outcome.assetType,
        outcome.course,
        outcome.status,
        outcome.volumeId,
        outcome.remoteId,
        outcome.detail,
        this.now()
      );
    return true;
  }

  getCourseState(course: string): CourseRunState | undefined {
    const row = this.db
      .prepare<[string], CourseRunRow>(
        `
        SELECT course, status, volume_id, detail, updated_at
        FROM course_runs
        WHERE course_key = ?
        `
      )
      .get(courseKey(course));
    return row ? this.toCourseState(row) : undefined;
  }

  listCourseStates(): CourseRunState[] {
    return this.db
      .prepare<[], CourseRunRow>(
        `
        SELECT course, status, volume_id, detail, updated_at
        FROM course_runs
        ORDER BY course_key
        `
      )
      .all()
      .map(row => this.toCourseState(row));
  }

  setCourseState(state: NewCourseRunState): void {
    this.db
      .prepare(
        `
        INSERT INTO course_runs (course_key, course, status, volume_id, detail, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(course_key) DO UPDATE SET
          course = excluded.course,
          status = excluded.status,
          volume_id = excluded.volume_id,
          detail = excluded.detail,
          updated_at = excluded.updated_at
        `
      )
      .run(courseKey(state.course), state.course, state.status, state.volumeId, state.detail, this.now());
  }

  startRun(dryRun: boolean): TransferRunRecord {
    const record: TransferRunRecord = {
      id: randomUUID(),
      status: 'running',
      dryRun,
      startedAt: this.now(),
      completedAt: null,
      summary: {},
    };
    this.db
      .prepare(
        `
        INSERT INTO transfer_runs (id, status, dry_run, started_at, completed_at, summary)
        VALUES (?, ?, ?, ?, NULL, '{}')
        `
      )
      .run(record.id, record.status, dryRun ? 1 : 0, record.startedAt);
    return record;
  }

  finishRun(id: string, status: TransferRunStatus, summary: Record<string, unknown>): void {
    this.db
      .prepare(
        `
        UPDATE transfer_runs
        SET status = ?, completed_at = ?, summary = ?
        WHERE id = ?
        `
      )
      .run(status, this.now(), JSON.stringify(summary), id);
  }

  listRuns(): TransferRunRecord[] {
    return this.db
      .prepare<[], TransferRunRow>(
        `
        SELECT id, status, dry_run, started_at, completed_at, summary
        FROM transfer_runs
        ORDER BY started_at
        `
      )
      .all()
      .map(row => ({
        id: row.id,
        status: member(RUN_STATUSES, row.status, 'run status'),
        dryRun: row.dry_run === 1,
        startedAt: row.started_at,
        completedAt: row.completed_at,
        summary: parseSummary(row.summary),
      }));
  }

  close(): void {
    this.db.close();
  }

  private toAssignment(row: AssignmentRow): DiskAssignment {
    return {
      course: row.course,
      volumeId: row.volume_id,
      reason: member(ASSIGNMENT_REASONS, row.reason, 'assignment reason'),
      assignedAt: row.assigned_at,
    };
  }

  private toOutcome(row: OutcomeRow): TransferOutcome {
    return {
      course: row.course,
      assetType: member(ASSET_TYPE_KEYS, row.asset_type, 'asset type'),
      status: member(TRANSFER_STATUSES, row.status, 'transfer status'),
      volumeId: row.volume_id,
      remoteId: row.remote_id,
      detail: row.detail,
      updatedAt: row.updated_at,
    };
  }

  private toCourseState(row: CourseRunRow): CourseRunState {
    return {
      course: row.course,
      status: member(COURSE_RUN_STATUSES, row.status, 'course status'),
      volumeId: row.volume_id,
      detail: row.detail,
      updatedAt: row.updated_at,
    };
  }
}
