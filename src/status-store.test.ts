import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import Database from 'better-sqlite3';
import { SqliteStatusStore } from './status-store.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('SqliteStatusStore', () => {
  let now: Date;
  let store: SqliteStatusStore;

  beforeEach(() => {
    now = new Date('2026-03-01T08:00:00.000Z');
    store = new SqliteStatusStore(':memory:', () => now);
  });

  afterEach(() => {
    store.close();
  });

  describe('assignments', () => {
    it('should record and read back an assignment case-insensitively', () => {
      const stored = store.recordAssignment('Intro to Programming', 'disk-a', 'most-free-space');
      expect(stored).toEqual({
        course: 'Intro to Programming',
        volumeId: 'disk-a',
        reason: 'most-free-space',
        assignedAt: '2026-03-01T08:00:00.000Z',
      });
      expect(store.getAssignment('INTRO TO PROGRAMMING')).toEqual(stored);
    });

    it('should never overwrite an existing assignment', () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      now = new Date('2026-03-02T08:00:00.000Z');

      const second = store.recordAssignment('biology', 'disk-b', 'most-free-space');
      expect(second.volumeId).toBe('disk-a');
      expect(second.assignedAt).toBe('2026-03-01T08:00:00.000Z');
      expect(store.listAssignments()).toHaveLength(1);
    });
  });

  describe('outcomes', () => {
    const outcome = {
      course: 'Biology',
      assetType: 'slides' as const,
      status: 'ok' as const,
      volumeId: 'disk-a',
      remoteId: 'slides000001',
      detail: null,
    };

    it('should upsert outcomes per course and asset type', () => {
      expect(store.recordOutcome({ ...outcome, status: 'failed', detail: 'exit 1' })).toBe(true);
      expect(store.recordOutcome(outcome)).toBe(true);

      expect(store.listOutcomes()).toEqual([{ ...outcome, updatedAt: '2026-03-01T08:00:00.000Z' }]);
    });

    it('should keep the timestamp when nothing changed', () => {
      store.recordOutcome(outcome);
      now = new Date('2026-03-05T08:00:00.000Z');

      expect(store.recordOutcome(outcome)).toBe(false);
      expect(store.getOutcome('biology', 'slides')?.updatedAt).toBe('2026-03-01T08:00:00.000Z');
    });

    it('should list outcomes in asset order and filter by course', () => {
      store.recordOutcome({ ...outcome, assetType: 'raw-videos' });
      store.recordOutcome({ ...outcome, assetType: 'course-outline' });
      store.recordOutcome({ ...outcome, course: 'Algebra', assetType: 'slides' });

      expect(store.listOutcomes().map(entry => `${entry.course}:${entry.assetType}`)).toEqual([
        'Algebra:slides',
        'Biology:course-outline',
        'Biology:raw-videos',
      ]);
      expect(store.listOutcomes('BIOLOGY')).toHaveLength(2);
    });
  });

  describe('course state and runs', () => {
    it('should track the course state', () => {
      store.setCourseState({ course: 'Biology', status: 'in-progress', volumeId: 'disk-a', detail: null });
      store.setCourseState({ course: 'Biology', status: 'partial', volumeId: 'disk-a', detail: null });

      expect(store.getCourseState('biology')?.status).toBe('partial');
      expect(store.listCourseStates()).toHaveLength(1);
    });

    it('should record a run from start to finish', () => {
      const run = store.startRun(false);
      expect(store.listRuns()).toEqual([run]);

      now = new Date('2026-03-01T09:00:00.000Z');
      store.finishRun(run.id, 'completed', { failures: 0 });

      expect(store.listRuns()).toEqual([
        {
          id: run.id,
          status: 'completed',
          dryRun: false,
          startedAt: '2026-03-01T08:00:00.000Z',
          completedAt: '2026-03-01T09:00:00.000Z',
          summary: { failures: 0 },
        },
      ]);
    });
  });

  describe('durability', () => {
    const dir = join(TEST_DIR, 'status-store');

    beforeEach(() => {
      rmSync(dir, { recursive: true, force: true });
      mkdirSync(dir, { recursive: true });
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should keep records across reopen', () => {
      const dbPath = join(dir, 'state.db');
      const first = new SqliteStatusStore(dbPath, () => now);
      first.recordAssignment('Biology', 'disk-b', 'round-robin');
      first.close();

      const second = new SqliteStatusStore(dbPath, () => now);
      expect(second.getAssignment('Biology')?.volumeId).toBe('disk-b');
      second.close();
    });

    it('should refuse a file that is not a database', () => {
      const dbPath = join(dir, 'garbage.db');
      writeFileSync(dbPath, 'not a database\n'.repeat(100));

      expect(thrown(() => new SqliteStatusStore(dbPath))).toMatchObject({ code: 'STATUS_STORE_CORRUPT' });
    });

    it('should refuse a schema newer than this build knows', () => {
      const dbPath = join(dir, 'future.db');
      const db = new Database(dbPath);
      db.exec(`
        CREATE TABLE schema_migrations (version INTEGER PRIMARY KEY, name TEXT NOT NULL, executed_at TIMESTAMP);
        INSERT INTO schema_migrations (version, name) VALUES (99, 'future');
      `);
      db.close();

      expect(() => new SqliteStatusStore(dbPath)).toThrow(/newer than supported/);
    });

    it('should reject unknown status values read back from disk', () => {
      const dbPath = join(dir, 'tampered.db');
      const seeded = new SqliteStatusStore(dbPath, () => now);
      seeded.close();

      const db = new Database(dbPath);
      db.prepare(
        `INSERT INTO transfer_outcomes (course_key, asset_type, course, status, volume_id, remote_id, detail, updated_at)
         VALUES ('biology', 'slides', 'Biology', 'exploded', 'disk-a', NULL, NULL, '2026-03-01T08:00:00.000Z')`
      ).run();
      db.close();

      const store = new SqliteStatusStore(dbPath, () => now);
      expect(thrown(() => store.listOutcomes())).toMatchObject({ code: 'STATUS_STORE_CORRUPT' });
      store.close();
    });
  });
});
