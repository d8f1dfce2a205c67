import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { setTimeout as delay } from 'timers/promises';
import { AppError } from '../logger.js';
import { SqliteStatusStore } from '../status-store.js';
import type { AssetTypeKey, Course, TransferPrimitive, TransferRequest, TransferResult, Volume } from '../types.js';
import { COMPLETION_MARKER } from './folder-state.js';
import {
  TransferOrchestrator,
  courseStatusFor,
  isEligibleCourse,
  selectCourses,
  type TransferOrchestratorOptions,
} from './orchestrator.js';

const GB = 1024 ** 3;
const ROOT = join(TEST_DIR, 'orchestrator');

const DISK_A: Volume = { id: 'disk-a', path: join(ROOT, 'disk-a'), courseRoot: 'Courses' };
const DISK_B: Volume = { id: 'disk-b', path: join(ROOT, 'disk-b'), courseRoot: 'Courses' };

function link(id: string) {
  return { url: `https://drive.google.com/drive/folders/${id}`, remoteId: id };
}

function course(name: string, overrides: Partial<Course> = {}): Course {
  const prefix = name.toLowerCase().replace(/\W+/g, '');
  return {
    name,
    status: 'Completed',
    links: {
      'course-outline': link(`${prefix}-outline`),
      slides: link(`${prefix}-slides`),
      'written-assets': link(`${prefix}-written`),
      'final-videos': link(`${prefix}-final`),
      'raw-videos': link(`${prefix}-raw`),
      'course-artifacts': link(`${prefix}-artifacts`),
    },
    ...overrides,
  };
}

/**
 * Writes one file per transfer; fails or throws for the asset types it is told to
 */
class FakeTransfer implements TransferPrimitive {
  readonly requests: TransferRequest[] = [];
  failFor = new Set<AssetTypeKey>();
  throwFor = new Set<AssetTypeKey>();
  delayMs = 0;
  onTransfer?: (request: TransferRequest) => void;
  active = new Map<string, number>();
  maxActive = 0;

  async transfer(request: TransferRequest): Promise<TransferResult> {
    this.requests.push(request);
    this.onTransfer?.(request);
    if (this.throwFor.has(request.assetType)) {
      throw new Error('remote exploded');
    }
    if (this.failFor.has(request.assetType)) {
      return { ok: false, exitCode: 1, detail: 'rclone exited with 1' };
    }

    const volume = request.destination.startsWith(DISK_A.path) ? DISK_A.id : DISK_B.id;
    const running = (this.active.get(volume) ?? 0) + 1;
    this.active.set(volume, running);
    this.maxActive = Math.max(this.maxActive, running);
    try {
      if (this.delayMs > 0) await delay(this.delayMs);
      await mkdir(request.destination, { recursive: true });
      await writeFile(join(request.destination, 'payload.bin'), request.link.remoteId ?? '');
    } finally {
      this.active.set(volume, running - 1);
    }
    return { ok: true, exitCode: 0 };
  }
}

describe('TransferOrchestrator', () => {
  let store: SqliteStatusStore;
  let transfer: FakeTransfer;
  let free: number;

  function orchestrator(overrides: Partial<TransferOrchestratorOptions> = {}): TransferOrchestrator {
    return new TransferOrchestrator({
      store,
      transfer,
      probe: { freeBytes: async () => free },
      volumes: [DISK_A, DISK_B],
      minFreeBytes: 5 * GB,
      ...overrides,
    });
  }

  beforeEach(() => {
    rmSync(ROOT, { recursive: true, force: true });
    mkdirSync(join(DISK_A.path, 'Courses'), { recursive: true });
    mkdirSync(join(DISK_B.path, 'Courses'), { recursive: true });
    store = new SqliteStatusStore(':memory:');
    transfer = new FakeTransfer();
    free = 100 * GB;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    store.close();
    rmSync(ROOT, { recursive: true, force: true });
  });

  describe('runCourse', () => {
    it('should transfer every asset into one course directory on the assigned volume', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');

      const result = await orchestrator().runCourse(course('Biology'), DISK_A);

      expect(result.status).toBe('complete');
      expect(result.assets.map(asset => asset.status)).toEqual(['ok', 'ok', 'ok', 'ok', 'ok', 'ok']);
      expect(transfer.requests.map(request => request.destination)).toEqual([
        join(DISK_A.path, 'Courses', 'Biology', 'Course Outline'),
        join(DISK_A.path, 'Courses', 'Biology', 'PPTs'),
        join(DISK_A.path, 'Courses', 'Biology', 'Written Assets'),
        join(DISK_A.path, 'Courses', 'Biology', 'Final Videos'),
        join(DISK_A.path, 'Courses', 'Biology', 'Raw Videos'),
        join(DISK_A.path, 'Courses', 'Biology', 'Course Artifacts'),
      ]);
      expect(new Set(store.listOutcomes().map(outcome => outcome.volumeId))).toEqual(new Set(['disk-a']));
      expect(store.getCourseState('Biology')?.status).toBe('complete');
      expect(existsSync(join(DISK_B.path, 'Courses', 'Biology'))).toBe(false);
    });

    it('should do nothing on a second run', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      const subject = orchestrator();
      await subject.runCourse(course('Biology'), DISK_A);
      const before = store.listOutcomes();

      const again = await subject.runCourse(course('Biology'), DISK_A);

      expect(transfer.requests).toHaveLength(6);
      expect(again.status).toBe('complete');
      expect(again.assets.map(asset => asset.status)).toEqual(['ok', 'ok', 'ok', 'ok', 'ok', 'ok']);
      expect(store.listOutcomes()).toEqual(before);
    });

    it('should skip assets whose folder already has files', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      const slides = join(DISK_A.path, 'Courses', 'Biology', 'PPTs');
      mkdirSync(slides, { recursive: true });
      writeFileSync(join(slides, 'deck.pptx'), 'x');

      const result = await orchestrator().runCourse(course('Biology'), DISK_A);

      expect(result.assets[1]).toMatchObject({ assetType: 'slides', action: 'skipped-present', status: 'skipped-present' });
      expect(transfer.requests.map(request => request.assetType)).not.toContain('slides');
      expect(store.getOutcome('Biology', 'slides')?.status).toBe('skipped-present');
    });

    it('should record assets without a link as no-link', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      const subject = course('Biology');
      delete subject.links['raw-videos'];

      const result = await orchestrator().runCourse(subject, DISK_A);

      expect(result.status).toBe('complete');
      expect(result.assets[4]).toMatchObject({ assetType: 'raw-videos', action: 'no-link', status: 'no-link' });
      expect(transfer.requests).toHaveLength(5);
    });

    it('should transfer a remote folder shared by two assets once', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      const subject = course('Biology');
      subject.links['written-assets'] = link('biology-slides');

      const result = await orchestrator().runCourse(subject, DISK_A);

      expect(transfer.requests.map(request => request.assetType)).toEqual([
        'course-outline',
        'slides',
        'final-videos',
        'raw-videos',
        'course-artifacts',
      ]);
      expect(result.assets[2]).toEqual({
        assetType: 'written-assets',
        action: 'duplicate',
        status: 'skipped-present',
        remoteId: 'biology-slides',
        targetPath: join(DISK_A.path, 'Courses', 'Biology', 'Written Assets'),
        detail: 'duplicate of PPTs',
      });
      expect(result.status).toBe('complete');
    });

    it('should transfer a shared link without a folder id once', async () => {
      store.recordAssignment('Chemistry', 'disk-a', 'round-robin');
      const subject = course('Chemistry');
      const shared = { url: 'https://example.org/share/chem-materials', remoteId: null };
      subject.links.slides = shared;
      subject.links['written-assets'] = shared;

      const result = await orchestrator().runCourse(subject, DISK_A);

      expect(transfer.requests.filter(request => request.link.url === shared.url)).toHaveLength(1);
      expect(result.assets[2]).toMatchObject({
        assetType: 'written-assets',
        action: 'duplicate',
        status: 'skipped-present',
        remoteId: null,
        detail: 'duplicate of PPTs',
      });
    });

    it('should isolate a failing asset and finish the rest', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      transfer.failFor.add('final-videos');

      const result = await orchestrator().runCourse(course('Biology'), DISK_A);

      expect(result.status).toBe('partial');
      expect(result.assets.map(asset => asset.status)).toEqual(['ok', 'ok', 'ok', 'failed', 'ok', 'ok']);
      expect(store.getOutcome('Biology', 'final-videos')).toMatchObject({
        status: 'failed',
        detail: 'rclone exited with 1',
      });
      expect(store.getCourseState('Biology')?.status).toBe('partial');
    });

    it('should record a thrown transfer as failed', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      transfer.throwFor.add('slides');

      const result = await orchestrator().runCourse(course('Biology'), DISK_A);

      expect(result.assets[1]).toMatchObject({ status: 'failed', detail: 'remote exploded' });
      expect(result.status).toBe('partial');
    });

    it('should mark the course failed when every attempted transfer fails', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      for (const key of ['course-outline', 'slides', 'written-assets', 'final-videos', 'raw-videos', 'course-artifacts'] as const) {
        transfer.failFor.add(key);
      }

      const result = await orchestrator().runCourse(course('Biology'), DISK_A);

      expect(result.status).toBe('failed');
      expect(store.getCourseState('Biology')?.status).toBe('failed');
    });

    it('should retry only the failed asset on the next run', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      const subject = orchestrator();
      transfer.failFor.add('raw-videos');
      await subject.runCourse(course('Biology'), DISK_A);

      transfer.failFor.clear();
      transfer.requests.length = 0;
      const result = await subject.runCourse(course('Biology'), DISK_A);

      expect(transfer.requests.map(request => request.assetType)).toEqual(['raw-videos']);
      expect(result.status).toBe('complete');
    });

    it('should plan without side effects in a dry run', async () => {
      const result = await orchestrator().runCourse(course('Biology'), DISK_A, { dryRun: true });

      expect(result.status).toBe('planned');
      expect(result.assets.map(asset => asset.status)).toEqual([
        'not-started',
        'not-started',
        'not-started',
        'not-started',
        'not-started',
        'not-started',
      ]);
      expect(transfer.requests).toHaveLength(0);
      expect(store.listOutcomes()).toEqual([]);
      expect(store.getCourseState('Biology')).toBeUndefined();
      expect(existsSync(join(DISK_A.path, 'Courses', 'Biology'))).toBe(false);
    });

    it('should refuse a volume other than the assigned one', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');

      await expect(orchestrator().runCourse(course('Biology'), DISK_B)).rejects.toMatchObject({
        code: 'ASSIGNMENT_CONFLICT',
      });
      expect(transfer.requests).toHaveLength(0);
    });

    it('should refuse a course with no assignment outside a dry run', async () => {
      await expect(orchestrator().runCourse(course('Biology'), DISK_A)).rejects.toMatchObject({
        code: 'ASSIGNMENT_CONFLICT',
      });
    });

    it('should skip the course when the volume is low on space', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      free = 2 * GB;

      const result = await orchestrator().runCourse(course('Biology'), DISK_A);

      expect(result).toEqual({
        course: 'Biology',
        volumeId: 'disk-a',
        status: 'skipped',
        assets: [],
        reason: 'only 2.0 GB free on disk-a',
      });
      expect(store.getCourseState('Biology')?.status).toBe('skipped');
      expect(transfer.requests).toHaveLength(0);
    });

    it('should stop between assets when cancelled', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      const controller = new AbortController();
      transfer.onTransfer = request => {
        if (request.assetType === 'slides') controller.abort();
      };

      const result = await orchestrator().runCourse(course('Biology'), DISK_A, { signal: controller.signal });

      expect(result.reason).toBe('cancelled');
      expect(result.status).toBe('partial');
      expect(result.assets.map(asset => asset.assetType)).toEqual(['course-outline', 'slides']);
      expect(store.getCourseState('Biology')?.status).toBe('in-progress');
    });

    it('should require the completion marker when configured', async () => {
      store.recordAssignment('Biology', 'disk-a', 'round-robin');
      const slides = join(DISK_A.path, 'Courses', 'Biology', 'PPTs');
      mkdirSync(slides, { recursive: true });
      writeFileSync(join(slides, 'half-copied.pptx'), 'x');

      const subject = orchestrator({ completionMarker: true });
      await subject.runCourse(course('Biology'), DISK_A);

      expect(transfer.requests.map(request => request.assetType)).toContain('slides');
      expect(existsSync(join(slides, COMPLETION_MARKER))).toBe(true);

      transfer.requests.length = 0;
      await subject.runCourse(course('Biology'), DISK_A);
      expect(transfer.requests).toHaveLength(0);
    });
  });

  describe('runAll', () => {
    it('should skip ineligible courses and transfer the rest across volumes', async () => {
      const courses = [
        course('Algebra'),
        course('Biology', { status: 'In Production' }),
        course('Chemistry', { links: {} }),
        course('Drawing'),
      ];

      const summary = await orchestrator().runAll(courses);

      expect(summary.results.map(result => [result.course, result.status, result.volumeId, result.reason])).toEqual([
        ['Biology', 'skipped', null, 'status is In Production'],
        ['Chemistry', 'skipped', null, 'no asset links'],
        ['Algebra', 'complete', 'disk-a', undefined],
        ['Drawing', 'complete', 'disk-b', undefined],
      ]);
      expect(summary.status).toBe('completed');
      expect(summary.failures).toBe(0);
      expect(summary.courseCounts).toEqual({ skipped: 2, complete: 2 });
      expect(summary.assetCounts).toEqual({ ok: 12 });
      expect(store.listRuns()).toHaveLength(1);
      expect(store.listRuns()[0]).toMatchObject({ id: summary.runId, status: 'completed', dryRun: false });
    });

    it('should only run the selected courses', async () => {
      const summary = await orchestrator().runAll([course('Algebra'), course('Biology')], { select: ['bio'] });

      expect(summary.results.map(result => result.course)).toEqual(['Biology']);
      expect(store.getAssignment('Algebra')).toBeUndefined();
    });

    it('should treat manifest rows with the same name as one course', async () => {
      const summary = await orchestrator().runAll([course('Algebra'), course('ALGEBRA')]);

      expect(summary.results).toHaveLength(1);
      expect(transfer.requests).toHaveLength(6);
    });

    it('should count failed assets in the summary', async () => {
      transfer.failFor.add('slides');

      const summary = await orchestrator().runAll([course('Algebra'), course('Biology')]);

      expect(summary.failures).toBe(2);
      expect(summary.courseCounts).toEqual({ partial: 2 });
      expect(store.listRuns()[0].summary).toEqual({
        courses: { partial: 2 },
        assets: { ok: 10, failed: 2 },
        failures: 2,
      });
    });

    it('should write nothing in a dry run', async () => {
      const summary = await orchestrator().runAll([course('Algebra'), course('Biology')], { dryRun: true });

      expect(summary.runId).toBeNull();
      expect(summary.courseCounts).toEqual({ planned: 2 });
      expect(store.listAssignments()).toEqual([]);
      expect(store.listRuns()).toEqual([]);
      expect(transfer.requests).toHaveLength(0);
    });

    it('should skip courses no volume has room for', async () => {
      free = 1 * GB;

      const summary = await orchestrator().runAll([course('Algebra')]);

      expect(summary.results).toEqual([
        { course: 'Algebra', volumeId: null, status: 'skipped', assets: [], reason: 'no volume has 5.0 GB free' },
      ]);
    });

    it('should mark the run interrupted when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const summary = await orchestrator().runAll([course('Algebra')], { signal: controller.signal });

      expect(summary.status).toBe('interrupted');
      expect(summary.results[0]).toMatchObject({ status: 'skipped', reason: 'cancelled' });
      expect(store.listRuns()[0].status).toBe('interrupted');
    });

    it('should run volumes in parallel but never two courses on one volume', async () => {
      transfer.delayMs = 5;

      const summary = await orchestrator({ parallelVolumes: true }).runAll([
        course('Algebra'),
        course('Biology'),
        course('Chemistry'),
        course('Drawing'),
      ]);

      expect(summary.courseCounts).toEqual({ complete: 4 });
      expect(transfer.maxActive).toBe(1);
    });

    it('should stop the whole run on a corrupt status store', async () => {
      const readOutcome = store.getOutcome.bind(store);
      vi.spyOn(store, 'getOutcome').mockImplementation((name, assetType) => {
        if (name === 'Algebra') throw new AppError('database disk image is malformed', 'STATUS_STORE_CORRUPT', 500);
        return readOutcome(name, assetType);
      });
      vi.spyOn(console, 'error').mockImplementation(() => undefined);

      await expect(
        orchestrator().runAll([course('Algebra'), course('Biology'), course('Chemistry')])
      ).rejects.toMatchObject({ code: 'STATUS_STORE_CORRUPT' });
      await delay(20);

      expect(transfer.requests.map(request => request.course)).toEqual(['Algebra']);
      expect(store.getCourseState('Biology')).toBeUndefined();
      expect(store.getCourseState('Chemistry')).toBeUndefined();
      expect(store.listRuns().map(run => run.status)).toEqual(['interrupted']);
    });

    it('should refuse to run without volumes', async () => {
      await expect(orchestrator({ volumes: [] }).runAll([course('Algebra')])).rejects.toMatchObject({
        code: 'NO_VOLUMES_CONFIGURED',
      });
    });
  });
});

describe('course helpers', () => {
  it('should select courses by case-insensitive substring', () => {
    const courses = [course('Intro to Programming'), course('Biology'), course('Advanced Programming')];
    expect(selectCourses(courses, ['PROGRAM']).map(entry => entry.name)).toEqual([
      'Intro to Programming',
      'Advanced Programming',
    ]);
    expect(selectCourses(courses, [' ', ''])).toHaveLength(3);
  });

  it('should only accept eligible statuses with at least one link', () => {
    expect(isEligibleCourse(course('Biology', { status: ' completed ' }))).toBe(true);
    expect(isEligibleCourse(course('Biology', { status: 'Draft' }))).toBe(false);
    expect(isEligibleCourse(course('Biology', { status: 'Draft' }), ['Draft'])).toBe(true);
    expect(isEligibleCourse(course('Biology', { links: {} }))).toBe(false);
  });

  it('should derive the course status from asset outcomes', () => {
    const asset = (action: 'transfer' | 'no-link' | 'duplicate', status: 'ok' | 'failed' | 'no-link' | 'skipped-present') => ({
      assetType: 'slides' as const,
      action,
      status,
      remoteId: null,
      targetPath: '/x',
      detail: null,
    });

    expect(courseStatusFor([asset('transfer', 'ok'), asset('no-link', 'no-link')])).toBe('complete');
    expect(courseStatusFor([asset('transfer', 'failed'), asset('duplicate', 'skipped-present')])).toBe('failed');
    expect(courseStatusFor([asset('transfer', 'failed'), asset('transfer', 'ok')])).toBe('partial');
  });
});
