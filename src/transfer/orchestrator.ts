/**
 * Transfer orchestrator - resumable, idempotent per-course transfer of missing assets
 */

import { join } from 'path';
import pLimit from 'p-limit';
import { ASSET_TYPES, getAssetType } from '../asset-types.js';
import { DiskAssigner, DiskAssignmentPolicy, courseDirectory, type AssignmentDecision } from '../assignment.js';
import { AppError, errorMessage, logger } from '../logger.js';
import { courseKey, formatBytes } from '../naming.js';
import type { StatusStore } from '../status-store.js';
import type {
  AssetLink,
  AssetResult,
  AssetTypeKey,
  Course,
  CourseResult,
  CourseResultStatus,
  DiskSpaceProbe,
  TransferPrimitive,
  TransferRunStatus,
  TransferStatus,
  Volume,
} from '../types.js';
import { isAssetPresent, writeCompletionMarker } from './folder-state.js';

export interface TransferOrchestratorOptions {
  store: StatusStore;
  transfer: TransferPrimitive;
  probe: DiskSpaceProbe;
  volumes: readonly Volume[];
  minFreeBytes: number;
  balanceTolerance?: number;
  eligibleStatuses?: readonly string[];
  parallelVolumes?: boolean;
  /** Only count a folder as transferred once it carries the completion marker */
  completionMarker?: boolean;
}

export interface RunOptions {
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface RunAllOptions extends RunOptions {
  /** Case-insensitive substrings; a course is selected when its name contains any */
  select?: readonly string[];
}

export interface RunSummary {
  runId: string | null;
  status: TransferRunStatus;
  dryRun: boolean;
  results: CourseResult[];
  courseCounts: Partial<Record<CourseResultStatus, number>>;
  assetCounts: Partial<Record<TransferStatus, number>>;
  failures: number;
}

const SETTLED: ReadonlySet<TransferStatus> = new Set<TransferStatus>(['ok', 'skipped-present', 'no-link']);

export function selectCourses(courses: readonly Course[], needles: readonly string[] = []): Course[] {
  const lowered = needles.map(needle => needle.trim().toLowerCase()).filter(Boolean);
  if (lowered.length === 0) return [...courses];
  return courses.filter(course => {
    const name = course.name.toLowerCase();
    return lowered.some(needle => name.includes(needle));
  });
}

export function hasAnyLink(course: Course): boolean {
  return ASSET_TYPES.some(type => course.links[type.key] !== undefined);
}

export function isEligibleCourse(course: Course, eligibleStatuses: readonly string[] = ['Completed']): boolean {
  const status = course.status.trim().toLowerCase();
  return eligibleStatuses.some(candidate => candidate.trim().toLowerCase() === status) && hasAnyLink(course);
}

/**
 * complete iff every outcome settled; failed iff every attempted transfer failed
 */
export function courseStatusFor(assets: readonly AssetResult[]): CourseResultStatus {
  if (assets.some(asset => asset.status === 'not-started')) return 'planned';
  if (assets.every(asset => SETTLED.has(asset.status))) return 'complete';
  const attempted = assets.filter(asset => asset.action === 'transfer');
  if (attempted.length > 0 && attempted.every(asset => asset.status === 'failed')) return 'failed';
  return 'partial';
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export class TransferOrchestrator {
  private readonly store: StatusStore;
  private readonly volumes: readonly Volume[];
  private readonly eligibleStatuses: readonly string[];
  private readonly inFlight = new Set<string>();

  constructor(private readonly options: TransferOrchestratorOptions) {
    this.store = options.store;
    this.volumes = options.volumes;
    this.eligibleStatuses = options.eligibleStatuses ?? ['Completed'];
  }

  isEligible(course: Course): boolean {
    return isEligibleCourse(course, this.eligibleStatuses);
  }

  async runCourse(course: Course, volume: Volume, options: RunOptions = {}): Promise<CourseResult> {
    const dryRun = options.dryRun ?? false;
    const key = courseKey(course.name);

    const assignment = this.store.getAssignment(course.name);
    if (assignment ? assignment.volumeId !== volume.id : !dryRun) {
      throw new AppError(
        `Course ${course.name} is assigned to ${assignment?.volumeId ?? 'no volume'}, not ${volume.id}`,
        'ASSIGNMENT_CONFLICT',
        409,
        { course: course.name, volume: volume.id }
      );
    }
    if (this.inFlight.has(key)) {
      throw new AppError(`Course ${course.name} is already being transferred`, 'ASSIGNMENT_CONFLICT', 409);
    }

    this.inFlight.add(key);
    try {
      return await this.processCourse(course, volume, dryRun, options.signal);
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async processCourse(
    course: Course,
    volume: Volume,
    dryRun: boolean,
    signal: AbortSignal | undefined
  ): Promise<CourseResult> {
    const courseDir = courseDirectory(volume, course.name);

    const free = await this.options.probe.freeBytes(join(volume.path, volume.courseRoot));
    if (free < this.options.minFreeBytes) {
      const reason = `only ${formatBytes(free)} free on ${volume.id}`;
      logger.warn(`Skipping ${course.name}: ${reason}`, undefined, 'TransferOrchestrator');
      if (!dryRun) {
        this.store.setCourseState({ course: course.name, status: 'skipped', volumeId: volume.id, detail: reason });
      }
      return { course: course.name, volumeId: volume.id, status: 'skipped', assets: [], reason };
    }

    if (!dryRun) {
      this.store.setCourseState({ course: course.name, status: 'in-progress', volumeId: volume.id, detail: null });
    }
    logger.info(`Processing ${course.name} on ${volume.id}`, { dryRun, courseDir }, 'TransferOrchestrator');

    const assets: AssetResult[] = [];
    const seen = new Map<string, AssetTypeKey>();

    for (const assetType of ASSET_TYPES) {
      if (signal?.aborted) {
        logger.warn(`Cancelled during ${course.name}`, { next: assetType.key }, 'TransferOrchestrator');
        return { course: course.name, volumeId: volume.id, status: 'partial', assets, reason: 'cancelled' };
      }

      const link = course.links[assetType.key];
      const targetPath = join(courseDir, assetType.folderName);
      const remoteId = link?.remoteId ?? null;
      const reference = link ? (link.remoteId ?? link.url) : null;
      let result: AssetResult;

      if (!link) {
        result = { assetType: assetType.key, action: 'no-link', status: 'no-link', remoteId, targetPath, detail: null };
      } else if (await isAssetPresent(targetPath, this.options.completionMarker ?? false)) {
        result = {
          assetType: assetType.key,
          action: 'skipped-present',
          status: 'skipped-present',
          remoteId,
          targetPath,
          detail: null,
        };
        if (reference && !seen.has(reference)) seen.set(reference, assetType.key);
      } else if (reference && seen.has(reference)) {
        const first = seen.get(reference) ?? assetType.key;
        result = {
          assetType: assetType.key,
          action: 'duplicate',
          status: 'skipped-present',
          remoteId,
          targetPath,
          detail: `duplicate of ${getAssetType(first).label}`,
        };
      } else {
        if (reference) seen.set(reference, assetType.key);
        result = dryRun
          ? { assetType: assetType.key, action: 'transfer', status: 'not-started', remoteId, targetPath, detail: null }
          : await this.transferAsset(course.name, assetType.key, link, targetPath, signal);
      }

      if (!dryRun) {
        result = this.persist(course.name, volume.id, result);
      }
      assets.push(result);
    }

    const status = courseStatusFor(assets);
    if (!dryRun && status !== 'planned') {
      this.store.setCourseState({ course: course.name, status, volumeId: volume.id, detail: null });
    }
    logger.info(`Finished ${course.name}: ${status}`, undefined, 'TransferOrchestrator');
    return { course: course.name, volumeId: volume.id, status, assets };
  }

  private async transferAsset(
    course: string,
    assetType: AssetTypeKey,
    link: AssetLink,
    targetPath: string,
    signal: AbortSignal | undefined
  ): Promise<AssetResult> {
    const remoteId = link.remoteId;
    const base = { assetType, action: 'transfer' as const, remoteId, targetPath };

    try {
      const outcome = await this.options.transfer.transfer(
        { course, assetType, link, destination: targetPath },
        signal
      );
      if (!outcome.ok) {
        logger.warn(
          `Transfer failed: ${course} / ${assetType}`,
          { exitCode: outcome.exitCode, detail: outcome.detail },
          'TransferOrchestrator'
        );
        return { ...base, status: 'failed', detail: outcome.detail ?? `exit code ${outcome.exitCode ?? 'unknown'}` };
      }
      if (this.options.completionMarker) {
        await writeCompletionMarker(targetPath, { course, assetType, remoteId });
      }
      return { ...base, status: 'ok', detail: null };
    } catch (error) {
      logger.error(`Transfer threw: ${course} / ${assetType}`, error instanceof Error ? error : undefined, 'TransferOrchestrator');
      return { ...base, status: 'failed', detail: errorMessage(error) };
    }
  }

  /**
   * Stored ok/skipped-present records stay as they are when the folder is still present
   */
  private persist(course: string, volumeId: string, result: AssetResult): AssetResult {
    const stored = this.store.getOutcome(course, result.assetType);
    if (
      result.action === 'skipped-present' &&
      stored &&
      stored.volumeId === volumeId &&
      (stored.status === 'ok' || stored.status === 'skipped-present')
    ) {
      return { ...result, status: stored.status, detail: stored.detail };
    }

    this.store.recordOutcome({
      course,
      assetType: result.assetType,
      status: result.status,
      volumeId,
      remoteId: result.remoteId,
      detail: result.detail,
    });
    return result;
  }

  private volumeFor(decision: AssignmentDecision): Volume | null {
    return decision.kind === 'assigned' ? decision.volume : null;
  }

  async runAll(courses: readonly Course[], options: RunAllOptions = {}): Promise<RunSummary> {
    if (this.volumes.length === 0) {
      throw new AppError('No volumes configured', 'NO_VOLUMES_CONFIGURED', 400);
    }

    const dryRun = options.dryRun ?? false;
    const { signal } = options;
    const results: CourseResult[] = [];

    const unique = new Map<string, Course>();
    for (const course of selectCourses(courses, options.select)) {
      const key = courseKey(course.name);
      if (!unique.has(key)) unique.set(key, course);
    }

    const planned: Array<{ course: Course; volume: Volume }> = [];
    const policy = new DiskAssignmentPolicy({
      minFreeBytes: this.options.minFreeBytes,
      balanceTolerance: this.options.balanceTolerance ?? 0.2,
    });
    const assigner = new DiskAssigner(this.store, policy, this.options.probe, this.volumes);

    for (const course of unique.values()) {
      if (!this.isEligible(course)) {
        const reason = hasAnyLink(course) ? `status is ${course.status || 'empty'}` : 'no asset links';
        results.push({ course: course.name, volumeId: null, status: 'skipped', assets: [], reason });
        continue;
      }

      const decision = dryRun
        ? await policy.assign(
            course.name,
            this.volumes,
            this.store.getAssignment(course.name),
            await assigner.freeSpaceByVolume()
          )
        : await assigner.assign(course.name);
      const volume = this.volumeFor(decision);
      if (!volume) {
        const reason = decision.kind === 'skipped' ? decision.reason : 'unassigned';
        results.push({ course: course.name, volumeId: null, status: 'skipped', assets: [], reason });
        continue;
      }
      planned.push({ course, volume });
    }

    const run = dryRun ? null : this.store.startRun(false);
    let interrupted = false;
    let fatal: AppError | undefined;

    // Aborted by the caller or by the first fatal store error; reaches the course in flight too
    const abort = new AbortController();
    const onAbort = () => abort.abort();
    if (signal?.aborted) abort.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const shared = pLimit(1);
    const perVolume = new Map(this.volumes.map(volume => [volume.id, pLimit(1)]));
    const limiterFor = (volume: Volume) =>
      this.options.parallelVolumes ? (perVolume.get(volume.id) ?? shared) : shared;

    let processed: CourseResult[];
    try {
      processed = await Promise.all(
        planned.map(({ course, volume }) =>
          limiterFor(volume)(async (): Promise<CourseResult> => {
            if (abort.signal.aborted) {
              if (!fatal) interrupted = true;
              return { course: course.name, volumeId: volume.id, status: 'skipped', assets: [], reason: 'cancelled' };
            }
            try {
              const result = await this.runCourse(course, volume, { dryRun, signal: abort.signal });
              if (result.reason === 'cancelled' && !fatal) interrupted = true;
              return result;
            } catch (error) {
              if (error instanceof AppError && error.code === 'STATUS_STORE_CORRUPT') {
                fatal ??= error;
                abort.abort();
                return { course: course.name, volumeId: volume.id, status: 'failed', assets: [], reason: error.message };
              }
              logger.error(`Course failed: ${course.name}`, error instanceof Error ? error : undefined, 'TransferOrchestrator');
              return { course: course.name, volumeId: volume.id, status: 'failed', assets: [], reason: errorMessage(error) };
            }
          })
        )
      );
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (fatal) {
      logger.error('Run aborted: status store is unusable', fatal, 'TransferOrchestrator');
      if (run) this.closeAbortedRun(run.id, fatal);
      throw fatal;
    }
    results.push(...processed);

    const summary = this.summarize(run?.id ?? null, interrupted ? 'interrupted' : 'completed', dryRun, results);
    if (run) {
      this.store.finishRun(run.id, summary.status, {
        courses: summary.courseCounts,
        assets: summary.assetCounts,
        failures: summary.failures,
      });
    }

    logger.info(
      `Run ${summary.status}: ${results.length} courses, ${summary.failures} failures`,
      { courses: summary.courseCounts, assets: summary.assetCounts },
      'TransferOrchestrator'
    );
    return summary;
  }

  private closeAbortedRun(runId: string, cause: AppError): void {
    try {
      this.store.finishRun(runId, 'interrupted', { error: cause.message });
    } catch (error) {
      logger.warn('Could not close the aborted run', { runId, error: errorMessage(error) }, 'TransferOrchestrator');
    }
  }

  private summarize(
    runId: string | null,
    status: TransferRunStatus,
    dryRun: boolean,
    results: CourseResult[]
  ): RunSummary {
    const courseCounts: Partial<Record<CourseResultStatus, number>> = {};
    const assetCounts: Partial<Record<TransferStatus, number>> = {};
    let failures = 0;

    for (const result of results) {
      increment(courseCounts, result.status);
      if (result.status === 'failed' && result.assets.length === 0) failures++;
      for (const asset of result.assets) {
        increment(assetCounts, asset.status);
        if (asset.status === 'failed') failures++;
      }
    }

    return { runId, status, dryRun, results, courseCounts, assetCounts, failures };
  }
}
