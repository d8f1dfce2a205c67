/**
 * Disk assignment - decides which volume receives a course, exactly once
 */

import { join } from 'path';
import { BYTES_PER_GB } from './disk-space.js';
import { logger } from './logger.js';
import { formatBytes, sanitizeName } from './naming.js';
import type { StatusStore } from './status-store.js';
import { isFolderPopulated } from './transfer/folder-state.js';
import type { AssignmentReason, DiskAssignment, DiskSpaceProbe, Volume } from './types.js';

export type AssignmentDecision =
  | { kind: 'assigned'; course: string; volume: Volume; reason: AssignmentReason }
  | { kind: 'skipped'; course: string; reason: string };

export interface AssignmentPolicyOptions {
  minFreeBytes: number;
  /** Volumes within this fraction of the most free space count as tied */
  balanceTolerance: number;
  /** Whether a non-empty course directory already exists at this path */
  courseDirectoryExists?: (path: string) => Promise<boolean>;
}

export function courseDirectory(volume: Volume, course: string): string {
  return join(volume.path, volume.courseRoot, sanitizeName(course));
}

export class DiskAssignmentPolicy {
  private readonly newAssignments = new Map<string, number>();
  private readonly courseDirectoryExists: (path: string) => Promise<boolean>;

  constructor(private readonly options: AssignmentPolicyOptions) {
    this.courseDirectoryExists = options.courseDirectoryExists ?? isFolderPopulated;
  }

  static fromConfig(minFreeGb: number, balanceTolerance: number): DiskAssignmentPolicy {
    return new DiskAssignmentPolicy({ minFreeBytes: minFreeGb * BYTES_PER_GB, balanceTolerance });
  }

  /**
   * New placements this policy instance has made, per volume; reused directories are not counted
   */
  counts(): ReadonlyMap<string, number> {
    return this.newAssignments;
  }

  async assign(
    course: string,
    candidateVolumes: readonly Volume[],
    existingAssignment: DiskAssignment | undefined,
    freeSpaceByVolume: ReadonlyMap<string, number>
  ): Promise<AssignmentDecision> {
    if (existingAssignment) {
      const volume = candidateVolumes.find(candidate => candidate.id === existingAssignment.volumeId);
      if (!volume) {
        return {
          kind: 'skipped',
          course,
          reason: `assigned volume ${existingAssignment.volumeId} is not configured`,
        };
      }
      return { kind: 'assigned', course, volume, reason: 'existing' };
    }

    for (const volume of candidateVolumes) {
      if (await this.courseDirectoryExists(courseDirectory(volume, course))) {
        return { kind: 'assigned', course, volume, reason: 'reuse-in-place' };
      }
    }

    const eligible = candidateVolumes.filter(
      volume => (freeSpaceByVolume.get(volume.id) ?? 0) >= this.options.minFreeBytes
    );
    if (eligible.length === 0) {
      return {
        kind: 'skipped',
        course,
        reason: `no volume has ${formatBytes(this.options.minFreeBytes)} free`,
      };
    }

    const free = (volume: Volume) => freeSpaceByVolume.get(volume.id) ?? 0;
    const most = Math.max(...eligible.map(free));
    const tied = eligible.filter(volume => free(volume) >= most * (1 - this.options.balanceTolerance));

    if (tied.length === 1) {
      return this.record(course, tied[0], 'most-free-space');
    }

    let chosen = tied[0];
    for (const volume of tied) {
      if (this.count(volume) < this.count(chosen)) {
        chosen = volume;
      }
    }
    return this.record(course, chosen, 'round-robin');
  }

  private count(volume: Volume): number {
    return this.newAssignments.get(volume.id) ?? 0;
  }

  private record(course: string, volume: Volume, reason: AssignmentReason): AssignmentDecision {
    this.newAssignments.set(volume.id, this.count(volume) + 1);
    return { kind: 'assigned', course, volume, reason };
  }
}

/**
 * Applies the policy against the status store, persisting every new decision before returning it
 */
export class DiskAssigner {
  constructor(
    private readonly store: StatusStore,
    private readonly policy: DiskAssignmentPolicy,
    private readonly probe: DiskSpaceProbe,
    private readonly volumes: readonly Volume[]
  ) {}

  async freeSpaceByVolume(): Promise<Map<string, number>> {
    const free = new Map<string, number>();
    for (const volume of this.volumes) {
      free.set(volume.id, await this.probe.freeBytes(join(volume.path, volume.courseRoot)));
    }
    return free;
  }

  async assign(course: string): Promise<AssignmentDecision> {
    const existing = this.store.getAssignment(course);
    const free = existing ? new Map<string, number>() : await this.freeSpaceByVolume();
    const decision = await this.policy.assign(course, this.volumes, existing, free);

    if (decision.kind === 'skipped') {
      logger.warn(`Course not assigned: ${course} (${decision.reason})`, undefined, 'DiskAssigner');
      return decision;
    }
    if (decision.reason === 'existing') {
      return decision;
    }

    const stored = this.store.recordAssignment(course, decision.volume.id, decision.reason);
    logger.info(
      `Assigned ${course} -> ${stored.volumeId}`,
      { reason: stored.reason, free: formatBytes(free.get(stored.volumeId) ?? 0) },
      'DiskAssigner'
    );
    if (stored.volumeId !== decision.volume.id) {
      const volume = this.volumes.find(candidate => candidate.id === stored.volumeId);
      return volume
        ? { kind: 'assigned', course, volume, reason: 'existing' }
        : { kind: 'skipped', course, reason: `assigned volume ${stored.volumeId} is not configured` };
    }
    return decision;
  }

  async assignAll(courses: readonly string[]): Promise<AssignmentDecision[]> {
    const decisions: AssignmentDecision[] = [];
    for (const course of courses) {
      decisions.push(await this.assign(course));
    }
    return decisions;
  }
}
