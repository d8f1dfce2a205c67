/**
 * Progress report - one row per course combining assignment, outcomes and availability
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { courseDirectory } from './assignment.js';
import { logger } from './logger.js';
import { courseKey } from './naming.js';
import { classifyRow, groupByCourse } from './reconciliation.js';
import type {
  AssetTypeKey,
  AvailabilityRecord,
  Course,
  DiskAssignment,
  OverallProgress,
  ReportRow,
  RowClassification,
  TransferOutcome,
  TransferStatus,
  Volume,
} from './types.js';

export interface ReportInput {
  courses: readonly Course[];
  assignments: readonly DiskAssignment[];
  outcomes: readonly TransferOutcome[];
  availability: readonly AvailabilityRecord[];
  volumes: readonly Volume[];
  eligibleStatuses?: readonly string[];
}

export interface ProgressReport {
  generatedAt: string;
  summary: {
    courses: number;
    overall: Partial<Record<OverallProgress, number>>;
    availability: Partial<Record<RowClassification, number>>;
  };
  rows: ReportRow[];
}

const IN_PRODUCTION = 'in production';

export function overallProgress(courseStatus: string, outcomes: readonly TransferOutcome[]): OverallProgress {
  if (courseStatus.trim().toLowerCase() === IN_PRODUCTION) return 'In Production';
  if (outcomes.length === 0) return 'Not Started';

  const transferred = (status: TransferStatus) => status === 'ok' || status === 'skipped-present';
  if (outcomes.every(outcome => transferred(outcome.status) || outcome.status === 'no-link')) {
    return outcomes.some(outcome => transferred(outcome.status)) ? 'Complete' : 'Pending';
  }
  if (outcomes.some(outcome => transferred(outcome.status))) return 'Partial';
  if (outcomes.every(outcome => outcome.status === 'failed')) return 'Failed';
  return 'Pending';
}

export function buildReportRows(input: ReportInput): ReportRow[] {
  const eligible = new Set((input.eligibleStatuses ?? ['Completed']).map(status => status.trim().toLowerCase()));
  const assignments = new Map(input.assignments.map(assignment => [courseKey(assignment.course), assignment]));
  const volumes = new Map(input.volumes.map(volume => [volume.id, volume]));

  const outcomesByCourse = new Map<string, TransferOutcome[]>();
  for (const outcome of input.outcomes) {
    const key = courseKey(outcome.course);
    const list = outcomesByCourse.get(key) ?? [];
    list.push(outcome);
    outcomesByCourse.set(key, list);
  }

  const classification = new Map<string, RowClassification>();
  for (const group of groupByCourse(input.availability)) {
    classification.set(courseKey(group.course), classifyRow(group.records));
  }

  return input.courses.map((course, position) => {
    const key = courseKey(course.name);
    const assignment = assignments.get(key);
    const volume = assignment ? volumes.get(assignment.volumeId) : undefined;
    const outcomes = outcomesByCourse.get(key) ?? [];
    const fallback: TransferStatus | 'n/a' = eligible.has(course.status.trim().toLowerCase()) ? 'not-started' : 'n/a';

    const statusOf = (assetType: AssetTypeKey) =>
      outcomes.find(outcome => outcome.assetType === assetType)?.status ?? fallback;
    const assets: Record<AssetTypeKey, TransferStatus | 'n/a'> = {
      'course-outline': statusOf('course-outline'),
      slides: statusOf('slides'),
      'written-assets': statusOf('written-assets'),
      'final-videos': statusOf('final-videos'),
      'raw-videos': statusOf('raw-videos'),
      'course-artifacts': statusOf('course-artifacts'),
    };

    return {
      index: position + 1,
      course: course.name,
      courseStatus: course.status,
      volumeId: assignment?.volumeId ?? null,
      coursePath: volume ? courseDirectory(volume, course.name) : null,
      assets,
      availability: classification.get(key) ?? 'none',
      overall: overallProgress(course.status, outcomes),
    };
  });
}

function tally<K extends string>(values: readonly K[]): Partial<Record<K, number>> {
  const counts: Partial<Record<K, number>> = {};
  for (const value of values) {
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}

export function buildProgressReport(input: ReportInput, now: Date = new Date()): ProgressReport {
  const rows = buildReportRows(input);
  return {
    generatedAt: now.toISOString(),
    summary: {
      courses: rows.length,
      overall: tally(rows.map(row => row.overall)),
      availability: tally(rows.map(row => row.availability)),
    },
    rows,
  };
}

/**
 * Write the report as pretty-printed JSON
 */
export class ReportWriter {
  constructor(private readonly path: string = './reports/progress.json') {}

  write(report: ProgressReport): string {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify(report, null, 2));
    logger.success(`Wrote report for ${report.rows.length} courses to ${this.path}`, 'ReportWriter');
    return this.path;
  }
}
