/**
 * Reconciliation engine - classifies every course x asset pair by local
 * presence and remote reachability
 */

import { ASSET_TYPES, type AssetTypeDefinition } from './asset-types.js';
import { IndexLookup } from './indexing/index-lookup.js';
import { FuzzyMatcher } from './matching/fuzzy-matcher.js';
import { courseKey, normalizeName } from './naming.js';
import type {
  AssetLink,
  AvailabilityRecord,
  Course,
  CourseAvailability,
  DriveIndex,
  IndexEntry,
  LinkStatusMap,
  LocalStatus,
  MatchResult,
  RemoteStatus,
  RowClassification,
  TransferOutcome,
} from './types.js';

export interface ReconcileOptions {
  /** Minimum fuzzy score (0-100) for a folder to count as the course */
  threshold: number;
  /** Stored transfer outcomes; ok/skipped-present ones override the filesystem probe */
  outcomes?: readonly TransferOutcome[];
}

const NO_MATCH: MatchResult = { matched: false, localPath: null, root: null, score: 0 };

export function resolveRemoteStatus(link: AssetLink | undefined, linkStatuses: LinkStatusMap): RemoteStatus {
  if (!link) return 'absent-link';
  const verdict = (link.remoteId ? linkStatuses.get(link.remoteId) : undefined) ?? linkStatuses.get(link.url);
  return verdict ?? 'unchecked';
}

export function isSatisfied(record: AvailabilityRecord): boolean {
  return record.localStatus !== 'absent' || record.remoteStatus === 'available';
}

/**
 * complete / partial / none from the six records of one course
 */
export function classifyRow(records: readonly AvailabilityRecord[]): RowClassification {
  const satisfied = records.filter(isSatisfied).length;
  if (records.length > 0 && satisfied === records.length) return 'complete';
  if (satisfied === 0) return 'none';
  return 'partial';
}

export function groupByCourse(records: readonly AvailabilityRecord[]): CourseAvailability[] {
  const groups = new Map<string, CourseAvailability>();
  for (const record of records) {
    const key = courseKey(record.course);
    const group = groups.get(key) ?? { course: record.course, records: [] };
    group.records.push(record);
    groups.set(key, group);
  }
  return [...groups.values()];
}

/**
 * Locates asset folders on disk for courses, reusing one normalized candidate set
 */
export class LocalAssetLocator {
  private readonly lookup: IndexLookup;
  private readonly courseMatcher: FuzzyMatcher;

  constructor(index: DriveIndex, private readonly threshold: number) {
    this.lookup = new IndexLookup(index);
    this.courseMatcher = new FuzzyMatcher(this.lookup.directoryNames());
  }

  /**
   * Best matching course folders (all directories with the winning name) and their score
   */
  matchCourse(courseName: string): { folders: IndexEntry[]; score: number } {
    const best = this.courseMatcher.findBestMatch(courseName, this.threshold);
    if (!best) return { folders: [], score: 0 };
    return { folders: this.lookup.directoriesNamed(best.candidate), score: best.score };
  }

  locateAsset(folders: IndexEntry[], courseScore: number, assetType: AssetTypeDefinition): MatchResult {
    const fixedNames = [assetType.folderName, ...assetType.aliases].map(normalizeName);

    for (const folder of folders) {
      const children = this.lookup.childDirectoriesOf(folder);
      for (const name of fixedNames) {
        const child = children.find(entry => entry.normalizedName === name);
        if (child) {
          return { matched: true, localPath: this.lookup.absolutePath(child), root: child.root, score: courseScore };
        }
      }
    }

    for (const folder of folders) {
      const children = this.lookup.childDirectoriesOf(folder);
      if (children.length === 0) continue;
      const best = new FuzzyMatcher(children.map(child => child.name)).findBestMatch(assetType.label, this.threshold);
      const child = best ? children.find(entry => entry.name === best.candidate) : undefined;
      if (best && child) {
        return {
          matched: true,
          localPath: this.lookup.absolutePath(child),
          root: child.root,
          score: Math.min(courseScore, best.score),
        };
      }
    }

    return { ...NO_MATCH };
  }
}

function outcomeKey(course: string, assetType: string): string {
  return `${courseKey(course)}\u0000${assetType}`;
}

export function reconcile(
  courses: readonly Course[],
  driveIndex: DriveIndex,
  linkStatuses: LinkStatusMap,
  options: ReconcileOptions
): AvailabilityRecord[] {
  const locator = new LocalAssetLocator(driveIndex, options.threshold);

  const transferred = new Set<string>();
  for (const outcome of options.outcomes ?? []) {
    if (outcome.status === 'ok' || outcome.status === 'skipped-present') {
      transferred.add(outcomeKey(outcome.course, outcome.assetType));
    }
  }

  const records: AvailabilityRecord[] = [];
  for (const course of courses) {
    const { folders, score } = locator.matchCourse(course.name);

    for (const assetType of ASSET_TYPES) {
      const match = folders.length > 0 ? locator.locateAsset(folders, score, assetType) : { ...NO_MATCH };

      let localStatus: LocalStatus = 'absent';
      if (transferred.has(outcomeKey(course.name, assetType.key))) {
        localStatus = 'found-via-transfer';
      } else if (match.matched) {
        localStatus = 'found';
      }

      records.push({
        course: course.name,
        assetType: assetType.key,
        localStatus,
        remoteStatus: resolveRemoteStatus(course.links[assetType.key], linkStatuses),
        match,
      });
    }
  }

  return records;
}
