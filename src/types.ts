/**
 * Core types for course asset reconciliation and transfer
 */

import type {
  AssetTypeKey,
  AvailabilityRecord,
  CourseRunStatus,
  LinkVerdict,
  TransferStatus,
} from '@course-sync/contracts';

export type {
  AssetTypeKey,
  AssignmentReason,
  AvailabilityRecord,
  CourseRunState,
  CourseRunStatus,
  DiskAssignment,
  LinkVerdict,
  LocalStatus,
  MatchResult,
  OverallProgress,
  RemoteStatus,
  ReportRow,
  RowClassification,
  TransferOutcome,
  TransferRunRecord,
  TransferRunStatus,
  TransferStatus,
} from '@course-sync/contracts';

export interface AssetLink {
  url: string;
  /** Remote folder identifier parsed from the url, when recognizable */
  remoteId: string | null;
}

export interface Course {
  name: string;
  status: string;
  links: Partial<Record<AssetTypeKey, AssetLink>>;
}

export interface StorageRoot {
  id: string;
  path: string;
}

export interface Volume extends StorageRoot {
  /** Subdirectory under the mount that holds one folder per course */
  courseRoot: string;
}

export interface IndexEntry {
  root: string;
  /** Path relative to the root, posix separators */
  path: string;
  name: string;
  normalizedName: string;
  isDirectory: boolean;
}

export interface DriveIndex {
  fingerprint: string;
  createdAt: string;
  roots: StorageRoot[];
  partitions: Record<string, IndexEntry[]>;
  warnings: string[];
}

/** Remote reachability verdicts keyed by remote folder id (or raw link) */
export type LinkStatusMap = ReadonlyMap<string, LinkVerdict>;

export interface CourseAvailability {
  course: string;
  records: AvailabilityRecord[];
}

export type AssetAction = 'no-link' | 'skipped-present' | 'duplicate' | 'transfer';

export interface AssetResult {
  assetType: AssetTypeKey;
  action: AssetAction;
  status: TransferStatus;
  remoteId: string | null;
  targetPath: string;
  detail: string | null;
}

export type CourseResultStatus = Exclude<CourseRunStatus, 'pending' | 'in-progress'> | 'planned';

export interface CourseResult {
  course: string;
  volumeId: string | null;
  status: CourseResultStatus;
  assets: AssetResult[];
  reason?: string;
}

export interface TransferRequest {
  course: string;
  assetType: AssetTypeKey;
  link: AssetLink;
  destination: string;
}

export interface TransferResult {
  ok: boolean;
  exitCode: number | null;
  detail?: string;
}

/**
 * Moves the bytes of one remote asset folder into a local directory
 */
export interface TransferPrimitive {
  transfer(request: TransferRequest, signal?: AbortSignal): Promise<TransferResult>;
}

export interface DiskSpaceProbe {
  freeBytes(path: string): Promise<number>;
}

export type Clock = () => Date;
