export type AssetTypeKey =
  | 'course-outline'
  | 'slides'
  | 'written-assets'
  | 'final-videos'
  | 'raw-videos'
  | 'course-artifacts';

export type LocalStatus = 'found' | 'found-via-transfer' | 'absent';
export type RemoteStatus = 'available' | 'missing' | 'broken' | 'absent-link' | 'unchecked';
export type LinkVerdict = 'available' | 'missing' | 'broken';
export type RowClassification = 'complete' | 'partial' | 'none';

export type TransferStatus = 'ok' | 'skipped-present' | 'no-link' | 'failed' | 'not-started';
export type CourseRunStatus = 'pending' | 'in-progress' | 'complete' | 'partial' | 'failed' | 'skipped';
export type TransferRunStatus = 'running' | 'completed' | 'interrupted';

export type AssignmentReason = 'existing' | 'reuse-in-place' | 'most-free-space' | 'round-robin';

export interface MatchResult {
  matched: boolean;
  localPath: string | null;
  root: string | null;
  score: number;
}

export interface AvailabilityRecord {
  course: string;
  assetType: AssetTypeKey;
  localStatus: LocalStatus;
  remoteStatus: RemoteStatus;
  match: MatchResult;
}

export interface DiskAssignment {
  course: string;
  volumeId: string;
  reason: AssignmentReason;
  assignedAt: string;
}

export interface TransferOutcome {
  course: string;
  assetType: AssetTypeKey;
  status: TransferStatus;
  volumeId: string;
  remoteId: string | null;
  detail: string | null;
  updatedAt: string;
}

export interface CourseRunState {
  course: string;
  status: CourseRunStatus;
  volumeId: string | null;
  detail: string | null;
  updatedAt: string;
}

export interface TransferRunRecord {
  id: string;
  status: TransferRunStatus;
  dryRun: boolean;
  startedAt: string;
  completedAt: string | null;
  summary: Record<string, unknown>;
}

export type OverallProgress = 'In Production' | 'Not Started' | 'Complete' | 'Partial' | 'Failed' | 'Pending';

export interface ReportRow {
  index: number;
  course: string;
  courseStatus: string;
  volumeId: string | null;
  coursePath: string | null;
  assets: Record<AssetTypeKey, TransferStatus | 'n/a'>;
  availability: RowClassification;
  overall: OverallProgress;
}
