/**
 * Public entry point for course-sync
 */

export * from './types.js';
export { ASSET_TYPES, ASSET_TYPE_KEYS, getAssetType, type AssetTypeDefinition } from './asset-types.js';
export { courseKey, extractRemoteId, formatBytes, normalizeName, sanitizeName } from './naming.js';
export { AppError, Logger, handleError, logger, type ErrorCode, type LogLevel } from './logger.js';
export { ConfigManager, DEFAULT_CONFIG, parseConfig, type AppConfig } from './config.js';

export { IndexCache, fingerprintRoots } from './indexing/index-cache.js';
export { StorageIndexer, buildOrLoadIndex, type StorageIndexerOptions } from './indexing/storage-indexer.js';
export { FuzzyMatcher, findBestMatch, type FuzzyMatch } from './matching/fuzzy-matcher.js';
export { LocalAssetLocator, classifyRow, groupByCourse, reconcile, type ReconcileOptions } from './reconciliation.js';

export { SqliteStatusStore, type StatusStore } from './status-store.js';
export { MigrationManager, statusStoreMigrations, type Migration } from './migrations.js';
export {
  DiskAssigner,
  DiskAssignmentPolicy,
  courseDirectory,
  type AssignmentDecision,
  type AssignmentPolicyOptions,
} from './assignment.js';
export { BYTES_PER_GB, StatfsDiskSpaceProbe } from './disk-space.js';

export {
  TransferOrchestrator,
  courseStatusFor,
  isEligibleCourse,
  selectCourses,
  type RunAllOptions,
  type RunOptions,
  type RunSummary,
  type TransferOrchestratorOptions,
} from './transfer/orchestrator.js';
export { RcloneTransfer, spawnCommand, type CommandRunner, type RcloneTransferOptions } from './transfer/rclone-transfer.js';
export { COMPLETION_MARKER, isAssetPresent, isFolderPopulated } from './transfer/folder-state.js';

export {
  createManifestSchema,
  loadLinkStatuses,
  loadManifestFile,
  parseLinkStatuses,
  parseManifestDocument,
  resolveManifest,
  type ManifestSchema,
  type ManifestTable,
} from './manifest.js';
export { ReportWriter, buildProgressReport, buildReportRows, overallProgress, type ProgressReport } from './report.js';
