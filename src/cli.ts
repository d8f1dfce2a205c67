#!/usr/bin/env node
/**
 * course-sync CLI - audit, assign, transfer and report
 */

import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import { DiskAssigner, DiskAssignmentPolicy } from './assignment.js';
import { ConfigManager } from './config.js';
import { BYTES_PER_GB, StatfsDiskSpaceProbe } from './disk-space.js';
import { IndexCache } from './indexing/index-cache.js';
import { StorageIndexer } from './indexing/storage-indexer.js';
import { AppError, handleError, isLogLevel, logger } from './logger.js';
import { loadLinkStatuses, loadManifestFile } from './manifest.js';
import { classifyRow, groupByCourse, reconcile } from './reconciliation.js';
import { ReportWriter, buildProgressReport } from './report.js';
import { SqliteStatusStore } from './status-store.js';
import { TransferOrchestrator, isEligibleCourse, selectCourses } from './transfer/orchestrator.js';
import { RcloneTransfer } from './transfer/rclone-transfer.js';
import type { AvailabilityRecord, Course } from './types.js';

loadEnv({ override: false });

export type Command = 'audit' | 'assign' | 'transfer' | 'report';

export interface CliOptions {
  command: Command | null;
  courses: string[];
  dryRun: boolean;
  refreshIndex: boolean;
  configPath: string;
  help: boolean;
}

const COMMANDS: readonly Command[] = ['audit', 'assign', 'transfer', 'report'];

const USAGE = `Usage: course-sync <audit|assign|transfer|report> [options]

  --course <name>     Only courses whose name contains <name> (repeatable)
  --dry-run           Show decisions without transferring or writing state
  --refresh-index     Rebuild the storage index even if the cache is fresh
  --config <path>     Configuration file (default: course-sync.yaml)
  --help              Show this message`;

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const options: CliOptions = {
    command: null,
    courses: [],
    dryRun: false,
    refreshIndex: false,
    configPath: env.COURSE_SYNC_CONFIG?.trim() || './course-sync.yaml',
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--course') {
      const value = argv[++i];
      if (value) options.courses.push(value);
    } else if (arg.startsWith('--course=')) {
      options.courses.push(arg.slice('--course='.length));
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--refresh-index') {
      options.refreshIndex = true;
    } else if (arg === '--config') {
      const value = argv[++i];
      if (value) options.configPath = value;
    } else if (arg.startsWith('--config=')) {
      options.configPath = arg.slice('--config='.length);
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (!options.command) {
      const command = COMMANDS.find(candidate => candidate === arg);
      if (!command) {
        throw new AppError(`Unknown command: ${arg}`, 'INVALID_CONFIG', 400);
      }
      options.command = command;
    }
  }

  return options;
}

function printAvailability(records: AvailabilityRecord[]): void {
  const groups = groupByCourse(records);
  const counts = { complete: 0, partial: 0, none: 0 };
  for (const group of groups) {
    const classification = classifyRow(group.records);
    counts[classification]++;
    if (classification !== 'complete') {
      const missing = group.records.filter(record => record.localStatus === 'absent').map(record => record.assetType);
      console.log(`  ${classification === 'none' ? '✗' : '~'} ${group.course}: missing ${missing.join(', ')}`);
    }
  }
  console.log(`\n📊 ${groups.length} courses: ${counts.complete} complete, ${counts.partial} partial, ${counts.none} none`);
}

async function run(options: CliOptions, signal: AbortSignal): Promise<number> {
  const configManager = new ConfigManager(resolve(options.configPath));
  const config = configManager.getAll();
  if (!isLogLevel(process.env.LOG_LEVEL)) {
    logger.setMinLevel(config.logging.level);
  }
  logger.setLogFile(config.logging.file);

  const validation = configManager.validate();
  if (!validation.valid) {
    throw new AppError(`Invalid configuration: ${validation.errors.join('; ')}`, 'INVALID_CONFIG', 400);
  }

  const volumes = configManager.requireVolumes();
  const store = new SqliteStatusStore(config.store.path);

  try {
    const allCourses = await loadManifestFile(config.manifest.path, config.manifest.columns);
    const courses: Course[] = selectCourses(allCourses, options.courses);
    const probe = new StatfsDiskSpaceProbe();

    const availability = async (): Promise<AvailabilityRecord[]> => {
      const indexer = new StorageIndexer(
        new IndexCache({ cacheDir: config.scanning.cacheDir, maxAgeHours: config.scanning.cacheMaxAgeHours }),
        { maxWorkers: config.scanning.maxWorkers, extensionsFilter: config.scanning.extensionsFilter }
      );
      const index = await indexer.buildOrLoadIndex(configManager.getScanRoots(), options.refreshIndex, signal);
      for (const warning of index.warnings) {
        logger.warn(warning, undefined, 'Index');
      }
      const linkStatuses = await loadLinkStatuses(config.manifest.linkStatusPath);
      return reconcile(courses, index, linkStatuses, {
        threshold: config.scanning.fuzzyThreshold,
        outcomes: store.listOutcomes(),
      });
    };

    switch (options.command) {
      case 'audit': {
        printAvailability(await availability());
        return 0;
      }

      case 'assign': {
        const policy = DiskAssignmentPolicy.fromConfig(config.transfer.minFreeGb, config.transfer.balanceTolerance);
        const assigner = new DiskAssigner(store, policy, probe, volumes);
        let skipped = 0;
        for (const course of courses.filter(candidate => isEligibleCourse(candidate, config.transfer.eligibleStatuses))) {
          const decision = options.dryRun
            ? await policy.assign(course.name, volumes, store.getAssignment(course.name), await assigner.freeSpaceByVolume())
            : await assigner.assign(course.name);
          if (decision.kind === 'assigned') {
            console.log(`  ${course.name} → ${decision.volume.id} (${decision.reason})`);
          } else {
            skipped++;
            console.log(`  ${course.name} skipped: ${decision.reason}`);
          }
        }
        console.log(`\n🗂  ${skipped} course(s) left unassigned`);
        return 0;
      }

      case 'transfer': {
        const orchestrator = new TransferOrchestrator({
          store,
          transfer: new RcloneTransfer({
            remote: config.transfer.remote,
            command: config.transfer.command,
            extraArgs: config.transfer.extraArgs,
            retries: config.transfer.retries,
            retryDelayMs: config.transfer.retryDelayMs,
            timeoutMs: config.transfer.timeoutMs,
          }),
          probe,
          volumes,
          minFreeBytes: config.transfer.minFreeGb * BYTES_PER_GB,
          balanceTolerance: config.transfer.balanceTolerance,
          eligibleStatuses: config.transfer.eligibleStatuses,
          parallelVolumes: config.transfer.parallelVolumes,
          completionMarker: config.transfer.completionMarker,
        });
        const summary = await orchestrator.runAll(courses, { dryRun: options.dryRun, signal });
        for (const result of summary.results) {
          const detail = result.reason ? ` (${result.reason})` : '';
          console.log(`  ${result.status.padEnd(9)} ${result.course}${detail}`);
          for (const asset of result.assets.filter(entry => entry.status === 'failed' || entry.status === 'not-started')) {
            console.log(`      ${asset.status}: ${asset.assetType}${asset.detail ? ` - ${asset.detail}` : ''}`);
          }
        }
        console.log(`\n📦 Run ${summary.status}: ${summary.failures} failures`);
        return summary.failures > 0 || summary.status === 'interrupted' ? 1 : 0;
      }

      case 'report': {
        const report = buildProgressReport({
          courses,
          assignments: store.listAssignments(),
          outcomes: store.listOutcomes(),
          availability: await availability(),
          volumes,
          eligibleStatuses: config.transfer.eligibleStatuses,
        });
        new ReportWriter(config.report.path).write(report);
        return 0;
      }

      default:
        console.log(USAGE);
        return 1;
    }
  } finally {
    store.close();
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const options = parseArgs(argv);
  if (options.help || !options.command) {
    console.log(USAGE);
    return options.help ? 0 : 1;
  }

  const controller = new AbortController();
  const onSignal = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warn('Interrupt received, finishing the current step (press Ctrl+C again to force)', undefined, 'CLI');
    controller.abort();
  };
  process.on('SIGINT', onSignal);

  try {
    return await run(options, controller.signal);
  } finally {
    process.off('SIGINT', onSignal);
  }
}

const isDirectRun = /(cli\.[jt]s|course-sync)$/.test(process.argv[1] ?? '');
if (isDirectRun) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      const appError = handleError(error, 'CLI');
      console.error(`❌ ${appError.code}: ${appError.message}`);
      process.exitCode = 2;
    });
}
