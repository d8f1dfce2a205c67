/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { AppError, isLogLevel, logger, type LogLevel } from './logger.js';
import type { StorageRoot, Volume } from './types.js';

export interface VolumeConfig {
  id: string;
  path: string;
  courseRoot?: string;
}

export interface ScanningConfig {
  roots: StorageRoot[];
  fuzzyThreshold: number;
  cacheDir: string;
  cacheMaxAgeHours: number;
  maxWorkers: number;
  extensionsFilter: string[];
}

export interface TransferConfig {
  remote: string;
  command: string;
  extraArgs: string[];
  retries: number;
  retryDelayMs: number;
  timeoutMs: number;
  minFreeGb: number;
  balanceTolerance: number;
  parallelVolumes: boolean;
  eligibleStatuses: string[];
  completionMarker: boolean;
}

export interface ManifestConfig {
  path: string;
  linkStatusPath: string;
  /** Source column label per logical manifest field */
  columns: Record<string, string>;
}

export interface AppConfig {
  volumes: VolumeConfig[];
  scanning: ScanningConfig;
  transfer: TransferConfig;
  manifest: ManifestConfig;
  store: { path: string };
  report: { path: string };
  logging: { level: LogLevel; file: string | null };
}

export const DEFAULT_COURSE_ROOT = 'Downloaded Courses';

export const DEFAULT_CONFIG: AppConfig = {
  volumes: [],
  scanning: {
    roots: [],
    fuzzyThreshold: 75,
    cacheDir: './cache/index',
    cacheMaxAgeHours: 24,
    maxWorkers: 4,
    extensionsFilter: []
  },
  transfer: {
    remote: 'gdrive',
    command: 'rclone',
    extraArgs: ['--transfers=4', '--checkers=8', '--retries=3', '--low-level-retries=10'],
    retries: 3,
    retryDelayMs: 15000,
    timeoutMs: 6 * 60 * 60 * 1000,
    minFreeGb: 5,
    balanceTolerance: 0.2,
    parallelVolumes: false,
    eligibleStatuses: ['Completed'],
    completionMarker: false
  },
  manifest: {
    path: './manifest.json',
    linkStatusPath: './link-status.json',
    columns: {}
  },
  store: {
    path: './db/course-sync.db'
  },
  report: {
    path: './reports/progress.json'
  },
  logging: {
    level: 'info',
    file: null
  }
};

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = raw[key];
  return isRecord(section) ? section : {};
}

function readNumber(section: Record<string, unknown>, key: string, fallback: number): number {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  logger.warn(`Ignoring non-numeric config value for ${key}`, { value }, 'ConfigManager');
  return fallback;
}

function readString(section: Record<string, unknown>, key: string, fallback: string): string {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value === 'string') return value;
  logger.warn(`Ignoring non-string config value for ${key}`, { value }, 'ConfigManager');
  return fallback;
}

function readBoolean(section: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  logger.warn(`Ignoring non-boolean config value for ${key}`, { value }, 'ConfigManager');
  return fallback;
}

function readStringArray(section: Record<string, unknown>, key: string, fallback: string[]): string[] {
  const value = section[key];
  if (value === undefined) return [...fallback];
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === 'string');
  }
  logger.warn(`Ignoring non-list config value for ${key}`, { value }, 'ConfigManager');
  return [...fallback];
}

function readRoots(value: unknown): VolumeConfig[] {
  if (!Array.isArray(value)) return [];
  const roots: VolumeConfig[] = [];
  value.forEach((entry, index) => {
    if (typeof entry === 'string') {
      roots.push({ id: `volume-${index + 1}`, path: entry });
      return;
    }
    if (isRecord(entry) && typeof entry.path === 'string') {
      roots.push({
        id: typeof entry.id === 'string' && entry.id.trim() ? entry.id.trim() : `volume-${index + 1}`,
        path: entry.path,
        courseRoot: typeof entry.courseRoot === 'string' ? entry.courseRoot : undefined,
      });
    }
  });
  return roots;
}

/**
 * Build a fully populated configuration from an untrusted document
 */
export function parseConfig(raw: unknown): AppConfig {
  const config = cloneConfig(DEFAULT_CONFIG);
  if (!isRecord(raw)) {
    return config;
  }

  config.volumes = readRoots(raw.volumes);

  const scanning = readSection(raw, 'scanning');
  config.scanning = {
    roots: readRoots(scanning.roots).map(({ id, path }) => ({ id, path })),
    fuzzyThreshold: readNumber(scanning, 'fuzzyThreshold', config.scanning.fuzzyThreshold),
    cacheDir: readString(scanning, 'cacheDir', config.scanning.cacheDir),
    cacheMaxAgeHours: readNumber(scanning, 'cacheMaxAgeHours', config.scanning.cacheMaxAgeHours),
    maxWorkers: readNumber(scanning, 'maxWorkers', config.scanning.maxWorkers),
    extensionsFilter: readStringArray(scanning, 'extensionsFilter', config.scanning.extensionsFilter),
  };

  const transfer = readSection(raw, 'transfer');
  const defaults = config.transfer;
  config.transfer = {
    remote: readString(transfer, 'remote', defaults.remote),
    command: readString(transfer, 'command', defaults.command),
    extraArgs: readStringArray(transfer, 'extraArgs', defaults.extraArgs),
    retries: readNumber(transfer, 'retries', defaults.retries),
    retryDelayMs: readNumber(transfer, 'retryDelayMs', defaults.retryDelayMs),
    timeoutMs: readNumber(transfer, 'timeoutMs', defaults.timeoutMs),
    minFreeGb: readNumber(transfer, 'minFreeGb', defaults.minFreeGb),
    balanceTolerance: readNumber(transfer, 'balanceTolerance', defaults.balanceTolerance),
    parallelVolumes: readBoolean(transfer, 'parallelVolumes', defaults.parallelVolumes),
    eligibleStatuses: readStringArray(transfer, 'eligibleStatuses', defaults.eligibleStatuses),
    completionMarker: readBoolean(transfer, 'completionMarker', defaults.completionMarker),
  };

  const manifest = readSection(raw, 'manifest');
  const columns = readSection(manifest, 'columns');
  config.manifest = {
    path: readString(manifest, 'path', config.manifest.path),
    linkStatusPath: readString(manifest, 'linkStatusPath', config.manifest.linkStatusPath),
    columns: Object.fromEntries(
      Object.entries(columns).filter((entry): entry is [string, string] => typeof entry[1] === 'string')
    ),
  };

  config.store.path = readString(readSection(raw, 'store'), 'path', config.store.path);
  config.report.path = readString(readSection(raw, 'report'), 'path', config.report.path);

  const logging = readSection(raw, 'logging');
  const level = logging.level;
  config.logging = {
    level: isLogLevel(level) ? level : config.logging.level,
    file: typeof logging.file === 'string' && logging.file ? logging.file : null,
  };

  return config;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;

  constructor(configPath: string = './course-sync.yaml') {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.info(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    let raw: unknown;
    try {
      const content = readFileSync(this.configPath, 'utf-8');
      if (this.configPath.endsWith('.json')) {
        raw = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        raw = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }
    } catch (error) {
      throw new AppError(
        `Failed to load config ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_CONFIG',
        400,
        { path: this.configPath }
      );
    }

    logger.info(`Loaded configuration from ${this.configPath}`, undefined, 'ConfigManager');
    return parseConfig(raw);
  }

  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Get nested configuration value by dotted path
   */
  get(path: string): unknown {
    let value: unknown = this.config;
    for (const part of path.split('.')) {
      if (!isRecord(value)) return undefined;
      value = value[part];
    }
    return value;
  }

  /**
   * Volumes with their course root resolved
   */
  getVolumes(): Volume[] {
    return this.config.volumes.map(volume => ({
      id: volume.id,
      path: volume.path,
      courseRoot: volume.courseRoot ?? DEFAULT_COURSE_ROOT,
    }));
  }

  /**
   * Roots to index; the volumes themselves when none are listed
   */
  getScanRoots(): StorageRoot[] {
    if (this.config.scanning.roots.length > 0) {
      return this.config.scanning.roots.map(root => ({ ...root }));
    }
    return this.config.volumes.map(({ id, path }) => ({ id, path }));
  }

  requireVolumes(): Volume[] {
    const volumes = this.getVolumes();
    if (volumes.length === 0) {
      throw new AppError(
        `No volumes configured in ${this.configPath}`,
        'NO_VOLUMES_CONFIGURED',
        400
      );
    }
    return volumes;
  }

  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { scanning, transfer } = this.config;

    const ids = this.config.volumes.map(volume => volume.id);
    if (new Set(ids).size !== ids.length) {
      errors.push('Volume ids must be unique');
    }

    if (scanning.fuzzyThreshold < 0 || scanning.fuzzyThreshold > 100) {
      errors.push('Fuzzy threshold must be between 0 and 100');
    }

    if (scanning.maxWorkers < 1) {
      errors.push('Scanning maxWorkers must be at least 1');
    }

    if (scanning.cacheMaxAgeHours < 0) {
      errors.push('Index cache max age must not be negative');
    }

    if (transfer.retries < 0) {
      errors.push('Transfer retries must not be negative');
    }

    if (transfer.balanceTolerance < 0 || transfer.balanceTolerance >= 1) {
      errors.push('Balance tolerance must be in [0, 1)');
    }

    if (transfer.minFreeGb < 0) {
      errors.push('Minimum free space must not be negative');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  save(config: AppConfig = this.config): void {
    this.config = cloneConfig(config);
    mkdirSync(dirname(this.configPath), { recursive: true });
    const content = this.configPath.endsWith('.json')
      ? JSON.stringify(this.config, null, 2)
      : YAML.dump(this.config, { indent: 2 });
    writeFileSync(this.configPath, content);
    logger.info(`Configuration saved to ${this.configPath}`, undefined, 'ConfigManager');
  }

  getPath(): string {
    return this.configPath;
  }
}
