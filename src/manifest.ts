/**
 * Manifest loading - turns a course table (or an already normalized course list)
 * into typed courses and reads the link reachability verdicts
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import YAML from 'js-yaml';
import { ASSET_TYPES } from './asset-types.js';
import { AppError, errorMessage, logger } from './logger.js';
import { courseKey, extractRemoteId } from './naming.js';
import type { AssetLink, AssetTypeKey, Course, LinkVerdict } from './types.js';

export type ManifestFieldKey = 'name' | 'status' | AssetTypeKey;

export interface ManifestField {
  key: ManifestFieldKey;
  /** Header label in the source table */
  label: string;
  required: boolean;
}

export type ManifestSchema = readonly ManifestField[];

export interface ManifestTable {
  headers: string[];
  rows: Array<Array<string | null>>;
}

export const DEFAULT_MANIFEST_LABELS: Readonly<Record<ManifestFieldKey, string>> = {
  name: 'Course',
  status: 'Status',
  'course-outline': 'Course Outline',
  slides: 'PPTs',
  'written-assets': 'Written Assets (PQ, GQ, DP)',
  'final-videos': 'Final Videos',
  'raw-videos': 'Raw Videos',
  'course-artifacts': 'Course Artifacts Link',
};

const PLACEHOLDER_NAMES = new Set(['', 'nan', 'none', 'n/a']);
const LINK_VERDICTS: readonly LinkVerdict[] = ['available', 'missing', 'broken'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isManifestFieldKey(value: string): value is ManifestFieldKey {
  return value === 'name' || value === 'status' || ASSET_TYPES.some(type => type.key === value);
}

/**
 * Field order is name, status, then the asset types; labels may be overridden per field
 */
export function createManifestSchema(labels: Record<string, string> = {}): ManifestSchema {
  const keys: ManifestFieldKey[] = ['name', 'status', ...ASSET_TYPES.map(type => type.key)];
  for (const key of Object.keys(labels)) {
    if (!isManifestFieldKey(key)) {
      logger.warn(`Ignoring unknown manifest column mapping: ${key}`, undefined, 'Manifest');
    }
  }
  return keys.map(key => ({
    key,
    label: labels[key] ?? DEFAULT_MANIFEST_LABELS[key],
    required: key === 'name',
  }));
}

export function toAssetLink(value: string | null | undefined): AssetLink | undefined {
  const url = value?.trim();
  if (!url) return undefined;
  return { url, remoteId: extractRemoteId(url) };
}

function isPlaceholderName(name: string): boolean {
  return PLACEHOLDER_NAMES.has(name.trim().toLowerCase());
}

function dedupeCourses(courses: Course[]): Course[] {
  const seen = new Set<string>();
  const unique: Course[] = [];
  for (const course of courses) {
    const key = courseKey(course.name);
    if (seen.has(key)) {
      logger.warn(`Duplicate course in manifest ignored: ${course.name}`, undefined, 'Manifest');
      continue;
    }
    seen.add(key);
    unique.push(course);
  }
  return unique;
}

/**
 * Resolve header labels to column positions once, then read every row
 */
export function resolveManifest(table: ManifestTable, schema: ManifestSchema = createManifestSchema()): Course[] {
  const positions = new Map<string, number>();
  table.headers.forEach((header, index) => {
    const label = header.trim().toLowerCase();
    if (!positions.has(label)) positions.set(label, index);
  });

  const columns = new Map<ManifestFieldKey, number>();
  for (const field of schema) {
    const position = positions.get(field.label.trim().toLowerCase());
    if (position === undefined) {
      if (field.required) {
        throw new AppError(
          `Manifest column '${field.label}' not found. Available: ${table.headers.join(', ')}`,
          'INVALID_MANIFEST',
          400
        );
      }
      logger.warn(`Manifest column '${field.label}' not found`, undefined, 'Manifest');
      continue;
    }
    columns.set(field.key, position);
  }

  const cell = (row: Array<string | null>, key: ManifestFieldKey): string => {
    const position = columns.get(key);
    if (position === undefined) return '';
    return (row[position] ?? '').trim();
  };

  const courses: Course[] = [];
  for (const row of table.rows) {
    const name = cell(row, 'name');
    if (isPlaceholderName(name)) continue;

    const links: Course['links'] = {};
    for (const type of ASSET_TYPES) {
      const link = toAssetLink(cell(row, type.key));
      if (link) links[type.key] = link;
    }
    courses.push({ name, status: cell(row, 'status'), links });
  }

  return dedupeCourses(courses);
}

function readCourse(value: unknown, position: number): Course | null {
  if (!isRecord(value) || typeof value.name !== 'string') {
    logger.warn(`Skipping manifest entry ${position}: no course name`, undefined, 'Manifest');
    return null;
  }
  if (isPlaceholderName(value.name)) return null;

  const links: Course['links'] = {};
  const rawLinks = isRecord(value.links) ? value.links : {};
  for (const type of ASSET_TYPES) {
    const raw = rawLinks[type.key];
    const link = typeof raw === 'string' ? toAssetLink(raw) : undefined;
    if (link) links[type.key] = link;
  }

  return {
    name: value.name.trim(),
    status: typeof value.status === 'string' ? value.status.trim() : '',
    links,
  };
}

function readTable(value: Record<string, unknown>): ManifestTable {
  const { headers, rows } = value;
  if (!Array.isArray(headers) || !Array.isArray(rows)) {
    throw new AppError('Manifest table needs headers and rows', 'INVALID_MANIFEST', 400);
  }
  return {
    headers: headers.map(header => String(header ?? '')),
    rows: rows.map(row =>
      Array.isArray(row) ? row.map(entry => (entry === null || entry === undefined ? null : String(entry))) : []
    ),
  };
}

/**
 * Accepts a course list, `{ courses: [...] }`, or a `{ headers, rows }` table
 */
export function parseManifestDocument(document: unknown, schema: ManifestSchema = createManifestSchema()): Course[] {
  if (Array.isArray(document)) {
    return dedupeCourses(
      document.map((entry, index) => readCourse(entry, index)).filter((course): course is Course => course !== null)
    );
  }
  if (isRecord(document)) {
    if (Array.isArray(document.courses)) {
      return parseManifestDocument(document.courses, schema);
    }
    if ('headers' in document) {
      return resolveManifest(readTable(document), schema);
    }
  }
  throw new AppError('Unrecognized manifest document', 'INVALID_MANIFEST', 400);
}

async function readDocument(path: string): Promise<unknown> {
  const content = await readFile(path, 'utf-8');
  return path.endsWith('.yaml') || path.endsWith('.yml') ? YAML.load(content) : JSON.parse(content);
}

export async function loadManifestFile(path: string, labels: Record<string, string> = {}): Promise<Course[]> {
  let document: unknown;
  try {
    document = await readDocument(path);
  } catch (error) {
    throw new AppError(`Failed to read manifest ${path}: ${errorMessage(error)}`, 'INVALID_MANIFEST', 400, { path });
  }
  const courses = parseManifestDocument(document, createManifestSchema(labels));
  logger.info(`Loaded ${courses.length} courses from ${path}`, undefined, 'Manifest');
  return courses;
}

/**
 * Verdicts keyed by link or folder id; links are also indexed by the id they carry
 */
export function parseLinkStatuses(document: unknown): Map<string, LinkVerdict> {
  const statuses = new Map<string, LinkVerdict>();
  if (!isRecord(document)) return statuses;

  for (const [key, value] of Object.entries(document)) {
    const verdict = LINK_VERDICTS.find(candidate => candidate === String(value).trim().toLowerCase());
    if (!verdict) {
      logger.warn(`Ignoring unknown link verdict for ${key}`, { value }, 'Manifest');
      continue;
    }
    statuses.set(key.trim(), verdict);
    const remoteId = extractRemoteId(key);
    if (remoteId && !statuses.has(remoteId)) {
      statuses.set(remoteId, verdict);
    }
  }
  return statuses;
}

export async function loadLinkStatuses(path: string): Promise<Map<string, LinkVerdict>> {
  if (!existsSync(path)) {
    logger.info(`No link status file at ${path}; remote links count as unchecked`, undefined, 'Manifest');
    return new Map();
  }
  try {
    return parseLinkStatuses(await readDocument(path));
  } catch (error) {
    throw new AppError(`Failed to read link statuses ${path}: ${errorMessage(error)}`, 'INVALID_MANIFEST', 400, { path });
  }
}
