/**
 * Name handling shared by the indexer, matcher and transfer layers
 */

const REMOTE_ID_PATTERNS: RegExp[] = [
  /\/folders\/([a-zA-Z0-9_-]{10,})/,
  /\/file\/d\/([a-zA-Z0-9_-]{10,})/,
  /\/d\/([a-zA-Z0-9_-]{10,})/,
  /[?&]id=([a-zA-Z0-9_-]{10,})/,
  /^([a-zA-Z0-9_-]{25,})$/,
];

const MAX_FOLDER_NAME_LENGTH = 120;

/**
 * Case-fold and collapse punctuation, underscores and whitespace to single spaces
 */
export function normalizeName(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

/**
 * Lookup key for a course: names compare case-insensitively
 */
export function courseKey(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Make a course name safe to use as a folder name
 */
export function sanitizeName(name: string): string {
  const cleaned = name
    .trim()
    .replace(/[<>:"/\\|?*\x00-\x1f]/g, '')
    .replace(/\s+/g, ' ');
  return cleaned.slice(0, MAX_FOLDER_NAME_LENGTH).trim();
}

/**
 * Pull the remote folder identifier out of the supported link shapes
 */
export function extractRemoteId(link: string | null | undefined): string | null {
  if (!link) return null;
  const trimmed = link.trim();
  for (const pattern of REMOTE_ID_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match) {
      return match[1];
    }
  }
  return null;
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  for (const unit of units) {
    if (Math.abs(value) < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} PB`;
}
