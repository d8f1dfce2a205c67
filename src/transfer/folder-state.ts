import { stat, writeFile } from 'fs/promises';
import { join } from 'path';
import fg from 'fast-glob';

export const COMPLETION_MARKER = '.transfer-complete';

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * True when the directory holds at least one file anywhere below it
 */
export async function isFolderPopulated(path: string): Promise<boolean> {
  if (!(await isDirectory(path))) return false;

  const stream = fg.stream('**/*', {
    cwd: path,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
    ignore: [COMPLETION_MARKER],
    suppressErrors: true,
  });

  for await (const entry of stream) {
    if (entry) return true;
  }
  return false;
}

export async function hasCompletionMarker(path: string): Promise<boolean> {
  try {
    return (await stat(join(path, COMPLETION_MARKER))).isFile();
  } catch {
    return false;
  }
}

export async function writeCompletionMarker(path: string, detail: Record<string, unknown>): Promise<void> {
  await writeFile(join(path, COMPLETION_MARKER), `${JSON.stringify(detail, null, 2)}\n`);
}

/**
 * Whether an asset folder counts as already transferred
 */
export async function isAssetPresent(path: string, requireMarker: boolean): Promise<boolean> {
  if (!(await isFolderPopulated(path))) return false;
  return requireMarker ? hasCompletionMarker(path) : true;
}
