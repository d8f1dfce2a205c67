import { afterAll, beforeAll } from 'vitest';
import { existsSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';

// Scratch space for volume and index fixtures
const TEST_DIR = join(process.cwd(), '.test-tmp');
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  if (!process.env.VITEST_CLEANUP || !existsSync(TEST_DIR)) {
    return;
  }
  try {
    rmSync(TEST_DIR, { recursive: true, force: true });
  } catch (error) {
    // Parallel workers may race on the shared directory.
    console.warn(`Could not remove ${TEST_DIR}: ${error instanceof Error ? error.message : String(error)}`);
  }
});

globalThis.TEST_DIR = TEST_DIR;

declare global {
  var TEST_DIR: string;
}
