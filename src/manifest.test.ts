import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  createManifestSchema,
  loadLinkStatuses,
  loadManifestFile,
  parseLinkStatuses,
  parseManifestDocument,
  resolveManifest,
  type ManifestTable,
} from './manifest.js';

const HEADERS = [
  'Course',
  'Status',
  'Course Outline',
  'PPTs',
  'Written Assets (PQ, GQ, DP)',
  'Final Videos',
  'Raw Videos',
  'Course Artifacts Link',
];

function folder(id: string): string {
  return `https://drive.google.com/drive/folders/${id}`;
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('resolveManifest', () => {
  it('should read courses and their links by header label', () => {
    const table: ManifestTable = {
      headers: HEADERS,
      rows: [['Biology', 'Completed', folder('outline0001'), ' ', null, folder('final00001'), '', 'not a link']],
    };

    expect(resolveManifest(table)).toEqual([
      {
        name: 'Biology',
        status: 'Completed',
        links: {
          'course-outline': { url: folder('outline0001'), remoteId: 'outline0001' },
          'final-videos': { url: folder('final00001'), remoteId: 'final00001' },
          'course-artifacts': { url: 'not a link', remoteId: null },
        },
      },
    ]);
  });

  it('should match headers regardless of case, spacing and order', () => {
    const table: ManifestTable = {
      headers: ['  status', 'ppts ', 'COURSE'],
      rows: [['Completed', folder('slides0001'), 'Algebra']],
    };

    expect(resolveManifest(table)).toEqual([
      { name: 'Algebra', status: 'Completed', links: { slides: { url: folder('slides0001'), remoteId: 'slides0001' } } },
    ]);
  });

  it('should skip placeholder names and keep the first of duplicate courses', () => {
    const table: ManifestTable = {
      headers: ['Course', 'Status'],
      rows: [['NaN', 'Completed'], ['', 'Completed'], ['n/a', ''], ['Biology', 'Completed'], ['biology ', 'Draft']],
    };

    expect(resolveManifest(table)).toEqual([{ name: 'Biology', status: 'Completed', links: {} }]);
  });

  it('should fail without the course column', () => {
    const table: ManifestTable = { headers: ['Title', 'Status'], rows: [] };

    const error = thrown(() => resolveManifest(table));
    expect(error).toMatchObject({ code: 'INVALID_MANIFEST' });
    expect(error).toHaveProperty('message', "Manifest column 'Course' not found. Available: Title, Status");
  });

  it('should use custom column labels', () => {
    const schema = createManifestSchema({ name: 'Course Title', slides: 'Slides' });
    const table: ManifestTable = { headers: ['Course Title', 'Slides'], rows: [['Biology', folder('slides0001')]] };

    expect(resolveManifest(table, schema)[0]).toEqual({
      name: 'Biology',
      status: '',
      links: { slides: { url: folder('slides0001'), remoteId: 'slides0001' } },
    });
  });
});

describe('parseManifestDocument', () => {
  it('should accept a course list', () => {
    const courses = parseManifestDocument({
      courses: [
        { name: ' Biology ', status: 'Completed', links: { slides: folder('slides0001'), unknown: folder('other00001') } },
        { status: 'Completed' },
        { name: 'none' },
      ],
    });

    expect(courses).toEqual([
      { name: 'Biology', status: 'Completed', links: { slides: { url: folder('slides0001'), remoteId: 'slides0001' } } },
    ]);
  });

  it('should accept a table with non-string cells', () => {
    const courses = parseManifestDocument({ headers: ['Course', 'Status'], rows: [[101, null]] });
    expect(courses).toEqual([{ name: '101', status: '', links: {} }]);
  });

  it('should reject anything else', () => {
    expect(thrown(() => parseManifestDocument('Course,Status'))).toMatchObject({ code: 'INVALID_MANIFEST' });
    expect(thrown(() => parseManifestDocument({ headers: ['Course'] }))).toMatchObject({ code: 'INVALID_MANIFEST' });
  });
});

describe('manifest files', () => {
  const dir = join(TEST_DIR, 'manifest');

  beforeEach(() => {
    rmSync(dir, { recursive: true, force: true });
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load a YAML manifest', async () => {
    const path = join(dir, 'manifest.yaml');
    writeFileSync(
      path,
      ['courses:', '  - name: Biology', '    status: Completed', '    links:', `      raw-videos: ${folder('raw0000001')}`, ''].join('\n')
    );

    expect(await loadManifestFile(path)).toEqual([
      { name: 'Biology', status: 'Completed', links: { 'raw-videos': { url: folder('raw0000001'), remoteId: 'raw0000001' } } },
    ]);
  });

  it('should load a JSON table with custom labels', async () => {
    const path = join(dir, 'manifest.json');
    writeFileSync(path, JSON.stringify({ headers: ['Name'], rows: [['Biology']] }));

    expect(await loadManifestFile(path, { name: 'Name' })).toEqual([{ name: 'Biology', status: '', links: {} }]);
  });

  it('should report unreadable manifests', async () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ nope');

    await expect(loadManifestFile(path)).rejects.toMatchObject({ code: 'INVALID_MANIFEST' });
    await expect(loadManifestFile(join(dir, 'missing.json'))).rejects.toMatchObject({ code: 'INVALID_MANIFEST' });
  });

  it('should treat a missing link status file as empty', async () => {
    expect((await loadLinkStatuses(join(dir, 'missing.json'))).size).toBe(0);
  });

  it('should load link statuses from YAML', async () => {
    const path = join(dir, 'links.yaml');
    writeFileSync(path, 'slides0001: Available\n');

    expect([...(await loadLinkStatuses(path))]).toEqual([['slides0001', 'available']]);
  });
});

describe('parseLinkStatuses', () => {
  it('should index verdicts by link and by folder id', () => {
    const statuses = parseLinkStatuses({
      [folder('final00001')]: 'broken',
      raw0000001: ' MISSING ',
      other00001: 'maybe',
    });

    expect(statuses.get(folder('final00001'))).toBe('broken');
    expect(statuses.get('final00001')).toBe('broken');
    expect(statuses.get('raw0000001')).toBe('missing');
    expect(statuses.has('other00001')).toBe(false);
    expect(statuses.size).toBe(3);
  });

  it('should return nothing for non-object documents', () => {
    expect(parseLinkStatuses(['available']).size).toBe(0);
    expect(parseLinkStatuses(null).size).toBe(0);
  });
});
