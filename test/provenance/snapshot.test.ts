import fs from 'node:fs';
import path from 'node:path';
import { clearSnapshot, readSnapshot, writeSnapshot } from '../../src/provenance/snapshot.js';
import { PENDING_SNAPSHOT_FILE } from '../../src/utils/paths.js';
import { makeTempDir } from '../helpers.js';

describe('pending snapshot', () => {
  let gitDir: string;

  beforeEach(() => {
    gitDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(gitDir, { recursive: true, force: true });
  });

  it('round-trips through the git dir', async () => {
    const snapshot = {
      repoKey: '/r',
      promptIds: ['p1', 'p2'],
      renderedAt: '2025-01-15T10:00:00.000Z',
    };
    await writeSnapshot(gitDir, snapshot);
    expect(await readSnapshot(gitDir)).toEqual(snapshot);

    await clearSnapshot(gitDir);
    expect(await readSnapshot(gitDir)).toBeNull();
  });

  it('reads a missing snapshot as null', async () => {
    expect(await readSnapshot(gitDir)).toBeNull();
    await expect(clearSnapshot(gitDir)).resolves.toBeUndefined();
  });

  it('ignores unusable files', async () => {
    const file = path.join(gitDir, PENDING_SNAPSHOT_FILE);

    fs.writeFileSync(file, '{not json');
    expect(await readSnapshot(gitDir)).toBeNull();

    fs.writeFileSync(file, JSON.stringify({ repoKey: '/r', promptIds: 'p1' }));
    expect(await readSnapshot(gitDir)).toBeNull();
  });
});
