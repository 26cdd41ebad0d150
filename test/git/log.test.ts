import { execSync } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import {
  getBranchName,
  getCurrentBranch,
  getWorkingTreeChanges,
} from '../../src/git/log.js';
import { initRepo, makeTempDir } from '../helpers.js';

describe('git log helpers', () => {
  let tmpDir: string;
  let repo: string;

  beforeEach(() => {
    tmpDir = makeTempDir();
    repo = initRepo(path.join(tmpDir, 'repo'));
    execSync('git checkout -q -b topic', { cwd: repo, stdio: 'ignore' });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads the checked-out branch', async () => {
    expect(await getBranchName(repo)).toBe('topic');
    expect(await getCurrentBranch(repo)).toBe('topic');
  });

  it('has no branch name on a detached HEAD', async () => {
    execSync('git checkout -q --detach', { cwd: repo, stdio: 'ignore' });
    expect(await getBranchName(repo)).toBeUndefined();
    expect(await getCurrentBranch(repo)).toBe('HEAD');
  });

  it('has no branch name outside git', async () => {
    const plain = path.join(tmpDir, 'plain');
    fs.mkdirSync(plain);
    expect(await getBranchName(plain)).toBeUndefined();
  });

  it('lists staged and unstaged changes against HEAD', async () => {
    fs.writeFileSync(path.join(repo, 'README.md'), 'hello again\n');
    fs.writeFileSync(path.join(repo, 'staged.ts'), 'export {};\n');
    execSync('git add staged.ts', { cwd: repo, stdio: 'ignore' });

    const changes = await getWorkingTreeChanges(repo);
    expect(changes.files).toEqual(['README.md', 'staged.ts']);
    expect(changes.stat).toContain('2 files changed');
  });

  it('reports a clean tree as empty', async () => {
    expect(await getWorkingTreeChanges(repo)).toEqual({ files: [], stat: '' });
  });
});
