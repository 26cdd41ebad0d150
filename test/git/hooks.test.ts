import fs from 'node:fs';
import path from 'node:path';
import { HOOK_SCRIPTS, installHook, installHooks, isHookInstalled } from '../../src/git/hooks.js';
import { initRepo, makeTempDir } from '../helpers.js';

describe('git hooks', () => {
  let tmpDir: string;
  let repo: string;
  let hooksDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir();
    repo = initRepo(path.join(tmpDir, 'repo'));
    hooksDir = path.join(repo, '.git', 'hooks');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('installs both hooks as executables', async () => {
    expect(await installHooks(repo)).toEqual({
      'prepare-commit-msg': 'installed',
      'post-commit': 'installed',
    });

    const script = path.join(hooksDir, 'post-commit');
    expect(fs.readFileSync(script, 'utf-8')).toBe(HOOK_SCRIPTS['post-commit']);
    expect(fs.statSync(script).mode & 0o111).not.toBe(0);
    expect(await isHookInstalled(repo, 'prepare-commit-msg')).toBe(true);
  });

  it('skips merge and squash commits in prepare-commit-msg', () => {
    expect(HOOK_SCRIPTS['prepare-commit-msg']).toContain('merge|squash) exit 0');
    expect(HOOK_SCRIPTS['prepare-commit-msg']).toContain(
      'promptrail hook prepare-commit-msg "$COMMIT_MSG_FILE" "$COMMIT_SOURCE" || true',
    );
  });

  it('leaves a foreign hook alone unless forced', async () => {
    const foreign = '#!/bin/sh\necho custom\n';
    fs.writeFileSync(path.join(hooksDir, 'post-commit'), foreign);

    expect(await installHook(repo, 'post-commit')).toBe('skipped');
    expect(fs.readFileSync(path.join(hooksDir, 'post-commit'), 'utf-8')).toBe(foreign);
    expect(await isHookInstalled(repo, 'post-commit')).toBe(false);

    expect(await installHook(repo, 'post-commit', true)).toBe('installed');
    expect(await isHookInstalled(repo, 'post-commit')).toBe(true);
  });

  it('reinstalls over its own hook', async () => {
    await installHook(repo, 'prepare-commit-msg');
    expect(await installHook(repo, 'prepare-commit-msg')).toBe('installed');
  });

  it('reports missing hooks', async () => {
    expect(await isHookInstalled(repo, 'post-commit')).toBe(false);
  });
});
