import fs from 'node:fs/promises';
import path from 'node:path';
import { getHooksDir } from './log.js';

const HOOK_MARKER = 'promptrail';

const PREPARE_COMMIT_MSG = `#!/bin/sh
# promptrail prepare-commit-msg hook
# Appends the prompt history behind this commit as comment lines

COMMIT_MSG_FILE="$1"
COMMIT_SOURCE="$2"

# Merges and squashes carry their own message
case "$COMMIT_SOURCE" in
  merge|squash) exit 0 ;;
esac

# Gracefully no-op if promptrail is not installed
if ! command -v promptrail >/dev/null 2>&1; then
  exit 0
fi

promptrail hook prepare-commit-msg "$COMMIT_MSG_FILE" "$COMMIT_SOURCE" || true
`;

const POST_COMMIT = `#!/bin/sh
# promptrail post-commit hook
# Marks the prompts listed in the trailer as committed

if ! command -v promptrail >/dev/null 2>&1; then
  exit 0
fi

promptrail hook post-commit || true
`;

export type HookName = 'prepare-commit-msg' | 'post-commit';

export const HOOK_SCRIPTS: Record<HookName, string> = {
  'prepare-commit-msg': PREPARE_COMMIT_MSG,
  'post-commit': POST_COMMIT,
};

export type HookInstallResult = 'installed' | 'skipped';

export async function installHook(
  repoPath: string,
  name: HookName,
  force = false,
): Promise<HookInstallResult> {
  const hooksDir = await getHooksDir(repoPath);
  const hookPath = path.join(hooksDir, name);

  await fs.mkdir(hooksDir, { recursive: true });

  if (!force) {
    // A missing hook reads as null
    const existing = await fs.readFile(hookPath, 'utf-8').catch(() => null);
    if (existing && !existing.includes(HOOK_MARKER)) {
      return 'skipped';
    }
  }

  await fs.writeFile(hookPath, HOOK_SCRIPTS[name], { mode: 0o755 });
  await fs.chmod(hookPath, 0o755);
  return 'installed';
}

export async function installHooks(
  repoPath: string,
  force = false,
): Promise<Record<HookName, HookInstallResult>> {
  return {
    'prepare-commit-msg': await installHook(repoPath, 'prepare-commit-msg', force),
    'post-commit': await installHook(repoPath, 'post-commit', force),
  };
}

export async function isHookInstalled(
  repoPath: string,
  name: HookName,
): Promise<boolean> {
  const hookPath = path.join(await getHooksDir(repoPath), name);
  try {
    const content = await fs.readFile(hookPath, 'utf-8');
    return content.includes(HOOK_MARKER);
  } catch {
    return false;
  }
}
