import { simpleGit, type SimpleGit } from 'simple-git';

// Git exports GIT_DIR, GIT_INDEX_FILE and friends to hook processes. Passing
// those through would pin every query to the hook's repository, so git runs
// with a minimal environment instead.
const PASSTHROUGH_ENV = [
  'PATH',
  'HOME',
  'USERPROFILE',
  'SYSTEMROOT',
  'TMPDIR',
  'LANG',
  'LC_ALL',
  'XDG_CONFIG_HOME',
];

function gitEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of PASSTHROUGH_ENV) {
    const value = process.env[key];
    if (value !== undefined) env[key] = value;
  }
  return env;
}

export function gitAt(dir: string): SimpleGit {
  return simpleGit(dir).env(gitEnv());
}
