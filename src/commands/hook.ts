import { Command } from 'commander';
import { getAdapter, getDefaultAdapter } from '../adapters/registry.js';
import type { AgentAdapter } from '../adapters/types.js';
import { getStore } from '../store/index.js';
import { loadConfig } from '../config/config.js';
import { recordPrompt, recordToolUse } from '../provenance/index.js';
import { finishCommit, prepareCommitMessage } from '../git/handlers.js';
import { readStdinJson } from '../utils/stdin.js';
import { describeError } from '../utils/errors.js';
import { debug, error } from '../utils/logger.js';

interface AgentOptions {
  agent?: string;
}

// Hooks report failures on stderr and always exit 0: a broken store must
// never block a prompt or a commit.
async function guarded(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    error(`promptrail ${name} hook: ${describeError(err)}`);
  }
}

function adapterFor(options: AgentOptions): AgentAdapter {
  if (!options.agent) return getDefaultAdapter();
  const adapter = getAdapter(options.agent);
  if (!adapter) throw new Error(`Unknown agent "${options.agent}"`);
  return adapter;
}

async function runPromptHook(options: AgentOptions): Promise<void> {
  await guarded('prompt', async () => {
    const event = adapterFor(options).parsePromptEvent(await readStdinJson());
    if (!event) return;

    const prompt = await recordPrompt(
      getStore(),
      { sessionHint: event.sessionHint, repoPath: event.cwd, text: event.text },
      loadConfig(),
    );
    debug(`Recorded prompt ${prompt.id} in session ${prompt.sessionId}`);
  });
}

async function runPostToolHook(options: AgentOptions): Promise<void> {
  await guarded('post-tool', async () => {
    const event = adapterFor(options).parseToolUseEvent(await readStdinJson());
    if (!event) return;
    await recordToolUse(getStore(), event);
  });
}

async function runPrepareCommitMsg(file: string, source?: string): Promise<void> {
  await guarded('prepare-commit-msg', async () => {
    await prepareCommitMessage(getStore(), process.cwd(), file, source, loadConfig());
  });
}

async function runPostCommit(): Promise<void> {
  await guarded('post-commit', async () => {
    await finishCommit(getStore(), process.cwd());
  });
}

export function createHookCommand(): Command {
  const cmd = new Command('hook').description(
    'Entry points for assistant and git hooks (never fail)',
  );

  cmd
    .command('prompt')
    .description('Record a submitted prompt from the hook JSON on stdin')
    .option('--agent <type>', 'Assistant that sent the payload')
    .action(runPromptHook);

  cmd
    .command('post-tool')
    .description('Record a tool invocation from the hook JSON on stdin')
    .option('--agent <type>', 'Assistant that sent the payload')
    .action(runPostToolHook);

  cmd
    .command('prepare-commit-msg <file> [source]')
    .description('Append the prompt history to a commit message')
    .action(runPrepareCommitMsg);

  cmd
    .command('post-commit')
    .description('Mark the prompts shown in the last trailer as committed')
    .action(runPostCommit);

  return cmd;
}
