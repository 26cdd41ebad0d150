#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createHookCommand } from './commands/hook.js';
import { createTrailerCommand } from './commands/trailer.js';
import { createUncommittedCommand } from './commands/uncommitted.js';
import { createPrCommand } from './commands/pr.js';
import { createSessionsCommand } from './commands/sessions.js';
import { createHistoryCommand } from './commands/history.js';
import { createMarkCommittedCommand } from './commands/mark-committed.js';
import { createConfigCommand } from './commands/config.js';
import { createMcpServerCommand } from './commands/mcp-server-cmd.js';
import { initStore, closeStore } from './store/index.js';
import { DEFAULT_CONFIG, loadConfig } from './config/config.js';
import { describeError } from './utils/errors.js';
import { debug, error } from './utils/logger.js';

const program = new Command();

program
  .name('promptrail')
  .version('0.1.0')
  .description('Attach the AI prompts behind your code to its commits and pull requests');

program.addCommand(createInitCommand());
program.addCommand(createHookCommand());
program.addCommand(createTrailerCommand());
program.addCommand(createUncommittedCommand());
program.addCommand(createPrCommand());
program.addCommand(createSessionsCommand());
program.addCommand(createHistoryCommand());
program.addCommand(createMarkCommittedCommand());
program.addCommand(createConfigCommand());
program.addCommand(createMcpServerCommand());

program.exitOverride();

function busyTimeout(): number {
  try {
    return loadConfig().storeBusyTimeoutMs;
  } catch (err) {
    debug(`Config unreadable, using default busy timeout: ${describeError(err)}`);
    return DEFAULT_CONFIG.storeBusyTimeoutMs;
  }
}

async function main(): Promise<void> {
  try {
    // Best-effort store initialization; commands that need it fail on getStore()
    try {
      await initStore(undefined, { busyTimeoutMs: busyTimeout() });
    } catch (err) {
      debug(`Store init failed: ${describeError(err)}`);
    }

    await program.parseAsync();
  } catch (err) {
    // Filter Commander control-flow "errors" (help, version display)
    if (
      err instanceof CommanderError &&
      (err.code === 'commander.helpDisplayed' ||
        err.code === 'commander.version' ||
        err.code === 'commander.help')
    ) {
      return;
    }
    throw err;
  } finally {
    closeStore();
  }
}

main().catch((err: unknown) => {
  if (!(err instanceof CommanderError)) {
    error(describeError(err));
  }
  process.exitCode = 1;
});
