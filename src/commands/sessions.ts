import { Command } from 'commander';
import chalk from 'chalk';
import { getStore } from '../store/index.js';
import { loadConfig } from '../config/config.js';
import { getSessionSummary, listSessions } from '../provenance/index.js';
import { formatTimestamp, truncate } from '../utils/time.js';

export function parseLimit(value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`Invalid limit "${value}": expected a positive integer`);
  }
  return n;
}

async function runSessionsList(options: { limit: number }): Promise<void> {
  const sessions = await listSessions(getStore(), process.cwd(), options.limit, loadConfig());

  if (sessions.length === 0) {
    console.log(chalk.yellow('No sessions found.'));
    return;
  }

  console.log(
    chalk.bold(
      `${'ID'.padEnd(10)} ${'Started'.padEnd(18)} ${'State'.padEnd(8)} ${'Prompts'.padEnd(8)} ${'Uncommitted'.padEnd(12)} Branch`,
    ),
  );
  console.log('─'.repeat(76));

  for (const session of sessions) {
    const state = session.state === 'open' ? chalk.green('open'.padEnd(8)) : 'closed'.padEnd(8);
    console.log(
      `${session.id.slice(0, 8).padEnd(10)} ${formatTimestamp(session.startedAt).padEnd(18)} ${state} ${String(session.totalPrompts).padEnd(8)} ${String(session.uncommittedPrompts).padEnd(12)} ${session.branch ?? chalk.gray('-')}`,
    );
  }

  console.log(`\n${sessions.length} session(s) found.`);
}

function runSessionInspect(sessionId: string): void {
  const summary = getSessionSummary(getStore(), sessionId);
  const { session } = summary;

  console.log(chalk.bold('Session: ') + session.id);
  console.log(chalk.bold('Repository: ') + session.repoKey);
  console.log(chalk.bold('State: ') + session.state);
  if (session.branch) {
    console.log(chalk.bold('Branch: ') + session.branch);
  }
  console.log(chalk.bold('Started: ') + formatTimestamp(session.startedAt));
  console.log(chalk.bold('Last activity: ') + formatTimestamp(session.lastActivityAt));
  if (session.closedAt) {
    console.log(chalk.bold('Closed: ') + formatTimestamp(session.closedAt));
  }

  if (summary.prompts.length > 0) {
    console.log(chalk.bold('\nPrompts:'));
    for (const prompt of summary.prompts) {
      const marker = prompt.committed
        ? chalk.green(`✓ ${prompt.commitHash?.slice(0, 7) ?? ''}`)
        : chalk.yellow('·');
      console.log(`  ${marker} ${truncate(prompt.text.split('\n')[0], 100)}`);
    }
  }

  if (summary.files.length > 0) {
    console.log(chalk.bold('\nFiles:'));
    for (const file of summary.files) {
      console.log('  ' + chalk.cyan(file));
    }
  }

  const tools = Object.entries(summary.tools);
  if (tools.length > 0) {
    console.log(chalk.bold('\nTools:'));
    for (const [name, count] of tools) {
      console.log(`  ${name}: ${count}`);
    }
  }

  if (summary.links.length > 0) {
    console.log(chalk.bold('\nLinked into:'));
    for (const link of summary.links) {
      const branch = link.branch ? ` on ${link.branch}` : '';
      console.log(`  ${link.targetRepoKey}${branch} (${link.files.length} file(s))`);
    }
  }
}

export function createSessionsCommand(): Command {
  const cmd = new Command('sessions')
    .description('List and inspect recorded sessions for this repository')
    .option('--limit <n>', 'Number of sessions to show', parseLimit, 10)
    .action(runSessionsList);

  cmd
    .command('inspect <id>')
    .description('Inspect a session by id or id prefix')
    .action(runSessionInspect);

  return cmd;
}
