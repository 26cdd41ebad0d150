import chalk from 'chalk';

const isDebug = process.env.PROMPTRAIL_DEBUG === '1';

// Everything goes to stderr: stdout carries rendered trailers, PR bodies and
// the MCP protocol.

export function debug(msg: string): void {
  if (isDebug) {
    console.error(chalk.gray(`[debug] ${msg}`));
  }
}

export function info(msg: string): void {
  console.error(chalk.blue(`[info] ${msg}`));
}

export function warn(msg: string): void {
  console.error(chalk.yellow(`[warn] ${msg}`));
}

export function error(msg: string): void {
  console.error(chalk.red(`[error] ${msg}`));
}
