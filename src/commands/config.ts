import { Command } from 'commander';
import chalk from 'chalk';
import { CONFIG_KEYS, getOrSetConfig, loadConfig } from '../config/config.js';
import { PROMPTRAIL_CONFIG_PATH } from '../utils/paths.js';

function runConfig(key?: string, value?: string): void {
  if (!key) {
    const config = loadConfig();
    console.log(chalk.gray(`# ${PROMPTRAIL_CONFIG_PATH}`));
    for (const k of CONFIG_KEYS) {
      console.log(`${k}: ${config[k]}`);
    }
    return;
  }

  const result = getOrSetConfig(key, value);
  if (value === undefined) {
    console.log(String(result));
  } else {
    console.log(chalk.green('✓') + ` ${key} = ${result}`);
  }
}

export function createConfigCommand(): Command {
  return new Command('config')
    .description('Show the configuration, or read or set one key')
    .argument('[key]', `One of: ${CONFIG_KEYS.join(', ')}`)
    .argument('[value]', 'New value')
    .action(runConfig);
}
