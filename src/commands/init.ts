import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { CONFIG_DIR, CONFIG_FILE } from '../config/index.js';
import { parseConfig } from '../schemas/config.js';

interface InitOptions {
  force?: boolean;
}

export interface InitResult {
  created: boolean;
  configPath: string;
}

/**
 * Write `.annobatch/config.yaml` with every default spelled out.
 * Leaves an existing file alone unless `force` is set.
 */
export function initProject(projectPath: string, force = false): InitResult {
  const dirPath = join(projectPath, CONFIG_DIR);
  const configPath = join(dirPath, CONFIG_FILE);

  if (existsSync(configPath) && !force) {
    return { created: false, configPath };
  }

  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
  writeFileSync(configPath, yaml.dump(parseConfig({}), { lineWidth: 80 }));

  return { created: true, configPath };
}

export const initCommand = new Command('init')
  .description('Create .annobatch/config.yaml with default paths and options')
  .option('--force', 'Overwrite an existing configuration')
  .action((options: InitOptions) => {
    const projectPath = process.cwd();

    try {
      const result = initProject(projectPath, options.force);
      if (!result.created) {
        console.error(chalk.red(`Error: ${CONFIG_DIR}/${CONFIG_FILE} already exists. Use --force to overwrite.`));
        process.exitCode = 1;
        return;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`✗ Failed to create ${CONFIG_DIR}/${CONFIG_FILE}: ${message}`));
      process.exitCode = 1;
      return;
    }

    console.log(chalk.green(`✓ Created ${CONFIG_DIR}/${CONFIG_FILE}`));
    console.log(chalk.cyan('\nNext steps:'));
    console.log('  1. Point dataset.path at your .jsonl file');
    console.log('  2. Pick allocation.on_remainder: dropRemainder or distributeToLast');
    console.log('  3. Run `annobatch` and answer the prompts');
  });
