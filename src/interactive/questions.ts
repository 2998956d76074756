import chalk from 'chalk';
import type { Prompter } from './prompter.js';
import { parseBatchSize } from '../allocation/planner.js';
import { InvalidInputError } from '../errors/index.js';

function isYes(answer: string): boolean {
  return answer.trim().toLowerCase() === 'y';
}

export async function askConfirm(prompter: Prompter, question: string): Promise<boolean> {
  return isYes(await prompter.ask(`${question} (y/n): `));
}

/**
 * Offer the configured dataset path; anything but "y" asks for another one.
 */
export async function askDatasetPath(prompter: Prompter, defaultPath: string): Promise<string> {
  if (await askConfirm(prompter, `Use the default dataset (${defaultPath})?`)) {
    return defaultPath;
  }
  let path = '';
  while (!path) {
    path = await prompter.ask('Dataset path: ');
  }
  return path;
}

/**
 * Ask for the number of conversations per annotator until the answer is valid.
 */
export async function askBatchSize(prompter: Prompter, total: number): Promise<number> {
  for (;;) {
    const answer = await prompter.ask('Conversations per annotator: ');
    try {
      return parseBatchSize(answer, total);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        console.log(chalk.yellow(`  ${error.message}, please try again.`));
        continue;
      }
      throw error;
    }
  }
}
