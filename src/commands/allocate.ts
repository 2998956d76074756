import { Command } from 'commander';
import chalk from 'chalk';
import { relative } from 'path';
import { loadConfig, resolveDatasetPath, resolveFrom, resolveOutputPaths } from '../config/index.js';
import { loadDataset } from '../dataset/index.js';
import { planBatches, BatchAllocator, BatchPlan } from '../allocation/index.js';
import type { RemainderPolicy } from '../schemas/config.js';
import { exportAll, ExportResult } from '../export/index.js';
import { createTerminalPrompter, askBatchSize, askConfirm, askDatasetPath, Prompter } from '../interactive/index.js';
import { InvalidInputError, UserCancelledError, exitCodeFor, formatError } from '../errors/index.js';

export interface AllocateRunOptions {
  projectPath: string;
  prompter: Prompter;
}

const RULE = '='.repeat(60);

function header(title: string): void {
  console.log(chalk.blue(`\n${RULE}\n${title}\n${RULE}`));
}

function printPlan(plan: BatchPlan, policy: RemainderPolicy): void {
  header('Allocation plan');
  for (let k = 1; k <= plan.batchCount; k++) {
    console.log(`Annotator ${k}: ${plan.batchSize} conversations`);
  }

  if (plan.remainder === 0) {
    console.log(chalk.gray('\nThe dataset divides evenly, nothing is left over.'));
  } else if (policy === 'distributeToLast') {
    console.log(`Annotator ${plan.batchCount + 1}: ${plan.remainder} conversations (short batch)`);
  } else {
    console.log(chalk.yellow(`\n${plan.remainder} conversations will stay unallocated.`));
  }

  const allocated = policy === 'distributeToLast' ? plan.total : plan.total - plan.remainder;
  console.log(`\nTotal: ${allocated} of ${plan.total} conversations`);
}

function printResult(result: ExportResult, projectPath: string): void {
  const s = result.summary;
  header('Allocation complete');
  console.log(`Annotators:  ${s.participants}`);
  console.log(`Allocated:   ${s.allocated_count}`);
  if (s.unallocated_count > 0) {
    console.log(chalk.yellow(`Unallocated: ${s.unallocated_count}`));
  }
  console.log(chalk.cyan('\nFiles written:'));
  console.log(`  1. CSV sheet:  ${relative(projectPath, result.csv)}`);
  console.log(`  2. Manifest:   ${relative(projectPath, result.manifest)}`);
  console.log(`  3. Page:       ${relative(projectPath, result.page)}  (upload to the annotation platform)`);
  console.log('');
}

/**
 * The interactive allocation flow: dataset → batch size → confirm → allocate → export.
 * Throws UserCancelledError when the user declines; other errors abort the run.
 */
export async function runAllocation(options: AllocateRunOptions): Promise<ExportResult> {
  const { projectPath, prompter } = options;
  const config = loadConfig(projectPath);

  header('annobatch: split a dataset into annotator batches');

  const datasetPath = resolveFrom(
    projectPath,
    await askDatasetPath(prompter, resolveDatasetPath(config, projectPath))
  );

  console.log(chalk.gray('\nLoading dataset...'));
  const dataset = loadDataset(datasetPath);
  console.log(chalk.green(`✓ Loaded ${dataset.length} conversations`));

  if (dataset.length === 0) {
    throw new InvalidInputError(`The dataset is empty, nothing to allocate: ${datasetPath}`);
  }

  const batchSize = await askBatchSize(prompter, dataset.length);
  const plan = planBatches(dataset.length, batchSize);
  const policy = config.allocation.on_remainder;
  printPlan(plan, policy);

  if (!(await askConfirm(prompter, '\nStart the allocation?'))) {
    throw new UserCancelledError();
  }

  console.log(chalk.gray('\nAllocating...'));
  const allocation = new BatchAllocator({ onRemainder: policy }).allocate(dataset, plan);
  for (const annotator of allocation.annotators) {
    console.log(chalk.gray(`  Annotator ${annotator.name}: ${annotator.records.length} conversations`));
  }

  console.log(chalk.gray('\nWriting outputs...'));
  const result = exportAll(allocation, resolveOutputPaths(config, projectPath), {
    title: config.page.title,
    question: config.page.question,
  });

  printResult(result, projectPath);
  return result;
}

export const allocateCommand = new Command('allocate')
  .description('Interactively split a dataset into annotator batches and export the results')
  .action(async () => {
    const prompter = createTerminalPrompter();
    try {
      await runAllocation({ projectPath: process.cwd(), prompter });
    } catch (error) {
      if (error instanceof UserCancelledError) {
        console.log(chalk.yellow(`\n${error.message}`));
        process.exitCode = 0;
        return;
      }
      if (error instanceof Error) {
        console.error(chalk.red(`\n${formatError(error)}`));
        if (error.stack) {
          console.error(chalk.dim(error.stack));
        }
        process.exitCode = exitCodeFor(error);
        return;
      }
      throw error;
    } finally {
      prompter.close();
    }
  });
