import { Command } from 'commander';
import { allocateCommand } from './commands/allocate.js';
import { initCommand } from './commands/init.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('annobatch')
    .description('Split a conversation dataset into equal annotator batches')
    .version('0.1.0');

  program.addCommand(allocateCommand, { isDefault: true });
  program.addCommand(initCommand);

  return program;
}
