import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { packCommand } from './commands/pack.js';
import { benchCommand } from './commands/bench.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('boxpack')
    .description('Distribute weighted articles across boxes as evenly as possible')
    .version('0.1.0');

  program.addCommand(initCommand);
  program.addCommand(packCommand);
  program.addCommand(benchCommand);

  return program;
}
