#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './commands';

export function createProgram(): Command {
  const program = new Command();
  program.name('codemender').description('Inspect, fix and verify code with fallback text-generation backends').version('0.1.0').option('--verbose', 'Show detailed output for every command');
  registerCommands(program);
  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
