#!/usr/bin/env node
import { program } from 'commander';
import { registerMainCommand } from './cli/commands';
import { handleUnknownError } from './errors/index';

// Set up Commander program
program
  .name('rpipe')
  .description('Compile iterator expressions into native programs and run them over text input')
  .version('1.0.0');

registerMainCommand(program);

// Parse command line arguments
program.parseAsync().catch((e: unknown) => {
  const err = handleUnknownError(e, 'Parsing command line');
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
