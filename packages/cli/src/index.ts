#!/usr/bin/env node

import { Command } from 'commander';
import { registerAssessCommands } from './commands/assess/assess';
import { errorMessage } from './base/base-command';

const program = new Command();

program
  .name('tasking')
  .description('Task prioritization, routing and authority resolution')
  .version('0.1.0');

registerAssessCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(`❌ Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
