#!/usr/bin/env node
import 'reflect-metadata';
import { Command } from 'commander';
import charactersCommand from './commands/characters';
import corporationCommand from './commands/corporation';
import databaseCommand from './commands/database';
import playersCommand from './commands/players';
import stateCommand from './commands/state';
import uploadCommand from './commands/upload';

const program = new Command();

program.name('corp-ledger').description('Corporation monthly ledger CLI').version('1.0.0');

// Add subcommands
program.addCommand(databaseCommand);
program.addCommand(uploadCommand);
program.addCommand(charactersCommand);
program.addCommand(playersCommand);
program.addCommand(stateCommand);
program.addCommand(corporationCommand);

export default program;

if (require.main === module) {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
