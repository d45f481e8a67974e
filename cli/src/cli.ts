#!/usr/bin/env node

import { Command } from 'commander';
import { readMessage } from './message.js';
import { log } from './log.js';
import { printOutcome, runCheckCommand, runTypesCommand, type CliFlags } from './run.js';

const VERSION = '1.0.0';

function checkCommand(file: string | undefined, options: CliFlags) {
  log(file ? `Reading commit message from ${file}` : 'Reading commit message from stdin');

  const outcome = runCheckCommand(() => readMessage(file), options);
  printOutcome(outcome);
  process.exit(outcome.exitCode);
}

function typesCommand(options: CliFlags) {
  const outcome = runTypesCommand(options);
  printOutcome(outcome);
  process.exit(outcome.exitCode);
}

// Main CLI
const program = new Command();

program
  .name('commit-grammar')
  .description('Validate commit messages against a type(scope): description grammar')
  .version(VERSION);

program
  .command('check [file]', { isDefault: true })
  .description('Validate a commit message read from a file or stdin')
  .option('-t, --types <spec>', 'Replace the allowed types, e.g. "feat=scope;fix=;docs="')
  .option('-c, --allow-caps-types', 'Match commit types case-insensitively')
  .option('-e, --dont-exit-on-errors', 'Report violations but exit with status 0')
  .option('--strip-comments', 'Drop "#" comment lines before validating')
  .option('--verbose', 'Print the parsed message')
  .action(checkCommand);

program
  .command('types')
  .description('Print the allowed commit types and their required fields')
  .option('-t, --types <spec>', 'Replace the allowed types, e.g. "feat=scope;fix=;docs="')
  .option('-c, --allow-caps-types', 'Match commit types case-insensitively')
  .action(typesCommand);

program.parse();
