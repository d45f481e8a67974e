#!/usr/bin/env node

/**
 * Git commit-msg hook script
 * Git calls this after the message has been written and before the commit is made;
 * a non-zero exit aborts the commit.
 *
 * Usage: commit-grammar-hook <commit-msg-file>
 *
 * Install by adding `commit-grammar-hook "$1"` to .git/hooks/commit-msg.
 * Configuration comes from the environment and .commitgrammarrc only.
 */

import { readMessage } from './message.js';
import { log } from './log.js';
import { printOutcome, runCheckCommand } from './run.js';

function main(): void {
  const commitMsgFile = process.argv[2];

  if (!commitMsgFile) {
    console.error('Usage: commit-grammar-hook <commit-msg-file>');
    process.exit(1);
  }

  log(`Checking ${commitMsgFile}`);
  const outcome = runCheckCommand(() => readMessage(commitMsgFile), { stripComments: true });

  if (outcome.exitCode !== 0) {
    log('Rejecting commit');
  }
  printOutcome(outcome);
  process.exit(outcome.exitCode);
}

main();
