import { Command } from 'commander';
import type { ConfigOverrides } from '@taskrank/core';
import { createDefaultContext, type CliContext } from './helpers.js';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createRankCommand } from './commands/rank.js';
import { createShowCommand } from './commands/show.js';
import { createStatusCommand, createDoneCommand, createWipCommand } from './commands/status.js';
import { createPriorityCommand } from './commands/priority.js';
import { createDueCommand } from './commands/due.js';
import { createTagCommand, createUntagCommand } from './commands/tag.js';
import { createDeleteCommand } from './commands/delete.js';
import { createStatsCommand } from './commands/stats.js';

interface GlobalOptions {
  store?: string;
  verbose?: boolean;
}

/** Build the CLI program. A context may be passed in for tests. */
export function createProgram(context?: CliContext): Command {
  const program = new Command()
    .name('taskrank')
    .description('Personal task tracker that ranks tasks by importance')
    .version('1.0.0')
    .option('--store <path>', 'Path to the task store file')
    .option('-v, --verbose', 'Log diagnostics to stderr');

  const ctx = context ?? createDefaultContext((): ConfigOverrides => {
    const g = program.opts<GlobalOptions>();
    return { storePath: g.store, logLevel: g.verbose ? 'debug' : undefined };
  });

  // Register commands
  program.addCommand(createAddCommand(ctx));
  program.addCommand(createListCommand(ctx));
  program.addCommand(createRankCommand(ctx));
  program.addCommand(createShowCommand(ctx));
  program.addCommand(createStatusCommand(ctx));
  program.addCommand(createDoneCommand(ctx));
  program.addCommand(createWipCommand(ctx));
  program.addCommand(createPriorityCommand(ctx));
  program.addCommand(createDueCommand(ctx));
  program.addCommand(createTagCommand(ctx));
  program.addCommand(createUntagCommand(ctx));
  program.addCommand(createDeleteCommand(ctx));
  program.addCommand(createStatsCommand(ctx));

  return program;
}
