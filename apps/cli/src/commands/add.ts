import { Command } from 'commander';
import { shortId } from '@taskrank/core';
import * as out from '../output.js';
import { $try, report, type CliContext } from '../helpers.js';

interface AddOptions {
  description?: string;
  priority?: string;
  due?: string;
  tags?: string;
}

export function createAddCommand(ctx: CliContext): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<text...>', 'Task title (supports: @tag, !1-!4 or !low..!urgent, #date)')
    .option('-d, --description <text>', 'Task description')
    .option('-p, --priority <level>', 'Priority (1-4, low, medium, high, urgent)')
    .option('-u, --due <date>', 'Due date (today, tomorrow, friday, +3d, yyyy-MM-dd, ...)')
    .option('-t, --tags <tags>', 'Comma-separated tags')
    .action((words: string[], opts: AddOptions) => $try(() => {
      const { result, warnings } = ctx.manager.createFromText(words.join(' '), opts);
      for (const w of warnings) out.warning(w);

      if (result.type === 'success') {
        out.success(`Created task with ID: ${shortId(result.data.id)}`);
      } else {
        report(result);
      }
    }));
}
