import { Command } from 'commander';
import * as out from '../output.js';
import { $try, report, type CliContext } from '../helpers.js';

interface ListOptions {
  status?: string;
  priority?: string;
  tag?: string;
  overdue?: boolean;
}

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List tasks in the order they were added')
    .option('-s, --status <status>', 'Filter by status (todo, in_progress, review, done)')
    .option('-p, --priority <level>', 'Filter by priority (1-4, low, medium, high, urgent)')
    .option('-t, --tag <tag>', 'Filter by tag')
    .option('-o, --overdue', 'Show only overdue tasks')
    .action((opts: ListOptions) => $try(() => {
      const result = ctx.manager.listTasks(opts);
      if (result.type !== 'success') {
        report(result);
        return;
      }

      if (result.data.length === 0) {
        out.info('No tasks found matching the criteria.');
        return;
      }
      const now = ctx.manager.now();
      for (const task of result.data) {
        console.log(out.formatTaskLine(task, now));
      }
    }));
}
