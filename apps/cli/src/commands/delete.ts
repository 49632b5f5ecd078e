import { Command } from 'commander';
import { $try, report, type CliContext } from '../helpers.js';

export function createDeleteCommand(ctx: CliContext): Command {
  return new Command('delete')
    .description('Delete a task permanently')
    .argument('<taskId>', 'The task ID (or a unique prefix)')
    .action((taskId: string) => $try(() => {
      const manager = ctx.manager;
      report(manager.deleteTask(manager.resolveId(taskId)));
    }));
}
