import { Command } from 'commander';
import { $try, report, type CliContext } from '../helpers.js';

export function createDueCommand(ctx: CliContext): Command {
  return new Command('due')
    .description("Set or clear a task's due date")
    .argument('<taskId>', 'The task ID (or a unique prefix)')
    .argument('<date>', "Due date (today, tomorrow, friday, +3d, jan15, yyyy-MM-dd) or 'clear'")
    .action((taskId: string, date: string) => $try(() => {
      const manager = ctx.manager;
      report(manager.updateDueDate(manager.resolveId(taskId), date));
    }));
}
