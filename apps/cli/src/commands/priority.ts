import { Command } from 'commander';
import { $try, report, type CliContext } from '../helpers.js';

export function createPriorityCommand(ctx: CliContext): Command {
  return new Command('priority')
    .description("Set a task's priority")
    .argument('<taskId>', 'The task ID (or a unique prefix)')
    .argument('<level>', 'Priority level (1-4, low, medium, high, urgent)')
    .action((taskId: string, level: string) => $try(() => {
      const manager = ctx.manager;
      report(manager.updatePriority(manager.resolveId(taskId), level));
    }));
}
