import { Command } from 'commander';
import * as out from '../output.js';
import { $try, report, type CliContext } from '../helpers.js';

export function createShowCommand(ctx: CliContext): Command {
  return new Command('show')
    .description('Show task details and its score')
    .argument('<taskId>', 'The task ID (or a unique prefix)')
    .action((taskId: string) => $try(() => {
      const manager = ctx.manager;
      const id = manager.resolveId(taskId);
      const task = manager.getTask(id);
      if (!task) {
        report({ type: 'not-found', taskId });
        return;
      }

      for (const line of out.formatTaskDetails(task)) console.log(line);
      const breakdown = manager.explainScore(task);
      console.log(`  Score:    ${out.formatScore(breakdown.total)}`);
      console.log(`            ${out.formatBreakdown(breakdown)}`);
    }));
}
