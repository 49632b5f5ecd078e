import { Command } from 'commander';
import chalk from 'chalk';
import { TaskStatus, Priority, PriorityName, statusLabel } from '@taskrank/core';
import { $try, type CliContext } from '../helpers.js';

const STATUS_ORDER = [TaskStatus.Todo, TaskStatus.InProgress, TaskStatus.Review, TaskStatus.Done] as const;
const PRIORITY_ORDER = [Priority.Urgent, Priority.High, Priority.Medium, Priority.Low] as const;

export function createStatsCommand(ctx: CliContext): Command {
  return new Command('stats')
    .description('Show task statistics')
    .action(() => $try(() => {
      const stats = ctx.manager.getStats();

      console.log(`Total tasks: ${chalk.bold(String(stats.total))}`);
      console.log('By status:');
      for (const status of STATUS_ORDER) {
        console.log(`  ${statusLabel(status)}: ${stats.byStatus[status]}`);
      }
      console.log('By priority:');
      for (const priority of PRIORITY_ORDER) {
        console.log(`  ${PriorityName[priority]}: ${stats.byPriority[priority]}`);
      }
      const overdue = stats.overdue > 0 ? chalk.red(String(stats.overdue)) : '0';
      console.log(`Overdue tasks: ${overdue}`);
      console.log(`Completed in last 7 days: ${stats.completedLastWeek}`);
    }));
}
