import { Command } from 'commander';
import { TaskStatus } from '@taskrank/core';
import { $try, report, type CliContext } from '../helpers.js';

export function createStatusCommand(ctx: CliContext): Command {
  return new Command('status')
    .description('Set the status of a task')
    .argument('<taskId>', 'The task ID (or a unique prefix)')
    .argument('<status>', 'The status to set: todo, in_progress, review, done')
    .action((taskId: string, status: string) => $try(() => {
      const manager = ctx.manager;
      report(manager.updateStatus(manager.resolveId(taskId), status));
    }));
}

export function createDoneCommand(ctx: CliContext): Command {
  return new Command('done')
    .description('Mark a task as done')
    .argument('<taskId>', 'The task ID (or a unique prefix)')
    .action((taskId: string) => $try(() => {
      const manager = ctx.manager;
      report(manager.updateStatus(manager.resolveId(taskId), TaskStatus.Done));
    }));
}

export function createWipCommand(ctx: CliContext): Command {
  return new Command('wip')
    .description('Mark a task as in progress')
    .argument('<taskId>', 'The task ID (or a unique prefix)')
    .action((taskId: string) => $try(() => {
      const manager = ctx.manager;
      report(manager.updateStatus(manager.resolveId(taskId), TaskStatus.InProgress));
    }));
}
