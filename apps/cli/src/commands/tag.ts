import { Command } from 'commander';
import { $try, report, type CliContext } from '../helpers.js';

export function createTagCommand(ctx: CliContext): Command {
  return new Command('tag')
    .description('Add a tag to a task')
    .argument('<taskId>', 'The task ID (or a unique prefix)')
    .argument('<tag>', 'Tag to add')
    .action((taskId: string, tag: string) => $try(() => {
      const manager = ctx.manager;
      report(manager.addTag(manager.resolveId(taskId), tag));
    }));
}

export function createUntagCommand(ctx: CliContext): Command {
  return new Command('untag')
    .description('Remove a tag from a task')
    .argument('<taskId>', 'The task ID (or a unique prefix)')
    .argument('<tag>', 'Tag to remove')
    .action((taskId: string, tag: string) => $try(() => {
      const manager = ctx.manager;
      report(manager.removeTag(manager.resolveId(taskId), tag));
    }));
}
