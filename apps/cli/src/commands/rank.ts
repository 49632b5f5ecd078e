import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import * as out from '../output.js';
import { $try, type CliContext } from '../helpers.js';

interface RankOptions {
  all?: boolean;
  limit?: number;
  explain?: boolean;
}

function parseLimit(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n < 1) throw new InvalidArgumentError('Must be a positive integer.');
  return n;
}

export function createRankCommand(ctx: CliContext): Command {
  return new Command('rank')
    .description('Show tasks ordered by importance score')
    .option('-a, --all', 'Include done tasks')
    .option('-n, --limit <count>', 'Show only the top N tasks', parseLimit)
    .option('--explain', 'Show how each score is made up')
    .action((opts: RankOptions) => $try(() => {
      const ranked = ctx.manager.rankedTasks({ activeOnly: !opts.all, limit: opts.limit });
      if (ranked.length === 0) {
        out.info('No tasks to rank... use the add command to create one');
        return;
      }

      const now = ctx.manager.now();
      for (const { task, score } of ranked) {
        console.log(`${chalk.bold(out.formatScore(score).padStart(7))} ${out.formatTaskLine(task, now)}`);
        if (opts.explain) {
          console.log(`        ${out.formatBreakdown(ctx.manager.explainScore(task))}`);
        }
      }
    }));
}
