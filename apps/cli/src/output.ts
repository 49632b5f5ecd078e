/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { TaskStatus, Priority, PriorityName, shortId, formatDate } from '@taskrank/core';
import type { Task, TaskResult, ScoreBreakdown } from '@taskrank/core';

const DAY_MS = 86_400_000;

// --- Tag colors (deterministic from tag name) ---

const TAG_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

function tagColor(tag: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < tag.length; i++) {
    hash = ((hash << 5) - hash + tag.charCodeAt(i)) | 0;
  }
  return TAG_COLORS[Math.abs(hash) % TAG_COLORS.length] ?? chalk.white;
}

// --- Formatting functions ---

export function formatCheckbox(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Done: return chalk.green('[✓]');
    case TaskStatus.InProgress: return chalk.yellow('[>]');
    case TaskStatus.Review: return chalk.cyan('[?]');
    case TaskStatus.Todo: return chalk.gray('[ ]');
  }
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.Urgent: return chalk.red.bold('!!!!');
    case Priority.High: return chalk.red('!!! ');
    case Priority.Medium: return chalk.yellow('!!  ');
    case Priority.Low: return chalk.blue('!   ');
  }
}

/** Whole local calendar days from `from` to `to` */
function dayDiff(from: Date, to: Date): number {
  const a = new Date(from.getFullYear(), from.getMonth(), from.getDate());
  const b = new Date(to.getFullYear(), to.getMonth(), to.getDate());
  return Math.round((b.getTime() - a.getTime()) / DAY_MS);
}

function formatMonthDay(d: Date): string {
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric' });
}

export function formatDueDate(task: Task, now: Date = new Date()): string {
  if (!task.dueDate) return '';
  const due = new Date(task.dueDate);

  // For completed tasks, freeze the label based on completion time
  if (task.status === TaskStatus.Done && task.completedAt) {
    const lateDays = dayDiff(due, new Date(task.completedAt));
    return lateDays > 0
      ? chalk.dim(`  Completed ${lateDays}d late`)
      : chalk.dim(`  Due: ${formatMonthDay(due)}`);
  }

  const diff = dayDiff(now, due);
  if (diff < 0) return chalk.red(`  OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('  Due: Today');
  if (diff === 1) return chalk.dim('  Due: Tomorrow');
  if (diff < 7) return chalk.dim(`  Due: ${due.toLocaleDateString('en-US', { weekday: 'long' })}`);
  return chalk.dim(`  Due: ${formatMonthDay(due)}`);
}

export function formatTags(tags: readonly string[]): string {
  if (tags.length === 0) return '';
  const formatted = tags.map(t => tagColor(t)(`@${t}`));
  return '  ' + formatted.join(' ');
}

/** One-line summary used by list and rank */
export function formatTaskLine(task: Task, now: Date = new Date()): string {
  const taskId = chalk.dim(`(${shortId(task.id)})`);
  return `${taskId} ${formatPriority(task.priority)} ${formatCheckbox(task.status)} ${chalk.bold(task.title)}${formatDueDate(task, now)}${formatTags(task.tags)}`;
}

/** Multi-line detail view */
export function formatTaskDetails(task: Task): string[] {
  const lines = [
    `${formatCheckbox(task.status)} ${chalk.bold(task.title)}`,
    `  ID:       ${task.id}`,
    `  Priority: ${PriorityName[task.priority]}`,
    `  Status:   ${task.status}`,
    `  Due:      ${task.dueDate ? formatDate(new Date(task.dueDate)) : 'No due date'}`,
    `  Tags:     ${task.tags.length > 0 ? task.tags.join(', ') : 'No tags'}`,
    `  Created:  ${task.createdAt}`,
    `  Updated:  ${task.updatedAt}`,
  ];
  if (task.completedAt) lines.push(`  Done:     ${task.completedAt}`);
  if (task.previousCompletedAt) lines.push(`  Reopened: previously done ${task.previousCompletedAt}`);
  if (task.description) lines.push('', `  ${task.description}`);
  return lines;
}

export function formatScore(value: number): string {
  return value.toFixed(2);
}

export function formatBreakdown(b: ScoreBreakdown): string {
  return chalk.dim(
    `priority ${formatScore(b.priority)} + due ${formatScore(b.dueDate)} + status ${formatScore(b.status)}`
    + ` + tags ${formatScore(b.tags)} + stale ${formatScore(b.staleness)}`,
  );
}

// --- Result output ---

export function printResult(result: TaskResult): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'no-change': info(result.message); break;
    case 'not-found': error(`Could not find task with id ${result.taskId}`); break;
    case 'invalid-status': error(`Unknown status: '${result.value}'. Use: todo, in_progress, review, done`); break;
    case 'invalid-priority': error(`Unknown priority: '${result.value}'. Use: 1-4, low, medium, high, urgent`); break;
    case 'invalid-date': error(`Could not read '${result.value}' as a date`); break;
    case 'invalid-title': error(result.message); break;
    case 'invalid-tag': error(`Invalid tag: '${result.value}'`); break;
    case 'write-failed': error(`Change not saved: ${result.message}`); break;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
