/**
 * Importance score for a task: a weighted sum of priority, due date,
 * status, boost tags and staleness. Higher means more important.
 *
 * Every function here is pure; `now` is always passed in.
 */

import type { Task } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { DEFAULT_BOOST_TAGS, DEFAULT_WEIGHTS, type ScoringWeights } from './weights.js';

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

export interface ScoringOptions {
  readonly weights?: Partial<ScoringWeights>;
  readonly boostTags?: readonly string[];
}

export interface ScoreBreakdown {
  readonly priority: number;
  readonly dueDate: number;
  readonly status: number;
  readonly tags: number;
  readonly staleness: number;
  readonly total: number;
}

export interface RankedTask {
  readonly task: Task;
  readonly score: number;
}

export interface RankOptions extends ScoringOptions {
  /** Drop Done tasks from the ranking */
  readonly activeOnly?: boolean;
}

function resolveWeights(options?: ScoringOptions): ScoringWeights {
  return options?.weights ? { ...DEFAULT_WEIGHTS, ...options.weights } : DEFAULT_WEIGHTS;
}

function timeOf(iso: string | null): number | null {
  if (iso === null) return null;
  const t = Date.parse(iso);
  return Number.isNaN(t) ? null : t;
}

export function priorityComponent(task: Task, weights: ScoringWeights = DEFAULT_WEIGHTS): number {
  return task.priority * weights.priorityMultiplier;
}

/**
 * Bonus that grows as the due date approaches: the maximum once overdue,
 * half of it at `dueHorizonHours` remaining, tending to zero far out.
 * Tasks without a due date get nothing.
 */
export function dueDateComponent(task: Task, now: Date, weights: ScoringWeights = DEFAULT_WEIGHTS): number {
  const due = timeOf(task.dueDate);
  if (due === null) return 0;

  const hoursRemaining = (due - now.getTime()) / HOUR_MS;
  if (hoursRemaining <= 0) return weights.dueMaxBonus;
  return (weights.dueMaxBonus * weights.dueHorizonHours) / (weights.dueHorizonHours + hoursRemaining);
}

export function statusComponent(task: Task, weights: ScoringWeights = DEFAULT_WEIGHTS): number {
  switch (task.status) {
    case TaskStatus.Done: return weights.statusDone;
    case TaskStatus.InProgress: return weights.statusInProgress;
    case TaskStatus.Review: return weights.statusReview;
    case TaskStatus.Todo: return 0;
  }
}

export function tagComponent(
  task: Task,
  boostTags: readonly string[] = DEFAULT_BOOST_TAGS,
  weights: ScoringWeights = DEFAULT_WEIGHTS,
): number {
  const boost = new Set(boostTags.map(t => t.toLowerCase()));
  return task.tags.some(t => boost.has(t.toLowerCase())) ? weights.tagBoost : 0;
}

/** Whole days since the last update, capped; surfaces neglected tasks */
export function stalenessComponent(task: Task, now: Date, weights: ScoringWeights = DEFAULT_WEIGHTS): number {
  const updated = timeOf(task.updatedAt);
  if (updated === null) return 0;

  const days = Math.floor((now.getTime() - updated) / DAY_MS);
  if (days <= 0) return 0;
  return Math.min(days, weights.stalenessCapDays) * weights.stalenessPerDay;
}

export function scoreBreakdown(task: Task, now: Date, options?: ScoringOptions): ScoreBreakdown {
  const weights = resolveWeights(options);
  const priority = priorityComponent(task, weights);
  const dueDate = dueDateComponent(task, now, weights);
  const status = statusComponent(task, weights);
  const tags = tagComponent(task, options?.boostTags ?? DEFAULT_BOOST_TAGS, weights);
  const staleness = stalenessComponent(task, now, weights);

  return {
    priority,
    dueDate,
    status,
    tags,
    staleness,
    total: priority + dueDate + status + tags + staleness,
  };
}

export function score(task: Task, now: Date, options?: ScoringOptions): number {
  return scoreBreakdown(task, now, options).total;
}

/**
 * Sort by descending score. Equal scores keep their input order
 * (Array.prototype.sort is stable); ids are never compared.
 */
export function rankTasks(tasks: Iterable<Task>, now: Date, options?: RankOptions): RankedTask[] {
  const ranked: RankedTask[] = [];
  for (const task of tasks) {
    if (options?.activeOnly && task.status === TaskStatus.Done) continue;
    ranked.push({ task, score: score(task, now, options) });
  }
  return ranked.sort((a, b) => b.score - a.score);
}
