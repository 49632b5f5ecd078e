/**
 * Status/priority manager: the one place where external input is validated
 * against the closed sets. Each mutation replaces the task in the owned
 * collection and saves the whole collection through the store.
 */

import type { Logger } from 'pino';
import type { Task, TaskCollection, TaskDraft, TaskId } from '../types/task.js';
import type { DataResult, TaskResult } from '../types/results.js';
import { TaskStatus, parseStatus, statusLabel } from '../types/task-status.js';
import { Priority, PriorityName, parsePriority } from '../types/priority.js';
import type { TaskStore } from '../store/task-store.js';
import {
  newTask, withStatus, withPriority, withDueDate,
  addTag, removeTag, isOverdue, normalizeTags,
} from '../tasks/task-helpers.js';
import { rankTasks, scoreBreakdown, type RankedTask, type ScoreBreakdown, type ScoringOptions } from '../scoring/score.js';
import { parseDueDate } from '../parsers/date-parser.js';
import { parseTaskText } from '../parsers/task-text-parser.js';
import { TaskrankError, ErrorCode, errorMessage } from '../errors.js';
import { getLogger } from '../logger.js';

const SHORT_ID_LENGTH = 8;
const MIN_PREFIX_LENGTH = 4;
const WEEK_MS = 7 * 24 * 3_600_000;
const CLEAR_WORDS = new Set(['clear', 'none', '-']);

export interface TaskManagerOptions {
  /** Source of "now"; tests pass a fixed clock */
  readonly clock?: () => Date;
  readonly scoring?: ScoringOptions;
}

/** Raw, unvalidated values as typed by the user */
export interface RawTaskOptions {
  readonly description?: string;
  readonly priority?: string;
  readonly due?: string;
  /** Comma-separated */
  readonly tags?: string;
}

export interface RawTaskFilter {
  readonly status?: string;
  readonly priority?: string;
  readonly tag?: string;
  readonly overdue?: boolean;
}

export interface AddResult {
  readonly result: DataResult<Task>;
  readonly warnings: string[];
}

export interface TaskStats {
  readonly total: number;
  readonly byStatus: Record<TaskStatus, number>;
  readonly byPriority: Record<Priority, number>;
  readonly overdue: number;
  readonly completedLastWeek: number;
}

export function shortId(id: TaskId): string {
  return id.slice(0, SHORT_ID_LENGTH);
}

export class TaskManager {
  private readonly tasks: TaskCollection;
  private readonly clock: () => Date;
  private readonly scoring: ScoringOptions;
  private readonly log: Logger;

  /** Loads the collection immediately; a corrupt store throws here */
  constructor(private readonly store: TaskStore, options: TaskManagerOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.scoring = options.scoring ?? {};
    this.log = getLogger('manager');
    this.tasks = store.load();
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  getTask(id: TaskId): Task | null {
    return this.tasks.get(id) ?? null;
  }

  /** All tasks in insertion order */
  getAllTasks(): Task[] {
    return [...this.tasks.values()];
  }

  get size(): number {
    return this.tasks.size;
  }

  /** Current time according to the manager's clock */
  now(): Date {
    return this.clock();
  }

  /**
   * Resolve a full id or a unique prefix of at least four characters.
   * Returns the input unchanged when nothing matches, so lookups report it as not found.
   */
  resolveId(idOrPrefix: string): TaskId {
    const input = idOrPrefix.trim();
    if (this.tasks.has(input) || input.length < MIN_PREFIX_LENGTH) return input;

    const matches = [...this.tasks.keys()].filter(id => id.startsWith(input));
    return matches.length === 1 && matches[0] !== undefined ? matches[0] : input;
  }

  listTasks(filter: RawTaskFilter = {}): DataResult<Task[]> {
    const status = filter.status !== undefined ? parseStatus(filter.status) : null;
    if (filter.status !== undefined && status === null) return { type: 'invalid-status', value: filter.status };

    const priority = filter.priority !== undefined ? parsePriority(filter.priority) : null;
    if (filter.priority !== undefined && priority === null) return { type: 'invalid-priority', value: filter.priority };

    const [tag] = filter.tag !== undefined ? normalizeTags([filter.tag]) : [];
    const now = this.clock();

    const data = this.getAllTasks().filter(t =>
      (status === null || t.status === status)
      && (priority === null || t.priority === priority)
      && (tag === undefined || t.tags.includes(tag))
      && (!filter.overdue || isOverdue(t, now)),
    );
    return { type: 'success', data, message: `${data.length} task(s)` };
  }

  /** Tasks by descending score; Done tasks are left out unless activeOnly is false */
  rankedTasks(options: { activeOnly?: boolean; limit?: number } = {}): RankedTask[] {
    const ranked = rankTasks(this.tasks.values(), this.clock(), {
      ...this.scoring,
      activeOnly: options.activeOnly ?? true,
    });
    return options.limit !== undefined ? ranked.slice(0, Math.max(0, options.limit)) : ranked;
  }

  /** Score components of a task as of now, with the configured weights */
  explainScore(task: Task): ScoreBreakdown {
    return scoreBreakdown(task, this.clock(), this.scoring);
  }

  getStats(): TaskStats {
    const now = this.clock();
    const weekAgo = now.getTime() - WEEK_MS;
    const byStatus: Record<TaskStatus, number> = {
      [TaskStatus.Todo]: 0,
      [TaskStatus.InProgress]: 0,
      [TaskStatus.Review]: 0,
      [TaskStatus.Done]: 0,
    };
    const byPriority: Record<Priority, number> = {
      [Priority.Low]: 0,
      [Priority.Medium]: 0,
      [Priority.High]: 0,
      [Priority.Urgent]: 0,
    };
    let overdue = 0;
    let completedLastWeek = 0;

    for (const task of this.tasks.values()) {
      byStatus[task.status]++;
      byPriority[task.priority]++;
      if (isOverdue(task, now)) overdue++;
      if (task.completedAt && Date.parse(task.completedAt) >= weekAgo) completedLastWeek++;
    }

    return { total: this.tasks.size, byStatus, byPriority, overdue, completedLastWeek };
  }

  // ---------------------------------------------------------------------------
  // Transitions
  // ---------------------------------------------------------------------------

  updateStatus(id: TaskId, value: string): TaskResult {
    const status = parseStatus(value);
    if (status === null) return { type: 'invalid-status', value };

    const task = this.tasks.get(id);
    if (!task) return { type: 'not-found', taskId: id };
    if (task.status === status) {
      return { type: 'no-change', message: `Task ${shortId(id)} is already ${statusLabel(status)}` };
    }

    this.log.debug({ taskId: id, from: task.status, to: status }, 'status transition');
    return this.commit(withStatus(task, status, this.clock()), `Set ${shortId(id)} to ${statusLabel(status)}`);
  }

  markDone(id: TaskId): TaskResult {
    return this.updateStatus(id, TaskStatus.Done);
  }

  updatePriority(id: TaskId, value: string): TaskResult {
    const priority = parsePriority(value);
    if (priority === null) return { type: 'invalid-priority', value };

    const task = this.tasks.get(id);
    if (!task) return { type: 'not-found', taskId: id };
    if (task.priority === priority) {
      return { type: 'no-change', message: `Task ${shortId(id)} is already ${PriorityName[priority]} priority` };
    }

    this.log.debug({ taskId: id, from: task.priority, to: priority }, 'priority change');
    return this.commit(withPriority(task, priority, this.clock()), `Set priority for ${shortId(id)}: ${PriorityName[priority]}`);
  }

  /** Accepts anything parseDate understands, or clear/none to remove the due date */
  updateDueDate(id: TaskId, value: string): TaskResult {
    const clearing = CLEAR_WORDS.has(value.trim().toLowerCase());
    const dueDate = clearing ? null : parseDueDate(value, this.clock());
    if (!clearing && dueDate === null) return { type: 'invalid-date', value };

    const task = this.tasks.get(id);
    if (!task) return { type: 'not-found', taskId: id };
    if (task.dueDate === dueDate) return { type: 'no-change', message: `Due date for ${shortId(id)} is unchanged` };

    const msg = dueDate ? `Set due date for ${shortId(id)}: ${dueDate.slice(0, 10)}` : `Cleared due date for ${shortId(id)}`;
    return this.commit(withDueDate(task, dueDate, this.clock()), msg);
  }

  addTag(id: TaskId, tag: string): TaskResult {
    const [normalized] = normalizeTags([tag]);
    if (normalized === undefined) return { type: 'invalid-tag', value: tag };

    const task = this.tasks.get(id);
    if (!task) return { type: 'not-found', taskId: id };

    const updated = addTag(task, normalized, this.clock());
    if (!updated) return { type: 'no-change', message: `Task ${shortId(id)} already has tag '${normalized}'` };
    return this.commit(updated, `Added tag '${normalized}' to ${shortId(id)}`);
  }

  removeTag(id: TaskId, tag: string): TaskResult {
    const [normalized] = normalizeTags([tag]);
    if (normalized === undefined) return { type: 'invalid-tag', value: tag };

    const task = this.tasks.get(id);
    if (!task) return { type: 'not-found', taskId: id };

    const updated = removeTag(task, normalized, this.clock());
    if (!updated) return { type: 'no-change', message: `Task ${shortId(id)} has no tag '${normalized}'` };
    return this.commit(updated, `Removed tag '${normalized}' from ${shortId(id)}`);
  }

  deleteTask(id: TaskId): TaskResult {
    if (!this.tasks.delete(id)) return { type: 'not-found', taskId: id };
    this.log.debug({ taskId: id }, 'deleted task');
    return this.persist(`Deleted task ${shortId(id)}`);
  }

  // ---------------------------------------------------------------------------
  // Creation
  // ---------------------------------------------------------------------------

  createTask(draft: TaskDraft): DataResult<Task> {
    let task: Task;
    try {
      task = newTask(draft, this.clock());
    } catch (err: unknown) {
      if (err instanceof TaskrankError && err.code === ErrorCode.InvalidTitle) {
        return { type: 'invalid-title', message: err.message };
      }
      if (err instanceof TaskrankError && err.code === ErrorCode.InvalidPriority) {
        return { type: 'invalid-priority', value: String(draft.priority) };
      }
      throw err;
    }

    const result = this.commit(task, `Created task ${shortId(task.id)}`);
    return result.type === 'success' ? { ...result, data: task } : result;
  }

  /**
   * Create a task from marker text ("Buy milk @shopping !2 #tomorrow").
   * Explicit options win over markers and are validated here.
   */
  createFromText(text: string, options: RawTaskOptions = {}): AddResult {
    const warnings: string[] = [];
    const now = this.clock();
    const parsed = parseTaskText(text, now);
    for (const d of parsed.unparsedDates) warnings.push(`Could not read '#${d}' as a date, ignored`);

    let priority = parsed.priority;
    if (options.priority !== undefined) {
      const p = parsePriority(options.priority);
      if (p === null) return { result: { type: 'invalid-priority', value: options.priority }, warnings };
      priority = p;
    }

    let dueDate = parsed.dueDate;
    if (options.due !== undefined) {
      dueDate = parseDueDate(options.due, now);
      if (dueDate === null) return { result: { type: 'invalid-date', value: options.due }, warnings };
    }

    const extraTags = options.tags !== undefined ? options.tags.split(',') : [];
    const result = this.createTask({
      title: parsed.title,
      description: options.description ?? '',
      priority,
      dueDate,
      tags: [...parsed.tags, ...extraTags],
    });
    return { result, warnings };
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  private commit(task: Task, message: string): TaskResult {
    this.tasks.set(task.id, task);
    return this.persist(message);
  }

  /** Save the whole collection. The in-memory change stays even when the write fails. */
  private persist(message: string): TaskResult {
    try {
      this.store.save(this.tasks);
    } catch (err: unknown) {
      this.log.error({ err }, 'save failed, in-memory state differs from the store');
      return { type: 'write-failed', message: errorMessage(err) };
    }
    return { type: 'success', message };
  }
}
