/**
 * On-disk representation of the task collection.
 *
 * The file is a JSON object keyed by task id; each record uses snake_case
 * keys, the integer priority weight and the lowercase status string.
 */

import { z } from 'zod';
import type { Task, TaskCollection } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { Priority } from '../types/priority.js';
import { normalizeTags } from '../tasks/task-helpers.js';

const IsoTimestamp = z.string()
  .refine(s => !Number.isNaN(Date.parse(s)), { message: 'Invalid ISO-8601 timestamp' })
  .transform(s => new Date(s).toISOString());

export const TaskRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string().refine(s => s.trim().length > 0, { message: 'Title cannot be empty' }),
  description: z.string().default(''),
  priority: z.nativeEnum(Priority),
  status: z.nativeEnum(TaskStatus),
  tags: z.array(z.string()),
  due_date: IsoTimestamp.nullable(),
  created_at: IsoTimestamp,
  updated_at: IsoTimestamp,
  completed_at: IsoTimestamp.nullable(),
  previous_completed_at: IsoTimestamp.nullable().default(null),
}).superRefine((rec, ctx) => {
  if ((rec.completed_at !== null) !== (rec.status === TaskStatus.Done)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['completed_at'],
      message: 'completed_at must be set exactly when status is done',
    });
  }
  if (rec.updated_at < rec.created_at) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['updated_at'],
      message: 'updated_at is earlier than created_at',
    });
  }
});

export type TaskRecord = z.input<typeof TaskRecordSchema>;
type ParsedRecord = z.output<typeof TaskRecordSchema>;

export const StoreFileSchema = z.record(z.string(), TaskRecordSchema).superRefine((records, ctx) => {
  for (const [key, rec] of Object.entries(records)) {
    if (rec.id !== key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key, 'id'],
        message: `Record id '${rec.id}' does not match its key`,
      });
    }
  }
});

export function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    priority: task.priority,
    status: task.status,
    tags: [...task.tags],
    due_date: task.dueDate,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
    completed_at: task.completedAt,
    previous_completed_at: task.previousCompletedAt,
  };
}

export function fromRecord(rec: ParsedRecord): Task {
  return {
    id: rec.id,
    title: rec.title.trim(),
    description: rec.description,
    priority: rec.priority,
    status: rec.status,
    tags: normalizeTags(rec.tags),
    dueDate: rec.due_date,
    createdAt: rec.created_at,
    updatedAt: rec.updated_at,
    completedAt: rec.completed_at,
    previousCompletedAt: rec.previous_completed_at,
  };
}

/** Serialize the whole collection, preserving insertion order */
export function encodeCollection(tasks: TaskCollection): string {
  const out: Record<string, TaskRecord> = {};
  for (const [id, task] of tasks) {
    out[id] = toRecord(task);
  }
  return JSON.stringify(out, null, 2) + '\n';
}

export type DecodeResult =
  | { readonly ok: true; readonly tasks: TaskCollection }
  | { readonly ok: false; readonly reason: string };

/** Parse file contents into a collection, or explain why they are unusable */
export function decodeCollection(content: string): DecodeResult {
  if (!content.trim()) return { ok: false, reason: 'file is empty' };

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    return { ok: false, reason: `invalid JSON (${err instanceof Error ? err.message : String(err)})` };
  }

  const parsed = StoreFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, reason: `${where}${issue?.message ?? 'invalid data'}` };
  }

  const tasks: TaskCollection = new Map();
  for (const rec of Object.values(parsed.data)) {
    tasks.set(rec.id, fromRecord(rec));
  }
  return { ok: true, tasks };
}
