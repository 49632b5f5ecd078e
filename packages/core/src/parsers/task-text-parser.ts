/**
 * Parses free-form task text into a TaskDraft.
 * Markers are whitespace-delimited tokens and are removed from the title:
 *   @tag                     tag
 *   !1..!4, !low..!urgent    priority (first one wins)
 *   #date                    due date, any format parseDate accepts (first parsable wins)
 */

import type { TaskDraft } from '../types/task.js';
import { parsePriority, type Priority } from '../types/priority.js';
import { parseDueDate } from './date-parser.js';
import { normalizeTags } from '../tasks/task-helpers.js';

const TAG_RE = /^@([\w-]+)$/;
const PRIORITY_RE = /^!([1-4]|low|medium|high|urgent)$/i;
const DATE_RE = /^#(\S+)$/;

export interface ParsedTaskText extends TaskDraft {
  readonly title: string;
  readonly priority?: Priority;
  readonly dueDate: string | null;
  readonly tags: string[];
  /** #markers that could not be read as a date */
  readonly unparsedDates: string[];
}

export function parseTaskText(text: string, now?: Date): ParsedTaskText {
  const words: string[] = [];
  const tags: string[] = [];
  const unparsedDates: string[] = [];
  let priority: Priority | undefined;
  let dueDate: string | null = null;

  for (const token of text.split(/\s+/)) {
    if (!token) continue;

    const tag = TAG_RE.exec(token)?.[1];
    if (tag !== undefined) {
      tags.push(tag);
      continue;
    }

    const level = PRIORITY_RE.exec(token)?.[1];
    if (level !== undefined) {
      if (priority === undefined) priority = parsePriority(level) ?? undefined;
      continue;
    }

    const dateText = DATE_RE.exec(token)?.[1];
    if (dateText !== undefined) {
      const parsed: string | null = dueDate === null ? parseDueDate(dateText, now) : null;
      if (parsed) dueDate = parsed;
      else if (dueDate === null) unparsedDates.push(dateText);
      continue;
    }

    words.push(token);
  }

  return {
    title: words.join(' '),
    priority,
    dueDate,
    tags: normalizeTags(tags),
    unparsedDates,
  };
}
