import type { TaskCollection } from '../types/task.js';
import type { TaskStore } from './task-store.js';
import { decodeCollection, encodeCollection } from './codec.js';
import { ErrorCode, TaskrankError } from '../errors.js';

/**
 * In-process store for tests. Keeps the encoded file contents so every
 * save/load goes through the same codec as the JSON file store.
 */
export class MemoryTaskStore implements TaskStore {
  private content: string | null;
  private saves = 0;

  constructor(initialContent: string | null = null) {
    this.content = initialContent;
  }

  load(): TaskCollection {
    if (this.content === null) return new Map();
    const decoded = decodeCollection(this.content);
    if (!decoded.ok) {
      throw new TaskrankError(ErrorCode.CorruptStore, `Task store is corrupt: ${decoded.reason}`);
    }
    return decoded.tasks;
  }

  save(tasks: TaskCollection): void {
    this.content = encodeCollection(tasks);
    this.saves++;
  }

  /** Number of saves so far */
  get saveCount(): number {
    return this.saves;
  }

  /** Raw stored contents, null before the first save */
  get raw(): string | null {
    return this.content;
  }
}
