import { readFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import writeFileAtomic from 'write-file-atomic';
import type { Logger } from 'pino';
import type { TaskCollection } from '../types/task.js';
import type { TaskStore } from './task-store.js';
import { decodeCollection, encodeCollection } from './codec.js';
import { ErrorCode, TaskrankError, errorMessage } from '../errors.js';
import { getLogger } from '../logger.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Stores the collection as a single JSON file, rewritten atomically on every save */
export class JsonFileStore implements TaskStore {
  private readonly log: Logger;

  constructor(readonly path: string) {
    this.log = getLogger('store');
  }

  load(): TaskCollection {
    let content: string;
    try {
      content = readFileSync(this.path, 'utf8');
    } catch (err: unknown) {
      if (isMissingFile(err)) {
        this.log.debug({ path: this.path }, 'store file not found, starting empty');
        return new Map();
      }
      throw new TaskrankError(ErrorCode.CorruptStore, `Failed to read task store ${this.path}: ${errorMessage(err)}`, { cause: err });
    }

    const decoded = decodeCollection(content);
    if (!decoded.ok) {
      this.log.error({ path: this.path, reason: decoded.reason }, 'task store is corrupt');
      throw new TaskrankError(ErrorCode.CorruptStore, `Task store ${this.path} is corrupt: ${decoded.reason}`);
    }

    this.log.debug({ path: this.path, count: decoded.tasks.size }, 'loaded tasks');
    return decoded.tasks;
  }

  save(tasks: TaskCollection): void {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileAtomic.sync(this.path, encodeCollection(tasks), { encoding: 'utf8' });
    } catch (err: unknown) {
      this.log.error({ path: this.path, err }, 'failed to write task store');
      throw new TaskrankError(ErrorCode.WriteFailed, `Failed to write task store ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
    this.log.debug({ path: this.path, count: tasks.size }, 'saved tasks');
  }
}
