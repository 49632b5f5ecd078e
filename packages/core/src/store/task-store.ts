import type { TaskCollection } from '../types/task.js';

/**
 * Persistence collaborator owning the stored task collection.
 *
 * `load` throws a CORRUPT_STORE TaskrankError on malformed data and returns
 * an empty collection when nothing has been stored yet. `save` replaces the
 * whole collection and throws a WRITE_FAILED TaskrankError on any I/O error.
 */
export interface TaskStore {
  load(): TaskCollection;
  save(tasks: TaskCollection): void;
}
