export type { TaskStore } from './task-store.js';
export { JsonFileStore } from './json-file-store.js';
export { MemoryTaskStore } from './memory-store.js';
export { encodeCollection, decodeCollection, toRecord, fromRecord, TaskRecordSchema, StoreFileSchema } from './codec.js';
export type { TaskRecord, DecodeResult } from './codec.js';
