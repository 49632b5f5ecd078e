// Types
export {
  TaskStatus, TaskStatusName, isTaskStatus, parseStatus, statusLabel,
  Priority, PriorityName, DEFAULT_PRIORITY, isPriority, parsePriority,
  isSuccess, isError,
} from './types/index.js';
export type {
  TaskId, Task, TaskDraft, TaskCollection,
  TaskResult, DataResult, FailedResult,
} from './types/index.js';

// Errors
export { TaskrankError, ErrorCode, EXIT_CODES, isTaskrankError, errorMessage } from './errors.js';

// Task entity
export {
  generateId, newTask, markDone, withStatus, withPriority, withDueDate,
  withTags, addTag, removeTag, isOverdue, normalizeTags,
} from './tasks/task-helpers.js';

// Scoring
export * from './scoring/index.js';

// Store
export * from './store/index.js';

// Manager
export * from './manager/index.js';

// Parsers
export * from './parsers/index.js';

// Config & logging
export { loadConfig, readConfigFile, getDefaultStorePath, getDataDir, getConfigPath, ConfigFileSchema, ENV } from './config.js';
export type { TaskrankConfig, ConfigOverrides, ConfigFile } from './config.js';
export { initLogger, getLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { LogLevel } from './logger.js';
