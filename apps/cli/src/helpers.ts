/**
 * CLI helpers: manager wiring, exit codes, error handling.
 */

import {
  TaskManager, JsonFileStore, loadConfig, initLogger,
  TaskrankError, ErrorCode, EXIT_CODES, errorMessage,
} from '@taskrank/core';
import type { TaskResult, DataResult, ConfigOverrides } from '@taskrank/core';
import * as out from './output.js';

/** Builds the manager on first use, after global options have been parsed */
export class CliContext {
  private cachedManager: TaskManager | null = null;

  constructor(private readonly createManager: () => TaskManager) {}

  /** Loads the store on first access; throws CORRUPT_STORE or CONFIG_ERROR */
  get manager(): TaskManager {
    if (!this.cachedManager) {
      this.cachedManager = this.createManager();
    }
    return this.cachedManager;
  }
}

/** Context backed by the resolved configuration and the JSON file store */
export function createDefaultContext(overrides: () => ConfigOverrides): CliContext {
  return new CliContext(() => {
    const config = loadConfig(overrides());
    initLogger(config.logLevel);
    return new TaskManager(new JsonFileStore(config.storePath), {
      scoring: { weights: config.weights, boostTags: config.boostTags },
    });
  });
}

/** Exit code for a failed result, 0 for success and no-change */
export function exitCodeFor(result: TaskResult | DataResult<unknown>): number {
  switch (result.type) {
    case 'success': case 'no-change': return 0;
    case 'not-found': return EXIT_CODES[ErrorCode.TaskNotFound];
    case 'invalid-status': return EXIT_CODES[ErrorCode.InvalidStatus];
    case 'invalid-priority': return EXIT_CODES[ErrorCode.InvalidPriority];
    case 'invalid-date': return EXIT_CODES[ErrorCode.InvalidDate];
    case 'invalid-title': case 'invalid-tag': return EXIT_CODES[ErrorCode.InvalidTitle];
    case 'write-failed': return EXIT_CODES[ErrorCode.WriteFailed];
  }
}

/** Print a result and record its exit code */
export function report(result: TaskResult): void {
  out.printResult(result);
  const code = exitCodeFor(result);
  if (code !== 0) process.exitCode = code;
}

/**
 * Wrap a command action with error handling.
 * Thrown errors are printed and mapped to an exit code instead of a stack trace.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(errorMessage(err));
    process.exitCode = err instanceof TaskrankError ? err.exitCode : 1;
  }
}
