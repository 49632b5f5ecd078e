import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import { TaskManager, MemoryTaskStore, TaskrankError, ErrorCode } from '@taskrank/core';
import { CliContext, exitCodeFor, report, $try } from '../src/helpers.js';

describe('exitCodeFor', () => {
  it('is zero for success and no-change', () => {
    expect(exitCodeFor({ type: 'success', message: 'ok' })).toBe(0);
    expect(exitCodeFor({ type: 'no-change', message: 'same' })).toBe(0);
  });

  it('maps failures to their error codes', () => {
    expect(exitCodeFor({ type: 'not-found', taskId: 'x' })).toBe(4);
    expect(exitCodeFor({ type: 'invalid-status', value: 'x' })).toBe(2);
    expect(exitCodeFor({ type: 'invalid-priority', value: 'x' })).toBe(2);
    expect(exitCodeFor({ type: 'invalid-date', value: 'x' })).toBe(2);
    expect(exitCodeFor({ type: 'invalid-title', message: 'x' })).toBe(2);
    expect(exitCodeFor({ type: 'write-failed', message: 'x' })).toBe(6);
  });
});

describe('report', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    chalk.level = 0;
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('prints the message and leaves the exit code alone on success', () => {
    report({ type: 'success', message: 'Deleted task abcdef12' });
    expect(logSpy).toHaveBeenCalledWith('Deleted task abcdef12');
    expect(process.exitCode).toBeUndefined();
  });

  it('prints an error and sets the exit code on failure', () => {
    report({ type: 'invalid-priority', value: 'max' });
    expect(logSpy).toHaveBeenCalledWith("Unknown priority: 'max'. Use: 1-4, low, medium, high, urgent");
    expect(process.exitCode).toBe(2);
  });
});

describe('$try', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    chalk.level = 0;
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('calls the wrapped function', () => {
    const fn = vi.fn();
    $try(fn);
    expect(fn).toHaveBeenCalledOnce();
    expect(process.exitCode).toBeUndefined();
  });

  it('prints a TaskrankError and uses its exit code', () => {
    $try(() => {
      throw new TaskrankError(ErrorCode.CorruptStore, 'Task store is corrupt: file is empty');
    });
    expect(logSpy).toHaveBeenCalledWith('Task store is corrupt: file is empty');
    expect(process.exitCode).toBe(5);
  });

  it('exits with 1 for unexpected errors', () => {
    $try(() => {
      throw new Error('test error');
    });
    expect(logSpy).toHaveBeenCalledWith('test error');
    expect(process.exitCode).toBe(1);
  });
});

describe('CliContext', () => {
  it('creates the manager once, on first use', () => {
    const factory = vi.fn(() => new TaskManager(new MemoryTaskStore()));
    const ctx = new CliContext(factory);
    expect(factory).not.toHaveBeenCalled();
    const first = ctx.manager;
    expect(ctx.manager).toBe(first);
    expect(factory).toHaveBeenCalledOnce();
  });
});
