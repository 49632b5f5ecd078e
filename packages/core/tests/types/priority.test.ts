import { describe, it, expect } from 'vitest';
import { Priority, parsePriority } from '../../src/types/priority.js';
import { TaskStatus, parseStatus } from '../../src/types/task-status.js';

describe('parsePriority', () => {
  it('parses weights and names', () => {
    expect(parsePriority('1')).toBe(Priority.Low);
    expect(parsePriority('2')).toBe(Priority.Medium);
    expect(parsePriority('3')).toBe(Priority.High);
    expect(parsePriority('4')).toBe(Priority.Urgent);
    expect(parsePriority('low')).toBe(Priority.Low);
    expect(parsePriority('med')).toBe(Priority.Medium);
  });

  it('is case-insensitive and trims', () => {
    expect(parsePriority(' URGENT ')).toBe(Priority.Urgent);
    expect(parsePriority('High')).toBe(Priority.High);
  });

  it('does not accept p-prefixed levels', () => {
    expect(parsePriority('p1')).toBeNull();
    expect(parsePriority('p4')).toBeNull();
  });

  it('returns null for values outside the set', () => {
    expect(parsePriority('0')).toBeNull();
    expect(parsePriority('5')).toBeNull();
    expect(parsePriority('critical')).toBeNull();
  });
});

describe('parseStatus', () => {
  it('parses the stored values and their aliases', () => {
    expect(parseStatus('todo')).toBe(TaskStatus.Todo);
    expect(parseStatus('in_progress')).toBe(TaskStatus.InProgress);
    expect(parseStatus('In-Progress')).toBe(TaskStatus.InProgress);
    expect(parseStatus('wip')).toBe(TaskStatus.InProgress);
    expect(parseStatus('review')).toBe(TaskStatus.Review);
    expect(parseStatus('completed')).toBe(TaskStatus.Done);
  });

  it('returns null for unknown status', () => {
    expect(parseStatus('blocked')).toBeNull();
  });
});
