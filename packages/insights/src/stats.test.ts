import { describe, it, expect } from 'vitest';
import type { Todo } from '@todo/shared-types';
import { computeStats, isOverdue } from './stats.js';

const now = new Date('2025-03-07T12:00:00.000Z');

function todo(overrides: Partial<Todo>): Todo {
  return {
    id: 'id',
    title: 'Task',
    description: '',
    completed: false,
    due_date: null,
    created_at: '2025-03-01T09:00:00.000Z',
    updated_at: '2025-03-01T09:00:00.000Z',
    ...overrides,
  };
}

describe('computeStats', () => {
  it('returns zeros for an empty list', () => {
    expect(computeStats([], now)).toEqual({
      total: 0,
      completed_count: 0,
      incomplete_count: 0,
      completion_rate: 0,
      completion_percentage: 0,
      overdue_count: 0,
      has_todos: false,
    });
  });

  it('counts three todos with one completed and one overdue', () => {
    const stats = computeStats(
      [
        todo({ id: 'a', completed: true }),
        todo({ id: 'b', due_date: '2025-03-01T00:00:00.000Z' }),
        todo({ id: 'c', due_date: '2025-04-01T00:00:00.000Z' }),
      ],
      now
    );

    expect(stats.total).toBe(3);
    expect(stats.completed_count).toBe(1);
    expect(stats.incomplete_count).toBe(2);
    expect(stats.completion_rate).toBeCloseTo(1 / 3, 10);
    expect(stats.completion_percentage).toBe(33.33);
    expect(stats.overdue_count).toBe(1);
    expect(stats.has_todos).toBe(true);
  });

  it('reports a full list as 100%', () => {
    const stats = computeStats([todo({ completed: true }), todo({ completed: true })], now);

    expect(stats.completion_rate).toBe(1);
    expect(stats.completion_percentage).toBe(100);
  });
});

describe('isOverdue', () => {
  it('requires a due date strictly before now', () => {
    expect(isOverdue(todo({ due_date: '2025-03-07T11:59:59.000Z' }), now)).toBe(true);
    expect(isOverdue(todo({ due_date: '2025-03-07T12:00:00.000Z' }), now)).toBe(false);
  });

  it('ignores todos without a due date', () => {
    expect(isOverdue(todo({ due_date: null }), now)).toBe(false);
  });

  it('ignores completed todos', () => {
    expect(isOverdue(todo({ completed: true, due_date: '2025-01-01T00:00:00.000Z' }), now)).toBe(
      false
    );
  });
});
