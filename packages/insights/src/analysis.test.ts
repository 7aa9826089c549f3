import { describe, it, expect } from 'vitest';
import type { Todo } from '@todo/shared-types';
import { analyzeTodos, findOldestOpen, findOverdue } from './analysis.js';

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

describe('analyzeTodos', () => {
  it('describes an empty list', () => {
    const analysis = analyzeTodos([], now);

    expect(analysis.oldestOpen).toBeNull();
    expect(analysis.overdue).toEqual([]);
    expect(analysis.recommendation).toBe('Add your first todo to get started.');
    expect(analysis.text).toBe(
      'You have no todos yet.\nRecommendation: Add your first todo to get started.'
    );
  });

  it('recommends the earliest overdue item first', () => {
    const todos = [
      todo({ id: 'a', title: 'Book flights', completed: true }),
      todo({
        id: 'b',
        title: 'File taxes',
        due_date: '2025-03-05T00:00:00.000Z',
        created_at: '2025-02-20T08:00:00.000Z',
      }),
      todo({ id: 'c', title: 'Renew passport', due_date: '2025-03-02T00:00:00.000Z' }),
      todo({ id: 'd', title: 'Plan trip', due_date: '2025-04-01T00:00:00.000Z' }),
    ];

    const analysis = analyzeTodos(todos, now);

    expect(analysis.overdue.map((t) => t.id)).toEqual(['c', 'b']);
    expect(analysis.oldestOpen?.id).toBe('b');
    expect(analysis.text).toBe(
      [
        'You have 4 todos: 1 completed, 3 open (25% complete).',
        '2 overdue todos.',
        'Oldest open item: "File taxes" (created 2025-02-20).',
        'Recommendation: Work on the overdue item "Renew passport" first.',
      ].join('\n')
    );
  });

  it('points at the oldest open item when nothing is overdue', () => {
    const todos = [
      todo({ id: 'a', title: 'Call mom', created_at: '2025-03-03T10:00:00.000Z' }),
      todo({ id: 'b', title: 'Buy milk', created_at: '2025-03-02T10:00:00.000Z' }),
      todo({ id: 'c', title: 'Walk dog', completed: true, created_at: '2025-01-01T10:00:00.000Z' }),
    ];

    const analysis = analyzeTodos(todos, now);

    expect(analysis.text).toBe(
      [
        'You have 3 todos: 1 completed, 2 open (33.33% complete).',
        'Nothing is overdue.',
        'Oldest open item: "Buy milk" (created 2025-03-02).',
        'Recommendation: Start with your oldest open item "Buy milk".',
      ].join('\n')
    );
  });

  it('congratulates when everything is done', () => {
    const analysis = analyzeTodos([todo({ title: 'Only one', completed: true })], now);

    expect(analysis.text).toBe(
      [
        'You have 1 todo: 1 completed, 0 open (100% complete).',
        'Nothing is overdue.',
        'Recommendation: Everything is done. Nice work!',
      ].join('\n')
    );
  });

  it('uses the singular for one overdue todo', () => {
    const analysis = analyzeTodos(
      [todo({ title: 'Pay invoice', due_date: '2025-03-06T00:00:00.000Z' })],
      now
    );

    expect(analysis.text.split('\n')[1]).toBe('1 overdue todo.');
  });
});

describe('findOldestOpen', () => {
  it('keeps list order on ties', () => {
    const todos = [todo({ id: 'first' }), todo({ id: 'second' })];
    expect(findOldestOpen(todos)?.id).toBe('first');
  });

  it('returns null when everything is complete', () => {
    expect(findOldestOpen([todo({ completed: true })])).toBeNull();
  });
});

describe('findOverdue', () => {
  it('excludes completed and future items', () => {
    const todos = [
      todo({ id: 'done', completed: true, due_date: '2025-03-01T00:00:00.000Z' }),
      todo({ id: 'future', due_date: '2025-03-08T00:00:00.000Z' }),
      todo({ id: 'late', due_date: '2025-03-06T00:00:00.000Z' }),
    ];
    expect(findOverdue(todos, now).map((t) => t.id)).toEqual(['late']);
  });
});
