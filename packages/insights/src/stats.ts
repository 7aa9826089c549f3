/**
 * Statistics Aggregator
 * Pure functions over a snapshot of todos: no caching, no history
 */

import { isBefore, type Todo, type TodoStats } from '@todo/shared-types';

/**
 * A todo is overdue when it is open and its due date lies strictly before `now`
 */
export function isOverdue(todo: Todo, now: Date): boolean {
  return !todo.completed && todo.due_date !== null && isBefore(todo.due_date, now);
}

/**
 * Compute count, completion and overdue statistics
 */
export function computeStats(todos: Todo[], now: Date = new Date()): TodoStats {
  const total = todos.length;
  const completedCount = todos.filter((t) => t.completed).length;
  const overdueCount = todos.filter((t) => isOverdue(t, now)).length;
  const completionRate = total > 0 ? completedCount / total : 0;

  return {
    total,
    completed_count: completedCount,
    incomplete_count: total - completedCount,
    completion_rate: completionRate,
    completion_percentage: Math.round(completionRate * 10000) / 100,
    overdue_count: overdueCount,
    has_todos: total > 0,
  };
}
