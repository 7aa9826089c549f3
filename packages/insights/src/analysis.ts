/**
 * Todo Analysis
 *
 * Templated narrative built from the statistics: completion rate, overdue
 * count, the oldest open item and one recommendation. Deterministic for a
 * given snapshot and clock.
 */

import { toDateOnly, type Todo, type TodoAnalysis } from '@todo/shared-types';
import { computeStats, isOverdue } from './stats.js';

function plural(count: number, noun: string): string {
  return count === 1 ? noun : `${noun}s`;
}

function timeOf(isoTimestamp: string): number {
  const time = Date.parse(isoTimestamp);
  return Number.isNaN(time) ? Number.POSITIVE_INFINITY : time;
}

/**
 * Incomplete todo with the earliest created_at (first in list order on ties)
 */
export function findOldestOpen(todos: Todo[]): Todo | null {
  let oldest: Todo | null = null;
  for (const todo of todos) {
    if (todo.completed) continue;
    if (!oldest || timeOf(todo.created_at) < timeOf(oldest.created_at)) {
      oldest = todo;
    }
  }
  return oldest;
}

/**
 * Overdue todos, earliest due date first
 */
export function findOverdue(todos: Todo[], now: Date): Todo[] {
  return todos
    .filter((t) => isOverdue(t, now))
    .sort((a, b) => timeOf(a.due_date ?? '') - timeOf(b.due_date ?? ''));
}

/**
 * Build the analysis for a snapshot of todos
 */
export function analyzeTodos(todos: Todo[], now: Date = new Date()): TodoAnalysis {
  const stats = computeStats(todos, now);
  const oldestOpen = findOldestOpen(todos);
  const overdue = findOverdue(todos, now);

  let recommendation: string;
  const firstOverdue = overdue[0];
  if (!stats.has_todos) {
    recommendation = 'Add your first todo to get started.';
  } else if (firstOverdue) {
    recommendation = `Work on the overdue item "${firstOverdue.title}" first.`;
  } else if (oldestOpen) {
    recommendation = `Start with your oldest open item "${oldestOpen.title}".`;
  } else {
    recommendation = 'Everything is done. Nice work!';
  }

  const lines: string[] = [];

  if (!stats.has_todos) {
    lines.push('You have no todos yet.');
  } else {
    lines.push(
      `You have ${stats.total} ${plural(stats.total, 'todo')}: ` +
        `${stats.completed_count} completed, ${stats.incomplete_count} open ` +
        `(${stats.completion_percentage}% complete).`
    );
    lines.push(
      stats.overdue_count > 0
        ? `${stats.overdue_count} overdue ${plural(stats.overdue_count, 'todo')}.`
        : 'Nothing is overdue.'
    );
  }

  if (oldestOpen) {
    lines.push(
      `Oldest open item: "${oldestOpen.title}" (created ${toDateOnly(oldestOpen.created_at)}).`
    );
  }

  lines.push(`Recommendation: ${recommendation}`);

  return {
    stats,
    oldestOpen,
    overdue,
    recommendation,
    text: lines.join('\n'),
  };
}
