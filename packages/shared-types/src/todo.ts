/**
 * Todo Domain Types
 * The single record type shared by the store, the tools and every transport
 */

/** Title length bounds (inclusive) */
export const TITLE_MIN_LENGTH = 1;
export const TITLE_MAX_LENGTH = 100;

/** Maximum description length */
export const DESCRIPTION_MAX_LENGTH = 500;

/**
 * Length in characters (code points), so an emoji counts once
 */
export function characterLength(value: string): number {
  return [...value].length;
}

/**
 * A todo as stored on disk and returned on the wire.
 * Field names are snake_case to match the JSON data file.
 */
export interface Todo {
  /** UUID assigned by the store, immutable */
  id: string;
  title: string;
  description: string;
  completed: boolean;
  /** ISO 8601 UTC timestamp, or null when no due date is set */
  due_date: string | null;
  /** ISO 8601 UTC timestamp */
  created_at: string;
  /** ISO 8601 UTC timestamp, refreshed on every mutation */
  updated_at: string;
}

/**
 * Input for creating a todo.
 * `due_date` accepts a bare date (YYYY-MM-DD) or any ISO 8601 timestamp.
 */
export interface TodoCreateInput {
  title: string;
  description?: string;
  completed?: boolean;
  due_date?: string | null;
}

/**
 * Partial update. Only keys that are present (and not undefined) are applied;
 * `due_date: null` clears the due date.
 */
export interface TodoUpdateInput {
  title?: string;
  description?: string;
  completed?: boolean;
  due_date?: string | null;
}

/**
 * Aggregate statistics over a snapshot of todos
 */
export interface TodoStats {
  total: number;
  completed_count: number;
  incomplete_count: number;
  /** completed_count / total, 0 when there are no todos */
  completion_rate: number;
  /** completion_rate * 100, rounded to two decimals */
  completion_percentage: number;
  overdue_count: number;
  has_todos: boolean;
}

/**
 * Narrative analysis of the todo list
 */
export interface TodoAnalysis {
  stats: TodoStats;
  /** Incomplete todo with the earliest created_at */
  oldestOpen: Todo | null;
  /** Overdue todos, earliest due first */
  overdue: Todo[];
  recommendation: string;
  text: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard for a record read from disk or received over the wire
 */
export function isTodoRecord(record: unknown): record is Todo {
  return (
    isRecord(record) &&
    typeof record['id'] === 'string' &&
    typeof record['title'] === 'string' &&
    typeof record['description'] === 'string' &&
    typeof record['completed'] === 'boolean' &&
    (record['due_date'] === null || typeof record['due_date'] === 'string') &&
    typeof record['created_at'] === 'string' &&
    typeof record['updated_at'] === 'string'
  );
}
