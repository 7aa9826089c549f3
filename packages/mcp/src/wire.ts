/**
 * Wire shapes for MCP tool failures
 *
 * MCP clients written against the original tool set expect a failed call to
 * come back as a todo-shaped record with `id: "error"`. The error kind travels
 * in the title; the message in the description.
 */

import type { Todo } from '@todo/shared-types';
import type { ToolErrorKind } from '@todo/ai';

export type ErrorRecord = Omit<Todo, 'id' | 'title' | 'completed' | 'due_date'> & {
  id: 'error';
  title: string;
  completed: false;
  due_date: null;
};

export const ERROR_TITLES: Record<ToolErrorKind, string> = {
  validation: 'Validation error',
  not_found: 'Todo not found',
  storage: 'Storage error',
  unknown_tool: 'Unknown tool',
  internal: 'Error',
};

export function toWireError(kind: ToolErrorKind, message: string): ErrorRecord {
  return {
    id: 'error',
    title: ERROR_TITLES[kind],
    description: message,
    completed: false,
    created_at: '',
    updated_at: '',
    due_date: null,
  };
}

/**
 * Reverse of the title mapping. Unrecognised titles count as `internal`.
 */
export function kindFromTitle(title: string): ToolErrorKind {
  for (const [kind, kindTitle] of Object.entries(ERROR_TITLES)) {
    if (kindTitle === title && isToolErrorKind(kind)) {
      return kind;
    }
  }
  return 'internal';
}

function isToolErrorKind(value: string): value is ToolErrorKind {
  return value in ERROR_TITLES;
}

export function isErrorRecord(value: unknown): value is ErrorRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    value.id === 'error' &&
    'title' in value &&
    typeof value.title === 'string' &&
    'description' in value &&
    typeof value.description === 'string'
  );
}
