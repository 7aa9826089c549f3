/**
 * Store error taxonomy
 *
 * Every failure the store signals is a TodoError with a `kind`, so callers can
 * branch on the kind without string matching:
 * - ValidationError: bad input shape or range
 * - NotFoundError: unknown todo id
 * - StoreIOError: backing file unreadable, corrupt or unwritable
 */

export type TodoErrorKind = 'validation' | 'not_found' | 'storage';

/** Base class for all store errors */
export class TodoError extends Error {
  public readonly kind: TodoErrorKind;

  constructor(message: string, kind: TodoErrorKind, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TodoError';
    this.kind = kind;
  }
}

export function isTodoError(error: unknown): error is TodoError {
  return error instanceof TodoError;
}

export class ValidationError extends TodoError {
  /** Offending field, when the failure is tied to one */
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'validation');
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class NotFoundError extends TodoError {
  public readonly todoId: string;

  constructor(todoId: string) {
    super(`Todo with ID ${todoId} not found`, 'not_found');
    this.name = 'NotFoundError';
    this.todoId = todoId;
  }
}

export class StoreIOError extends TodoError {
  public readonly filePath: string;

  constructor(filePath: string, message: string, options?: ErrorOptions) {
    super(message, 'storage', options);
    this.name = 'StoreIOError';
    this.filePath = filePath;
  }
}
