import type { FastifyInstance } from 'fastify';
import { toDateOnly, type Todo } from '@todo/shared-types';
import type { TodoFormValues } from './views/pages.js';

export type FormFields = Record<string, string>;

/**
 * Parse application/x-www-form-urlencoded bodies into a flat record.
 * Repeated keys keep their last value.
 */
export function registerFormParser(fastify: FastifyInstance): void {
  fastify.addContentTypeParser(
    'application/x-www-form-urlencoded',
    { parseAs: 'string' },
    (_request, body, done) => {
      done(null, Object.fromEntries(new URLSearchParams(String(body))));
    }
  );
}

/**
 * Form values from a submitted form. Unchecked checkboxes are simply absent.
 */
export function formValues(fields: FormFields | undefined): TodoFormValues {
  return {
    title: fields?.['title'] ?? '',
    description: fields?.['description'] ?? '',
    due_date: (fields?.['due_date'] ?? '').trim(),
    completed: fields?.['completed'] === 'on',
  };
}

/**
 * Form values prefilled from a stored todo
 */
export function valuesFromTodo(todo: Todo): TodoFormValues {
  return {
    title: todo.title,
    description: todo.description,
    due_date: todo.due_date ? toDateOnly(todo.due_date) : '',
    completed: todo.completed,
  };
}
