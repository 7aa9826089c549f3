import { DESCRIPTION_MAX_LENGTH, TITLE_MAX_LENGTH, TITLE_MIN_LENGTH } from '@todo/shared-types';

/**
 * Fastify JSON schemas for todo request bodies
 *
 * Shape checks only; the store still validates every value it writes.
 */

const title = {
  type: 'string',
  minLength: TITLE_MIN_LENGTH,
  maxLength: TITLE_MAX_LENGTH,
} as const;

const description = { type: 'string', maxLength: DESCRIPTION_MAX_LENGTH } as const;
const completed = { type: 'boolean' } as const;
const dueDate = { type: ['string', 'null'] } as const;

export const createTodoBody = {
  type: 'object',
  required: ['title'],
  properties: { title, description, completed, due_date: dueDate },
} as const;

export const updateTodoBody = {
  type: 'object',
  properties: { title, description, completed, due_date: dueDate },
} as const;

export const todoIdParams = {
  type: 'object',
  required: ['id'],
  properties: { id: { type: 'string', minLength: 1 } },
} as const;
