import type { FastifyBaseLogger } from 'fastify';
import type { TodoStore } from '@todo/database';
import type { TodoCreateInput } from '@todo/shared-types';

export const STARTER_TODOS: TodoCreateInput[] = [
  {
    title: 'Learn Fastify',
    description: 'Learn how to build APIs with Fastify',
    completed: true,
  },
  {
    title: 'Build the todo app',
    description: 'Create a simple todo application with Fastify',
    completed: false,
  },
];

/**
 * Add the starter todos when the store is empty
 *
 * @returns Number of todos created
 */
export async function seedIfEmpty(store: TodoStore, log: FastifyBaseLogger): Promise<number> {
  const existing = await store.listAll();
  if (existing.length > 0) {
    return 0;
  }

  for (const input of STARTER_TODOS) {
    await store.create(input);
  }
  log.info({ count: STARTER_TODOS.length }, 'Seeded empty store with starter todos');
  return STARTER_TODOS.length;
}
