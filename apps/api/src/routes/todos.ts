import type { FastifyPluginAsync } from 'fastify';
import type { TodoStore } from '@todo/database';
import type { TodoCreateInput, TodoUpdateInput } from '@todo/shared-types';
import { createTodoBody, todoIdParams, updateTodoBody } from './schemas.js';

interface TodoRoutesConfig {
  store: TodoStore;
}

interface IdParams {
  id: string;
}

/**
 * Todo CRUD routes
 *
 * - GET    /todos            list
 * - POST   /todos            create (201)
 * - GET    /todos/:id        read
 * - PUT    /todos/:id        partial update
 * - PATCH  /todos/:id        partial update
 * - POST   /todos/:id/toggle flip completed
 * - DELETE /todos/:id        delete (204)
 */
export function createTodoRoutes(config: TodoRoutesConfig): FastifyPluginAsync {
  const { store } = config;

  return async (fastify) => {
    fastify.get('/', async () => store.listAll());

    fastify.post<{ Body: TodoCreateInput }>(
      '/',
      { schema: { body: createTodoBody } },
      async (request, reply) => {
        const todo = await store.create(request.body);
        request.log.info({ todoId: todo.id }, 'Todo created');
        return reply.status(201).send(todo);
      }
    );

    fastify.get<{ Params: IdParams }>(
      '/:id',
      { schema: { params: todoIdParams } },
      async (request) => store.get(request.params.id)
    );

    const update = async (request: { params: IdParams; body: TodoUpdateInput }) =>
      store.update(request.params.id, request.body);

    fastify.put<{ Params: IdParams; Body: TodoUpdateInput }>(
      '/:id',
      { schema: { params: todoIdParams, body: updateTodoBody } },
      update
    );

    fastify.patch<{ Params: IdParams; Body: TodoUpdateInput }>(
      '/:id',
      { schema: { params: todoIdParams, body: updateTodoBody } },
      update
    );

    fastify.post<{ Params: IdParams }>(
      '/:id/toggle',
      { schema: { params: todoIdParams } },
      async (request) => store.toggle(request.params.id)
    );

    fastify.delete<{ Params: IdParams }>(
      '/:id',
      { schema: { params: todoIdParams } },
      async (request, reply) => {
        await store.delete(request.params.id);
        request.log.info({ todoId: request.params.id }, 'Todo deleted');
        return reply.status(204).send();
      }
    );
  };
}
