import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import type { TodoStore } from '@todo/database';
import { errorHandler } from './errors.js';
import { createHealthRoutes } from './routes/health.js';
import { createInsightRoutes } from './routes/insights.js';
import { createTodoRoutes } from './routes/todos.js';

export interface AppOptions {
  store: TodoStore;
  /** Fastify logger option (pino) */
  logger?: FastifyServerOptions['logger'];
  /** Clock for overdue checks and health timestamps */
  now?: () => Date;
}

export const WELCOME_MESSAGE = 'Welcome to the Todo API! See /todos, /stats and /analysis.';

/**
 * Build the API without listening, so tests can use inject()
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { store } = options;
  const now = options.now ?? (() => new Date());

  const fastify = Fastify({ logger: options.logger ?? false });

  await fastify.register(cors, {
    origin: true,
  });

  fastify.setErrorHandler(errorHandler);

  fastify.get('/', async () => ({ message: WELCOME_MESSAGE }));

  await fastify.register(createTodoRoutes({ store }), { prefix: '/todos' });
  await fastify.register(createInsightRoutes({ store, now }));
  await fastify.register(createHealthRoutes({ store, now }), { prefix: '/health' });

  return fastify;
}
