import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
  type FastifyServerOptions,
} from 'fastify';
import { TodoError, isTodoError, type TodoStore } from '@todo/database';
import { computeStats } from '@todo/insights';
import type { TodoUpdateInput } from '@todo/shared-types';
import { formValues, registerFormParser, valuesFromTodo, type FormFields } from './form.js';
import { EMPTY_FORM, renderDetail, renderError, renderForm, renderIndex } from './views/pages.js';
import type { Flash } from './views/html.js';

export interface WebAppOptions {
  store: TodoStore;
  /** Fastify logger option (pino) */
  logger?: FastifyServerOptions['logger'];
  /** Clock for overdue flags */
  now?: () => Date;
}

interface IdParams {
  id: string;
}

interface FlashQuery {
  notice?: string;
  error?: string;
}

type Attempt<T> = { ok: true; value: T } | { ok: false; error: TodoError };

/**
 * Location with a flash message in the query string
 */
export function withFlash(path: string, flash: Flash): string {
  const query = new URLSearchParams();
  if (flash.notice) query.set('notice', flash.notice);
  if (flash.error) query.set('error', flash.error);
  const search = query.toString();
  return search ? `${path}?${search}` : path;
}

function flashFrom(query: FlashQuery): Flash {
  return {
    ...(query.notice ? { notice: query.notice } : {}),
    ...(query.error ? { error: query.error } : {}),
  };
}

/**
 * Run a store call, handing back the failures a page can answer itself.
 * Storage failures propagate to the error handler.
 */
async function attempt<T>(run: () => Promise<T>): Promise<Attempt<T>> {
  try {
    return { ok: true, value: await run() };
  } catch (error) {
    if (isTodoError(error) && error.kind !== 'storage') {
      return { ok: false, error };
    }
    throw error;
  }
}

function editPath(id: string): string {
  return `/todo/${encodeURIComponent(id)}/edit`;
}

function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
  const page = reply.type('text/html; charset=utf-8');

  // Fastify's own client errors (body too large, unsupported media type, ...)
  if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
    return page.status(error.statusCode).send(renderError(error.message));
  }

  request.log.error({ err: error }, 'Request failed');
  const message = isTodoError(error) ? error.message : 'An unexpected error occurred';
  return page.status(500).send(renderError(message));
}

/**
 * Server-rendered todo UI
 */
export async function buildWebApp(options: WebAppOptions): Promise<FastifyInstance> {
  const { store } = options;
  const now = options.now ?? (() => new Date());

  const fastify = Fastify({ logger: options.logger ?? false });
  registerFormParser(fastify);
  fastify.setErrorHandler(errorHandler);

  const html = (reply: FastifyReply, page: string, status = 200) =>
    reply.status(status).type('text/html; charset=utf-8').send(page);

  const backToList = (reply: FastifyReply, flash: Flash) => reply.redirect(withFlash('/', flash));

  fastify.get<{ Querystring: FlashQuery }>('/', async (request, reply) => {
    const todos = await store.listAll();
    const at = now();
    return html(reply, renderIndex(todos, computeStats(todos, at), at, flashFrom(request.query)));
  });

  fastify.get('/todo/new', async (_request, reply) =>
    html(reply, renderForm({ action: '/todo/new', heading: 'New todo', values: EMPTY_FORM }))
  );

  fastify.post<{ Body: FormFields }>('/todo/new', async (request, reply) => {
    const values = formValues(request.body);
    const result = await attempt(() =>
      store.create({
        title: values.title,
        description: values.description,
        completed: values.completed,
        due_date: values.due_date || null,
      })
    );
    if (!result.ok) {
      const form = { action: '/todo/new', heading: 'New todo', values, error: result.error.message };
      return html(reply, renderForm(form), 400);
    }
    request.log.info({ todoId: result.value.id }, 'Todo created');
    return backToList(reply, { notice: 'Todo created successfully!' });
  });

  fastify.get<{ Params: IdParams; Querystring: FlashQuery }>('/todo/:id', async (request, reply) => {
    const result = await attempt(() => store.get(request.params.id));
    if (!result.ok) return backToList(reply, { error: result.error.message });
    return html(reply, renderDetail(result.value, now(), flashFrom(request.query)));
  });

  fastify.get<{ Params: IdParams }>('/todo/:id/edit', async (request, reply) => {
    const result = await attempt(() => store.get(request.params.id));
    if (!result.ok) return backToList(reply, { error: result.error.message });
    const form = {
      action: editPath(result.value.id),
      heading: 'Edit todo',
      values: valuesFromTodo(result.value),
    };
    return html(reply, renderForm(form));
  });

  fastify.post<{ Params: IdParams; Body: FormFields }>('/todo/:id/edit', async (request, reply) => {
    const values = formValues(request.body);
    const result = await attempt(async () => {
      const current = await store.get(request.params.id);
      const changes: TodoUpdateInput = {
        title: values.title,
        description: values.description,
        completed: values.completed,
      };
      // The form only shows the date part; an untouched field keeps the stored time
      if (values.due_date !== valuesFromTodo(current).due_date) {
        changes.due_date = values.due_date || null;
      }
      return store.update(current.id, changes);
    });
    if (!result.ok) {
      if (result.error.kind === 'not_found') {
        return backToList(reply, { error: result.error.message });
      }
      const form = {
        action: editPath(request.params.id),
        heading: 'Edit todo',
        values,
        error: result.error.message,
      };
      return html(reply, renderForm(form), 400);
    }
    request.log.info({ todoId: result.value.id }, 'Todo updated');
    return backToList(reply, { notice: 'Todo updated successfully!' });
  });

  fastify.post<{ Params: IdParams }>('/todo/:id/toggle', async (request, reply) => {
    const result = await attempt(() => store.toggle(request.params.id));
    if (!result.ok) return backToList(reply, { error: result.error.message });
    const status = result.value.completed ? 'completed' : 'active';
    return backToList(reply, { notice: `Todo marked as ${status}!` });
  });

  fastify.post<{ Params: IdParams }>('/todo/:id/delete', async (request, reply) => {
    const result = await attempt(() => store.delete(request.params.id));
    if (!result.ok) return backToList(reply, { error: result.error.message });
    request.log.info({ todoId: request.params.id }, 'Todo deleted');
    return backToList(reply, { notice: 'Todo deleted successfully!' });
  });

  return fastify;
}
