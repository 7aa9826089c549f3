import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { FastifyInstance } from 'fastify';
import { JsonTodoStore, StoreIOError, type TodoStore } from '@todo/database';
import { buildWebApp, withFlash } from './app.js';
import { escapeHtml } from './views/html.js';

const clock = () => new Date('2025-03-07T12:00:00.000Z');
const FORM = { 'content-type': 'application/x-www-form-urlencoded' };

function brokenStore(): TodoStore {
  const failing = () => Promise.reject(new StoreIOError('/data/todos.json', 'Failed to read todo data'));
  return {
    listAll: failing,
    get: failing,
    create: failing,
    update: failing,
    delete: failing,
    toggle: failing,
  };
}

describe('todo web UI', () => {
  let dir: string;
  let store: JsonTodoStore;
  let app: FastifyInstance;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'todo-web-'));
    let nextId = 0;
    store = new JsonTodoStore({
      filePath: path.join(dir, 'todos.json'),
      now: clock,
      generateId: () => `todo-${++nextId}`,
    });
    app = await buildWebApp({ store, now: clock });
  });

  afterEach(async () => {
    await app.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('list page', () => {
    it('shows an empty state', async () => {
      const response = await app.inject({ method: 'GET', url: '/' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.body).toContain('No todos yet.');
    });

    it('shows stats and flags overdue todos', async () => {
      await store.create({ title: 'Pay rent', due_date: '2025-03-01' });

      const response = await app.inject({ method: 'GET', url: '/' });

      expect(response.body).toContain(
        '<p class="stats">1 total · 0 completed · 1 open · 0% complete · 1 overdue</p>'
      );
      expect(response.body).toContain(
        '<span class="due overdue">due 2025-03-01 00:00:00 (overdue)</span>'
      );
    });

    it('escapes user text', async () => {
      await store.create({ title: '<b>bold</b> & "quoted"' });

      const response = await app.inject({ method: 'GET', url: '/' });

      expect(response.body).toContain('&lt;b&gt;bold&lt;/b&gt; &amp; &quot;quoted&quot;');
      expect(response.body).not.toContain('<b>bold</b>');
    });

    it('renders the flash notice from the query string', async () => {
      const response = await app.inject({ method: 'GET', url: '/?notice=Saved%21' });

      expect(response.body).toContain('<div class="flash notice">Saved!</div>');
    });
  });

  describe('creating', () => {
    it('creates from the form and redirects with a notice', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/todo/new',
        headers: FORM,
        payload: 'title=Buy+milk&description=2+litres&due_date=2025-03-10',
      });

      expect(response.statusCode).toBe(302);
      expect(response.headers['location']).toBe('/?notice=Todo+created+successfully%21');
      expect(await store.listAll()).toMatchObject([
        {
          title: 'Buy milk',
          description: '2 litres',
          completed: false,
          due_date: '2025-03-10T00:00:00.000Z',
        },
      ]);
    });

    it('treats an empty due date as none and a ticked box as completed', async () => {
      await app.inject({
        method: 'POST',
        url: '/todo/new',
        headers: FORM,
        payload: 'title=Done+already&due_date=&completed=on',
      });

      expect(await store.listAll()).toMatchObject([{ completed: true, due_date: null }]);
    });

    it('re-renders the form with 400 on invalid input', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/todo/new',
        headers: FORM,
        payload: 'title=&description=keep+me',
      });

      expect(response.statusCode).toBe(400);
      expect(response.body).toContain(
        '<div class="flash error">Title must be between 1 and 100 characters</div>'
      );
      expect(response.body).toContain('>keep me</textarea>');
      expect(await store.listAll()).toEqual([]);
    });

    it('serves an empty form', async () => {
      const response = await app.inject({ method: 'GET', url: '/todo/new' });

      expect(response.statusCode).toBe(200);
      expect(response.body).toContain('<form method="post" action="/todo/new">');
    });
  });

  describe('existing todos', () => {
    beforeEach(async () => {
      await store.create({ title: 'Write report', due_date: '2025-03-20' });
    });

    it('shows the detail page', async () => {
      const response = await app.inject({ method: 'GET', url: '/todo/todo-1' });

      expect(response.statusCode).toBe(200);
      expect(response.body).toContain('<h2>Write report</h2>');
      expect(response.body).toContain('<dt>Due</dt><dd>2025-03-20 00:00:00</dd>');
    });

    it('prefills the edit form', async () => {
      const response = await app.inject({ method: 'GET', url: '/todo/todo-1/edit' });

      expect(response.body).toContain('<form method="post" action="/todo/todo-1/edit">');
      expect(response.body).toContain('name="title" value="Write report"');
      expect(response.body).toContain('name="due_date" value="2025-03-20"');
    });

    it('saves edits', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/todo/todo-1/edit',
        headers: FORM,
        payload: 'title=Write+the+report&description=&due_date=',
      });

      expect(response.headers['location']).toBe('/?notice=Todo+updated+successfully%21');
      expect(await store.get('todo-1')).toMatchObject({
        title: 'Write the report',
        due_date: null,
        completed: false,
      });
    });

    it('keeps the stored due time when the date is left alone', async () => {
      const todo = await store.create({ title: 'Call the bank', due_date: '2030-03-10T14:30:00Z' });
      const form = await app.inject({ method: 'GET', url: `/todo/${todo.id}/edit` });
      expect(form.body).toContain('name="due_date" value="2030-03-10"');

      await app.inject({
        method: 'POST',
        url: `/todo/${todo.id}/edit`,
        headers: FORM,
        payload: 'title=Call+the+bank+again&description=&due_date=2030-03-10',
      });

      expect(await store.get(todo.id)).toMatchObject({
        title: 'Call the bank again',
        due_date: '2030-03-10T14:30:00.000Z',
      });
    });

    it('moves the due date when a new date is picked', async () => {
      const todo = await store.create({ title: 'Call the bank', due_date: '2030-03-10T14:30:00Z' });

      await app.inject({
        method: 'POST',
        url: `/todo/${todo.id}/edit`,
        headers: FORM,
        payload: 'title=Call+the+bank&description=&due_date=2030-03-12',
      });

      expect(await store.get(todo.id)).toMatchObject({ due_date: '2030-03-12T00:00:00.000Z' });
    });

    it('keeps the form on an invalid edit', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/todo/todo-1/edit',
        headers: FORM,
        payload: 'title=Write+report&due_date=soon',
      });

      expect(response.statusCode).toBe(400);
      expect(response.body).toContain(
        escapeHtml('Invalid due date "soon": expected YYYY-MM-DD or an ISO 8601 timestamp')
      );
      expect(await store.get('todo-1')).toMatchObject({ due_date: '2025-03-20T00:00:00.000Z' });
    });

    it('toggles both ways', async () => {
      const first = await app.inject({ method: 'POST', url: '/todo/todo-1/toggle' });
      const second = await app.inject({ method: 'POST', url: '/todo/todo-1/toggle' });

      expect(first.headers['location']).toBe('/?notice=Todo+marked+as+completed%21');
      expect(second.headers['location']).toBe('/?notice=Todo+marked+as+active%21');
    });

    it('deletes', async () => {
      const response = await app.inject({ method: 'POST', url: '/todo/todo-1/delete' });

      expect(response.headers['location']).toBe('/?notice=Todo+deleted+successfully%21');
      expect(await store.listAll()).toEqual([]);
    });
  });

  describe('unknown ids', () => {
    it.each([
      ['GET', '/todo/missing'],
      ['GET', '/todo/missing/edit'],
      ['POST', '/todo/missing/toggle'],
      ['POST', '/todo/missing/delete'],
    ] as const)('%s %s redirects to the list with an error', async (method, url) => {
      const response = await app.inject({ method, url });

      expect(response.statusCode).toBe(302);
      expect(response.headers['location']).toBe('/?error=Todo+with+ID+missing+not+found');
    });

    it('redirects an edit of an unknown id', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/todo/missing/edit',
        headers: FORM,
        payload: 'title=x',
      });

      expect(response.headers['location']).toBe('/?error=Todo+with+ID+missing+not+found');
    });
  });

  it('renders an error page when the store fails', async () => {
    const broken = await buildWebApp({ store: brokenStore(), now: clock });

    const response = await broken.inject({ method: 'GET', url: '/' });
    await broken.close();

    expect(response.statusCode).toBe(500);
    expect(response.body).toContain('<div class="flash error">Failed to read todo data</div>');
  });

  it('answers unsupported bodies with their client status', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/todo/new',
      headers: { 'content-type': 'text/plain' },
      payload: 'title=Buy milk',
    });

    expect(response.statusCode).toBe(415);
    expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(await store.listAll()).toEqual([]);
  });

  it('builds flash locations', () => {
    expect(withFlash('/', {})).toBe('/');
    expect(withFlash('/', { error: 'a & b' })).toBe('/?error=a+%26+b');
  });
});
