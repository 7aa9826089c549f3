import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { JsonTodoStore } from './json-store.js';
import { NotFoundError, StoreIOError, ValidationError } from './errors.js';

describe('JsonTodoStore', () => {
  let dir: string;
  let filePath: string;
  let clock: Date;
  let nextId: number;

  const createStore = (overrides: { samplePath?: string; generateId?: () => string } = {}) =>
    new JsonTodoStore({
      filePath,
      now: () => clock,
      generateId: () => `todo-${++nextId}`,
      ...overrides,
    });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'todo-store-'));
    filePath = path.join(dir, 'data', 'todos.json');
    clock = new Date('2025-03-07T12:00:00.000Z');
    nextId = 0;
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('initialization', () => {
    it('creates an empty data file when none exists', async () => {
      const store = createStore();

      expect(await store.listAll()).toEqual([]);
      expect(JSON.parse(await fs.readFile(filePath, 'utf-8'))).toEqual([]);
    });

    it('seeds a missing data file from the sample file', async () => {
      const samplePath = path.join(dir, 'sample.json');
      const sample = [
        {
          id: 'sample-1',
          title: 'From the sample',
          description: '',
          completed: false,
          due_date: null,
          created_at: '2025-01-01T00:00:00.000Z',
          updated_at: '2025-01-01T00:00:00.000Z',
        },
      ];
      await fs.writeFile(samplePath, JSON.stringify(sample));

      const store = createStore({ samplePath });

      expect(await store.listAll()).toEqual(sample);
      expect(JSON.parse(await fs.readFile(filePath, 'utf-8'))).toEqual(sample);
    });

    it('starts empty when the sample file is missing too', async () => {
      const store = createStore({ samplePath: path.join(dir, 'missing.json') });
      expect(await store.listAll()).toEqual([]);
    });

    it('reads the legacy layout keyed by id', async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(
        filePath,
        JSON.stringify({
          abc: {
            id: 'abc',
            title: 'Legacy',
            description: 'old format',
            completed: true,
            created_at: '2025-01-01T00:00:00.000Z',
            updated_at: '2025-01-02T00:00:00.000Z',
          },
        })
      );

      const [todo] = await createStore().listAll();

      expect(todo).toEqual({
        id: 'abc',
        title: 'Legacy',
        description: 'old format',
        completed: true,
        due_date: null,
        created_at: '2025-01-01T00:00:00.000Z',
        updated_at: '2025-01-02T00:00:00.000Z',
      });
    });

    it('normalizes due dates written without an offset', async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(
        filePath,
        JSON.stringify([
          {
            id: 'abc',
            title: 'Older file',
            description: '',
            completed: false,
            due_date: '2025-03-07T00:00:00',
            created_at: '2025-01-01T00:00:00.000Z',
            updated_at: '2025-01-01T00:00:00.000Z',
          },
          {
            id: 'def',
            title: 'Microseconds',
            description: '',
            completed: false,
            due_date: '2025-03-08T09:15:00.123456',
            created_at: '2025-01-01T00:00:00.000Z',
            updated_at: '2025-01-01T00:00:00.000Z',
          },
        ])
      );

      const todos = await createStore().listAll();

      expect(todos.map((t) => t.due_date)).toEqual([
        '2025-03-07T00:00:00.000Z',
        '2025-03-08T09:15:00.123Z',
      ]);
    });

    it('raises StoreIOError for invalid JSON and leaves the file alone', async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, '{ not json');

      await expect(createStore().listAll()).rejects.toBeInstanceOf(StoreIOError);
      expect(await fs.readFile(filePath, 'utf-8')).toBe('{ not json');
    });

    it('raises StoreIOError for records that are not todos', async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify([{ id: 1, title: 'bad' }]));

      await expect(createStore().listAll()).rejects.toThrow(
        `${filePath} has an invalid todo record at position 0`
      );
    });
  });

  describe('create', () => {
    it('assigns an id, defaults and equal timestamps', async () => {
      const todo = await createStore().create({ title: 'X' });

      expect(todo).toEqual({
        id: 'todo-1',
        title: 'X',
        description: '',
        completed: false,
        due_date: null,
        created_at: '2025-03-07T12:00:00.000Z',
        updated_at: '2025-03-07T12:00:00.000Z',
      });
    });

    it('round-trips through get', async () => {
      const store = createStore();
      const created = await store.create({ title: 'X' });

      const fetched = await store.get(created.id);

      expect(fetched.title).toBe('X');
      expect(fetched.description).toBe('');
      expect(fetched.completed).toBe(false);
      expect(fetched.due_date).toBeNull();
    });

    it('accepts titles of length 1 and 100', async () => {
      const store = createStore();

      await expect(store.create({ title: 'a' })).resolves.toMatchObject({ title: 'a' });
      await expect(store.create({ title: 'b'.repeat(100) })).resolves.toMatchObject({
        title: 'b'.repeat(100),
      });
    });

    it('rejects titles of length 0 and 101', async () => {
      const store = createStore();

      await expect(store.create({ title: '' })).rejects.toBeInstanceOf(ValidationError);
      await expect(store.create({ title: 'c'.repeat(101) })).rejects.toBeInstanceOf(ValidationError);
      expect(await store.listAll()).toEqual([]);
    });

    it('counts characters outside the BMP once', async () => {
      const store = createStore();
      const emoji = '\u{1F600}';

      await expect(store.create({ title: emoji.repeat(100) })).resolves.toMatchObject({
        title: emoji.repeat(100),
      });
      await expect(store.create({ title: emoji.repeat(101) })).rejects.toMatchObject({
        kind: 'validation',
        field: 'title',
      });
      await expect(
        store.create({ title: 'ok', description: emoji.repeat(500) })
      ).resolves.toBeDefined();
    });

    it('rejects descriptions over 500 characters', async () => {
      const store = createStore();

      await expect(store.create({ title: 'ok', description: 'd'.repeat(500) })).resolves.toBeDefined();
      await expect(
        store.create({ title: 'ok', description: 'd'.repeat(501) })
      ).rejects.toMatchObject({ kind: 'validation', field: 'description' });
    });

    it('normalizes the due date', async () => {
      const todo = await createStore().create({ title: 'Pay rent', due_date: '2025-04-01' });
      expect(todo.due_date).toBe('2025-04-01T00:00:00.000Z');
    });

    it('rejects an unparseable due date', async () => {
      await expect(
        createStore().create({ title: 'Pay rent', due_date: 'next week' })
      ).rejects.toMatchObject({ kind: 'validation', field: 'due_date' });
    });

    it('keeps ids unique when the generator repeats itself', async () => {
      const ids = ['dup', 'dup', 'fresh'];
      const store = createStore({ generateId: () => ids.shift() ?? 'spare' });

      const first = await store.create({ title: 'one' });
      const second = await store.create({ title: 'two' });

      expect(first.id).toBe('dup');
      expect(second.id).toBe('fresh');
    });

    it('persists every create when calls overlap', async () => {
      const store = createStore();

      const created = await Promise.all(
        Array.from({ length: 10 }, (_, i) => store.create({ title: `Task ${i}` }))
      );

      expect(new Set(created.map((t) => t.id)).size).toBe(10);
      const onDisk = JSON.parse(await fs.readFile(filePath, 'utf-8')) as unknown[];
      expect(onDisk).toHaveLength(10);
    });
  });

  describe('get', () => {
    it('fails with NotFoundError for an unknown id', async () => {
      const store = createStore();

      await expect(store.get('missing')).rejects.toBeInstanceOf(NotFoundError);
      await expect(store.get('missing')).rejects.toThrow('Todo with ID missing not found');
    });
  });

  describe('update', () => {
    it('applies only the given fields and moves updated_at forward', async () => {
      const store = createStore();
      const created = await store.create({ title: 'Write report', description: 'Q1 numbers' });

      const updated = await store.update(created.id, { completed: true });

      expect(updated.title).toBe('Write report');
      expect(updated.description).toBe('Q1 numbers');
      expect(updated.completed).toBe(true);
      expect(updated.created_at).toBe(created.created_at);
      // Clock has not moved, so the store steps one millisecond
      expect(updated.updated_at).toBe('2025-03-07T12:00:00.001Z');
    });

    it('uses the clock when it has moved on', async () => {
      const store = createStore();
      const created = await store.create({ title: 'Write report' });
      clock = new Date('2025-03-08T08:00:00.000Z');

      const updated = await store.update(created.id, { title: 'Write the report' });

      expect(updated.updated_at).toBe('2025-03-08T08:00:00.000Z');
    });

    it('clears the due date with null', async () => {
      const store = createStore();
      const created = await store.create({ title: 'Dentist', due_date: '2025-03-10' });

      const updated = await store.update(created.id, { due_date: null });

      expect(updated.due_date).toBeNull();
    });

    it('re-validates changed fields', async () => {
      const store = createStore();
      const created = await store.create({ title: 'Keep me' });

      await expect(store.update(created.id, { title: '' })).rejects.toBeInstanceOf(ValidationError);
      expect((await store.get(created.id)).title).toBe('Keep me');
    });

    it('fails with NotFoundError for an unknown id', async () => {
      await expect(createStore().update('missing', { title: 'x' })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('toggle', () => {
    it('flips completed back and forth', async () => {
      const store = createStore();
      const created = await store.create({ title: 'Water plants' });

      const once = await store.toggle(created.id);
      const twice = await store.toggle(created.id);

      expect(once.completed).toBe(true);
      expect(twice.completed).toBe(false);
      expect(once.updated_at).toBe('2025-03-07T12:00:00.001Z');
      expect(twice.updated_at).toBe('2025-03-07T12:00:00.002Z');
    });
  });

  describe('delete', () => {
    it('removes the todo', async () => {
      const store = createStore();
      const keep = await store.create({ title: 'keep' });
      const drop = await store.create({ title: 'drop' });

      await store.delete(drop.id);

      expect((await store.listAll()).map((t) => t.id)).toEqual([keep.id]);
    });

    it('fails with NotFoundError for an unknown id', async () => {
      await expect(createStore().delete('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('persistence', () => {
    it('is visible to a second store on the same file', async () => {
      await createStore().create({ title: 'Shared' });

      const other = new JsonTodoStore({ filePath });

      expect((await other.listAll()).map((t) => t.title)).toEqual(['Shared']);
    });

    it('leaves no temp files behind', async () => {
      const store = createStore();
      const todo = await store.create({ title: 'one' });
      await store.toggle(todo.id);

      expect(await fs.readdir(path.dirname(filePath))).toEqual(['todos.json']);
    });
  });
});
