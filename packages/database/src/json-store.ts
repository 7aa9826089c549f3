import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { isTodoRecord, normalizeDueDate, type Todo, type TodoCreateInput, type TodoUpdateInput } from '@todo/shared-types';
import { NotFoundError, StoreIOError } from './errors.js';
import {
  validateTitle,
  validateDescription,
  validateCompleted,
  validateDueDate,
} from './validation.js';

/**
 * Todo store contract shared by every transport
 */
export interface TodoStore {
  /** All todos, insertion order */
  listAll(): Promise<Todo[]>;
  /** @throws NotFoundError */
  get(id: string): Promise<Todo>;
  /** @throws ValidationError */
  create(input: TodoCreateInput): Promise<Todo>;
  /** @throws NotFoundError | ValidationError */
  update(id: string, changes: TodoUpdateInput): Promise<Todo>;
  /** @throws NotFoundError */
  delete(id: string): Promise<void>;
  /** @throws NotFoundError */
  toggle(id: string): Promise<Todo>;
}

export interface JsonTodoStoreOptions {
  /** JSON data file (an array of todos) */
  filePath: string;
  /** Copied into place when the data file does not exist yet */
  samplePath?: string;
  /** Clock, injectable for tests */
  now?: () => Date;
  /** Id generator, injectable for tests */
  generateId?: () => string;
}

/**
 * JSON file backed todo store
 *
 * Every call reads the whole file into memory and every mutation rewrites it in
 * full (temp file + rename). Calls made through one instance run one at a time,
 * in arrival order. Separate processes sharing the file are last-writer-wins.
 */
export class JsonTodoStore implements TodoStore {
  private readonly filePath: string;
  private readonly samplePath: string | null;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: JsonTodoStoreOptions) {
    this.filePath = options.filePath;
    this.samplePath = options.samplePath ?? null;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Path of the backing file
   */
  get location(): string {
    return this.filePath;
  }

  listAll(): Promise<Todo[]> {
    return this.enqueue(() => this.load());
  }

  get(id: string): Promise<Todo> {
    return this.enqueue(async () => {
      const todos = await this.load();
      const todo = todos.find((t) => t.id === id);
      if (!todo) {
        throw new NotFoundError(id);
      }
      return todo;
    });
  }

  create(input: TodoCreateInput): Promise<Todo> {
    return this.enqueue(async () => {
      const title = validateTitle(input.title);
      const description = validateDescription(input.description);
      const completed = validateCompleted(input.completed);
      const dueDate = validateDueDate(input.due_date);

      const todos = await this.load();

      let id = this.generateId();
      while (todos.some((t) => t.id === id)) {
        id = this.generateId();
      }

      const timestamp = this.now().toISOString();
      const todo: Todo = {
        id,
        title,
        description,
        completed,
        due_date: dueDate,
        created_at: timestamp,
        updated_at: timestamp,
      };

      todos.push(todo);
      await this.save(todos);
      return todo;
    });
  }

  update(id: string, changes: TodoUpdateInput): Promise<Todo> {
    return this.enqueue(async () => {
      const todos = await this.load();
      const { index, todo: current } = this.locate(todos, id);

      const next: Todo = { ...current };
      if (changes.title !== undefined) {
        next.title = validateTitle(changes.title);
      }
      if (changes.description !== undefined) {
        next.description = validateDescription(changes.description);
      }
      if (changes.completed !== undefined) {
        next.completed = validateCompleted(changes.completed);
      }
      if (changes.due_date !== undefined) {
        next.due_date = validateDueDate(changes.due_date);
      }
      next.updated_at = this.nextTimestamp(current.updated_at);

      todos[index] = next;
      await this.save(todos);
      return next;
    });
  }

  delete(id: string): Promise<void> {
    return this.enqueue(async () => {
      const todos = await this.load();
      const { index } = this.locate(todos, id);
      todos.splice(index, 1);
      await this.save(todos);
    });
  }

  toggle(id: string): Promise<Todo> {
    return this.enqueue(async () => {
      const todos = await this.load();
      const { index, todo: current } = this.locate(todos, id);

      const next: Todo = {
        ...current,
        completed: !current.completed,
        updated_at: this.nextTimestamp(current.updated_at),
      };

      todos[index] = next;
      await this.save(todos);
      return next;
    });
  }

  /**
   * Chain an operation behind everything already queued on this instance.
   * A failed operation rejects its own promise but does not stall the queue.
   */
  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(operation, operation);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private locate(todos: Todo[], id: string): { index: number; todo: Todo } {
    const index = todos.findIndex((t) => t.id === id);
    const todo = todos[index];
    if (index === -1 || !todo) {
      throw new NotFoundError(id);
    }
    return { index, todo };
  }

  /**
   * updated_at must move strictly forward, even within the same millisecond
   */
  private nextTimestamp(previous: string): string {
    const now = this.now().getTime();
    const last = Date.parse(previous);
    const next = Number.isNaN(last) ? now : Math.max(now, last + 1);
    return new Date(next).toISOString();
  }

  private async load(): Promise<Todo[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return this.seed();
      }
      throw new StoreIOError(this.filePath, `Failed to read todo data from ${this.filePath}`, {
        cause: error,
      });
    }

    return parseTodos(raw, this.filePath);
  }

  /**
   * Create the data file from the sample file, or empty when there is none
   */
  private async seed(): Promise<Todo[]> {
    let todos: Todo[] = [];

    if (this.samplePath) {
      try {
        const sample = await fs.readFile(this.samplePath, 'utf-8');
        todos = parseTodos(sample, this.samplePath);
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error instanceof StoreIOError
            ? error
            : new StoreIOError(this.samplePath, `Failed to read sample data from ${this.samplePath}`, {
                cause: error,
              });
        }
      }
    }

    await this.save(todos);
    return todos;
  }

  private async save(todos: Todo[]): Promise<void> {
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, `${JSON.stringify(todos, null, 2)}\n`, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new StoreIOError(this.filePath, `Failed to write todo data to ${this.filePath}`, {
        cause: error,
      });
    }
  }
}

/**
 * Parse the data file. Accepts the array layout and the legacy object layout
 * (records keyed by id). Records missing `description` or `due_date` get defaults.
 */
export function parseTodos(raw: string, filePath: string): Todo[] {
  if (raw.trim() === '') {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StoreIOError(filePath, `${filePath} does not contain valid JSON`, { cause: error });
  }

  let records: unknown[];
  if (Array.isArray(parsed)) {
    records = parsed;
  } else if (typeof parsed === 'object' && parsed !== null) {
    records = Object.values(parsed);
  } else {
    throw new StoreIOError(filePath, `${filePath} must contain a JSON array of todos`);
  }

  return records.map((record, index) => {
    const withDefaults = applyDefaults(record);
    if (!isTodoRecord(withDefaults)) {
      throw new StoreIOError(filePath, `${filePath} has an invalid todo record at position ${index}`);
    }
    return withDefaults;
  });
}

/**
 * Fill in missing optional fields and bring due dates written by older
 * versions (no offset, extra precision) to the normalized form
 */
function applyDefaults(record: unknown): unknown {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    return record;
  }
  const withDefaults = { description: '', due_date: null, ...record };
  const dueDate: unknown = withDefaults.due_date;
  if (typeof dueDate === 'string') {
    return { ...withDefaults, due_date: normalizeDueDate(dueDate) ?? dueDate };
  }
  return withDefaults;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
