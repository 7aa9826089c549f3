/**
 * Todo Tools
 * List, read, create, update, delete and toggle todos
 *
 * Parameters reach `execute` already validated against the schema; the store
 * validates again before it writes anything.
 */

import {
  TITLE_MIN_LENGTH,
  TITLE_MAX_LENGTH,
  DESCRIPTION_MAX_LENGTH,
  type TodoUpdateInput,
} from '@todo/shared-types';
import type { JSONSchemaProperty, Tool, ToolResult } from './types.js';
import { ok } from './types.js';

const idProperty: JSONSchemaProperty = {
  type: 'string',
  description: 'ID of the todo',
  minLength: 1,
};

const titleProperty: JSONSchemaProperty = {
  type: 'string',
  description: `Title of the todo item (${TITLE_MIN_LENGTH}-${TITLE_MAX_LENGTH} characters)`,
  minLength: TITLE_MIN_LENGTH,
  maxLength: TITLE_MAX_LENGTH,
};

const descriptionProperty: JSONSchemaProperty = {
  type: 'string',
  description: `Detailed description of the todo item (at most ${DESCRIPTION_MAX_LENGTH} characters)`,
  maxLength: DESCRIPTION_MAX_LENGTH,
};

const completedProperty: JSONSchemaProperty = {
  type: 'boolean',
  description: 'Whether the todo is completed',
};

const dueDateProperty: JSONSchemaProperty = {
  type: 'string',
  description: 'Due date in ISO format (YYYY-MM-DD or a full ISO 8601 timestamp)',
  format: 'date',
  nullable: true,
};

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

/** undefined = leave alone, null = clear */
function optionalDueDate(value: unknown): string | null | undefined {
  if (value === null) return null;
  return typeof value === 'string' ? value : undefined;
}

function requireId(params: Record<string, unknown>): string {
  // Presence and type are guaranteed by the schema's `required` list
  return String(params['id']);
}

export const listTodos: Tool = {
  name: 'list_todos',
  description: 'List all todos in the system, in the order they were created.',
  parameters: {
    type: 'object',
    properties: {},
    required: [],
  },
  execute: async (_params, context): Promise<ToolResult> => {
    return ok(await context.store.listAll());
  },
};

export const getTodo: Tool = {
  name: 'get_todo',
  description: 'Get a specific todo by its ID.',
  parameters: {
    type: 'object',
    properties: {
      id: idProperty,
    },
    required: ['id'],
  },
  execute: async (params, context): Promise<ToolResult> => {
    return ok(await context.store.get(requireId(params)));
  },
};

export const createTodo: Tool = {
  name: 'create_todo',
  description:
    'Create a new todo item. Use this whenever the user mentions something they need to do.',
  parameters: {
    type: 'object',
    properties: {
      title: titleProperty,
      description: descriptionProperty,
      completed: completedProperty,
      due_date: dueDateProperty,
    },
    required: ['title'],
  },
  execute: async (params, context): Promise<ToolResult> => {
    const todo = await context.store.create({
      title: String(params['title']),
      description: optionalString(params['description']),
      completed: optionalBoolean(params['completed']),
      due_date: optionalDueDate(params['due_date']),
    });
    return ok(todo);
  },
};

export const updateTodo: Tool = {
  name: 'update_todo',
  description:
    'Update an existing todo item. Only the fields given in "changes" are modified; set due_date to null to clear it.',
  parameters: {
    type: 'object',
    properties: {
      id: idProperty,
      changes: {
        type: 'object',
        description: 'Fields to change',
        properties: {
          title: titleProperty,
          description: descriptionProperty,
          completed: completedProperty,
          due_date: dueDateProperty,
        },
      },
    },
    required: ['id'],
  },
  execute: async (params, context): Promise<ToolResult> => {
    const raw = params['changes'];
    const changes: TodoUpdateInput = {};

    if (typeof raw === 'object' && raw !== null) {
      const title = optionalString(Reflect.get(raw, 'title'));
      const description = optionalString(Reflect.get(raw, 'description'));
      const completed = optionalBoolean(Reflect.get(raw, 'completed'));
      const dueDate = optionalDueDate(Reflect.get(raw, 'due_date'));

      if (title !== undefined) changes.title = title;
      if (description !== undefined) changes.description = description;
      if (completed !== undefined) changes.completed = completed;
      if (dueDate !== undefined) changes.due_date = dueDate;
    }

    return ok(await context.store.update(requireId(params), changes));
  },
};

export const deleteTodo: Tool = {
  name: 'delete_todo',
  description: 'Delete a todo by ID. This cannot be undone.',
  parameters: {
    type: 'object',
    properties: {
      id: idProperty,
    },
    required: ['id'],
  },
  execute: async (params, context): Promise<ToolResult> => {
    const id = requireId(params);
    await context.store.delete(id);
    return ok({ ok: true, id });
  },
};

export const toggleTodo: Tool = {
  name: 'toggle_todo',
  description: 'Flip a todo between completed and not completed.',
  parameters: {
    type: 'object',
    properties: {
      id: idProperty,
    },
    required: ['id'],
  },
  execute: async (params, context): Promise<ToolResult> => {
    return ok(await context.store.toggle(requireId(params)));
  },
};
