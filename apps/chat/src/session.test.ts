import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { fail, ok, type TextGenerator } from '@todo/ai';
import { JsonTodoStore } from '@todo/database';
import { TodoMcpClient, createTodoMcpServer } from '@todo/mcp';
import { ChatSession, describeToolCall } from './session.js';

const clock = () => new Date('2025-03-07T12:00:00.000Z');

function scriptedModel(replies: string[]): TextGenerator {
  return {
    generate: async () => {
      const reply = replies.shift();
      if (reply === undefined) throw new Error('no scripted reply left');
      return reply;
    },
  };
}

describe('ChatSession', () => {
  let dir: string;
  let store: JsonTodoStore;
  let server: Server;
  let mcp: TodoMcpClient;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'todo-chat-'));
    let nextId = 0;
    store = new JsonTodoStore({
      filePath: path.join(dir, 'todos.json'),
      now: clock,
      generateId: () => `todo-${++nextId}`,
    });
    server = createTodoMcpServer({ store, now: clock });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    mcp = new TodoMcpClient({ transport: clientTransport });
    await mcp.connect();
  });

  afterEach(async () => {
    await mcp.disconnect();
    await server.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('drives the server tools and keeps the history', async () => {
    const session = new ChatSession({
      mcp,
      now: clock,
      model: scriptedModel([
        '{"tool_calls":[{"name":"create_todo","parameters":{"title":"Buy milk"}}]}',
        'Added "Buy milk".',
        'You have one todo.',
      ]),
    });

    const first = await session.ask('remember to buy milk');

    expect(first).toMatchObject({ success: true, response: 'Added "Buy milk".' });
    expect(first.toolCalls).toMatchObject([
      { tool: 'create_todo', params: { title: 'Buy milk' }, result: { success: true } },
    ]);
    expect(await store.listAll()).toMatchObject([{ title: 'Buy milk' }]);
    expect(session.messages.map((m) => m.role)).toEqual(['user', 'assistant', 'tool', 'assistant']);

    await session.ask('how many do I have?');
    expect(session.messages).toHaveLength(6);

    session.clear();
    expect(session.messages).toEqual([]);
  });

  it('exposes every server tool', () => {
    const session = new ChatSession({ mcp, model: scriptedModel([]) });

    expect(session.tools.map((t) => t.name)).toContain('get_todo_analysis');
  });

  it('reads the analysis prompt text', async () => {
    const session = new ChatSession({ mcp, model: scriptedModel([]) });

    expect(await session.analysis()).toBe(
      'You have no todos yet.\n' +
        'Recommendation: Add your first todo to get started.\n' +
        '\n' +
        'Based on this, what should I focus on next? Suggest a few concrete next steps.'
    );
  });
});

describe('describeToolCall', () => {
  it('shows failures', () => {
    const call = { tool: 'get_todo', params: { id: 'x' }, result: fail('not_found', 'Todo with ID x not found') };

    expect(describeToolCall(call)).toBe('→ get_todo({"id":"x"})\n  ✗ Todo with ID x not found');
  });

  it('shortens long results', () => {
    const call = { tool: 'list_todos', params: {}, result: ok('a'.repeat(300)) };
    const [, second] = describeToolCall(call).split('\n');

    expect(second).toBe(`  ✓ "${'a'.repeat(196)}...`);
  });
});
