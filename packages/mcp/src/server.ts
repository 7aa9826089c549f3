/**
 * MCP Server
 *
 * Exposes the todo tools, each todo as a resource, and the `todo_analysis`
 * prompt over the Model Context Protocol. The server is transport-agnostic:
 * apps/mcp-server connects it to stdio, tests to an in-memory pair.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
  type GetPromptResult,
  type Tool as McpTool,
} from '@modelcontextprotocol/sdk/types.js';
import { allTools, executeTool, type Tool, type ToolContext, type ToolErrorKind } from '@todo/ai';
import { isTodoError, type TodoStore } from '@todo/database';
import { analyzeTodos } from '@todo/insights';
import { toWireError } from './wire.js';

export const SERVER_NAME = 'todo-mcp';
export const SERVER_VERSION = '0.1.0';

export const TODO_URI_PREFIX = 'todo:///';
export const ANALYSIS_PROMPT = 'todo_analysis';

export interface TodoMcpServerOptions {
  store: TodoStore;
  /** Tools to expose (default: every registered tool) */
  tools?: Tool[];
  /** Clock, injectable for tests */
  now?: () => Date;
}

export function todoUri(id: string): string {
  return `${TODO_URI_PREFIX}${encodeURIComponent(id)}`;
}

/**
 * Todo id from a `todo:///<id>` URI, or null for any other URI
 */
export function parseTodoUri(uri: string): string | null {
  if (!uri.startsWith(TODO_URI_PREFIX)) return null;
  const encoded = uri.slice(TODO_URI_PREFIX.length);
  if (encoded === '') return null;
  try {
    return decodeURIComponent(encoded);
  } catch {
    return null;
  }
}

/**
 * Tool definition as advertised over MCP
 */
export function toMcpTool(tool: Tool): McpTool {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: {
      type: 'object',
      properties: tool.parameters.properties,
      required: tool.parameters.required,
    },
  };
}

function textResult(text: string, isError = false): CallToolResult {
  return isError
    ? { content: [{ type: 'text', text }], isError: true }
    : { content: [{ type: 'text', text }] };
}

function errorResult(kind: ToolErrorKind, message: string): CallToolResult {
  return textResult(JSON.stringify(toWireError(kind, message), null, 2), true);
}

/**
 * Run one tool call and shape the outcome for MCP
 */
export async function callTool(
  tools: Map<string, Tool>,
  name: string,
  args: Record<string, unknown> | undefined,
  context: ToolContext
): Promise<CallToolResult> {
  const tool = tools.get(name);
  if (!tool) {
    return errorResult('unknown_tool', `Unknown tool: ${name}`);
  }

  const result = await executeTool(tool, args ?? {}, context);
  if (!result.success) {
    return errorResult(result.errorKind, result.error);
  }
  return textResult(JSON.stringify(result.data, null, 2));
}

/**
 * Translate store failures into protocol errors for resources and prompts
 */
function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) return error;
  if (isTodoError(error)) {
    if (error.kind === 'storage') {
      console.error('[McpServer] Storage error:', error);
      return new McpError(ErrorCode.InternalError, error.message);
    }
    return new McpError(ErrorCode.InvalidParams, error.message);
  }
  console.error('[McpServer] Unexpected error:', error);
  return new McpError(
    ErrorCode.InternalError,
    error instanceof Error ? error.message : 'Unknown error'
  );
}

export function buildAnalysisPrompt(store: TodoStore, now: () => Date) {
  return async (): Promise<GetPromptResult> => {
    const analysis = analyzeTodos(await store.listAll(), now());
    return {
      description: 'Summary of the todo list with a request for next steps',
      messages: [
        {
          role: 'user',
          content: {
            type: 'text',
            text: `${analysis.text}\n\nBased on this, what should I focus on next? Suggest a few concrete next steps.`,
          },
        },
      ],
    };
  };
}

/**
 * Create the todo MCP server
 */
export function createTodoMcpServer(options: TodoMcpServerOptions): Server {
  const { store } = options;
  const now = options.now ?? (() => new Date());
  const tools = new Map((options.tools ?? allTools).map((tool) => [tool.name, tool]));
  const context: ToolContext = { store, now };
  const analysisPrompt = buildAnalysisPrompt(store, now);

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: Array.from(tools.values(), toMcpTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(tools, name, args, context);
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    try {
      const todos = await store.listAll();
      return {
        resources: todos.map((todo) => ({
          uri: todoUri(todo.id),
          name: todo.title,
          mimeType: 'application/json',
          ...(todo.description ? { description: todo.description } : {}),
        })),
      };
    } catch (error) {
      throw toMcpError(error);
    }
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const id = parseTodoUri(uri);
    if (id === null) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`);
    }

    try {
      const todo = await store.get(id);
      return {
        contents: [
          {
            uri,
            mimeType: 'application/json',
            text: JSON.stringify(todo, null, 2),
          },
        ],
      };
    } catch (error) {
      throw toMcpError(error);
    }
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: [
      {
        name: ANALYSIS_PROMPT,
        description: 'Analyze the todo list and ask for suggested next steps',
      },
    ],
  }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    if (request.params.name !== ANALYSIS_PROMPT) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown prompt: ${request.params.name}`);
    }
    try {
      return await analysisPrompt();
    } catch (error) {
      throw toMcpError(error);
    }
  });

  return server;
}
