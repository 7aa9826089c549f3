/**
 * MCP Tool Adapter
 *
 * Adapts MCP tools to the tool definitions used by the agent loop, so the chat
 * CLI drives the todo server exactly like local tools.
 */

import type { JSONSchemaProperty, ToolDefinition, ToolResult, ToolRunner } from '@todo/ai';
import { fail, ok, validateParams } from '@todo/ai';
import type { MCPTool } from './types.js';
import { extractText, type TodoMcpClient } from './client.js';
import { isErrorRecord, kindFromTitle } from './wire.js';

/**
 * Tool that runs on the MCP server. It needs no local context.
 */
export interface RemoteTool extends ToolDefinition {
  execute: (params: Record<string, unknown>) => Promise<ToolResult>;
}

/**
 * Options for creating MCP tool adapters
 */
export interface MCPToolAdapterOptions {
  /** Connected client used for tool execution */
  client: TodoMcpClient;
  /** Prefix to add to tool names (to avoid conflicts) */
  namePrefix?: string;
}

const SCHEMA_TYPES = ['string', 'number', 'boolean', 'array', 'object'] as const;
type SchemaType = (typeof SCHEMA_TYPES)[number];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSchemaType(value: unknown): SchemaType {
  if (value === 'integer') return 'number';
  return SCHEMA_TYPES.find((type) => type === value) ?? 'string';
}

function toStringArray(value: unknown): string[] | undefined {
  return Array.isArray(value) ? value.map(String) : undefined;
}

/**
 * Convert an MCP schema property to internal format
 */
export function convertSchemaProperty(prop: unknown): JSONSchemaProperty {
  if (!isRecord(prop)) {
    return { type: 'string' };
  }

  const result: JSONSchemaProperty = { type: toSchemaType(prop['type']) };

  if (typeof prop['description'] === 'string') result.description = prop['description'];
  if (typeof prop['format'] === 'string') result.format = prop['format'];
  if (typeof prop['minLength'] === 'number') result.minLength = prop['minLength'];
  if (typeof prop['maxLength'] === 'number') result.maxLength = prop['maxLength'];
  if (prop['nullable'] === true) result.nullable = true;
  if (prop['default'] !== undefined) result.default = prop['default'];

  const enumValues = toStringArray(prop['enum']);
  if (enumValues) result.enum = enumValues;

  const required = toStringArray(prop['required']);
  if (required) result.required = required;

  if (prop['items'] !== undefined) {
    result.items = convertSchemaProperty(prop['items']);
  }

  const properties = prop['properties'];
  if (isRecord(properties)) {
    result.properties = Object.fromEntries(
      Object.entries(properties).map(([key, value]) => [key, convertSchemaProperty(value)])
    );
  }

  return result;
}

/**
 * Interpret a tool result: the legacy error record becomes a tagged failure,
 * JSON text becomes data
 */
export function toToolResult(text: string, isError: boolean): ToolResult {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    data = text;
  }

  if (isErrorRecord(data)) {
    return fail(kindFromTitle(data.title), data.description);
  }
  if (isError) {
    return fail('internal', text || 'Unknown MCP tool error');
  }
  return ok(data);
}

/**
 * Convert an MCP tool to internal tool format
 */
function convertMCPToolToInternal(mcpTool: MCPTool, options: MCPToolAdapterOptions): RemoteTool {
  const { client, namePrefix = '' } = options;

  const properties: Record<string, JSONSchemaProperty> = {};
  for (const [key, value] of Object.entries(mcpTool.inputSchema.properties ?? {})) {
    properties[key] = convertSchemaProperty(value);
  }

  return {
    name: namePrefix + mcpTool.name,
    description: mcpTool.description ?? mcpTool.name,
    parameters: {
      type: 'object',
      properties,
      required: toStringArray(mcpTool.inputSchema['required']),
    },
    execute: async (params): Promise<ToolResult> => {
      const result = await client.callTool(mcpTool.name, params);
      return toToolResult(extractText(result), result.isError === true);
    },
  };
}

/**
 * Create internal tools from all tools the client has discovered
 */
export function createMcpToolAdapters(options: MCPToolAdapterOptions): RemoteTool[] {
  return options.client.listTools().map((tool) => convertMCPToolToInternal(tool, options));
}

/**
 * Tool runner over adapted MCP tools. Parameters are checked against the
 * advertised schema first; transport failures become `internal` results.
 */
export function createMcpToolRunner(tools: RemoteTool[]): ToolRunner {
  const byName = new Map(tools.map((tool) => [tool.name, tool]));

  return async (call) => {
    const tool = byName.get(call.name);
    if (!tool) {
      return fail('unknown_tool', `Unknown tool: ${call.name}`);
    }

    const validation = validateParams(call.parameters, tool);
    if (!validation.valid) {
      return fail('validation', validation.error);
    }

    try {
      return await tool.execute(validation.params);
    } catch (error) {
      console.error(`[McpToolRunner] Error calling ${call.name}:`, error);
      return fail('internal', error instanceof Error ? error.message : 'Unknown error');
    }
  };
}
