/**
 * Tool System Types
 * Defines the interface for the todo tools shared by the MCP server, the REST
 * API and the agent loop
 */

import type { TodoStore } from '@todo/database';

/**
 * JSON Schema subset for tool parameter definitions
 */
export interface JSONSchemaProperty {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description?: string;
  enum?: string[];
  default?: unknown;
  format?: string;
  minLength?: number;
  maxLength?: number;
  /** Accept null as well as the declared type */
  nullable?: boolean;
  items?: JSONSchemaProperty;
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
}

export interface JSONSchema {
  type: 'object';
  properties: Record<string, JSONSchemaProperty>;
  required?: string[];
}

/**
 * What the model is told about a tool
 */
export interface ToolDefinition {
  /** Unique tool name (snake_case) */
  name: string;
  /** Human-readable description for the LLM */
  description: string;
  /** JSON Schema defining the parameters */
  parameters: JSONSchema;
}

/**
 * Tool definition interface
 */
export interface Tool extends ToolDefinition {
  /** Execute the tool with validated parameters */
  execute: (params: Record<string, unknown>, context: ToolContext) => Promise<ToolResult>;
}

/**
 * Context passed to tool execution
 */
export interface ToolContext {
  /** Todo store */
  store: TodoStore;
  /** Clock used for overdue checks */
  now: () => Date;
}

/**
 * Failure categories. The store's taxonomy plus the bridge's own failures.
 */
export type ToolErrorKind = 'validation' | 'not_found' | 'storage' | 'unknown_tool' | 'internal';

/**
 * Result from tool execution
 */
export type ToolResult<T = unknown> =
  | {
      success: true;
      /** Result data (tool-specific) */
      data: T;
    }
  | {
      success: false;
      /** Error message */
      error: string;
      errorKind: ToolErrorKind;
    };

/**
 * Tool call from LLM
 */
export interface ToolCall {
  name: string;
  parameters: Record<string, unknown>;
}

/**
 * Runs a named tool call. The agent loop only needs this, so it works the same
 * over local tools and over tools adapted from an MCP server.
 */
export type ToolRunner = (call: ToolCall) => Promise<ToolResult>;

/**
 * Message in the conversation
 */
export interface ConversationMessage {
  role: 'user' | 'assistant' | 'tool';
  content: string;
}

/**
 * Agent loop result
 */
export interface AgentResult {
  /** Final response text to show the user */
  response: string;

  /** Tool calls that were executed */
  toolCalls: Array<{
    tool: string;
    params: Record<string, unknown>;
    result: ToolResult;
  }>;

  /** This turn's messages: the user's, then tool calls and results, then the answer */
  messages: ConversationMessage[];

  /** Whether the agent completed successfully */
  success: boolean;

  /** Error message if failed */
  error?: string;
}

export function ok<T>(data: T): ToolResult<T> {
  return { success: true, data };
}

export function fail(errorKind: ToolErrorKind, error: string): ToolResult<never> {
  return { success: false, error, errorKind };
}
