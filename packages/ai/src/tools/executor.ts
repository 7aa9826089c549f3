/**
 * Tool Executor
 * Safely executes tools with validation and error handling
 *
 * Nothing thrown by a tool escapes this module: store errors keep their kind,
 * anything else becomes an `internal` failure.
 */

import { isTodoError } from '@todo/database';
import { characterLength } from '@todo/shared-types';
import type {
  JSONSchema,
  JSONSchemaProperty,
  Tool,
  ToolCall,
  ToolContext,
  ToolDefinition,
  ToolResult,
} from './types.js';
import { fail } from './types.js';

export type Validation =
  | { valid: true; params: Record<string, unknown> }
  | { valid: false; error: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate one value against its property schema.
 * Returns the value to pass on (numeric strings become numbers) or an error.
 */
function validateValue(
  key: string,
  value: unknown,
  schema: JSONSchemaProperty
): { ok: true; value: unknown } | { ok: false; error: string } {
  const valueType = Array.isArray(value) ? 'array' : typeof value;

  if (schema.type !== valueType) {
    // Allow string numbers
    if (schema.type === 'number' && typeof value === 'string' && value.trim() !== '') {
      const num = Number(value);
      if (!isNaN(num)) return { ok: true, value: num };
    }
    return { ok: false, error: `Parameter '${key}' should be ${schema.type}, got ${valueType}` };
  }

  if (typeof value === 'string') {
    const length = characterLength(value);
    if (schema.enum && !schema.enum.includes(value)) {
      return {
        ok: false,
        error: `Parameter '${key}' must be one of: ${schema.enum.join(', ')}`,
      };
    }
    if (schema.minLength !== undefined && length < schema.minLength) {
      return {
        ok: false,
        error: `Parameter '${key}' must be at least ${schema.minLength} characters`,
      };
    }
    if (schema.maxLength !== undefined && length > schema.maxLength) {
      return {
        ok: false,
        error: `Parameter '${key}' must be at most ${schema.maxLength} characters`,
      };
    }
  }

  if (isPlainObject(value) && schema.properties) {
    const nested = validateObject(value, {
      type: 'object',
      properties: schema.properties,
      required: schema.required,
    }, `${key}.`);
    return nested.valid ? { ok: true, value: nested.params } : { ok: false, error: nested.error };
  }

  if (Array.isArray(value) && schema.items) {
    const items: unknown[] = [];
    for (const [index, item] of value.entries()) {
      const checked = validateValue(`${key}[${index}]`, item, schema.items);
      if (!checked.ok) return checked;
      items.push(checked.value);
    }
    return { ok: true, value: items };
  }

  return { ok: true, value };
}

function validateObject(
  params: Record<string, unknown>,
  schema: JSONSchema,
  prefix = ''
): Validation {
  // Check required fields
  for (const field of schema.required ?? []) {
    if (params[field] === undefined || params[field] === null) {
      return { valid: false, error: `Missing required parameter: ${prefix}${field}` };
    }
  }

  const cleaned: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(params)) {
    const propSchema = schema.properties[key];
    if (!propSchema) {
      // Allow extra properties (LLM might add reasoning, etc.)
      continue;
    }

    if (value === undefined) {
      continue;
    }

    if (value === null) {
      // Models send null for "not given"; only nullable fields keep it
      if (propSchema.nullable) cleaned[key] = null;
      continue;
    }

    const checked = validateValue(`${prefix}${key}`, value, propSchema);
    if (!checked.ok) {
      return { valid: false, error: checked.error };
    }
    cleaned[key] = checked.value;
  }

  return { valid: true, params: cleaned };
}

/**
 * Validate parameters against a tool's JSON schema
 */
export function validateParams(params: unknown, tool: ToolDefinition): Validation {
  if (params === undefined || params === null) {
    return validateObject({}, tool.parameters);
  }
  if (!isPlainObject(params)) {
    return { valid: false, error: 'Parameters must be an object' };
  }
  return validateObject(params, tool.parameters);
}

/**
 * Execute a single tool call
 */
export async function executeTool(
  tool: Tool,
  params: unknown,
  context: ToolContext
): Promise<ToolResult> {
  // Validate parameters
  const validation = validateParams(params, tool);
  if (!validation.valid) {
    return fail('validation', validation.error);
  }

  try {
    return await tool.execute(validation.params, context);
  } catch (error) {
    if (isTodoError(error)) {
      if (error.kind === 'storage') {
        console.error(`[ToolExecutor] Storage error in ${tool.name}:`, error);
      }
      return fail(error.kind, error.message);
    }

    console.error(`[ToolExecutor] Error executing ${tool.name}:`, error);
    return fail('internal', error instanceof Error ? error.message : 'Unknown error');
  }
}

/**
 * Execute multiple tool calls in sequence
 */
export async function executeToolCalls(
  toolCalls: ToolCall[],
  tools: Map<string, Tool>,
  context: ToolContext
): Promise<Array<{ call: ToolCall; result: ToolResult }>> {
  const results: Array<{ call: ToolCall; result: ToolResult }> = [];

  for (const call of toolCalls) {
    const tool = tools.get(call.name);

    if (!tool) {
      results.push({
        call,
        result: fail('unknown_tool', `Unknown tool: ${call.name}`),
      });
      continue;
    }

    const result = await executeTool(tool, call.parameters, context);
    results.push({ call, result });
  }

  return results;
}

/**
 * Format tool results for LLM consumption
 */
export function formatToolResults(
  results: Array<{ call: ToolCall; result: ToolResult }>
): string {
  return results
    .map(({ call, result }) => {
      if (result.success) {
        return `Tool: ${call.name}\nResult: ${JSON.stringify(result.data, null, 2)}`;
      } else {
        return `Tool: ${call.name}\nError: ${result.error}`;
      }
    })
    .join('\n\n');
}
