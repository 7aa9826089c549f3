/**
 * Tool Registry
 * Central registry of all available tools
 */

import type { Tool, ToolDefinition } from './types.js';

import {
  listTodos,
  getTodo,
  createTodo,
  updateTodo,
  deleteTodo,
  toggleTodo,
} from './todos.js';
import { getTodoStats, getTodoAnalysis } from './insights.js';

// Re-export types
export * from './types.js';

/**
 * All available tools
 */
export const allTools: Tool[] = [
  // Todo tools
  listTodos,
  getTodo,
  createTodo,
  updateTodo,
  deleteTodo,
  toggleTodo,

  // Insight tools (read-only)
  getTodoStats,
  getTodoAnalysis,
];

/**
 * Tool registry as a Map for quick lookup
 */
export const toolRegistry: Map<string, Tool> = new Map(
  allTools.map((tool) => [tool.name, tool])
);

/**
 * Get a subset of tools by names
 */
export function getTools(names: string[]): Tool[] {
  return names
    .map((name) => toolRegistry.get(name))
    .filter((tool): tool is Tool => tool !== undefined);
}

/**
 * Format tools for LLM prompt
 */
export function formatToolsForPrompt(tools: ToolDefinition[]): string {
  return tools
    .map((tool) => {
      const params = Object.entries(tool.parameters.properties)
        .map(([name, schema]) => {
          const required = tool.parameters.required?.includes(name)
            ? ' (required)'
            : '';
          const enumValues = schema.enum ? ` [${schema.enum.join('|')}]` : '';
          const nested = schema.properties
            ? ` { ${Object.keys(schema.properties).join(', ')} }`
            : '';
          return `    - ${name}: ${schema.description ?? schema.type}${required}${enumValues}${nested}`;
        })
        .join('\n');

      return `${tool.name}:
  ${tool.description}
  Parameters:
${params || '    (none)'}`;
    })
    .join('\n\n');
}

// Re-export individual tools for direct import
export {
  listTodos,
  getTodo,
  createTodo,
  updateTodo,
  deleteTodo,
  toggleTodo,
  getTodoStats,
  getTodoAnalysis,
};
export { toAnalysisPayload, type AnalysisPayload } from './insights.js';
export {
  executeTool,
  executeToolCalls,
  formatToolResults,
  validateParams,
  type Validation,
} from './executor.js';
