/**
 * Insight Tools
 * Read-only statistics and analysis over the current todo snapshot
 */

import { analyzeTodos, computeStats } from '@todo/insights';
import type { Todo, TodoAnalysis, TodoStats } from '@todo/shared-types';
import type { Tool, ToolResult } from './types.js';
import { ok } from './types.js';

/**
 * Wire shape of the analysis (snake_case, like the rest of the todo data)
 */
export interface AnalysisPayload {
  text: string;
  recommendation: string;
  stats: TodoStats;
  oldest_open: Todo | null;
  overdue: Todo[];
}

export function toAnalysisPayload(analysis: TodoAnalysis): AnalysisPayload {
  return {
    text: analysis.text,
    recommendation: analysis.recommendation,
    stats: analysis.stats,
    oldest_open: analysis.oldestOpen,
    overdue: analysis.overdue,
  };
}

export const getTodoStats: Tool = {
  name: 'get_todo_stats',
  description:
    'Get statistics about the todos: totals, completed and open counts, completion rate and overdue count.',
  parameters: {
    type: 'object',
    properties: {},
    required: [],
  },
  execute: async (_params, context): Promise<ToolResult> => {
    const todos = await context.store.listAll();
    return ok(computeStats(todos, context.now()));
  },
};

export const getTodoAnalysis: Tool = {
  name: 'get_todo_analysis',
  description:
    'Analyze the todo list and get a short summary with a recommendation for what to work on next.',
  parameters: {
    type: 'object',
    properties: {},
    required: [],
  },
  execute: async (_params, context): Promise<ToolResult> => {
    const todos = await context.store.listAll();
    return ok(toAnalysisPayload(analyzeTodos(todos, context.now())));
  },
};
