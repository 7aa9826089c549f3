/**
 * Agent Loop
 * Executes the tool-enabled LLM conversation loop
 */

import type { TextGenerator } from '../gemini-client.js';
import type {
  Tool,
  ToolCall,
  ToolContext,
  ToolDefinition,
  ToolRunner,
  AgentResult,
  ConversationMessage,
} from '../tools/types.js';
import { fail } from '../tools/types.js';
import { executeTool } from '../tools/executor.js';
import { buildAgentSystemPrompt, buildToolInstructions } from './prompts.js';

/**
 * Options for running the agent loop
 */
export interface AgentLoopOptions {
  /** User's message */
  message: string;
  /** Earlier turns of the conversation */
  history?: ConversationMessage[];
  /** Tools advertised to the model */
  tools: ToolDefinition[];
  /** Runs the tool calls the model asks for */
  runTool: ToolRunner;
  /** Model client */
  client: TextGenerator;
  /** Clock for the date in the system prompt */
  now?: () => Date;
  /** Maximum iterations (tool call rounds) */
  maxIterations?: number;
}

export type ParsedResponse =
  | { type: 'text'; content: string }
  | { type: 'tool_calls'; calls: ToolCall[] };

/**
 * Run the agent loop
 */
export async function runAgentLoop(options: AgentLoopOptions): Promise<AgentResult> {
  const { message, history = [], tools, runTool, client, maxIterations = 5 } = options;
  const now = options.now ?? (() => new Date());

  const toolCalls: AgentResult['toolCalls'] = [];
  const systemPrompt = buildAgentSystemPrompt(tools, now());

  // Messages added this turn; history stays untouched
  const turn: ConversationMessage[] = [{ role: 'user', content: message }];

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    const fullPrompt = buildFullPrompt(systemPrompt, [...history, ...turn]);

    let response: string;
    try {
      response = await client.generate(fullPrompt);
    } catch (error) {
      console.error('[AgentLoop] LLM error:', error);
      return {
        success: false,
        response: "I'm having trouble processing your request. Please try again.",
        toolCalls,
        messages: turn,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }

    const parsed = parseResponse(response);

    if (parsed.type === 'text') {
      turn.push({ role: 'assistant', content: parsed.content });
      return {
        success: true,
        response: parsed.content,
        toolCalls,
        messages: turn,
      };
    }

    const results: string[] = [];
    for (const call of parsed.calls) {
      const result = await runTool(call);
      toolCalls.push({ tool: call.name, params: call.parameters, result });
      results.push(
        `${call.name}: ${result.success ? JSON.stringify(result.data) : `Error: ${result.error}`}`
      );
    }

    turn.push({
      role: 'assistant',
      content: `Tool calls:\n${parsed.calls.map((c) => `${c.name}(${JSON.stringify(c.parameters)})`).join('\n')}`,
    });
    turn.push({ role: 'tool', content: results.join('\n\n') });
  }

  return {
    success: false,
    response: "I'm having trouble completing your request. Please try rephrasing.",
    toolCalls,
    messages: turn,
    error: 'Max iterations reached',
  };
}

/**
 * Build full prompt from system prompt and conversation
 */
export function buildFullPrompt(systemPrompt: string, messages: ConversationMessage[]): string {
  // Only the latest exchange decides which instructions apply
  const lastUser = messages.map((m) => m.role).lastIndexOf('user');
  const hasToolResults = messages.slice(lastUser + 1).some((m) => m.role === 'tool');

  const conversationStr = messages
    .map((m) => {
      switch (m.role) {
        case 'user':
          return `USER: ${m.content}`;
        case 'assistant':
          return `ASSISTANT: ${m.content}`;
        case 'tool':
          return `TOOL RESULTS:\n${m.content}`;
      }
    })
    .join('\n\n');

  return `${systemPrompt}

${buildToolInstructions(hasToolResults)}

═══════════════════════════════════════════════════════════════
CONVERSATION
═══════════════════════════════════════════════════════════════

${conversationStr}

ASSISTANT:`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read one call in either `{name, parameters}` or `{tool, params}` form
 */
function toToolCall(value: unknown): ToolCall | null {
  if (!isRecord(value)) return null;
  const name = value['name'] ?? value['tool'];
  if (typeof name !== 'string' || name === '') return null;
  const parameters = value['parameters'] ?? value['params'];
  return { name, parameters: isRecord(parameters) ? parameters : {} };
}

function toToolCalls(values: unknown[]): ToolCall[] | null {
  const calls = values.map(toToolCall);
  if (calls.length === 0) return null;
  const valid = calls.filter((call): call is ToolCall => call !== null);
  return valid.length === calls.length ? valid : null;
}

function stripCodeFence(text: string): string {
  let jsonStr = text;
  if (jsonStr.startsWith('```json')) {
    jsonStr = jsonStr.slice(7);
  } else if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.slice(3);
  }
  if (jsonStr.endsWith('```')) {
    jsonStr = jsonStr.slice(0, -3);
  }
  return jsonStr.trim();
}

/**
 * Parse LLM response for tool calls or final text
 */
export function parseResponse(response: string): ParsedResponse {
  const trimmed = response.trim();
  const jsonStr = stripCodeFence(trimmed);

  // Only try to parse if it looks like JSON (object or array)
  if (!jsonStr.startsWith('{') && !jsonStr.startsWith('[')) {
    return { type: 'text', content: trimmed };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch {
    return { type: 'text', content: trimmed };
  }

  // Array format: [{"tool": "...", "parameters": {...}}]
  if (Array.isArray(parsed)) {
    const calls = toToolCalls(parsed);
    if (calls) return { type: 'tool_calls', calls };
  }

  if (isRecord(parsed)) {
    // Object format: {"tool_calls": [{"name": "...", "parameters": {...}}]}
    const rawCalls = parsed['tool_calls'];
    if (Array.isArray(rawCalls)) {
      const calls = toToolCalls(rawCalls);
      if (calls) return { type: 'tool_calls', calls };
    }

    // Text wrapped in JSON anyway
    for (const field of ['response', 'message', 'text', 'content', 'reply', 'answer']) {
      const value = parsed[field];
      if (typeof value === 'string' && value !== '') {
        return { type: 'text', content: value };
      }
    }

    console.warn('[AgentLoop] LLM returned unexpected JSON structure:', Object.keys(parsed));
  }

  return { type: 'text', content: trimmed };
}

/**
 * Tool runner over local tools and a store
 */
export function createLocalToolRunner(tools: Tool[], context: ToolContext): ToolRunner {
  const byName = new Map(tools.map((tool) => [tool.name, tool]));

  return async (call) => {
    const tool = byName.get(call.name);
    if (!tool) {
      return fail('unknown_tool', `Unknown tool: ${call.name}`);
    }
    return executeTool(tool, call.parameters, context);
  };
}
