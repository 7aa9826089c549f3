import {
  runAgentLoop,
  type AgentResult,
  type ConversationMessage,
  type TextGenerator,
  type ToolResult,
} from '@todo/ai';
import {
  ANALYSIS_PROMPT,
  createMcpToolAdapters,
  createMcpToolRunner,
  type RemoteTool,
  type TodoMcpClient,
} from '@todo/mcp';

const RESULT_PREVIEW_LENGTH = 200;

export interface ChatSessionOptions {
  /** Connected MCP client */
  mcp: TodoMcpClient;
  /** Model used by the agent loop */
  model: TextGenerator;
  now?: () => Date;
  maxIterations?: number;
}

/**
 * One chat conversation over the MCP tools
 */
export class ChatSession {
  readonly tools: RemoteTool[];
  private readonly options: ChatSessionOptions;
  private history: ConversationMessage[] = [];

  constructor(options: ChatSessionOptions) {
    this.options = options;
    this.tools = createMcpToolAdapters({ client: options.mcp });
  }

  get messages(): readonly ConversationMessage[] {
    return this.history;
  }

  /**
   * Answer one user message; the turn joins the history
   */
  async ask(message: string): Promise<AgentResult> {
    const result = await runAgentLoop({
      message,
      history: this.history,
      tools: this.tools,
      runTool: createMcpToolRunner(this.tools),
      client: this.options.model,
      now: this.options.now,
      maxIterations: this.options.maxIterations,
    });
    this.history = [...this.history, ...result.messages];
    return result;
  }

  clear(): void {
    this.history = [];
  }

  /**
   * Text of the server's analysis prompt
   */
  async analysis(): Promise<string> {
    const prompt = await this.options.mcp.getPrompt(ANALYSIS_PROMPT);
    return prompt.messages
      .map((m) => m.content)
      .filter((c): c is { type: 'text'; text: string } => c.type === 'text')
      .map((c) => c.text)
      .join('\n');
  }
}

/**
 * Two-line description of a tool call for the terminal
 */
export function describeToolCall(call: AgentResult['toolCalls'][number]): string {
  return `→ ${call.tool}(${JSON.stringify(call.params)})\n  ${describeResult(call.result)}`;
}

function describeResult(result: ToolResult): string {
  if (!result.success) {
    return `✗ ${result.error}`;
  }
  const json = JSON.stringify(result.data) ?? 'null';
  return json.length > RESULT_PREVIEW_LENGTH
    ? `✓ ${json.slice(0, RESULT_PREVIEW_LENGTH - 3)}...`
    : `✓ ${json}`;
}
