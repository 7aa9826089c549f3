/**
 * @todo/mcp - Model Context Protocol server and client for the todo tools
 *
 * - Server: exposes the tool registry, each todo as a `todo:///<id>` resource
 *   and the `todo_analysis` prompt
 * - Client: launches the server over stdio and calls its tools
 * - Tool adapter: turns the server's tools into definitions the agent loop runs
 *
 * ## Usage
 *
 * ```typescript
 * import { TodoMcpClient, createMcpToolAdapters, createMcpToolRunner } from '@todo/mcp';
 *
 * const client = new TodoMcpClient({ server: { command: 'node', args: ['server.js'] } });
 * await client.connect();
 *
 * const tools = createMcpToolAdapters({ client });
 * const runTool = createMcpToolRunner(tools);
 * ```
 */

// Server
export {
  createTodoMcpServer,
  callTool,
  toMcpTool,
  todoUri,
  parseTodoUri,
  buildAnalysisPrompt,
  SERVER_NAME,
  SERVER_VERSION,
  TODO_URI_PREFIX,
  ANALYSIS_PROMPT,
  type TodoMcpServerOptions,
} from './server.js';

// Client
export { TodoMcpClient, createMcpClient, extractText } from './client.js';

// Tool Adapter (for agent loop integration)
export {
  createMcpToolAdapters,
  createMcpToolRunner,
  convertSchemaProperty,
  toToolResult,
  type RemoteTool,
  type MCPToolAdapterOptions,
} from './tool-adapter.js';

// Wire shapes
export { toWireError, kindFromTitle, isErrorRecord, ERROR_TITLES, type ErrorRecord } from './wire.js';

// Types
export type {
  MCPClientConfig,
  MCPServerCommand,
  MCPServerInfo,
  MCPConnectionState,
  MCPTool,
  MCPToolCallResult,
} from './types.js';
