/**
 * MCP Client
 *
 * Thin wrapper around the SDK client: launches the todo server over stdio (or
 * uses a given transport), performs the initialization handshake, caches the
 * tool list and unwraps tool results.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolResultSchema,
  type CallToolResult,
  type GetPromptResult,
  type Prompt,
  type ReadResourceResult,
  type Resource,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { MCPClientConfig, MCPConnectionState, MCPServerCommand, MCPServerInfo } from './types.js';

const DEFAULT_TIMEOUT_MS = 30000;
const CLIENT_VERSION = '0.1.0';

/**
 * Environment for the server process: ours plus the extras, strings only
 */
function buildTransportEnv(
  baseEnv: NodeJS.ProcessEnv,
  extraEnv: Record<string, string> = {}
): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries({ ...baseEnv, ...extraEnv })) {
    if (typeof value === 'string') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * Text blocks of a tool result, joined by newlines
 */
export function extractText(result: CallToolResult): string {
  return result.content
    .filter((c): c is { type: 'text'; text: string } => c.type === 'text')
    .map((c) => c.text)
    .join('\n');
}

/**
 * MCP Client for the todo server
 */
export class TodoMcpClient {
  private readonly config: MCPClientConfig;
  private readonly timeout: number;
  private client: Client | null = null;
  private state: MCPConnectionState = 'disconnected';
  private serverInfo: MCPServerInfo | null = null;
  private tools: Tool[] = [];

  constructor(config: MCPClientConfig) {
    if (!config.server && !config.transport) {
      throw new Error('MCP client needs either a server command or a transport');
    }
    this.config = config;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Get current connection state
   */
  get connectionState(): MCPConnectionState {
    return this.state;
  }

  /**
   * Get server information (available after connection)
   */
  get server(): MCPServerInfo | null {
    return this.serverInfo;
  }

  /**
   * Connect to the MCP server and load its tools
   */
  async connect(): Promise<MCPServerInfo> {
    if (this.state === 'connected' && this.serverInfo) {
      return this.serverInfo;
    }

    this.state = 'connecting';
    const client = new Client(
      { name: this.config.clientName ?? 'todo-chat', version: CLIENT_VERSION },
      { capabilities: {} }
    );
    this.client = client;

    let timer: NodeJS.Timeout | undefined;
    try {
      const transport = this.config.transport ?? this.createStdioTransport(this.config.server);
      this.log('Connecting to MCP server');

      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error(`Connection timeout after ${this.timeout}ms`)),
          this.timeout
        );
      });
      await Promise.race([client.connect(transport), timeoutPromise]);

      const version = client.getServerVersion();
      this.serverInfo = {
        name: version?.name ?? 'unknown',
        version: version?.version ?? 'unknown',
      };
      this.state = 'connected';

      await this.refreshTools();
      this.log('Connected successfully. Tools available:', this.tools.length);

      return this.serverInfo;
    } catch (error) {
      this.log('Connection failed:', error instanceof Error ? error.message : error);
      await this.closeClient();
      this.state = 'error';
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Disconnect from the server (stops a spawned server process)
   */
  async disconnect(): Promise<void> {
    await this.closeClient();
    this.log('Disconnected');
  }

  /**
   * Get list of available tools
   */
  listTools(): Tool[] {
    return [...this.tools];
  }

  /**
   * Refresh the tools list from the server
   */
  async refreshTools(): Promise<Tool[]> {
    const response = await this.connected().listTools();
    this.tools = response.tools;
    return this.listTools();
  }

  /**
   * Call a tool by name with arguments
   */
  async callTool(name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
    const client = this.connected();

    if (!this.tools.some((t) => t.name === name)) {
      throw new Error(
        `Unknown tool: ${name}. Available tools: ${this.tools.map((t) => t.name).join(', ')}`
      );
    }

    this.log(`Calling tool: ${name}`, args);
    const result = await client.request(
      { method: 'tools/call', params: { name, arguments: args } },
      CallToolResultSchema
    );
    this.log('Tool result:', result);
    return result;
  }

  /**
   * Call a tool and extract text content from the result
   *
   * @throws Error when the tool reports a failure
   */
  async callToolForText(name: string, args: Record<string, unknown> = {}): Promise<string> {
    const result = await this.callTool(name, args);
    const text = extractText(result);
    if (result.isError) {
      throw new Error(`Tool error: ${text}`);
    }
    return text;
  }

  /**
   * Call a tool and parse JSON from the result
   */
  async callToolForJSON(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
    const text = await this.callToolForText(name, args);
    try {
      return JSON.parse(text);
    } catch {
      throw new Error(`Failed to parse tool result as JSON: ${text.slice(0, 100)}`);
    }
  }

  async listPrompts(): Promise<Prompt[]> {
    const response = await this.connected().listPrompts();
    return response.prompts;
  }

  async getPrompt(name: string, args: Record<string, string> = {}): Promise<GetPromptResult> {
    return this.connected().getPrompt({ name, arguments: args });
  }

  async listResources(): Promise<Resource[]> {
    const response = await this.connected().listResources();
    return response.resources;
  }

  async readResource(uri: string): Promise<ReadResourceResult> {
    return this.connected().readResource({ uri });
  }

  private createStdioTransport(server: MCPServerCommand | undefined): Transport {
    if (!server) {
      throw new Error('No MCP server command configured');
    }
    return new StdioClientTransport({
      command: server.command,
      args: server.args ?? [],
      env: buildTransportEnv(process.env, server.env),
      cwd: server.cwd,
      stderr: this.config.debug ? 'inherit' : 'ignore',
    });
  }

  private async closeClient(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.serverInfo = null;
    this.tools = [];
    this.state = 'disconnected';
    if (client) {
      await client.close();
    }
  }

  /**
   * Ensure the client is connected
   */
  private connected(): Client {
    if (this.state !== 'connected' || !this.client) {
      throw new Error(`MCP client not connected (state: ${this.state})`);
    }
    return this.client;
  }

  /**
   * Log debug messages (stderr, so stdout stays clean for the CLI)
   */
  private log(...args: unknown[]): void {
    if (this.config.debug) {
      console.error('[MCPClient]', ...args);
    }
  }
}

/**
 * Create an MCP client instance
 */
export function createMcpClient(config: MCPClientConfig): TodoMcpClient {
  return new TodoMcpClient(config);
}
