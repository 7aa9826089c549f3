/**
 * MCP Client Types
 *
 * Protocol shapes come from @modelcontextprotocol/sdk; these are the client's
 * own configuration and state.
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

export type { CallToolResult as MCPToolCallResult, Tool as MCPTool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Connection state of the MCP client
 */
export type MCPConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * How to launch the server process
 */
export interface MCPServerCommand {
  /** Executable to run */
  command: string;
  /** Arguments passed to the executable */
  args?: string[];
  /** Extra environment variables for the server */
  env?: Record<string, string>;
  /** Working directory of the server process */
  cwd?: string;
}

/**
 * MCP client configuration. Give either a command to spawn over stdio or a
 * ready-made transport.
 */
export interface MCPClientConfig {
  server?: MCPServerCommand;
  transport?: Transport;
  /** Connect timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Enable debug logging (to stderr) */
  debug?: boolean;
  /** Client name sent during initialization */
  clientName?: string;
}

/**
 * Server information available after connecting
 */
export interface MCPServerInfo {
  name: string;
  version: string;
}
