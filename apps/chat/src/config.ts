import { fileURLToPath } from 'node:url';
import type { MCPServerCommand } from '@todo/mcp';

/** Entry point of the stdio MCP server in this workspace */
export const SERVER_ENTRY = fileURLToPath(new URL('../../mcp-server/src/index.ts', import.meta.url));

/**
 * How the chat launches the MCP server.
 *
 * TODO_MCP_COMMAND (with whitespace-separated TODO_MCP_ARGS) overrides the
 * default, which runs the workspace server through the tsx loader.
 */
export function resolveServerCommand(
  env: NodeJS.ProcessEnv = process.env,
  entry: string = SERVER_ENTRY
): MCPServerCommand {
  const command = env['TODO_MCP_COMMAND']?.trim();
  if (command) {
    const args = env['TODO_MCP_ARGS']?.trim();
    return { command, args: args ? args.split(/\s+/) : [] };
  }
  return { command: process.execPath, args: ['--import', 'tsx', entry] };
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env['MCP_DEBUG']?.toLowerCase();
  return value === '1' || value === 'true';
}
