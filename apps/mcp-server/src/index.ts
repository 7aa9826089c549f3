import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createTodoStore, storeConfigFromEnv } from '@todo/database';
import { SERVER_NAME, SERVER_VERSION, createTodoMcpServer } from '@todo/mcp';

/**
 * Todo MCP server over stdio
 *
 * stdout carries the protocol, so every log line goes to stderr.
 */
async function main() {
  const storeConfig = storeConfigFromEnv();
  const server = createTodoMcpServer({ store: createTodoStore(storeConfig) });

  const onSignal = () => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[McpServer] Error during shutdown:', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  await server.connect(new StdioServerTransport());
  console.error(
    `[McpServer] ${SERVER_NAME} v${SERVER_VERSION} running on stdio (data: ${storeConfig.dataFile})`
  );
}

main().catch((error: unknown) => {
  console.error('[McpServer] Fatal error:', error);
  process.exit(1);
});
