/**
 * Walk through the todo MCP server from a plain client:
 * list tools, add a todo, read stats and resources, fetch the analysis prompt.
 *
 * Usage: npm run example:mcp-client
 */

import { fileURLToPath } from 'node:url';
import { createMcpClient } from '@todo/mcp';

const serverEntry = fileURLToPath(new URL('../apps/mcp-server/src/index.ts', import.meta.url));

async function main() {
  const client = createMcpClient({
    server: { command: process.execPath, args: ['--import', 'tsx', serverEntry] },
    debug: process.env['MCP_DEBUG'] === 'true',
    clientName: 'todo-mcp-example',
  });

  await client.connect();
  try {
    console.log('Tools:');
    for (const tool of client.listTools()) {
      console.log(`  - ${tool.name}: ${tool.description ?? ''}`);
    }

    const created = await client.callToolForJSON('create_todo', {
      title: 'Try the MCP example',
      description: 'Created by scripts/mcp-client-example.ts',
    });
    console.log('\nCreated:', created);

    console.log('\nStats:', await client.callToolForJSON('get_todo_stats'));

    const resources = await client.listResources();
    console.log(`\nResources (${resources.length}):`);
    for (const resource of resources) {
      console.log(`  - ${resource.uri}  ${resource.name}`);
    }

    const prompt = await client.getPrompt('todo_analysis');
    console.log('\nAnalysis prompt:');
    for (const message of prompt.messages) {
      if (message.content.type === 'text') {
        console.log(message.content.text);
      }
    }
  } finally {
    await client.disconnect();
  }
}

main().catch((error: unknown) => {
  console.error('Example failed:', error);
  process.exit(1);
});
