import * as readline from 'node:readline';
import chalk from 'chalk';
import { createGeminiClient } from '@todo/ai';
import { createMcpClient } from '@todo/mcp';
import { HELP_TEXT, parseInput, type ChatCommand } from './commands.js';
import { isDebugEnabled, resolveServerCommand } from './config.js';
import { ChatSession, describeToolCall } from './session.js';

const colors = {
  user: chalk.green,
  assistant: chalk.cyan,
  tool: chalk.yellow,
  info: chalk.gray,
  error: chalk.red,
};

async function runCommand(command: ChatCommand, session: ChatSession): Promise<void> {
  switch (command) {
    case 'help':
      console.log(colors.info(HELP_TEXT));
      return;
    case 'tools':
      for (const tool of session.tools) {
        console.log(`${colors.tool(tool.name)}  ${colors.info(tool.description)}`);
      }
      return;
    case 'clear':
      session.clear();
      console.log(colors.info('Conversation cleared.'));
      return;
    case 'analysis':
      console.log(colors.assistant(await session.analysis()));
      return;
  }
}

async function chat(text: string, session: ChatSession): Promise<void> {
  const result = await session.ask(text);
  for (const call of result.toolCalls) {
    console.log(colors.tool(describeToolCall(call)));
  }
  const print = result.success ? colors.assistant : colors.error;
  console.log(`${print('Assistant>')} ${result.response}`);
  if (result.error) {
    console.log(colors.info(`(${result.error})`));
  }
}

async function repl(session: ChatSession): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt(colors.user('You> '));
  rl.on('SIGINT', () => rl.close());

  try {
    rl.prompt();
    for await (const line of rl) {
      const input = parseInput(line);
      switch (input.kind) {
        case 'exit':
          return;
        case 'empty':
          break;
        case 'unknown_command':
          console.log(colors.error(`Unknown command: ${input.command}. Type /help for commands.`));
          break;
        case 'command':
          await runCommand(input.command, session).catch((error: unknown) => {
            console.log(colors.error(`Error: ${error instanceof Error ? error.message : String(error)}`));
          });
          break;
        case 'chat':
          await chat(input.text, session);
          break;
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

/**
 * Todo chat
 *
 * Talks to the todo MCP server over stdio and lets Gemini drive its tools.
 */
async function main() {
  const model = createGeminiClient();
  const mcp = createMcpClient({
    server: resolveServerCommand(),
    debug: isDebugEnabled(),
    clientName: 'todo-chat',
  });

  await mcp.connect();
  try {
    const session = new ChatSession({ mcp, model });
    console.log(chalk.bold('Todo chat'));
    console.log(
      colors.info(`Connected to ${mcp.server?.name ?? 'MCP server'} with ${session.tools.length} tools. Type /help for commands.\n`)
    );
    await repl(session);
    console.log(colors.info('Goodbye!'));
  } finally {
    await mcp.disconnect();
  }
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    console.error(colors.error(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  }
);
