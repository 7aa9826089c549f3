/**
 * Chat input parsing
 */

export type ChatCommand = 'help' | 'tools' | 'clear' | 'analysis';

export type ParsedInput =
  | { kind: 'empty' }
  | { kind: 'exit' }
  | { kind: 'command'; command: ChatCommand }
  | { kind: 'unknown_command'; command: string }
  | { kind: 'chat'; text: string };

const EXIT_WORDS = new Set(['/exit', '/quit', '/q', 'exit', 'quit', 'bye']);

const COMMANDS: Record<string, ChatCommand> = {
  '/help': 'help',
  '/tools': 'tools',
  '/clear': 'clear',
  '/analysis': 'analysis',
};

export const HELP_TEXT = [
  'Commands:',
  '  /help      Show this help',
  '  /tools     List the tools the assistant can use',
  '  /clear     Forget the conversation so far',
  '  /analysis  Show the todo analysis prompt',
  '  /exit      Leave (also /quit, /q, exit, quit, bye)',
  '',
  'Anything else is sent to the assistant, e.g. "add a todo to buy milk tomorrow".',
].join('\n');

export function parseInput(line: string): ParsedInput {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: 'empty' };
  }

  const normalized = trimmed.toLowerCase();
  if (EXIT_WORDS.has(normalized)) {
    return { kind: 'exit' };
  }

  if (trimmed.startsWith('/')) {
    const command = COMMANDS[normalized];
    return command ? { kind: 'command', command } : { kind: 'unknown_command', command: trimmed };
  }

  return { kind: 'chat', text: trimmed };
}
