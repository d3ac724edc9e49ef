/** Opens and closes a multi-line message */
export const MULTI_LINE_DELIMITER = '"""';

export type ChatCommand =
  | { type: 'exit' }
  | { type: 'clear' }
  | { type: 'help' }
  | { type: 'save'; name: string }
  | { type: 'load'; name: string | undefined }
  | { type: 'usage'; usage: string }
  | { type: 'unknown'; command: string };

export const HELP_TEXT = [
  'Available Commands:',
  '  /clear            Clear chat history',
  '  /save <name>      Save chat under a name',
  '  /load <name>      Load a saved chat (no name lists them)',
  '  /bye, /exit       Exit',
  '  /?, /help         Print available commands',
  '',
  `Use ${MULTI_LINE_DELIMITER} to begin a multi-line message.`,
].join('\n');

export function isCommand(input: string): boolean {
  return input.startsWith('/');
}

export function parseCommand(input: string): ChatCommand {
  const [command = '', ...rest] = input.trim().split(/\s+/);

  switch (command) {
    case '/bye':
    case '/exit':
      return { type: 'exit' };
    case '/clear':
      return { type: 'clear' };
    case '/?':
    case '/help':
      return { type: 'help' };
    case '/save':
      return rest.length === 1
        ? { type: 'save', name: rest[0] }
        : { type: 'usage', usage: 'Usage:\n  /save <name>' };
    case '/load':
      return rest.length <= 1
        ? { type: 'load', name: rest[0] }
        : { type: 'usage', usage: 'Usage:\n  /load [name]' };
    default:
      return { type: 'unknown', command };
  }
}
