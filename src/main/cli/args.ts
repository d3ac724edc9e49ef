import { parseArgs } from 'util';
import { ChatOptionsSchema, validateInput } from '../schemas';
import { UsageError } from '../services/ai/errors';

export const USAGE = `Usage:
  parley [--plain] [--verbose] chat [provider[:model]] [-p provider] [-m model] [--no-stream]
  parley [--plain] list
  parley version
  parley set-key <provider>
  parley clear-key <provider>

Options:
  --plain         plain text output: replies verbatim, no markdown or colours
  --verbose       diagnostic logging on stderr
  -p, --provider  provider to chat with (anthropic, google, mistral, openai)
  -m, --model     model id; defaults to the provider's model in settings
  --no-stream     wait for the full reply instead of streaming it
  -h, --help      show this help`;

export type CliCommand =
  | { name: 'chat'; provider?: string; model?: string; stream?: boolean }
  | { name: 'list' }
  | { name: 'version' }
  | { name: 'help' }
  | { name: 'set-key'; provider: string }
  | { name: 'clear-key'; provider: string };

export interface CliArgs {
  plain: boolean;
  verbose: boolean;
  command: CliCommand;
}

const OPTIONS = {
  plain: { type: 'boolean' },
  verbose: { type: 'boolean' },
  provider: { type: 'string', short: 'p' },
  model: { type: 'string', short: 'm' },
  'no-stream': { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

/** `provider[:model]`, split on the first colon */
export function splitProviderModel(value: string): { provider: string; model?: string } {
  const index = value.indexOf(':');
  if (index === -1) return { provider: value };
  const provider = value.slice(0, index);
  const model = value.slice(index + 1);
  if (!provider || !model) {
    throw new UsageError(`Invalid model '${value}'. Expected provider:model, e.g. openai:gpt-4o.`);
  }
  return { provider, model };
}

function parse(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    // parseArgs throws a TypeError carrying an ERR_PARSE_ARGS_* code
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = parse(argv);
  const plain = values.plain ?? false;
  const verbose = values.verbose ?? false;
  const [commandName, ...rest] = positionals;

  if (values.help || commandName === 'help') {
    return { plain, verbose, command: { name: 'help' } };
  }
  if (!commandName) {
    throw new UsageError(`Missing command.\n\n${USAGE}`);
  }

  const chatOnly = values.provider !== undefined || values.model !== undefined || values['no-stream'] !== undefined;
  if (commandName !== 'chat' && chatOnly) {
    throw new UsageError(`-p, -m and --no-stream only apply to the chat command.`);
  }

  const expectArgs = (count: number) => {
    if (rest.length !== count) {
      throw new UsageError(`'${commandName}' takes ${count === 0 ? 'no arguments' : `${count} argument`}.\n\n${USAGE}`);
    }
  };

  switch (commandName) {
    case 'chat': {
      if (rest.length > 1) throw new UsageError(`'chat' takes at most one argument.\n\n${USAGE}`);
      const positional = rest[0] !== undefined ? splitProviderModel(rest[0]) : undefined;
      if (positional && values.provider !== undefined) {
        throw new UsageError('Give the provider either as an argument or with -p, not both.');
      }
      if (positional?.model !== undefined && values.model !== undefined) {
        throw new UsageError('Give the model either as provider:model or with -m, not both.');
      }
      const options = validateInput(ChatOptionsSchema, {
        provider: positional?.provider ?? values.provider,
        model: positional?.model ?? values.model,
      }, 'arguments');
      return {
        plain,
        verbose,
        command: {
          name: 'chat',
          provider: options.provider,
          model: options.model,
          // Only an explicit --no-stream overrides the settings file
          stream: values['no-stream'] ? false : undefined,
        },
      };
    }
    case 'list':
      expectArgs(0);
      return { plain, verbose, command: { name: 'list' } };
    case 'version':
      expectArgs(0);
      return { plain, verbose, command: { name: 'version' } };
    case 'set-key':
    case 'clear-key':
      expectArgs(1);
      return { plain, verbose, command: { name: commandName, provider: rest[0] } };
    default:
      throw new UsageError(`Unknown command '${commandName}'.\n\n${USAGE}`);
  }
}
