/**
 * Command dispatch
 * Maps each parsed command to its handler
 */

import { TerminalRenderer } from '../../renderer/TerminalRenderer';
import { readPackageInfo } from '../version';
import { USAGE } from './args';
import type { CliArgs } from './args';
import { runChat } from './chat.handler';
import type { CliContext } from './context';
import { runClearKey, runSetKey } from './keys.handler';
import { runList } from './list.handler';

export async function runCommand(args: CliArgs, ctx: CliContext): Promise<number> {
  const { command } = args;
  switch (command.name) {
    case 'chat':
      return runChat(command, args.plain, ctx);
    case 'list':
      return runList(args.plain, ctx);
    case 'set-key':
      return runSetKey(command.provider, ctx);
    case 'clear-key':
      return runClearKey(command.provider, ctx);
    case 'version': {
      const { name, version } = readPackageInfo();
      new TerminalRenderer(ctx.stdout).info(`${name} ${version}`);
      return 0;
    }
    case 'help':
      new TerminalRenderer(ctx.stdout).info(USAGE);
      return 0;
  }
}
