import { isProviderName } from '../../shared/types';
import { TerminalRenderer } from '../../renderer/TerminalRenderer';
import { ProviderRegistry } from '../services/ai/ProviderRegistry';
import { NoCredentialsError } from '../services/ai/errors';
import { SessionLoop } from '../services/chat/SessionLoop';
import { createLogger } from '../utils/logger';
import type { CliCommand } from './args';
import type { CliContext } from './context';

const log = createLogger('chat');

type ChatCommand = Extract<CliCommand, { name: 'chat' }>;

/**
 * Start an interactive chat session. Startup problems (unknown provider,
 * missing credential, bad settings) throw a StartupError before the loop
 * starts; once it runs, only an internal fault can end it early.
 */
export async function runChat(command: ChatCommand, plain: boolean, ctx: CliContext): Promise<number> {
  const settings = await ctx.settings.getSettings();
  const registry = await ProviderRegistry.create(settings, ctx.credentials, ctx.env, ctx.factories);

  const name = command.provider ?? settings.defaultProvider;
  if (isProviderName(name) && registry.available().every((status) => !status.hasCredential)) {
    throw new NoCredentialsError();
  }
  const provider = registry.resolve(name, command.model);
  log.info(`chatting with ${provider.name}:${provider.model}`);

  const renderer = new TerminalRenderer(ctx.stdout, { plain: plain || settings.plain });
  const reader = ctx.createReader();
  const loop = new SessionLoop({
    provider,
    reader,
    renderer,
    archive: ctx.sessions,
    stream: command.stream ?? settings.stream,
  });

  try {
    await loop.run();
  } finally {
    reader.close();
  }
  return 0;
}
