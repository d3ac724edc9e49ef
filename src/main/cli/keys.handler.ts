import { PROVIDER_LABELS } from '../../shared/constants';
import { isProviderName } from '../../shared/types';
import type { ProviderName } from '../../shared/types';
import { TerminalRenderer } from '../../renderer/TerminalRenderer';
import { ApiKeySchema, validateInput } from '../schemas';
import { envCredential } from '../services/config/RuntimeConfig';
import { ConfigError, UnknownProviderError } from '../services/ai/errors';
import { createLogger } from '../utils/logger';
import { describeSecret } from '../utils/sanitize';
import type { CliContext } from './context';

const log = createLogger('keys');

function toProviderName(value: string): ProviderName {
  if (!isProviderName(value)) throw new UnknownProviderError(value);
  return value;
}

/** Prompt for a key without echo and store it encrypted. */
export async function runSetKey(providerArg: string, ctx: CliContext): Promise<number> {
  const provider = toProviderName(providerArg);
  const label = PROVIDER_LABELS[provider];
  const renderer = new TerminalRenderer(ctx.stdout);

  const reader = ctx.createReader();
  let entered: string | null;
  try {
    entered = await reader.readSecret(`${label} API key: `);
  } finally {
    reader.close();
  }
  if (entered === null) {
    throw new ConfigError('No API key entered.');
  }

  const apiKey = validateInput(ApiKeySchema, entered, 'API key');
  log.debug(`storing ${provider} key ${describeSecret(apiKey)}`);
  await ctx.credentials.saveApiKey(provider, apiKey);
  renderer.info(`Saved the ${label} API key.`);

  const fromEnv = envCredential(provider, ctx.env);
  if (fromEnv) {
    renderer.info(`Note: ${fromEnv.envVar} is set and takes precedence over the saved key.`);
  }
  return 0;
}

export async function runClearKey(providerArg: string, ctx: CliContext): Promise<number> {
  const provider = toProviderName(providerArg);
  const label = PROVIDER_LABELS[provider];
  const renderer = new TerminalRenderer(ctx.stdout);

  const removed = await ctx.credentials.deleteApiKey(provider);
  renderer.info(removed ? `Removed the saved ${label} API key.` : `No saved ${label} API key.`);
  return 0;
}
