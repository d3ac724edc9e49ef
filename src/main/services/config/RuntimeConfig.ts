import { PROVIDER_ENV_KEYS } from '../../../shared/constants';
import { PROVIDER_NAMES } from '../../../shared/types';
import type { AppSettings, ProviderConfig, ProviderName } from '../../../shared/types';
import type { Credentials } from '../security/CredentialVault';

export interface CredentialSource {
  getAllApiKeys(): Promise<Credentials>;
}

/** The first env variable for `provider` that holds a non-blank value */
export function envCredential(
  provider: ProviderName,
  env: NodeJS.ProcessEnv,
): { value: string; envVar: string } | undefined {
  for (const envVar of PROVIDER_ENV_KEYS[provider]) {
    const value = env[envVar]?.trim();
    if (value) return { value, envVar };
  }
  return undefined;
}

/**
 * Snapshot of every provider's API key, taken once at startup.
 * An environment variable wins over the key stored in the settings directory.
 */
export async function loadCredentials(
  env: NodeJS.ProcessEnv,
  source: CredentialSource,
): Promise<Readonly<Credentials>> {
  const stored = await source.getAllApiKeys();
  const credentials: Credentials = {};
  for (const provider of PROVIDER_NAMES) {
    const apiKey = envCredential(provider, env)?.value ?? stored[provider];
    if (apiKey) credentials[provider] = apiKey;
  }
  return Object.freeze(credentials);
}

export function buildProviderConfig(
  name: ProviderName,
  apiKey: string,
  settings: AppSettings,
  model?: string,
): ProviderConfig {
  return Object.freeze({
    name,
    apiKey,
    model: model ?? settings.models[name],
    baseUrl: settings.baseUrls[name],
    timeoutMs: settings.timeoutMs,
    maxTokens: settings.maxTokens,
    temperature: settings.temperature ?? undefined,
  });
}
