/**
 * ProviderRegistry: maps a provider name to its adapter.
 *
 * The table of providers is closed and lives here. Credentials are a snapshot
 * handed in at construction (see loadCredentials), so resolving never goes
 * back to the environment or the credential file.
 */

import { PROVIDER_ENV_KEYS, PROVIDER_LABELS } from '../../../shared/constants';
import { PROVIDER_NAMES, isProviderName } from '../../../shared/types';
import type { AppSettings, ProviderConfig, ProviderName } from '../../../shared/types';
import { createLogger } from '../../utils/logger';
import { sanitizeForLog } from '../../utils/sanitize';
import { buildProviderConfig, envCredential, loadCredentials } from '../config/RuntimeConfig';
import type { CredentialSource } from '../config/RuntimeConfig';
import type { Credentials } from '../security/CredentialVault';
import { MissingCredentialError, UnknownProviderError } from './errors';
import type { LLMProvider } from './providers/LLMProvider';
import { AnthropicProvider } from './providers/AnthropicProvider';
import { GoogleProvider } from './providers/GoogleProvider';
import { MistralProvider } from './providers/MistralProvider';
import { OpenAIProvider } from './providers/OpenAIProvider';

const log = createLogger('ProviderRegistry');

export type ProviderFactory = (config: ProviderConfig) => LLMProvider;

export const PROVIDER_FACTORIES: Readonly<Record<ProviderName, ProviderFactory>> = {
  anthropic: (config) => new AnthropicProvider(config),
  google: (config) => new GoogleProvider(config),
  mistral: (config) => new MistralProvider(config),
  openai: (config) => new OpenAIProvider(config),
};

export interface ProviderStatus {
  name: ProviderName;
  label: string;
  hasCredential: boolean;
  /** Where the key comes from: the env variable in use, or the one to set */
  envVar: string;
  fromEnv: boolean;
}

export class ProviderRegistry {
  private readonly instances = new Map<string, LLMProvider>();

  constructor(
    private readonly settings: AppSettings,
    private readonly credentials: Readonly<Credentials>,
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly factories: Readonly<Record<ProviderName, ProviderFactory>> = PROVIDER_FACTORIES,
  ) {}

  /** Reads the credential source exactly once. */
  static async create(
    settings: AppSettings,
    source: CredentialSource,
    env: NodeJS.ProcessEnv = process.env,
    factories?: Readonly<Record<ProviderName, ProviderFactory>>,
  ): Promise<ProviderRegistry> {
    const credentials = await loadCredentials(env, source);
    return new ProviderRegistry(settings, credentials, env, factories);
  }

  /**
   * The adapter for `name`, using `model` or the provider's default model.
   * The same (name, model) pair always yields the same instance.
   */
  resolve(name: string, model?: string): LLMProvider {
    if (!isProviderName(name)) {
      throw new UnknownProviderError(name);
    }

    const apiKey = this.credentials[name];
    if (!apiKey) {
      throw new MissingCredentialError(name);
    }

    const config = buildProviderConfig(name, apiKey, this.settings, model);
    const cacheKey = `${name}:${config.model}`;
    const cached = this.instances.get(cacheKey);
    if (cached) return cached;

    log.debug('creating adapter', sanitizeForLog(config));
    const provider = this.factories[name](config);
    this.instances.set(cacheKey, provider);
    return provider;
  }

  available(): ProviderStatus[] {
    return PROVIDER_NAMES.map((name) => {
      const fromEnv = envCredential(name, this.env);
      return {
        name,
        label: PROVIDER_LABELS[name],
        hasCredential: Boolean(this.credentials[name]),
        envVar: fromEnv?.envVar ?? PROVIDER_ENV_KEYS[name][0] ?? '',
        fromEnv: fromEnv !== undefined,
      };
    });
  }
}
