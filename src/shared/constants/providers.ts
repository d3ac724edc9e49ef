/**
 * Provider constants
 * Display labels and credential sources for every registered provider
 */

import type { ProviderName } from '../types/ai';

export const PROVIDER_LABELS: Record<ProviderName, string> = {
  anthropic: 'Anthropic',
  google: 'Google',
  mistral: 'Mistral',
  openai: 'OpenAI',
};

/**
 * Environment variables checked for each provider's API key, in order.
 * The first one is the name shown to the user.
 */
export const PROVIDER_ENV_KEYS: Record<ProviderName, readonly string[]> = {
  anthropic: ['ANTHROPIC_API_KEY'],
  google: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
  mistral: ['MISTRAL_API_KEY'],
  openai: ['OPENAI_API_KEY'],
};

/** Name used for the config directory and in version output */
export const PROJECT_NAME = 'parley';

export const LOG_LEVEL_ENV = 'PARLEY_LOG_LEVEL';
