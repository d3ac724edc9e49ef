/**
 * Application settings types
 */

import type { ProviderName } from './ai';

export interface AppSettings {
  // Provider selection
  defaultProvider: ProviderName;
  models: Record<ProviderName, string>;

  /** Endpoint overrides, e.g. a proxy or an OpenAI-compatible gateway */
  baseUrls: Partial<Record<ProviderName, string>>;

  // Request settings
  timeoutMs: number;
  maxTokens: number;
  /** null leaves the vendor's default in place */
  temperature: number | null;

  // Output settings
  stream: boolean;
  plain: boolean;
}

export const DEFAULT_SETTINGS: AppSettings = {
  defaultProvider: 'openai',
  models: {
    anthropic: 'claude-sonnet-4-5',
    google: 'gemini-2.5-flash',
    mistral: 'mistral-large-latest',
    openai: 'gpt-4o',
  },
  baseUrls: {},

  timeoutMs: 120_000,
  maxTokens: 4096,
  temperature: null,

  stream: true,
  plain: false,
};
