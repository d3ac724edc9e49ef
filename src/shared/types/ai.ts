/**
 * AI-related types
 */

/** Closed set of providers the CLI can dispatch to. */
export const PROVIDER_NAMES = ['anthropic', 'google', 'mistral', 'openai'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value);
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/** A completed model answer. Never mutated once produced. */
export interface Reply {
  text: string;
  finishReason: string;
  usage?: TokenUsage;
}

/**
 * Everything an adapter needs to talk to one vendor.
 * Built once at startup and read-only for the rest of the session.
 */
export interface ProviderConfig {
  readonly name: ProviderName;
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl?: string;
  readonly timeoutMs: number;
  readonly maxTokens: number;
  readonly temperature?: number;
}

export type ProviderErrorKind =
  | 'AUTH'
  | 'RATE_LIMIT'
  | 'NETWORK'
  | 'INVALID_RESPONSE'
  | 'TIMEOUT'
  | 'CANCELLED';
