/**
 * Error types for startup and for the provider dispatch layer.
 *
 * Startup errors end the process with a non-zero exit code. A ProviderError
 * is reported to the user and the session loop carries on, so every vendor
 * failure has to be folded into one of the ProviderErrorKind values here.
 */

import { PROVIDER_ENV_KEYS, PROVIDER_LABELS } from '../../../shared/constants';
import { PROVIDER_NAMES } from '../../../shared/types';
import type { ProviderErrorKind, ProviderName } from '../../../shared/types';

// ── Startup errors ────────────────────────────────────────────────────

export class StartupError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string) {
    super(message);
    this.name = 'StartupError';
  }
}

export class UnknownProviderError extends StartupError {
  readonly providerName: string;

  constructor(providerName: string) {
    super(`Unknown provider '${providerName}'. Choose one of: ${PROVIDER_NAMES.join(', ')}.`);
    this.name = 'UnknownProviderError';
    this.providerName = providerName;
  }
}

export class MissingCredentialError extends StartupError {
  readonly provider: ProviderName;

  constructor(provider: ProviderName) {
    super(
      `No API key for ${PROVIDER_LABELS[provider]}. ` +
      `Set ${PROVIDER_ENV_KEYS[provider].join(' or ')}, or run 'parley set-key ${provider}'.`,
    );
    this.name = 'MissingCredentialError';
    this.provider = provider;
  }
}

export class NoCredentialsError extends StartupError {
  constructor() {
    const vars = PROVIDER_NAMES.map((name) => PROVIDER_ENV_KEYS[name][0]).join(', ');
    super(`No API key is configured for any provider. Set one of ${vars}, or run 'parley set-key <provider>'.`);
    this.name = 'NoCredentialsError';
  }
}

/** Invalid settings file, saved chat or command-line arguments */
export class ConfigError extends StartupError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Bad command-line arguments */
export class UsageError extends StartupError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Programming error: adapters need at least one user turn to send. */
export class EmptyConversationError extends Error {
  constructor() {
    super('Conversation must contain at least one user turn');
    this.name = 'EmptyConversationError';
  }
}

// ── Provider errors ───────────────────────────────────────────────────

const USER_MESSAGES: Record<ProviderErrorKind, string> = {
  AUTH: 'The API key was rejected. Check it and try again.',
  RATE_LIMIT: 'The provider is rate limiting requests. Wait a moment, then resubmit.',
  NETWORK: 'Could not reach the provider. Check your connection, then resubmit.',
  INVALID_RESPONSE: 'The provider returned a response that could not be used.',
  TIMEOUT: 'The provider took too long to answer.',
  CANCELLED: 'Request cancelled.',
};

export function getUserMessage(kind: ProviderErrorKind): string {
  return USER_MESSAGES[kind];
}

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly provider: ProviderName;
  readonly statusCode: number | undefined;

  constructor(
    kind: ProviderErrorKind,
    message: string,
    provider: ProviderName,
    statusCode?: number,
  ) {
    super(message);
    this.name = 'ProviderError';
    this.kind = kind;
    this.provider = provider;
    this.statusCode = statusCode;
  }

  get userMessage(): string {
    return getUserMessage(this.kind);
  }
}

// ── Classification ────────────────────────────────────────────────────

const TIMEOUT_NAMES = new Set(['APIConnectionTimeoutError', 'RequestTimeoutError', 'TimeoutError']);
const NETWORK_NAMES = new Set(['APIConnectionError', 'ConnectionError', 'FetchError']);
const ABORT_NAMES = new Set(['APIUserAbortError', 'RequestAbortedError', 'AbortError']);

/** Gemini answers a bad key with 400 INVALID_ARGUMENT rather than 401 */
const BAD_KEY_PATTERN = /api[_ ]key[_ ]invalid|api key not valid/i;
const TIMEOUT_PATTERN = /timed? ?out|timeout|ETIMEDOUT|deadline/i;
const NETWORK_PATTERN = /ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN|EPIPE|socket hang up|fetch failed|connection error|network/i;

/** HTTP status carried by SDK errors: `status` (OpenAI, Anthropic, Google) or `statusCode` (Mistral). */
export function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

export function kindForStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'AUTH';
  if (status === 429) return 'RATE_LIMIT';
  if (status === 408) return 'TIMEOUT';
  if (status >= 500) return 'NETWORK';
  return 'INVALID_RESPONSE';
}

/**
 * Fold whatever an SDK threw into exactly one ProviderError kind.
 * Cancellation and the configured deadline are decided by the caller, which
 * owns the abort signals; this only looks at the error itself.
 */
export function classifyProviderError(error: unknown, provider: ProviderName): ProviderError {
  if (error instanceof ProviderError) return error;

  const label = PROVIDER_LABELS[provider];
  const message = error instanceof Error ? error.message : String(error);
  const status = readStatus(error);

  if (status !== undefined) {
    const kind = status === 400 && BAD_KEY_PATTERN.test(message) ? 'AUTH' : kindForStatus(status);
    return new ProviderError(kind, `${label} error (${status}): ${message}`, provider, status);
  }

  const name = error instanceof Error ? error.name : '';
  if (ABORT_NAMES.has(name)) {
    return new ProviderError('CANCELLED', `${label} request aborted: ${message}`, provider);
  }
  if (TIMEOUT_NAMES.has(name) || TIMEOUT_PATTERN.test(message)) {
    return new ProviderError('TIMEOUT', `${label} timed out: ${message}`, provider);
  }
  if (NETWORK_NAMES.has(name) || NETWORK_PATTERN.test(message)) {
    return new ProviderError('NETWORK', `${label} network error: ${message}`, provider);
  }
  if (error instanceof SyntaxError) {
    return new ProviderError('INVALID_RESPONSE', `${label} sent a malformed payload: ${message}`, provider);
  }

  return new ProviderError('NETWORK', `${label} request failed: ${message}`, provider);
}
