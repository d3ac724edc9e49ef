/**
 * LLMProvider interface: the only AI abstraction the rest of the app touches.
 *
 * Each provider wraps its vendor's SDK internally and maps the neutral turn
 * sequence to that vendor's request shape. Adding a provider means adding a
 * class that conforms to this interface and registering it in ProviderRegistry.
 */

import type { ProviderName, Reply, TokenUsage, Turn } from '../../../../shared/types';
import type { ReplyStream } from './ReplyStream';

export interface SendOptions {
  /** Aborting this signal cancels the in-flight request */
  signal?: AbortSignal;
}

/** One increment of a streamed reply, as produced by an adapter */
export interface StreamDelta {
  text?: string;
  finishReason?: string;
  usage?: TokenUsage;
}

export interface LLMProvider {
  readonly name: ProviderName;
  readonly model: string;

  /** Non-streaming call; resolves with the full reply */
  send(conversation: readonly Turn[], options?: SendOptions): Promise<Reply>;

  /** Streaming call; chunks arrive through the returned single-use stream */
  stream(conversation: readonly Turn[], options?: SendOptions): ReplyStream;

  /** Model ids available to the configured credential */
  listModels(options?: SendOptions): Promise<string[]>;
}
