import { ProviderError } from '../errors';
import type { ProviderName, Reply, TokenUsage } from '../../../../shared/types';
import type { StreamDelta } from './LLMProvider';

/**
 * A lazy, finite, single-use sequence of reply text chunks.
 *
 * Nothing is requested until iteration starts. Iterating a second time throws.
 * Once the sequence is exhausted, reply() resolves to the assembled Reply.
 * Every failure surfaces from the iterator as a ProviderError.
 */
export class ReplyStream implements AsyncIterable<string> {
  private consumed = false;
  private final: Reply | null = null;

  constructor(
    private readonly provider: ProviderName,
    private readonly open: () => AsyncIterable<StreamDelta>,
    private readonly normalizeError: (error: unknown) => ProviderError,
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    if (this.consumed) {
      throw new Error('ReplyStream can only be consumed once');
    }
    this.consumed = true;

    let text = '';
    let finishReason = 'stop';
    let usage: TokenUsage | undefined;

    try {
      for await (const delta of this.open()) {
        if (delta.usage) usage = delta.usage;
        if (delta.finishReason) finishReason = delta.finishReason;
        if (delta.text) {
          text += delta.text;
          yield delta.text;
        }
      }
    } catch (error) {
      throw this.normalizeError(error);
    }

    if (!text.trim()) {
      throw new ProviderError(
        'INVALID_RESPONSE',
        `${this.provider} returned an empty completion (finish reason: ${finishReason})`,
        this.provider,
      );
    }

    this.final = { text, finishReason, usage };
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  /** The assembled reply. Rejects unless the stream ran to completion. */
  async reply(): Promise<Reply> {
    if (!this.final) {
      throw new Error('ReplyStream has not completed');
    }
    return this.final;
  }
}
