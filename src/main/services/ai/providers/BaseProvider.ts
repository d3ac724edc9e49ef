import { createLogger } from '../../../utils/logger';
import type { Logger } from '../../../utils/logger';
import { EmptyConversationError, ProviderError, classifyProviderError } from '../errors';
import { ReplyStream } from './ReplyStream';
import type { LLMProvider, SendOptions, StreamDelta } from './LLMProvider';
import type { ProviderConfig, ProviderName, Reply, Turn } from '../../../../shared/types';

/** Timeout and caller cancellation merged into the one signal handed to the SDK */
interface Deadline {
  signal: AbortSignal;
  timeout: AbortSignal;
  caller?: AbortSignal;
}

function createDeadline(timeoutMs: number, caller?: AbortSignal): Deadline {
  const timeout = AbortSignal.timeout(timeoutMs);
  const signal = caller ? AbortSignal.any([caller, timeout]) : timeout;
  return { signal, timeout, caller };
}

/** Rejects as soon as `signal` aborts, even if the SDK call has not noticed yet. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export function assertHasUserTurn(conversation: readonly Turn[]): void {
  if (!conversation.some((turn) => turn.role === 'user')) {
    throw new EmptyConversationError();
  }
}

/**
 * Shared plumbing for every vendor adapter: input checks, the per-call
 * deadline, cancellation and error normalisation. Subclasses only translate
 * turns into their SDK's request and the SDK's answer back into a Reply.
 *
 * Exactly one SDK request is made per call; retries are never attempted here.
 */
export abstract class BaseProvider implements LLMProvider {
  protected readonly log: Logger;

  protected constructor(protected readonly config: ProviderConfig, scope: string) {
    this.log = createLogger(scope);
  }

  get name(): ProviderName {
    return this.config.name;
  }

  get model(): string {
    return this.config.model;
  }

  protected abstract complete(conversation: readonly Turn[], signal: AbortSignal): Promise<Reply>;

  protected abstract openStream(conversation: readonly Turn[], signal: AbortSignal): AsyncIterable<StreamDelta>;

  protected abstract fetchModels(signal: AbortSignal): Promise<string[]>;

  async send(conversation: readonly Turn[], options: SendOptions = {}): Promise<Reply> {
    assertHasUserTurn(conversation);
    const deadline = createDeadline(this.config.timeoutMs, options.signal);

    this.log.debug(`send() — model: ${this.model} | turns: ${conversation.length}`);

    let reply: Reply;
    try {
      reply = await abortable(this.complete(conversation, deadline.signal), deadline.signal);
    } catch (error) {
      throw this.normalizeError(error, deadline);
    }

    if (!reply.text.trim()) {
      throw new ProviderError(
        'INVALID_RESPONSE',
        `${this.name} returned an empty completion (finish reason: ${reply.finishReason})`,
        this.name,
      );
    }

    this.log.debug(`send() success — finish: ${reply.finishReason}`,
      reply.usage ? `| tokens in/out: ${reply.usage.inputTokens} / ${reply.usage.outputTokens}` : '');
    return reply;
  }

  stream(conversation: readonly Turn[], options: SendOptions = {}): ReplyStream {
    assertHasUserTurn(conversation);

    const self = this;
    let deadline: Deadline | null = null;

    // The deadline starts when iteration starts, not when the stream object is created.
    async function* open(): AsyncGenerator<StreamDelta> {
      deadline = createDeadline(self.config.timeoutMs, options.signal);
      const { signal } = deadline;
      self.log.debug(`stream() — model: ${self.model} | turns: ${conversation.length}`);

      for await (const delta of self.openStream(conversation, signal)) {
        if (signal.aborted) throw signal.reason;
        yield delta;
      }
    }

    return new ReplyStream(this.name, open, (error) =>
      this.normalizeError(error, deadline ?? createDeadline(this.config.timeoutMs, options.signal)));
  }

  async listModels(options: SendOptions = {}): Promise<string[]> {
    const deadline = createDeadline(this.config.timeoutMs, options.signal);
    try {
      const models = await abortable(this.fetchModels(deadline.signal), deadline.signal);
      return [...models].sort();
    } catch (error) {
      throw this.normalizeError(error, deadline);
    }
  }

  private normalizeError(error: unknown, deadline: Deadline): ProviderError {
    if (error instanceof ProviderError) return error;

    let normalized: ProviderError;
    if (deadline.caller?.aborted) {
      normalized = new ProviderError('CANCELLED', `${this.name} request cancelled`, this.name);
    } else if (deadline.timeout.aborted) {
      normalized = new ProviderError(
        'TIMEOUT',
        `${this.name} did not answer within ${this.config.timeoutMs} ms`,
        this.name,
      );
    } else {
      normalized = classifyProviderError(error, this.name);
    }

    this.log.warn(`request failed — kind: ${normalized.kind}`,
      normalized.statusCode !== undefined ? `| status: ${normalized.statusCode}` : '',
      `| message: ${normalized.message}`);
    return normalized;
  }
}
