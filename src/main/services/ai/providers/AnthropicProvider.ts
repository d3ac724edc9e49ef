import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider } from './BaseProvider';
import { alternatingTurns, collectSystemText } from './turnShaping';
import type { StreamDelta } from './LLMProvider';
import type { ProviderConfig, Reply, Turn } from '../../../../shared/types';

/**
 * Models that use extended thinking reject a custom temperature.
 */
function isThinkingModel(model: string): boolean {
  return model.includes('thinking');
}

export function toAnthropicRequest(conversation: readonly Turn[]): {
  system: string | undefined;
  messages: Anthropic.MessageParam[];
} {
  return {
    system: collectSystemText(conversation),
    messages: alternatingTurns(conversation).map((turn) => ({ role: turn.role, content: turn.text })),
  };
}

export class AnthropicProvider extends BaseProvider {
  private readonly client: Anthropic;

  constructor(config: ProviderConfig) {
    super(config, 'AnthropicProvider');
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  private params(conversation: readonly Turn[]): Anthropic.MessageCreateParamsNonStreaming {
    const { system, messages } = toAnthropicRequest(conversation);
    const temperature = this.config.temperature;
    return {
      model: this.model,
      max_tokens: this.config.maxTokens,
      messages,
      ...(system ? { system } : {}),
      ...(temperature !== undefined && !isThinkingModel(this.model) ? { temperature } : {}),
    };
  }

  protected async complete(conversation: readonly Turn[], signal: AbortSignal): Promise<Reply> {
    const response = await this.client.messages.create(this.params(conversation), { signal });

    const text = response.content
      .filter((b): b is Anthropic.TextBlock => b.type === 'text')
      .map(b => b.text)
      .join('');

    return {
      text,
      finishReason: response.stop_reason ?? 'end_turn',
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  protected async *openStream(conversation: readonly Turn[], signal: AbortSignal): AsyncGenerator<StreamDelta> {
    const stream = this.client.messages.stream(this.params(conversation), { signal });

    for await (const event of stream) {
      if (
        event.type === 'content_block_delta' &&
        event.delta.type === 'text_delta'
      ) {
        yield { text: event.delta.text };
      }
    }

    const finalMessage = await stream.finalMessage();
    yield {
      finishReason: finalMessage.stop_reason ?? 'end_turn',
      usage: {
        inputTokens: finalMessage.usage.input_tokens,
        outputTokens: finalMessage.usage.output_tokens,
      },
    };
  }

  protected async fetchModels(signal: AbortSignal): Promise<string[]> {
    const ids: string[] = [];
    for await (const model of this.client.models.list({}, { signal })) {
      ids.push(model.id);
    }
    return ids;
  }
}
