import OpenAI from 'openai';
import { BaseProvider } from './BaseProvider';
import type { StreamDelta } from './LLMProvider';
import type { ProviderConfig, Reply, Turn } from '../../../../shared/types';

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export function toOpenAIMessages(conversation: readonly Turn[]): ChatMessage[] {
  return conversation.map((turn): ChatMessage => {
    switch (turn.role) {
      case 'system':
        return { role: 'system', content: turn.text };
      case 'assistant':
        return { role: 'assistant', content: turn.text };
      case 'user':
        return { role: 'user', content: turn.text };
    }
  });
}

export class OpenAIProvider extends BaseProvider {
  private readonly client: OpenAI;

  constructor(config: ProviderConfig) {
    super(config, 'OpenAIProvider');
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
    this.log.debug('client created — model:', config.model, '| baseURL:', config.baseUrl ?? 'default');
  }

  private baseParams(conversation: readonly Turn[]) {
    return {
      model: this.model,
      max_completion_tokens: this.config.maxTokens,
      messages: toOpenAIMessages(conversation),
      ...(this.config.temperature !== undefined ? { temperature: this.config.temperature } : {}),
    };
  }

  protected async complete(conversation: readonly Turn[], signal: AbortSignal): Promise<Reply> {
    const response = await this.client.chat.completions.create(
      { ...this.baseParams(conversation), stream: false as const },
      { signal },
    );

    const choice = response.choices[0];
    return {
      text: choice?.message.content ?? '',
      finishReason: choice?.finish_reason ?? 'stop',
      usage: response.usage
        ? { inputTokens: response.usage.prompt_tokens, outputTokens: response.usage.completion_tokens }
        : undefined,
    };
  }

  protected async *openStream(conversation: readonly Turn[], signal: AbortSignal): AsyncGenerator<StreamDelta> {
    const stream = await this.client.chat.completions.create(
      {
        ...this.baseParams(conversation),
        stream: true as const,
        stream_options: { include_usage: true },
      },
      { signal },
    );

    for await (const chunk of stream) {
      const choice = chunk.choices[0];
      const delta: StreamDelta = {};
      if (choice?.delta?.content) delta.text = choice.delta.content;
      if (choice?.finish_reason) delta.finishReason = choice.finish_reason;
      // Usage arrives on the final chunk, which carries no choices
      if (chunk.usage) {
        delta.usage = {
          inputTokens: chunk.usage.prompt_tokens,
          outputTokens: chunk.usage.completion_tokens,
        };
      }
      yield delta;
    }
  }

  protected async fetchModels(signal: AbortSignal): Promise<string[]> {
    const ids: string[] = [];
    for await (const model of this.client.models.list({ signal })) {
      ids.push(model.id);
    }
    return ids;
  }
}
