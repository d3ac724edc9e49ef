import { Mistral } from '@mistralai/mistralai';
import { BaseProvider } from './BaseProvider';
import type { StreamDelta } from './LLMProvider';
import type { ProviderConfig, Reply, Turn } from '../../../../shared/types';

type MistralMessage = Parameters<Mistral['chat']['complete']>[0]['messages'][number];

/** Mistral content is either a plain string or a list of typed chunks. */
export function contentText(content: string | readonly object[] | null | undefined): string {
  if (typeof content === 'string') return content;
  if (!content) return '';
  return content
    .map((chunk) => ('text' in chunk && typeof chunk.text === 'string' ? chunk.text : ''))
    .join('');
}

export function toMistralMessages(conversation: readonly Turn[]): MistralMessage[] {
  return conversation.map((turn): MistralMessage => {
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

export class MistralProvider extends BaseProvider {
  private readonly client: Mistral;

  constructor(config: ProviderConfig) {
    super(config, 'MistralProvider');
    this.client = new Mistral({
      apiKey: config.apiKey,
      ...(config.baseUrl ? { serverURL: config.baseUrl } : {}),
      retryConfig: { strategy: 'none' },
    });
  }

  private request(conversation: readonly Turn[]) {
    return {
      model: this.model,
      messages: toMistralMessages(conversation),
      maxTokens: this.config.maxTokens,
      ...(this.config.temperature !== undefined ? { temperature: this.config.temperature } : {}),
    };
  }

  protected async complete(conversation: readonly Turn[], signal: AbortSignal): Promise<Reply> {
    const response = await this.client.chat.complete(this.request(conversation), {
      fetchOptions: { signal },
    });

    const choice = response.choices?.[0];
    return {
      text: contentText(choice?.message.content),
      finishReason: choice?.finishReason ?? 'stop',
      usage: response.usage
        ? { inputTokens: response.usage.promptTokens ?? 0, outputTokens: response.usage.completionTokens ?? 0 }
        : undefined,
    };
  }

  protected async *openStream(conversation: readonly Turn[], signal: AbortSignal): AsyncGenerator<StreamDelta> {
    const stream = await this.client.chat.stream(this.request(conversation), {
      fetchOptions: { signal },
    });

    for await (const event of stream) {
      const chunk = event.data;
      const choice = chunk.choices[0];
      const delta: StreamDelta = {};
      const text = contentText(choice?.delta.content);
      if (text) delta.text = text;
      if (choice?.finishReason) delta.finishReason = choice.finishReason;
      if (chunk.usage) {
        delta.usage = {
          inputTokens: chunk.usage.promptTokens ?? 0,
          outputTokens: chunk.usage.completionTokens ?? 0,
        };
      }
      yield delta;
    }
  }

  protected async fetchModels(signal: AbortSignal): Promise<string[]> {
    const list = await this.client.models.list(undefined, { fetchOptions: { signal } });
    return (list.data ?? []).map((card) => card.id);
  }
}
