import { GoogleGenAI } from '@google/genai';
import type { Content, GenerateContentConfig, GenerateContentResponse } from '@google/genai';
import { BaseProvider } from './BaseProvider';
import { alternatingTurns, collectSystemText } from './turnShaping';
import type { StreamDelta } from './LLMProvider';
import type { ProviderConfig, Reply, TokenUsage, Turn } from '../../../../shared/types';

const MODEL_PREFIX = 'models/';

export function toGeminiRequest(conversation: readonly Turn[]): {
  systemInstruction: string | undefined;
  contents: Content[];
} {
  return {
    systemInstruction: collectSystemText(conversation),
    contents: alternatingTurns(conversation).map((turn) => ({
      role: turn.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: turn.text }],
    })),
  };
}

function usageOf(response: GenerateContentResponse): TokenUsage | undefined {
  const meta = response.usageMetadata;
  if (!meta) return undefined;
  return {
    inputTokens: meta.promptTokenCount ?? 0,
    outputTokens: meta.candidatesTokenCount ?? 0,
  };
}

/**
 * Gemini via the unified @google/genai SDK, API-key backend only.
 */
export class GoogleProvider extends BaseProvider {
  private readonly ai: GoogleGenAI;

  constructor(config: ProviderConfig) {
    super(config, 'GoogleProvider');
    this.ai = new GoogleGenAI({
      apiKey: config.apiKey,
      ...(config.baseUrl ? { httpOptions: { baseUrl: config.baseUrl } } : {}),
    });
  }

  private generationConfig(systemInstruction: string | undefined, signal: AbortSignal): GenerateContentConfig {
    const config: GenerateContentConfig = {
      maxOutputTokens: this.config.maxTokens,
      abortSignal: signal,
    };
    if (systemInstruction) config.systemInstruction = systemInstruction;
    if (this.config.temperature !== undefined) config.temperature = this.config.temperature;
    return config;
  }

  protected async complete(conversation: readonly Turn[], signal: AbortSignal): Promise<Reply> {
    const { systemInstruction, contents } = toGeminiRequest(conversation);
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents,
      config: this.generationConfig(systemInstruction, signal),
    });

    return {
      text: response.text ?? '',
      finishReason: response.candidates?.[0]?.finishReason ?? 'STOP',
      usage: usageOf(response),
    };
  }

  protected async *openStream(conversation: readonly Turn[], signal: AbortSignal): AsyncGenerator<StreamDelta> {
    const { systemInstruction, contents } = toGeminiRequest(conversation);
    const stream = await this.ai.models.generateContentStream({
      model: this.model,
      contents,
      config: this.generationConfig(systemInstruction, signal),
    });

    for await (const chunk of stream) {
      const delta: StreamDelta = {};
      const text = chunk.text;
      if (text) delta.text = text;
      const finishReason = chunk.candidates?.[0]?.finishReason;
      if (finishReason) delta.finishReason = finishReason;
      const usage = usageOf(chunk);
      if (usage) delta.usage = usage;
      yield delta;
    }
  }

  protected async fetchModels(signal: AbortSignal): Promise<string[]> {
    const pager = await this.ai.models.list({ config: { abortSignal: signal } });
    const ids: string[] = [];
    for await (const model of pager) {
      if (!model.name) continue;
      ids.push(model.name.startsWith(MODEL_PREFIX) ? model.name.slice(MODEL_PREFIX.length) : model.name);
    }
    return ids;
  }
}
