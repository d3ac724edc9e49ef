import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  ctor: vi.fn(),
  create: vi.fn(),
  stream: vi.fn(),
  listModels: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: mocks.create, stream: mocks.stream };
    models = { list: mocks.listModels };
    constructor(options: unknown) {
      mocks.ctor(options);
    }
  },
}));

import { AnthropicProvider, toAnthropicRequest } from '../providers/AnthropicProvider';
import { createTurn } from '../../chat/Conversation';
import { TEST_CONFIG } from '../../../../test-utils/fakes';

const config = { ...TEST_CONFIG, name: 'anthropic' as const, model: 'claude-x' };

describe('AnthropicProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('creates the client with retries disabled', () => {
    new AnthropicProvider(config);
    expect(mocks.ctor).toHaveBeenCalledWith({ apiKey: 'test-secret', baseURL: undefined, maxRetries: 0 });
  });

  it('moves system turns to the system field and merges repeated roles', () => {
    expect(toAnthropicRequest([
      createTurn('system', 'Be brief'),
      createTurn('user', 'Hello'),
      createTurn('user', 'Are you there?'),
      createTurn('assistant', 'Yes'),
      createTurn('system', 'Answer in English'),
    ])).toEqual({
      system: 'Be brief\n\nAnswer in English',
      messages: [
        { role: 'user', content: 'Hello\n\nAre you there?' },
        { role: 'assistant', content: 'Yes' },
      ],
    });
  });

  describe('send', () => {
    it('joins the text blocks of the answer', async () => {
      mocks.create.mockResolvedValue({
        content: [
          { type: 'text', text: 'Hi ' },
          { type: 'tool_use', id: 'toolu_1', name: 'noop', input: {} },
          { type: 'text', text: 'there' },
        ],
        stop_reason: 'end_turn',
        usage: { input_tokens: 3, output_tokens: 2 },
      });
      const provider = new AnthropicProvider({ ...config, temperature: 0.5 });

      const reply = await provider.send([createTurn('system', 'Be brief'), createTurn('user', 'Hello')]);

      expect(reply).toEqual({ text: 'Hi there', finishReason: 'end_turn', usage: { inputTokens: 3, outputTokens: 2 } });
      expect(mocks.create).toHaveBeenCalledWith(
        {
          model: 'claude-x',
          max_tokens: 256,
          system: 'Be brief',
          temperature: 0.5,
          messages: [{ role: 'user', content: 'Hello' }],
        },
        { signal: expect.any(AbortSignal) },
      );
    });

    it('leaves out the temperature for thinking models', async () => {
      mocks.create.mockResolvedValue({
        content: [{ type: 'text', text: 'ok' }],
        stop_reason: 'end_turn',
        usage: { input_tokens: 1, output_tokens: 1 },
      });
      const provider = new AnthropicProvider({ ...config, model: 'claude-x-thinking', temperature: 0.5 });

      await provider.send([createTurn('user', 'Hello')]);

      expect(mocks.create.mock.calls[0]?.[0]).not.toHaveProperty('temperature');
    });

    it('maps an overloaded API to NETWORK', async () => {
      mocks.create.mockRejectedValue(Object.assign(new Error('Overloaded'), { status: 529 }));
      const provider = new AnthropicProvider(config);

      await expect(provider.send([createTurn('user', 'Hello')])).rejects.toMatchObject({
        kind: 'NETWORK',
        statusCode: 529,
        message: 'Anthropic error (529): Overloaded',
      });
    });
  });

  describe('stream', () => {
    it('yields text deltas and reads the stop reason from the final message', async () => {
      const events = [
        { type: 'message_start' },
        { type: 'content_block_delta', delta: { type: 'text_delta', text: 'Hi ' } },
        { type: 'content_block_delta', delta: { type: 'input_json_delta', partial_json: '{}' } },
        { type: 'content_block_delta', delta: { type: 'text_delta', text: 'there' } },
        { type: 'message_stop' },
      ];
      mocks.stream.mockReturnValue({
        async *[Symbol.asyncIterator]() {
          yield* events;
        },
        finalMessage: async () => ({ stop_reason: 'max_tokens', usage: { input_tokens: 3, output_tokens: 2 } }),
      });
      const provider = new AnthropicProvider(config);
      const stream = provider.stream([createTurn('user', 'Hello')]);

      const chunks: string[] = [];
      for await (const chunk of stream) chunks.push(chunk);

      expect(chunks).toEqual(['Hi ', 'there']);
      await expect(stream.reply()).resolves.toEqual({
        text: 'Hi there',
        finishReason: 'max_tokens',
        usage: { inputTokens: 3, outputTokens: 2 },
      });
    });
  });

  describe('listModels', () => {
    it('returns the model ids', async () => {
      mocks.listModels.mockReturnValue((async function* () {
        yield { id: 'claude-b' };
        yield { id: 'claude-a' };
      })());
      const provider = new AnthropicProvider(config);

      await expect(provider.listModels()).resolves.toEqual(['claude-a', 'claude-b']);
      expect(mocks.listModels).toHaveBeenCalledWith({}, { signal: expect.any(AbortSignal) });
    });
  });
});
