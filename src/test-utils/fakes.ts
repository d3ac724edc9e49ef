import { BaseProvider } from '../main/services/ai/providers/BaseProvider';
import type { StreamDelta } from '../main/services/ai/providers/LLMProvider';
import type { CredentialStore } from '../main/cli/context';
import type { LineReader } from '../main/services/chat/LineReader';
import type { Credentials } from '../main/services/security/CredentialVault';
import type { Output } from '../renderer/TerminalRenderer';
import type { ProviderConfig, ProviderName, Reply, Turn } from '../shared/types';

export const TEST_CONFIG: ProviderConfig = {
  name: 'openai',
  apiKey: 'test-secret',
  model: 'gpt-x',
  timeoutMs: 120_000,
  maxTokens: 256,
};

/** Rejects with the signal's reason once it aborts. */
export function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/**
 * One scripted answer:
 * - a string is the reply text (streamed word by word)
 * - an Error is thrown by the "SDK"
 * - a function gets the request signal and produces the text
 * - `{ chunks, hang }` streams the chunks, then waits until aborted
 */
export type ScriptStep =
  | string
  | Error
  | ((signal: AbortSignal) => Promise<string>)
  | { chunks: string[]; hang: true };

/**
 * Adapter over a script instead of an SDK. Goes through the real BaseProvider
 * plumbing: deadlines, cancellation and error normalisation.
 */
export class ScriptedProvider extends BaseProvider {
  readonly requests: (readonly Turn[])[] = [];
  private readonly script: ScriptStep[];
  private readonly models: string[] | Error;

  constructor(script: ScriptStep[] = [], config: Partial<ProviderConfig> = {}, models: string[] | Error = []) {
    super({ ...TEST_CONFIG, ...config }, 'ScriptedProvider');
    this.script = [...script];
    this.models = models;
  }

  private next(conversation: readonly Turn[]): ScriptStep {
    this.requests.push(conversation);
    const step = this.script.shift();
    if (step === undefined) throw new Error('ScriptedProvider: no reply scripted');
    return step;
  }

  protected async complete(conversation: readonly Turn[], signal: AbortSignal): Promise<Reply> {
    const step = this.next(conversation);
    if (typeof step === 'object' && !(step instanceof Error)) {
      return waitForAbort(signal);
    }
    return { text: await play(step, signal), finishReason: 'stop' };
  }

  protected async *openStream(conversation: readonly Turn[], signal: AbortSignal): AsyncGenerator<StreamDelta> {
    const step = this.next(conversation);
    if (typeof step === 'object' && !(step instanceof Error)) {
      for (const chunk of step.chunks) yield { text: chunk };
      await waitForAbort(signal);
      return;
    }
    const text = await play(step, signal);
    for (const word of text.split(/(?<= )/)) yield { text: word };
    yield { finishReason: 'stop' };
  }

  protected async fetchModels(): Promise<string[]> {
    if (this.models instanceof Error) throw this.models;
    return this.models;
  }
}

async function play(step: Exclude<ScriptStep, { hang: true }>, signal: AbortSignal): Promise<string> {
  if (typeof step === 'string') return step;
  if (step instanceof Error) throw step;
  return step(signal);
}

/** Feeds queued lines to the loop; null once they run out. */
export class ScriptedReader implements LineReader {
  readonly prompts: string[] = [];
  readonly secretPrompts: string[] = [];
  clearedLines = 0;
  closed = false;
  private readonly lines: string[];
  private interruptHandler: (() => void) | null = null;

  constructor(lines: string[] = []) {
    this.lines = [...lines];
  }

  async readLine(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.lines.shift() ?? null;
  }

  async readSecret(prompt: string): Promise<string | null> {
    this.secretPrompts.push(prompt);
    return this.lines.shift() ?? null;
  }

  onInterrupt(handler: () => void): void {
    this.interruptHandler = handler;
  }

  /** Simulates Ctrl+C */
  interrupt(): void {
    this.interruptHandler?.();
  }

  clearLine(): void {
    this.clearedLines += 1;
  }

  close(): void {
    this.closed = true;
  }
}

export class MemoryOutput implements Output {
  readonly chunks: string[] = [];

  constructor(readonly isTTY = false) {}

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

/** role/text pairs, for comparing conversations without ids or timestamps */
export function roleText(turns: readonly Turn[]): { role: string; text: string }[] {
  return turns.map(({ role, text }) => ({ role, text }));
}

/** CredentialVault without the disk or the encryption */
export class MemoryCredentials implements CredentialStore {
  readonly keys: Credentials;

  constructor(initial: Credentials = {}) {
    this.keys = { ...initial };
  }

  async getAllApiKeys(): Promise<Credentials> {
    return { ...this.keys };
  }

  async saveApiKey(provider: ProviderName, apiKey: string): Promise<void> {
    this.keys[provider] = apiKey;
  }

  async deleteApiKey(provider: ProviderName): Promise<boolean> {
    if (this.keys[provider] === undefined) return false;
    delete this.keys[provider];
    return true;
  }
}
