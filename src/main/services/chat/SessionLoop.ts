import { EventEmitter } from 'events';
import type { ProviderName, Reply, SavedChat, Turn } from '../../../shared/types';
import type { TerminalRenderer } from '../../../renderer/TerminalRenderer';
import { SessionNameSchema, validateInput } from '../../schemas';
import { createLogger } from '../../utils/logger';
import { ProviderError } from '../ai/errors';
import type { LLMProvider } from '../ai/providers/LLMProvider';
import type { SavedChatSummary } from '../storage/SessionStore';
import { Conversation, createTurn } from './Conversation';
import { HELP_TEXT, MULTI_LINE_DELIMITER, isCommand, parseCommand } from './commands';
import type { ChatCommand } from './commands';
import type { LineReader } from './LineReader';

const log = createLogger('SessionLoop');

export type SessionState = 'idle' | 'dispatching' | 'rendering' | 'error-reported' | 'terminated';

/** The part of SessionStore the loop needs for /save and /load */
export interface ChatArchive {
  hasSession(name: string): Promise<boolean>;
  getSession(name: string): Promise<SavedChat | null>;
  saveSession(name: string, provider: ProviderName, model: string, turns: readonly Turn[]): Promise<SavedChat>;
  listSessions(): Promise<SavedChatSummary[]>;
}

export interface SessionLoopOptions {
  provider: LLMProvider;
  reader: LineReader;
  renderer: TerminalRenderer;
  archive: ChatArchive;
  /** Print chunks as they arrive instead of waiting for the full reply */
  stream: boolean;
  conversation?: Conversation;
}

/**
 * read → append → dispatch → append → render, one exchange at a time.
 *
 * A ProviderError ends the cycle in 'error-reported' with the user turn kept
 * and no assistant turn added. Anything else escapes run().
 *
 * Emits 'state' with the new SessionState on every transition.
 */
export class SessionLoop extends EventEmitter {
  readonly conversation: Conversation;
  private readonly provider: LLMProvider;
  private readonly reader: LineReader;
  private readonly renderer: TerminalRenderer;
  private readonly archive: ChatArchive;
  private readonly streaming: boolean;

  private _state: SessionState = 'idle';
  private inFlight: AbortController | null = null;

  constructor(options: SessionLoopOptions) {
    super();
    this.provider = options.provider;
    this.reader = options.reader;
    this.renderer = options.renderer;
    this.archive = options.archive;
    this.streaming = options.stream;
    this.conversation = options.conversation ?? new Conversation();
  }

  get state(): SessionState {
    return this._state;
  }

  private setState(next: SessionState): void {
    this._state = next;
    this.emit('state', next);
  }

  async run(): Promise<void> {
    this.reader.onInterrupt(() => this.interrupt());

    while (this._state !== 'terminated') {
      const input = await this.readInput();
      if (input === null) {
        this.renderer.info('\nExiting.');
        this.setState('terminated');
        break;
      }
      if (!input) continue;

      if (isCommand(input)) {
        await this.handleCommand(parseCommand(input));
      } else {
        await this.submit(input);
      }
    }
  }

  /** Ctrl+C: cancels the in-flight request, or clears the line when idle. */
  interrupt(): void {
    if (this.inFlight) {
      log.debug('interrupt — cancelling in-flight request');
      this.inFlight.abort();
      return;
    }
    this.reader.clearLine();
  }

  /**
   * One exchange. Resolves with the reply, or null once a ProviderError has
   * been reported.
   */
  async submit(text: string): Promise<Reply | null> {
    this.conversation.append(createTurn('user', text));
    const controller = new AbortController();
    this.inFlight = controller;
    this.setState('dispatching');

    try {
      const reply = this.streaming
        ? await this.dispatchStreaming(controller.signal)
        : await this.dispatch(controller.signal);

      this.conversation.append(createTurn('assistant', reply.text));
      if (reply.usage) {
        log.debug(`reply — finish: ${reply.finishReason} | tokens in/out: ${reply.usage.inputTokens} / ${reply.usage.outputTokens}`);
      }
      this.setState('idle');
      return reply;
    } catch (error) {
      if (!(error instanceof ProviderError)) throw error;
      this.setState('error-reported');
      this.renderer.renderError(error);
      this.setState('idle');
      return null;
    } finally {
      this.inFlight = null;
    }
  }

  private async dispatch(signal: AbortSignal): Promise<Reply> {
    const stopThinking = this.renderer.showThinking();
    let reply: Reply;
    try {
      reply = await this.provider.send(this.conversation.snapshot(), { signal });
    } finally {
      stopThinking();
    }
    this.setState('rendering');
    this.renderer.render(reply.text);
    return reply;
  }

  private async dispatchStreaming(signal: AbortSignal): Promise<Reply> {
    const stream = this.provider.stream(this.conversation.snapshot(), { signal });
    await this.renderer.renderStream(stream);
    this.setState('rendering');
    return stream.reply();
  }

  // ── Input ─────────────────────────────────────────────────────────

  /** One message, joining a """ block into a single string. */
  private async readInput(): Promise<string | null> {
    const first = await this.reader.readLine(this.renderer.prompt(this.provider.model));
    if (first === null) return null;

    const line = first.trim();
    if (!line.startsWith(MULTI_LINE_DELIMITER)) return line;

    const opening = line.slice(MULTI_LINE_DELIMITER.length);
    if (opening.endsWith(MULTI_LINE_DELIMITER)) {
      return opening.slice(0, -MULTI_LINE_DELIMITER.length).trim();
    }

    const lines = [opening];
    for (;;) {
      const next = await this.reader.readLine('');
      // Input ended inside the block: nothing is sent
      if (next === null) return null;
      const trimmed = next.trimEnd();
      if (trimmed.endsWith(MULTI_LINE_DELIMITER)) {
        lines.push(trimmed.slice(0, -MULTI_LINE_DELIMITER.length));
        break;
      }
      lines.push(trimmed);
    }
    return lines.join('\n').trim();
  }

  private async confirm(question: string): Promise<boolean> {
    const answer = await this.reader.readLine(`${question} (y/n) `);
    return answer?.trim().toLowerCase() === 'y';
  }

  // ── Commands ──────────────────────────────────────────────────────

  private async handleCommand(command: ChatCommand): Promise<void> {
    try {
      switch (command.type) {
        case 'exit':
          this.renderer.info('Exiting.');
          this.setState('terminated');
          return;
        case 'clear':
          this.conversation.clear();
          this.renderer.info('Cleared chat history.');
          break;
        case 'help':
          this.renderer.info(HELP_TEXT);
          break;
        case 'save':
          await this.save(command.name);
          break;
        case 'load':
          if (command.name === undefined) {
            await this.listSaved();
          } else {
            await this.load(command.name);
          }
          break;
        case 'usage':
          this.renderer.info(command.usage);
          break;
        case 'unknown':
          this.renderer.info(`Unknown command: '${command.command}'. Type /? for help.`);
          break;
      }
    } catch (error) {
      // A failed /save or /load is reported; the session carries on
      log.warn('command failed:', error instanceof Error ? error.message : String(error));
      this.renderer.renderError(error);
      return;
    }
    this.renderer.info('');
  }

  private async save(rawName: string): Promise<void> {
    const name = validateInput(SessionNameSchema, rawName, 'chat name');
    if (this.conversation.length === 0) {
      this.renderer.info('No chat history to save.');
      return;
    }
    if (await this.archive.hasSession(name)) {
      if (!(await this.confirm(`Chat '${name}' already exists. Overwrite?`))) return;
    }
    await this.archive.saveSession(name, this.provider.name, this.provider.model, this.conversation.snapshot());
    this.renderer.info(`Saved chat '${name}'.`);
  }

  private async load(rawName: string): Promise<void> {
    const name = validateInput(SessionNameSchema, rawName, 'chat name');
    const saved = await this.archive.getSession(name);
    if (!saved) {
      this.renderer.info(`No saved chat named '${name}'.`);
      return;
    }
    if (this.conversation.length > 0 && !(await this.confirm('Overwrite current chat?'))) {
      return;
    }
    this.conversation.replace(saved.turns);
    this.renderer.renderTranscript(this.conversation.snapshot(), this.provider.model);
  }

  private async listSaved(): Promise<void> {
    const chats = await this.archive.listSessions();
    if (chats.length === 0) {
      this.renderer.info('No saved chats.');
      return;
    }
    this.renderer.info('Saved chats:');
    for (const chat of chats) {
      this.renderer.info(`  ${chat.name}  (${chat.provider}:${chat.model}, ${chat.turnCount} turns, ${chat.updatedAt})`);
    }
  }
}
