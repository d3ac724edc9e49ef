/**
 * Everything the user sees on stdout. Presentational only: nothing here reads
 * or changes the conversation.
 */

import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';
import { ProviderError } from '../main/services/ai/errors';
import type { Turn } from '../shared/types';

export interface Output {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

export interface RendererOptions {
  /** Replies verbatim: no markdown formatting, colours or thinking indicator */
  plain?: boolean;
}

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  clearLine: '\r\x1b[K',
} as const;

const THINKING = 'Thinking...';

let markdown: Marked | null = null;

function formatMarkdown(text: string): string {
  markdown ??= new Marked(markedTerminal());
  const formatted = markdown.parse(text, { async: false });
  if (typeof formatted !== 'string') throw new Error('Markdown rendering unexpectedly went async');
  return formatted;
}

export class TerminalRenderer {
  private readonly styled: boolean;

  constructor(
    private readonly out: Output = process.stdout,
    options: RendererOptions = {},
  ) {
    this.styled = out.isTTY === true && !options.plain;
  }

  prompt(model: string): string {
    return `[${model}] >>> `;
  }

  /** A complete reply, followed by a blank line. Formatted as markdown when styled. */
  render(text: string): void {
    this.out.write(`${this.reply(text)}\n\n`);
  }

  /**
   * Writes chunks in arrival order as they arrive and resolves with the full
   * text. The line is closed off even when the stream fails part way.
   * Streamed text is written raw; markdown is only applied to whole replies.
   */
  async renderStream(chunks: AsyncIterable<string>): Promise<string> {
    const stopThinking = this.showThinking();
    let text = '';
    try {
      for await (const chunk of chunks) {
        if (!text) stopThinking();
        text += chunk;
        this.out.write(chunk);
      }
    } finally {
      stopThinking();
      if (text) this.out.write(text.endsWith('\n') ? '\n' : '\n\n');
    }
    return text;
  }

  /**
   * Shows the thinking indicator and returns the function that removes it.
   * A no-op in plain mode or when stdout is not a terminal.
   */
  showThinking(): () => void {
    if (!this.styled) return () => {};
    let shown = true;
    this.out.write(`${ANSI.dim}${THINKING}${ANSI.reset}`);
    return () => {
      if (!shown) return;
      shown = false;
      this.out.write(ANSI.clearLine);
    };
  }

  renderError(error: unknown): void {
    let line: string;
    let hint: string | undefined;
    if (error instanceof ProviderError) {
      line = `${this.paint('Error', ANSI.red)} (${error.kind}): ${error.message}`;
      if (error.kind !== 'CANCELLED') hint = error.userMessage;
    } else {
      line = `${this.paint('Error', ANSI.red)}: ${error instanceof Error ? error.message : String(error)}`;
    }
    this.out.write(`${line}\n`);
    if (hint) this.out.write(`${this.paint(hint, ANSI.dim)}\n`);
    this.out.write('\n');
  }

  info(text: string): void {
    this.out.write(`${text}\n`);
  }

  /** Markdown-ish listing: headings in bold when styled, otherwise verbatim. */
  renderMarkdown(markdown: string): void {
    const lines = markdown.split('\n').map((line) =>
      /^#{1,6} /.test(line) ? this.paint(line, ANSI.bold) : line);
    this.out.write(`${lines.join('\n')}\n`);
  }

  /** Re-prints a loaded chat the way it looked when it was typed. */
  renderTranscript(turns: readonly Turn[], model: string): void {
    for (const turn of turns) {
      switch (turn.role) {
        case 'user':
          this.out.write(`\n${this.prompt(model)}${turn.text}\n`);
          break;
        case 'assistant':
          this.out.write(`${this.reply(turn.text)}\n`);
          break;
        case 'system':
          this.out.write(`${this.paint(`(system) ${turn.text}`, ANSI.dim)}\n`);
          break;
      }
    }
    if (turns.length > 0) this.out.write('\n');
  }

  private reply(text: string): string {
    const body = this.styled ? formatMarkdown(text) : text;
    return body.replace(/\n+$/, '');
  }

  private paint(text: string, code: string): string {
    return this.styled ? `${code}${text}${ANSI.reset}` : text;
  }
}
