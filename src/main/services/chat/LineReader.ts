import readline from 'readline';
import { Writable } from 'stream';

/**
 * Where the session loop gets its input from. The loop never touches stdin
 * directly, so tests can drive it with a scripted reader.
 */
export interface LineReader {
  /** Next line without its newline, or null once input has ended */
  readLine(prompt: string): Promise<string | null>;
  /** Like readLine, without echoing what is typed */
  readSecret(prompt: string): Promise<string | null>;
  /** Ctrl+C. Replaces any previous handler. */
  onInterrupt(handler: () => void): void;
  /** Discard the partially typed line and prompt again */
  clearLine(): void;
  close(): void;
}

type Waiter = (line: string | null) => void;

type TerminalOutput = NodeJS.WritableStream & { columns?: number };

/**
 * Stands between readline and the real output. Muting hides typed secrets;
 * the width and resize events of the terminal are passed through so line
 * wrapping is computed against the real screen.
 */
export class EchoStream extends Writable {
  muted = false;
  private readonly onResize = () => this.emit('resize');

  constructor(private readonly target: TerminalOutput) {
    super();
    target.on('resize', this.onResize);
  }

  get columns(): number | undefined {
    return this.target.columns;
  }

  detach(): void {
    this.target.removeListener('resize', this.onResize);
  }

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void): void {
    if (!this.muted) this.target.write(chunk);
    callback();
  }
}

export class ReadlineLineReader implements LineReader {
  private readonly rl: readline.Interface;
  private readonly queue: string[] = [];
  private waiter: Waiter | null = null;
  private ended = false;
  private readonly echo: EchoStream;
  private interruptHandler: (() => void) | null = null;
  private readonly onProcessSigint = () => this.interrupt();
  private readonly terminal: boolean;

  constructor(
    input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
    private readonly output: TerminalOutput = process.stdout,
  ) {
    this.terminal = input.isTTY === true;
    this.echo = new EchoStream(output);
    this.rl = readline.createInterface({ input, output: this.echo, terminal: this.terminal });
    this.rl.on('line', (line) => this.push(line));
    this.rl.on('close', () => {
      this.ended = true;
      this.settle(null);
    });

    // In terminal mode readline turns Ctrl+C into its own event; otherwise
    // it arrives as a process signal.
    if (this.terminal) {
      this.rl.on('SIGINT', () => this.interrupt());
    } else {
      process.on('SIGINT', this.onProcessSigint);
    }
  }

  readLine(prompt: string): Promise<string | null> {
    this.rl.setPrompt(prompt);
    const queued = this.queue.shift();
    if (queued !== undefined) {
      if (!this.terminal) this.output.write(prompt);
      return Promise.resolve(queued);
    }
    if (this.ended) return Promise.resolve(null);

    this.rl.prompt();
    return new Promise<string | null>((resolve) => {
      this.waiter = resolve;
    });
  }

  async readSecret(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    this.echo.muted = true;
    try {
      return await this.readLine('');
    } finally {
      this.echo.muted = false;
      if (this.terminal) this.output.write('\n');
    }
  }

  onInterrupt(handler: () => void): void {
    this.interruptHandler = handler;
  }

  clearLine(): void {
    // Key sequences only mean something to a terminal-mode interface
    if (this.terminal) {
      this.rl.write(null, { ctrl: true, name: 'e' });
      this.rl.write(null, { ctrl: true, name: 'u' });
    }
    this.output.write('\n');
    this.rl.prompt();
  }

  close(): void {
    process.removeListener('SIGINT', this.onProcessSigint);
    this.echo.detach();
    this.rl.close();
  }

  private interrupt(): void {
    if (this.interruptHandler) {
      this.interruptHandler();
    } else {
      this.close();
    }
  }

  private push(line: string): void {
    if (this.waiter) {
      this.settle(line);
    } else {
      this.queue.push(line);
    }
  }

  private settle(line: string | null): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(line);
  }
}
