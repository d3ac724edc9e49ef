import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SessionLoop } from '../SessionLoop';
import type { SessionState } from '../SessionLoop';
import { createTurn } from '../Conversation';
import { SessionStore } from '../../storage/SessionStore';
import { TerminalRenderer } from '../../../../renderer/TerminalRenderer';
import { MemoryOutput, ScriptedProvider, ScriptedReader, roleText, waitForAbort } from '../../../../test-utils/fakes';
import type { ScriptStep } from '../../../../test-utils/fakes';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'parley-loop-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function setup(lines: string[], script: ScriptStep[] = [], stream = false) {
  const provider = new ScriptedProvider(script);
  const reader = new ScriptedReader(lines);
  const output = new MemoryOutput();
  const archive = new SessionStore({ cwd: dir });
  const loop = new SessionLoop({
    provider,
    reader,
    renderer: new TerminalRenderer(output),
    archive,
    stream,
  });
  const states: SessionState[] = [];
  loop.on('state', (state: SessionState) => states.push(state));
  return { provider, reader, output, archive, loop, states };
}

describe('SessionLoop', () => {
  describe('exchanges', () => {
    it.each([false, true])('answers and exits at end of input (stream: %s)', async (stream) => {
      const { loop, output, reader, states } = setup(['Hello'], ['Hi there'], stream);

      await loop.run();

      expect(output.text).toBe('Hi there\n\n\nExiting.\n');
      expect(roleText(loop.conversation.snapshot())).toEqual([
        { role: 'user', text: 'Hello' },
        { role: 'assistant', text: 'Hi there' },
      ]);
      expect(states).toEqual(['dispatching', 'rendering', 'idle', 'terminated']);
      expect(loop.state).toBe('terminated');
      expect(reader.prompts).toEqual(['[gpt-x] >>> ', '[gpt-x] >>> ']);
    });

    it('sends the whole history on every exchange', async () => {
      const { loop, provider } = setup(['one', 'two', 'three'], ['1', '2', '3']);

      await loop.run();

      expect(loop.conversation.length).toBe(6);
      expect(provider.requests.map((turns) => turns.length)).toEqual([1, 3, 5]);
      expect(roleText(provider.requests[2] ?? [])).toEqual([
        { role: 'user', text: 'one' },
        { role: 'assistant', text: '1' },
        { role: 'user', text: 'two' },
        { role: 'assistant', text: '2' },
        { role: 'user', text: 'three' },
      ]);
    });

    it('ignores blank input', async () => {
      const { loop, provider, output } = setup(['   ', '']);

      await loop.run();

      expect(provider.requests).toHaveLength(0);
      expect(output.text).toBe('\nExiting.\n');
    });

    it('joins a multi-line message', async () => {
      const { loop, provider, reader } = setup(['"""first', 'second  ', 'third"""', '"""inline"""'], ['ok', 'ok']);

      await loop.run();

      expect(roleText(provider.requests[0] ?? []).at(-1)).toEqual({ role: 'user', text: 'first\nsecond\nthird' });
      expect(roleText(provider.requests[1] ?? []).at(-1)).toEqual({ role: 'user', text: 'inline' });
      expect(reader.prompts).toEqual(['[gpt-x] >>> ', '', '', '[gpt-x] >>> ', '[gpt-x] >>> ']);
    });

    it('drops an unterminated multi-line block at end of input', async () => {
      const { loop, provider, output } = setup(['"""first', 'second']);

      await loop.run();

      expect(provider.requests).toHaveLength(0);
      expect(output.text).toBe('\nExiting.\n');
    });
  });

  describe('provider errors', () => {
    it('reports the error, keeps the user turn and carries on', async () => {
      const { loop, output, states } = setup(
        ['Hello', 'Again'],
        [new Error('connect ECONNREFUSED 10.0.0.1:443'), 'Hi there'],
      );

      await loop.run();

      expect(output.text).toBe(
        'Error (NETWORK): OpenAI network error: connect ECONNREFUSED 10.0.0.1:443\n' +
        'Could not reach the provider. Check your connection, then resubmit.\n' +
        '\n' +
        'Hi there\n\n' +
        '\nExiting.\n',
      );
      expect(roleText(loop.conversation.snapshot())).toEqual([
        { role: 'user', text: 'Hello' },
        { role: 'user', text: 'Again' },
        { role: 'assistant', text: 'Hi there' },
      ]);
      expect(states).toEqual([
        'dispatching', 'error-reported', 'idle',
        'dispatching', 'rendering', 'idle',
        'terminated',
      ]);
    });

    it('resolves submit() with null after an error', async () => {
      const { loop } = setup([], [Object.assign(new Error('Unauthorized'), { status: 401 })]);

      await expect(loop.submit('Hello')).resolves.toBeNull();
      expect(loop.conversation.length).toBe(1);
      expect(loop.state).toBe('idle');
    });
  });

  describe('interrupts', () => {
    it('cancels an in-flight request', async () => {
      const { loop, reader, output } = setup(['Hello'], [(signal) => waitForAbort(signal)]);
      loop.on('state', (state: SessionState) => {
        if (state === 'dispatching') setTimeout(() => reader.interrupt(), 0);
      });

      await loop.run();

      expect(output.text).toBe('Error (CANCELLED): openai request cancelled\n\n\nExiting.\n');
      expect(roleText(loop.conversation.snapshot())).toEqual([{ role: 'user', text: 'Hello' }]);
    });

    it('discards the partial text of a cancelled stream', async () => {
      const { loop, reader, output } = setup(['Hello'], [{ chunks: ['Partial '], hang: true }], true);
      loop.on('state', (state: SessionState) => {
        if (state === 'dispatching') setTimeout(() => reader.interrupt(), 0);
      });

      await loop.run();

      expect(output.text).toBe('Partial \n\nError (CANCELLED): openai request cancelled\n\n\nExiting.\n');
      expect(loop.conversation.length).toBe(1);
    });

    it('clears the input line when nothing is in flight', () => {
      const { loop, reader } = setup([]);

      loop.interrupt();

      expect(reader.clearedLines).toBe(1);
    });
  });

  describe('commands', () => {
    it('exits on /bye without sending anything', async () => {
      const { loop, provider, output, states } = setup(['/bye', 'Hello']);

      await loop.run();

      expect(output.text).toBe('Exiting.\n');
      expect(provider.requests).toHaveLength(0);
      expect(states).toEqual(['terminated']);
    });

    it('clears the history', async () => {
      const { loop, output } = setup(['Hello', '/clear'], ['Hi there']);

      await loop.run();

      expect(loop.conversation.length).toBe(0);
      expect(output.text).toBe('Hi there\n\nCleared chat history.\n\n\nExiting.\n');
    });

    it('sends only the turns after a clear', async () => {
      const { loop, provider } = setup(['Hello', '/clear', 'Again'], ['Hi there', 'Hello again']);

      await loop.run();

      expect(provider.requests).toHaveLength(2);
      expect(roleText(provider.requests[1] ?? [])).toEqual([{ role: 'user', text: 'Again' }]);
      expect(loop.conversation.length).toBe(2);
    });

    it('reports unknown commands and usage errors', async () => {
      const { loop, output } = setup(['/frob', '/save']);

      await loop.run();

      expect(output.text).toBe(
        "Unknown command: '/frob'. Type /? for help.\n\n" +
        'Usage:\n  /save <name>\n\n' +
        '\nExiting.\n',
      );
    });

    it('saves, clears and loads a chat', async () => {
      const { loop, output, archive } = setup(
        ['Hello', '/save notes', '/clear', '/load notes'],
        ['Hi there'],
      );

      await loop.run();

      expect(output.text).toBe(
        'Hi there\n\n' +
        "Saved chat 'notes'.\n\n" +
        'Cleared chat history.\n\n' +
        '\n[gpt-x] >>> Hello\nHi there\n\n\n' +
        '\nExiting.\n',
      );
      expect(roleText(loop.conversation.snapshot())).toEqual([
        { role: 'user', text: 'Hello' },
        { role: 'assistant', text: 'Hi there' },
      ]);
      await expect(archive.getSession('notes')).resolves.toMatchObject({ provider: 'openai', model: 'gpt-x' });
    });

    it('leaves an existing chat alone when overwriting is declined', async () => {
      const { loop, reader, archive } = setup(['Hello', '/save notes', 'n'], ['Hi there']);
      await archive.saveSession('notes', 'openai', 'gpt-x', [createTurn('user', 'old')]);

      await loop.run();

      expect(reader.prompts).toContain("Chat 'notes' already exists. Overwrite? (y/n) ");
      const saved = await archive.getSession('notes');
      expect(roleText(saved?.turns ?? [])).toEqual([{ role: 'user', text: 'old' }]);
    });

    it('asks before replacing a non-empty conversation on /load', async () => {
      const { loop, reader, archive } = setup(['Hello', '/load notes', 'y'], ['Hi there']);
      await archive.saveSession('notes', 'openai', 'gpt-x', [createTurn('user', 'old')]);

      await loop.run();

      expect(reader.prompts).toContain('Overwrite current chat? (y/n) ');
      expect(roleText(loop.conversation.snapshot())).toEqual([{ role: 'user', text: 'old' }]);
    });

    it('says so when there is nothing to save or load', async () => {
      const { loop, output } = setup(['/save notes', '/load notes', '/load']);

      await loop.run();

      expect(output.text).toBe(
        'No chat history to save.\n\n' +
        "No saved chat named 'notes'.\n\n" +
        'No saved chats.\n\n' +
        '\nExiting.\n',
      );
    });

    it('refuses a reserved chat name', async () => {
      const { loop, output, archive } = setup(['/save __proto__']);

      await loop.run();

      expect(output.text).toBe('Error: Invalid chat name: chat name: this name is reserved\n\n\nExiting.\n');
      expect(await archive.hasSession('__proto__')).toBe(false);
    });

    it('reports an invalid chat name and keeps going', async () => {
      const { loop, output } = setup(['/save ../etc']);

      await loop.run();

      expect(output.text).toBe(
        'Error: Invalid chat name: chat name: use letters, digits, dots, dashes or underscores\n\n' +
        '\nExiting.\n',
      );
    });
  });
});
