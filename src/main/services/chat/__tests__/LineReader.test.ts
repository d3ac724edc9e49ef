import { PassThrough, Writable } from 'stream';
import { describe, it, expect } from 'vitest';
import { EchoStream, ReadlineLineReader } from '../LineReader';

function collector() {
  const written: string[] = [];
  const output = new Writable({
    write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void) {
      written.push(chunk.toString());
      callback();
    },
  });
  return { output, text: () => written.join('') };
}

describe('ReadlineLineReader', () => {
  it('resolves lines in order and null once input ends', async () => {
    const input = new PassThrough();
    const { output } = collector();
    const reader = new ReadlineLineReader(input, output);

    const first = reader.readLine('> ');
    input.write('Hello\nSecond\n');
    await expect(first).resolves.toBe('Hello');
    await expect(reader.readLine('> ')).resolves.toBe('Second');

    input.end();
    await expect(reader.readLine('> ')).resolves.toBeNull();
    reader.close();
  });

  it('prints the prompt of a secret but not the answer', async () => {
    const input = new PassThrough();
    const { output, text } = collector();
    const reader = new ReadlineLineReader(input, output);

    const secret = reader.readSecret('Key: ');
    input.write('test-secret\n');

    await expect(secret).resolves.toBe('test-secret');
    expect(text()).toBe('Key: ');
    reader.close();
  });

  it('clears the line and prompts again when input is not a terminal', async () => {
    const input = new PassThrough();
    const { output, text } = collector();
    const reader = new ReadlineLineReader(input, output);

    const line = reader.readLine('> ');
    reader.clearLine();
    input.write('after\n');

    await expect(line).resolves.toBe('after');
    expect(text()).toBe('> \n> ');
    reader.close();
  });
});

describe('EchoStream', () => {
  it('reports the width of its target and forwards resize events', () => {
    const { output } = collector();
    const target = Object.assign(output, { columns: 40 });
    const echo = new EchoStream(target);
    let resized = 0;
    echo.on('resize', () => resized++);

    target.emit('resize');
    target.columns = 100;

    expect(resized).toBe(1);
    expect(echo.columns).toBe(100);

    echo.detach();
    target.emit('resize');
    expect(resized).toBe(1);
  });

  it('drops writes while muted', () => {
    const { output, text } = collector();
    const echo = new EchoStream(output);

    echo.write('shown ');
    echo.muted = true;
    echo.write('hidden');
    echo.muted = false;
    echo.write('again');

    expect(text()).toBe('shown again');
  });
});
