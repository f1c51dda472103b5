import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { createInputReader } from './input.js';

function streams() {
  return { input: new PassThrough(), output: new PassThrough() };
}

describe('createInputReader', () => {
  it('resolves with the typed line', async () => {
    const { input, output } = streams();
    const reader = createInputReader({ input, output });

    const answer = reader.readLine('> ');
    input.write('arrow keys\n');

    await expect(answer).resolves.toBe('arrow keys');
    reader.close();
  });

  it('resolves a waiting question with an empty answer when input ends', async () => {
    const { input, output } = streams();
    const reader = createInputReader({ input, output });

    const answer = reader.readLine('> ');
    input.end();

    await expect(answer).resolves.toBe('');
  });

  it('answers empty after the input has ended', async () => {
    const { input, output } = streams();
    const reader = createInputReader({ input, output });

    const first = reader.readLine('> ');
    input.end();
    await first;

    await expect(reader.readLine('> ')).resolves.toBe('');
    await expect(reader.readLine('> ')).resolves.toBe('');
  });
});
