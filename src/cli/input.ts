/**
 * Terminal input for interactive sessions.
 */

import * as readline from 'node:readline';
import type { InputReader } from './types.js';

/**
 * Streams an {@link InputReader} reads from and prompts to.
 */
export interface InputStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Creates an input reader over stdin.
 *
 * Once the input ends (Ctrl-D, a closed pipe) every pending and later
 * `readLine` resolves to an empty answer.
 */
export function createInputReader(streams: InputStreams = {}): InputReader {
  const rl = readline.createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stdout,
  });

  let closed = false;
  const pending = new Set<(answer: string) => void>();

  rl.on('close', () => {
    closed = true;
    for (const resolve of pending) {
      resolve('');
    }
    pending.clear();
  });

  return {
    readLine: (prompt: string): Promise<string> => {
      if (closed) {
        return Promise.resolve('');
      }
      return new Promise((resolve) => {
        const settle = (answer: string): void => {
          pending.delete(settle);
          resolve(answer);
        };
        pending.add(settle);
        rl.question(prompt, settle);
      });
    },
    close: (): void => {
      rl.close();
    },
  };
}
