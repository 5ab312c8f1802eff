import * as readline from 'node:readline';

export interface Prompt {
  /**
   * Resolves with the answer line as typed, or null once input has ended.
   */
  ask(question: string): Promise<string | null>;
  close(): void;
}

/**
 * Line-based prompt over a readline interface. Lines that arrive before they
 * are asked for (piped input) are buffered rather than dropped.
 */
export function createReadlinePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompt {
  const rl = readline.createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  return {
    async ask(question: string) {
      // buffered lines can still be read after input has ended
      if (!closed) {
        rl.setPrompt(question);
        rl.prompt();
      }
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close() {
      rl.close();
    },
  };
}
