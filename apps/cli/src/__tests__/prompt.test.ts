/**
 * Readline Prompt Tests
 *
 * Feeds in-memory streams in place of stdin and stdout.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { createReadlinePrompt } from '../prompt.js';

describe('createReadlinePrompt', () => {
  let input: PassThrough;
  let output: PassThrough;
  let written: string;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    written = '';
    output.setEncoding('utf8');
    output.on('data', (chunk: string) => {
      written += chunk;
    });
  });

  it('should buffer piped lines and return null once input ends', async () => {
    input.end('1\n  Lunch  \n12\n');
    const prompt = createReadlinePrompt(input, output);

    const answers: Array<string | null> = [];
    for (let i = 0; i < 5; i++) {
      answers.push(await prompt.ask('Choose an option: '));
    }

    expect(answers).toEqual(['1', '  Lunch  ', '12', null, null]);
    expect(written.startsWith('Choose an option: ')).toBe(true);
    prompt.close();
  });

  it('should wait for a line typed after the question', async () => {
    const prompt = createReadlinePrompt(input, output);

    const pending = prompt.ask('Amount: ');
    input.write('42.50\n');

    await expect(pending).resolves.toBe('42.50');
    expect(written).toBe('Amount: ');
    prompt.close();
  });

  it('should return null after being closed', async () => {
    const prompt = createReadlinePrompt(input, output);

    prompt.close();

    await expect(prompt.ask('Description: ')).resolves.toBeNull();
    expect(written).toBe('');
  });
});
