// src/core/confirm/__tests__/prompt.test.ts
import { describe, it, expect, afterEach } from '@jest/globals';
import { PassThrough } from 'node:stream';
import chalk from 'chalk';
import { ReadlinePrompt } from '../prompt.js';
import { CONFIRMATION_QUESTION, askUntilAnswered } from '../confirmation.js';
import { ErrorCode } from '../../errors.js';

describe('ReadlinePrompt', () => {
  const prompts: ReadlinePrompt[] = [];

  function createPrompt(input: PassThrough, output: PassThrough): ReadlinePrompt {
    const prompt = new ReadlinePrompt(input, output);
    prompts.push(prompt);
    return prompt;
  }

  afterEach(() => {
    prompts.splice(0).forEach((prompt) => prompt.close());
  });

  it('writes the question and resolves with the typed line', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written: string[] = [];
    output.on('data', (chunk: Buffer) => written.push(chunk.toString()));

    const answer = createPrompt(input, output).ask('Continue? ');
    input.write('y\n');

    await expect(answer).resolves.toBe('y');
    expect(written.join('')).toBe('Continue? ');
  });

  it('rejects when the input closes before an answer', async () => {
    const input = new PassThrough();
    const output = new PassThrough();

    const answer = createPrompt(input, output).ask('Continue? ');
    input.end();

    await expect(answer).rejects.toMatchObject({ code: ErrorCode.USER_REJECTED_PARSING });
  });

  it('answers consecutive questions from lines written in one chunk', async () => {
    const input = new PassThrough();
    const prompt = createPrompt(input, new PassThrough());

    input.write('maybe\ny\n');

    await expect(prompt.ask('Q1')).resolves.toBe('maybe');
    await expect(prompt.ask('Q2')).resolves.toBe('y');
  });

  it('keeps the remaining lines for both confirmations after the input ends', async () => {
    const input = new PassThrough();
    const prompt = createPrompt(input, new PassThrough());

    input.end('y\ny\n');

    await expect(prompt.ask('first gate')).resolves.toBe('y');
    await expect(prompt.ask('second gate')).resolves.toBe('y');
    await expect(prompt.ask('third gate')).rejects.toMatchObject({
      code: ErrorCode.USER_REJECTED_PARSING,
    });
  });

  it('re-asks until a valid answer arrives on the same stream', async () => {
    const originalLevel = chalk.level;
    chalk.level = 0;
    const input = new PassThrough();
    const output = new PassThrough();
    const written: string[] = [];
    output.on('data', (chunk: Buffer) => written.push(chunk.toString()));

    input.write('maybe\nn\n');

    try {
      await expect(askUntilAnswered(createPrompt(input, output))).resolves.toBe('n');
    } finally {
      chalk.level = originalLevel;
    }
    expect(written.join('')).toBe(CONFIRMATION_QUESTION + CONFIRMATION_QUESTION);
  });
});
