// src/cli/__tests__/integration.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Command, CommanderError } from 'commander';
import { buildProgram, runCli } from '../index.js';
import { AccFetchOrchestrator } from '../../core/orchestrator.js';
import { AccFetchError, ErrorCode } from '../../core/errors.js';
import { MANUAL } from '../manual.js';
import { ReadlinePrompt } from '../../core/confirm/prompt.js';

jest.mock('../../core/orchestrator.js');

describe('CLI Integration Tests', () => {
  const OrchestratorMock = AccFetchOrchestrator as jest.MockedClass<typeof AccFetchOrchestrator>;

  let exitSpy: jest.SpiedFunction<typeof process.exit>;
  let errorSpy: jest.SpiedFunction<typeof console.error>;
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let runSpy: jest.Mock<AccFetchOrchestrator['run']>;

  beforeEach(() => {
    jest.clearAllMocks();
    exitSpy = jest.spyOn(process, 'exit').mockImplementation((() => undefined) as never);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    runSpy = jest.fn<AccFetchOrchestrator['run']>();
    OrchestratorMock.mockImplementation(() => ({ run: runSpy }) as unknown as jest.Mocked<AccFetchOrchestrator>);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should show the options in help', () => {
    const help = buildProgram().helpInformation();

    expect(help).toContain('--query <file>');
    expect(help).toContain('--list <file>');
    expect(help).toContain('--desc <length>');
    expect(help).toContain('--full-desc');
    expect(help).toContain('--whitespaces');
    expect(help).toContain('--man');
  });

  it('normalizes legacy flags before parsing', async () => {
    const parseSpy = jest
      .spyOn(Command.prototype, 'parseAsync')
      .mockResolvedValue(new Command());

    await runCli(['node', 'accfetch', '-query', 'in.txt', '-full_desc']);

    expect(parseSpy).toHaveBeenCalledWith(['node', 'accfetch', '--query', 'in.txt', '--full-desc']);
  });

  it('runs the orchestrator with header options from legacy flags', async () => {
    await runCli(['node', 'accfetch', '-query', 'in.txt', '-desc', '30', '-whitespaces']);

    expect(runSpy).toHaveBeenCalledWith({
      queryPath: 'in.txt',
      listPath: undefined,
      header: { maxLength: 30, fullHeader: false, preserveWhitespace: true },
    });
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it('uses the default description length', async () => {
    await runCli(['node', 'accfetch', '--query', 'in.csv', '--list', 'ids.txt', '-f']);

    expect(runSpy).toHaveBeenCalledWith({
      queryPath: 'in.csv',
      listPath: 'ids.txt',
      header: { maxLength: 50, fullHeader: true, preserveWhitespace: false },
    });
  });

  it('prints the banner before running', async () => {
    await runCli(['node', 'accfetch', '-q', 'in.txt']);

    const banner = logSpy.mock.calls.map((call) => String(call[0])).find((line) => line.includes('Version'));
    expect(banner).toContain('accfetch Version 0.1.0');
  });

  it('prints usage and exits when --query is missing', async () => {
    await runCli(['node', 'accfetch']);

    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Usage: accfetch'));
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(runSpy).not.toHaveBeenCalled();
  });

  it('accepts bare integers as leftover arguments', async () => {
    await runCli(['node', 'accfetch', '-query', 'in.txt', '12']);

    expect(runSpy).toHaveBeenCalled();
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it('rejects leftover arguments that are neither files nor integers', async () => {
    await runCli(['node', 'accfetch', '-query', 'in.txt', 'no-such-file.xyz']);

    expect(errorSpy).toHaveBeenCalledWith('Error: Unrecognised argument: no-such-file.xyz');
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(runSpy).not.toHaveBeenCalled();
  });

  it('rejects a description length that is not an integer', async () => {
    const program = buildProgram()
      .exitOverride()
      .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });

    await expect(
      program.parseAsync(['node', 'accfetch', '--query', 'in.txt', '--desc', 'abc'])
    ).rejects.toBeInstanceOf(CommanderError);
    expect(runSpy).not.toHaveBeenCalled();
  });

  it('prints the manual for --man without running', async () => {
    await runCli(['node', 'accfetch', '-man']);

    expect(logSpy).toHaveBeenCalledWith(MANUAL);
    expect(OrchestratorMock).not.toHaveBeenCalled();
  });

  it('reports errors with their suggestion and exits', async () => {
    runSpy.mockRejectedValue(
      new AccFetchError(
        ErrorCode.USER_REJECTED_PARSING,
        'Parsing results were rejected',
        false,
        'Please change the sequence identifiers'
      )
    );

    await runCli(['node', 'accfetch', '-query', 'in.csv']);

    expect(errorSpy).toHaveBeenCalledWith('Error:', 'Parsing results were rejected');
    expect(errorSpy).toHaveBeenCalledWith('Suggestion:', 'Please change the sequence identifiers');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('prints usage after a usage error', async () => {
    runSpy.mockRejectedValue(
      new AccFetchError(ErrorCode.USAGE, 'Please provide a CSV or TXT file of accession numbers')
    );

    await runCli(['node', 'accfetch', '-query', 'in.fasta']);

    expect(errorSpy).toHaveBeenCalledWith('Error:', 'Please provide a CSV or TXT file of accession numbers');
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Usage: accfetch'));
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('closes the prompt whether the run succeeds or fails', async () => {
    const closeSpy = jest.spyOn(ReadlinePrompt.prototype, 'close');

    await runCli(['node', 'accfetch', '-query', 'in.csv']);
    expect(closeSpy).toHaveBeenCalledTimes(1);

    runSpy.mockRejectedValue(new AccFetchError(ErrorCode.USER_REJECTED_PARSING, 'Parsing results were rejected'));
    await runCli(['node', 'accfetch', '-query', 'in.csv']);

    expect(closeSpy).toHaveBeenCalledTimes(2);
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('exits on unexpected errors', async () => {
    runSpy.mockRejectedValue(new Error('boom'));

    await runCli(['node', 'accfetch', '-query', 'in.txt']);

    expect(errorSpy).toHaveBeenCalledWith('Error:', 'boom');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
