// src/cli/commands/fetch.ts
import { existsSync } from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import { AccFetchOrchestrator } from '../../core/orchestrator.js';
import { EntrezClient } from '../../core/fetch/entrez.js';
import { ReadlinePrompt } from '../../core/confirm/prompt.js';
import { AccFetchError, ErrorCode } from '../../core/errors.js';
import { DEFAULT_DESC_LENGTH } from '../../core/config/constants.js';
import type { HeaderOptions } from '../../core/types/index.js';
import { isBareInteger } from '../argv.js';
import { MANUAL, buildBanner } from '../manual.js';

interface FetchCliOptions {
  query?: string;
  list?: string;
  desc: number;
  fullDesc: boolean;
  whitespaces: boolean;
  man: boolean;
}

export function parseDescLength(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Description length must be a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

export function toHeaderOptions(options: FetchCliOptions): HeaderOptions {
  return {
    maxLength: options.desc,
    fullHeader: options.fullDesc,
    preserveWhitespace: options.whitespaces,
  };
}

export function registerFetchCommand(program: Command): void {
  program
    .option('-q, --query <file>', 'CSV or TXT file of accession numbers')
    .option('-l, --list <file>', 'TXT list of identifiers (e.g. seq1A) limiting which CSV accessions are fetched')
    .option('-d, --desc <length>', 'Maximum length of sequence descriptions', parseDescLength, DEFAULT_DESC_LENGTH)
    .option('-f, --full-desc', 'Write full sequence descriptions (overrides --desc)', false)
    .option('-w, --whitespaces', 'Separate words in descriptions with spaces instead of "_"', false)
    .option('-m, --man', 'Show the full manual', false)
    .allowExcessArguments(true)
    .showHelpAfterError()
    .action(async (options: FetchCliOptions, command: Command) => {
      if (options.man) {
        console.log(command.helpInformation());
        console.log(MANUAL);
        return;
      }

      const unexpected = command.args.find((token) => !isBareInteger(token) && !existsSync(token));
      if (unexpected !== undefined) {
        console.error(`Error: Unrecognised argument: ${unexpected}`);
        console.error(command.helpInformation());
        process.exit(1);
        return;
      }

      if (!options.query) {
        console.error(command.helpInformation());
        process.exit(1);
        return;
      }

      console.log(buildBanner());

      const prompt = new ReadlinePrompt();
      const orchestrator = new AccFetchOrchestrator(new EntrezClient(), prompt);

      try {
        try {
          await orchestrator.run({
            queryPath: options.query,
            listPath: options.list,
            header: toHeaderOptions(options),
          });
        } finally {
          prompt.close();
        }
      } catch (error) {
        reportError(error, command);
        process.exit(1);
      }
    });
}

function reportError(error: unknown, command: Command): void {
  if (!(error instanceof AccFetchError)) {
    console.error('Error:', error instanceof Error ? error.message : error);
    return;
  }

  console.error('Error:', error.message);
  if (error.suggestion) {
    console.error('Suggestion:', error.suggestion);
  }
  if (error.code === ErrorCode.USAGE) {
    console.error(command.helpInformation());
  }
}
