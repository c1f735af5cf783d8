#!/usr/bin/env node

import { Command } from 'commander';
import { registerFetchCommand } from './commands/fetch.js';
import { normalizeArgv } from './argv.js';
import { PROGRAM_NAME, VERSION } from '../core/config/constants.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Fetch FASTA records with cleaned headers for a list of accession numbers')
    .version(VERSION);

  registerFetchCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(normalizeArgv(argv));
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
