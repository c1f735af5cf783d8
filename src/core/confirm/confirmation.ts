// src/core/confirm/confirmation.ts
import chalk from 'chalk';
import type { SelectionWeight } from '../filter/list-filter.js';
import type { IdentifierGroup } from '../types/index.js';
import type { PromptAdapter } from './prompt.js';
import { step } from '../progress.js';

export const CONFIRMATION_QUESTION = '[QUESTION] - Are you happy with the parsing results? [y,n] : ';

export function toIdentifierGroups(groups: ReadonlyMap<string, string[]>): IdentifierGroup[] {
  return [...groups.keys()].sort().map((identifier) => ({
    identifier,
    accessions: [...(groups.get(identifier) ?? [])],
  }));
}

/**
 * One row per identifier. With a selection, accessions that will be fetched
 * are bold and the rest stay plain white.
 */
export function formatGroupLine(
  group: IdentifierGroup,
  selection?: ReadonlyMap<string, SelectionWeight>
): string {
  const accessions = group.accessions
    .map((accession) => {
      if (!selection) return chalk.white(accession);
      return selection.get(accession) === 1 ? chalk.bold(accession) : chalk.white(accession);
    })
    .join(' ');

  return `[ OUTPUT ] - ${chalk.bold(group.identifier)}\t =>\t[ ${accessions} ]`;
}

export type ConfirmationAnswer = 'y' | 'n';

export function parseAnswer(input: string): ConfirmationAnswer | null {
  const answer = input.trim().toLowerCase();
  return answer === 'y' || answer === 'n' ? answer : null;
}

export async function askUntilAnswered(prompt: PromptAdapter): Promise<ConfirmationAnswer> {
  let answer = parseAnswer(await prompt.ask(CONFIRMATION_QUESTION));
  while (answer === null) {
    answer = parseAnswer(await prompt.ask(chalk.bold(CONFIRMATION_QUESTION)));
  }
  return answer;
}

/**
 * Prints the identifier groupings and blocks until the user answers.
 * Resolves `true` when the parse was accepted.
 */
export async function confirmParsing(
  groups: IdentifierGroup[],
  prompt: PromptAdapter,
  selection?: ReadonlyMap<string, SelectionWeight>
): Promise<boolean> {
  step(
    selection
      ? 'Printing identifiers and whether they will be fetched.'
      : 'Printing identifiers and respective ACC numbers.'
  );

  for (const group of groups) {
    console.log(formatGroupLine(group, selection));
  }

  return (await askUntilAnswered(prompt)) === 'y';
}
