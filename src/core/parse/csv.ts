// src/core/parse/csv.ts
import { CSV_TOKEN_SEPARATOR } from '../config/constants.js';
import type { CsvParseResult } from '../types/index.js';
import { incrementCount, matchAccession, splitLines } from './accession.js';

/**
 * FileMaker exports put an identifier first and its accession numbers in the
 * following fields. The scanner remembers the last identifier it saw, across
 * lines, and files every accession token under it.
 */
export enum CsvScanState {
  SEEKING_IDENTIFIER = 'seeking_identifier',
  ACCUMULATING_ACCESSIONS = 'accumulating_accessions',
}

/** Group key for accessions that appear before any identifier */
export const UNNAMED_IDENTIFIER = '';

export type CsvToken =
  | { kind: 'identifier'; identifier: string }
  | { kind: 'accession'; accession: string };

export interface CsvScanner {
  state: CsvScanState;
  identifier: string;
}

export const INITIAL_SCANNER: CsvScanner = {
  state: CsvScanState.SEEKING_IDENTIFIER,
  identifier: UNNAMED_IDENTIFIER,
};

export function tokenizeCsvLine(line: string): string[] {
  const normalized = line.replace(/\s+$/, '').replace(/\s/g, '_');
  if (normalized.length === 0) {
    return [];
  }

  const fields = normalized.split(CSV_TOKEN_SEPARATOR);
  while (fields.length > 0 && fields[fields.length - 1] === '') {
    fields.pop();
  }

  return fields.map((field) => field.replace(/"/g, ''));
}

export function classifyToken(token: string): CsvToken {
  const accession = matchAccession(token);
  return accession
    ? { kind: 'accession', accession }
    : { kind: 'identifier', identifier: token };
}

export function transition(scanner: CsvScanner, token: CsvToken): CsvScanner {
  if (token.kind === 'identifier') {
    return { state: CsvScanState.ACCUMULATING_ACCESSIONS, identifier: token.identifier };
  }
  // An accession never changes the current identifier
  return scanner;
}

export function parseCsvContent(content: string): CsvParseResult {
  const counts = new Map<string, number>();
  const groups = new Map<string, string[]>();
  let scanner = INITIAL_SCANNER;

  for (const line of splitLines(content)) {
    for (const field of tokenizeCsvLine(line)) {
      const token = classifyToken(field);
      scanner = transition(scanner, token);

      if (token.kind === 'accession') {
        const list = groups.get(scanner.identifier) ?? [];
        list.push(token.accession);
        groups.set(scanner.identifier, list);
        incrementCount(counts, token.accession);
      }
    }
  }

  return { counts, groups };
}
