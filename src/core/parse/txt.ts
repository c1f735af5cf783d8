// src/core/parse/txt.ts
import type { FormatWarning, TxtParseResult } from '../types/index.js';
import { incrementCount, matchAccession, splitLines } from './accession.js';

/**
 * Counts the first accession found on each line of a plain list.
 * Lines without one are reported and skipped; blank lines are ignored.
 */
export function parseTxtQuery(content: string): TxtParseResult {
  const counts = new Map<string, number>();
  const warnings: FormatWarning[] = [];

  splitLines(content).forEach((line, index) => {
    if (line.trim().length === 0) {
      return;
    }

    const accession = matchAccession(line);
    if (accession) {
      incrementCount(counts, accession);
    } else {
      warnings.push({
        lineNumber: index + 1,
        line,
        message: `${line} is not a valid ACC number`,
      });
    }
  });

  return { counts, warnings };
}

/**
 * Reads an identifier list. Each line is taken verbatim once trailing
 * whitespace is dropped and inner whitespace becomes `_`, matching the way
 * CSV identifiers are normalised.
 */
export function parseListContent(content: string): Set<string> {
  const identifiers = new Set<string>();

  for (const line of splitLines(content)) {
    const identifier = line.replace(/\s+$/, '').replace(/\s/g, '_');
    if (identifier.length > 0) {
      identifiers.add(identifier);
    }
  }

  return identifiers;
}
