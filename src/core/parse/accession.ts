// src/core/parse/accession.ts
import { ACCESSION_PATTERN } from '../config/constants.js';

/**
 * Returns the first accession-shaped substring of `text`, or `null`.
 *
 * @example
 * matchAccession('seq AB123456.1') // 'AB123456'
 */
export function matchAccession(text: string): string | null {
  const match = ACCESSION_PATTERN.exec(text);
  return match ? match[0] : null;
}

export function incrementCount(counts: Map<string, number>, accession: string): void {
  counts.set(accession, (counts.get(accession) ?? 0) + 1);
}

export function splitLines(content: string): string[] {
  const lines = content.split('\n').map((line) => line.replace(/\r$/, ''));
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
