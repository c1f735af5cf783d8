// src/core/sanitize/header.ts
import {
  DEFAULT_DESC_LENGTH,
  HEADER_PUNCTUATION,
  HEADER_SKIPPED_FIELDS,
} from '../config/constants.js';
import type { HeaderOptions, SanitizedHeader } from '../types/index.js';

export const DEFAULT_HEADER_OPTIONS: HeaderOptions = {
  maxLength: DEFAULT_DESC_LENGTH,
  fullHeader: false,
  preserveWhitespace: false,
};

/** Drops the leading `gi|<num>|gb|<acc>|` fields of a GenBank FASTA header */
export function stripIdentifierFields(header: string): string {
  return header.split('|').slice(HEADER_SKIPPED_FIELDS).join('');
}

export function removePunctuation(text: string): string {
  return text.replace(HEADER_PUNCTUATION, '');
}

export function cleanDescription(header: string, options: HeaderOptions): string {
  let text = stripIdentifierFields(header).replace(/^\s+/, '');
  text = removePunctuation(text);

  if (!options.preserveWhitespace) {
    text = text.replace(/\s+/g, '_');
  }

  if (!options.fullHeader && text.length > options.maxLength) {
    text = text.slice(0, options.maxLength);
  }

  return text;
}

export function sanitizeRecord(
  raw: string,
  accession: string,
  options: HeaderOptions
): SanitizedHeader {
  const lines = raw.split('\n');
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const header = lines.shift() ?? '';

  return {
    prefixAccession: accession,
    cleanedText: cleanDescription(header, options),
    sequenceLines: lines,
  };
}

export function headerSeparator(options: HeaderOptions): string {
  return options.preserveWhitespace ? ' ' : '_';
}

/** Renders a record as FASTA text, followed by a blank separator line */
export function formatRecord(record: SanitizedHeader, options: HeaderOptions): string {
  const headerLine = `>${record.prefixAccession}${headerSeparator(options)}${record.cleanedText}`;
  return [headerLine, ...record.sequenceLines].map((line) => `${line}\n`).join('') + '\n';
}
