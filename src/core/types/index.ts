// src/core/types/index.ts
export type QueryFileType = 'TXT' | 'CSV';

export interface AccessionRecord {
  accession: string;
  /** Raw occurrences seen while parsing */
  count: number;
  /** False when a list filter excludes every identifier the accession belongs to */
  selected: boolean;
}

export interface IdentifierGroup {
  identifier: string;
  accessions: string[];
}

export interface FormatWarning {
  lineNumber: number;
  line: string;
  message: string;
}

export interface TxtParseResult {
  counts: Map<string, number>;
  warnings: FormatWarning[];
}

export interface CsvParseResult {
  counts: Map<string, number>;
  groups: Map<string, string[]>;
}

export interface HeaderOptions {
  maxLength: number;
  fullHeader: boolean;
  preserveWhitespace: boolean;
}

export interface SanitizedHeader {
  prefixAccession: string;
  cleanedText: string;
  sequenceLines: string[];
}
