// src/core/config/constants.ts
export const ACCESSION_PATTERN = /[A-Z]{1,2}\d{3,7}/;
export const CSV_TOKEN_SEPARATOR = /"[,_]"/;
export const HEADER_PUNCTUATION = /[,.;:=()]/g;
export const HEADER_SKIPPED_FIELDS = 4;

export const DEFAULT_DESC_LENGTH = 50;

export const DEFAULT_EFETCH_URL = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi';
export const EFETCH_DATABASE = 'nucleotide';

export const OUTPUT_SUFFIX = '.fas';
export const LIST_OUTPUT_SUFFIX = '_list.fas';
export const LOG_SUFFIX = '.log';

export function getEfetchUrl(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.ACCFETCH_EFETCH_URL;
  return override && override.length > 0 ? override : DEFAULT_EFETCH_URL;
}

export const PROGRAM_NAME = 'accfetch';
export const VERSION = '0.1.0';
