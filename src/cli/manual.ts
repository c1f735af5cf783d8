// src/cli/manual.ts
import { PROGRAM_NAME, VERSION } from '../core/config/constants.js';

export function buildBanner(): string {
  const width = 48;
  const center = (text: string): string => {
    const left = Math.floor((width - text.length) / 2);
    return '###' + ' '.repeat(left) + text + ' '.repeat(width - text.length - left) + '###';
  };

  return [
    '',
    '#'.repeat(width + 6),
    center(''),
    center(`${PROGRAM_NAME} Version ${VERSION}`),
    center(`(more under ${PROGRAM_NAME} -help -man)`),
    center(''),
    '#'.repeat(width + 6),
    '',
  ]
    .map((line) => (line ? `\t\t${line}` : line))
    .join('\n');
}

export const MANUAL = `
DESCRIPTION
  ${PROGRAM_NAME} takes a file of accession numbers, either a CSV export
  (FileMaker style, one identifier followed by its accession numbers per
  record) or a TXT list (one accession per line), and fetches each sequence
  from the NCBI nucleotide database with a cleaned header.

  For CSV input the parsed identifiers and their accession numbers are shown
  and must be confirmed with "y" before anything is fetched. A list of
  identifiers (-list) limits the fetch to the accession numbers of those
  identifiers; the selection is shown and confirmed a second time.

HEADERS
  The gi/gb fields of each header are dropped, the characters , . ; : = ( )
  are removed and whitespace becomes "_" (keep it with -whitespaces). The
  description is cut to -desc characters (default 50) unless -full_desc is
  given.

OUTPUT
  <query>.fas        one FASTA record per accession (<query>_list.fas with -list)
  <query>.log        "accession,count" for every parsed accession

ENVIRONMENT
  ACCFETCH_EFETCH_URL  alternative E-utilities efetch endpoint
`;
