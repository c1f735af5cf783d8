// src/core/export/occurrence-log.ts
import * as fs from 'fs/promises';
import type { AccessionRecord } from '../types/index.js';
import { describeError } from '../errors.js';

export function formatOccurrenceLog(records: AccessionRecord[]): string {
  return [...records]
    .sort((a, b) => (a.accession < b.accession ? -1 : a.accession > b.accession ? 1 : 0))
    .map((record) => `${record.accession},${record.count}\n`)
    .join('');
}

export type LogWriteResult =
  | { status: 'written'; path: string }
  | { status: 'failed'; path: string; reason: string };

/** Never throws: a log that cannot be written only costs the log */
export async function writeOccurrenceLog(
  logPath: string,
  records: AccessionRecord[]
): Promise<LogWriteResult> {
  try {
    await fs.writeFile(logPath, formatOccurrenceLog(records), 'utf-8');
    return { status: 'written', path: logPath };
  } catch (error) {
    return { status: 'failed', path: logPath, reason: describeError(error) };
  }
}
