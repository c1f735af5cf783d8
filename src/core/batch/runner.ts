// src/core/batch/runner.ts
import type { AccessionRecord, HeaderOptions } from '../types/index.js';
import type { SequenceSource } from '../fetch/entrez.js';
import { FastaWriter } from '../export/fasta-writer.js';
import { sanitizeRecord } from '../sanitize/header.js';
import { ErrorCode, describeError, isAccFetchError } from '../errors.js';
import { step, warn } from '../progress.js';

export interface FetchRunOptions {
  outputPath: string;
  header: HeaderOptions;
  now?: () => number;
}

export interface FetchSummary {
  total: number;
  written: number;
  failed: number;
  duration: number;
  failures: Array<{ accession: string; error: string }>;
}

export function selectForFetch(records: AccessionRecord[]): string[] {
  return records
    .filter((record) => record.selected && record.count > 0)
    .map((record) => record.accession)
    .sort();
}

function logElapsed(milliseconds: number): void {
  console.log(`\t [${Math.floor(milliseconds / 1000)}sec]`);
}

// The error that stopped the loop is the one the caller sees
async function closeAfterFailure(writer: FastaWriter): Promise<void> {
  try {
    await writer.close();
  } catch (closeError) {
    warn(`${writer.path} could not be closed (${describeError(closeError)})`);
  }
}

export class FetchRunner {
  constructor(private source: SequenceSource) {}

  async run(records: AccessionRecord[], options: FetchRunOptions): Promise<FetchSummary> {
    const now = options.now ?? Date.now;
    const accessions = selectForFetch(records);
    const startTime = now();
    const failures: FetchSummary['failures'] = [];

    const writer = await FastaWriter.open(options.outputPath, options.header);

    try {
      for (const accession of accessions) {
        step(`Fetching ${accession}`);
        const fetchStart = now();

        let raw: string;
        try {
          raw = await this.source.fetchFasta(accession);
        } catch (error) {
          // Only network failures are per-record; anything else ends the run
          if (!isAccFetchError(error, ErrorCode.NETWORK_ERROR)) {
            throw error;
          }
          failures.push({ accession, error: describeError(error) });
          warn(`${accession} could not be fetched (${error.message})`);
          logElapsed(now() - fetchStart);
          continue;
        }

        await writer.write(sanitizeRecord(raw, accession, options.header));
        logElapsed(now() - fetchStart);
      }
    } catch (error) {
      await closeAfterFailure(writer);
      throw error;
    }
    await writer.close();

    const summary: FetchSummary = {
      total: accessions.length,
      written: writer.getRecordCount(),
      failed: failures.length,
      duration: now() - startTime,
      failures,
    };

    this.printSummary(summary);
    return summary;
  }

  private printSummary(summary: FetchSummary): void {
    console.log('\n' + '━'.repeat(50));
    console.log(
      `Summary: ${summary.written} written, ${summary.failed} failed, ${(summary.duration / 1000).toFixed(1)}s`
    );

    if (summary.failures.length > 0) {
      console.log('\nFailed accessions:');
      summary.failures.forEach(({ accession, error }) => {
        console.log(`  - ${accession}: ${error}`);
      });
    }
  }
}
