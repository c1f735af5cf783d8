// src/core/export/fasta-writer.ts
import * as fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { AccFetchError, ErrorCode, describeError } from '../errors.js';
import type { HeaderOptions, SanitizedHeader } from '../types/index.js';
import { formatRecord } from '../sanitize/header.js';

export class FastaWriter {
  private recordCount = 0;

  private constructor(
    private handle: FileHandle,
    readonly path: string,
    private options: HeaderOptions
  ) {}

  static async open(filePath: string, options: HeaderOptions): Promise<FastaWriter> {
    try {
      const handle = await fs.open(filePath, 'w');
      return new FastaWriter(handle, filePath, options);
    } catch (error) {
      throw new AccFetchError(
        ErrorCode.OUTPUT_WRITE_FAILED,
        `${filePath} could not be opened`,
        false,
        undefined,
        { path: filePath, cause: describeError(error) }
      );
    }
  }

  async write(record: SanitizedHeader): Promise<void> {
    try {
      await this.handle.write(formatRecord(record, this.options));
      this.recordCount++;
    } catch (error) {
      throw new AccFetchError(
        ErrorCode.OUTPUT_WRITE_FAILED,
        `Could not write ${record.prefixAccession} to ${this.path}`,
        false,
        undefined,
        { path: this.path, cause: describeError(error) }
      );
    }
  }

  getRecordCount(): number {
    return this.recordCount;
  }

  async close(): Promise<void> {
    try {
      await this.handle.close();
    } catch (error) {
      throw new AccFetchError(
        ErrorCode.OUTPUT_WRITE_FAILED,
        `${this.path} could not be closed`,
        false,
        undefined,
        { path: this.path, cause: describeError(error) }
      );
    }
  }
}
