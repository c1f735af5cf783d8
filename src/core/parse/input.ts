// src/core/parse/input.ts
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { AccFetchError, ErrorCode, describeError } from '../errors.js';
import type { QueryFileType } from '../types/index.js';

export function assertFileExists(filePath: string): void {
  if (!existsSync(filePath)) {
    throw new AccFetchError(ErrorCode.MISSING_FILE, `${filePath} was not found`, false, undefined, {
      path: filePath,
    });
  }
}

export async function readInputFile(filePath: string): Promise<string> {
  assertFileExists(filePath);

  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new AccFetchError(
      ErrorCode.FILE_UNREADABLE,
      `${filePath} could not be opened`,
      false,
      undefined,
      { path: filePath, cause: describeError(error) }
    );
  }
}

export function detectQueryFileType(filePath: string): QueryFileType | null {
  const extension = filePath.slice(-4).toLowerCase();
  if (extension === '.txt') return 'TXT';
  if (extension === '.csv') return 'CSV';
  return null;
}
