// src/core/errors.ts
export enum ErrorCode {
  USAGE = 'usage',
  MISSING_FILE = 'missing_file',
  FILE_UNREADABLE = 'file_unreadable',
  USER_REJECTED_PARSING = 'user_rejected_parsing',
  OUTPUT_WRITE_FAILED = 'output_write_failed',
  NETWORK_ERROR = 'network_error',
}

export class AccFetchError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AccFetchError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function isAccFetchError(error: unknown, code?: ErrorCode): error is AccFetchError {
  return error instanceof AccFetchError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
