// src/core/export/paths.ts
import { LIST_OUTPUT_SUFFIX, LOG_SUFFIX, OUTPUT_SUFFIX } from '../config/constants.js';

export interface OutputPaths {
  fastaPath: string;
  logPath: string;
}

export function generateOutputPaths(queryPath: string, filtered: boolean): OutputPaths {
  return {
    fastaPath: queryPath + (filtered ? LIST_OUTPUT_SUFFIX : OUTPUT_SUFFIX),
    logPath: queryPath + LOG_SUFFIX,
  };
}
