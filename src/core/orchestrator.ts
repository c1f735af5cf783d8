// src/core/orchestrator.ts
import type { AccessionRecord, HeaderOptions, QueryFileType } from './types/index.js';
import { AccFetchError, ErrorCode } from './errors.js';
import { assertFileExists, detectQueryFileType, readInputFile } from './parse/input.js';
import { parseListContent, parseTxtQuery } from './parse/txt.js';
import { parseCsvContent } from './parse/csv.js';
import { buildRecords, resolveSelection } from './filter/list-filter.js';
import { confirmParsing, toIdentifierGroups } from './confirm/confirmation.js';
import type { PromptAdapter } from './confirm/prompt.js';
import { generateOutputPaths } from './export/paths.js';
import { writeOccurrenceLog } from './export/occurrence-log.js';
import { FetchRunner, type FetchSummary } from './batch/runner.js';
import type { SequenceSource } from './fetch/entrez.js';
import { step, warn } from './progress.js';

export interface RunOptions {
  queryPath: string;
  listPath?: string;
  header: HeaderOptions;
}

export interface RunWarning {
  kind: 'format' | 'log_write' | 'list_ignored' | 'fetch_failed';
  message: string;
}

export interface RunResult {
  fileType: QueryFileType;
  filtered: boolean;
  records: AccessionRecord[];
  fastaPath: string;
  logPath: string | null;
  summary: FetchSummary;
  diagnostics: {
    warnings: RunWarning[];
  };
}

interface ParsedQuery {
  records: AccessionRecord[];
  filtered: boolean;
}

export class AccFetchOrchestrator {
  constructor(
    private source: SequenceSource,
    private prompt: PromptAdapter
  ) {}

  async run(options: RunOptions): Promise<RunResult> {
    const fileType = detectQueryFileType(options.queryPath);
    if (!fileType) {
      throw new AccFetchError(
        ErrorCode.USAGE,
        'Please provide a CSV or TXT file of accession numbers',
        false,
        undefined,
        { path: options.queryPath }
      );
    }
    if (options.listPath) {
      assertFileExists(options.listPath);
    }

    const warnings: RunWarning[] = [];

    step(`Opening ${options.queryPath}`);
    const content = await readInputFile(options.queryPath);
    step(`Parsing ${fileType} file`);

    const parsed =
      fileType === 'TXT'
        ? this.parseTxt(content, options, warnings)
        : await this.parseCsv(content, options);

    const { fastaPath, logPath } = generateOutputPaths(options.queryPath, parsed.filtered);

    step(`Writing log-file with incidences of ACC to ${logPath}`);
    const logResult = await writeOccurrenceLog(logPath, parsed.records);
    if (logResult.status === 'failed') {
      const message = `Could not write to log file ${logPath} (${logResult.reason})`;
      warn(message);
      warnings.push({ kind: 'log_write', message });
    }

    const runner = new FetchRunner(this.source);
    const summary = await runner.run(parsed.records, {
      outputPath: fastaPath,
      header: options.header,
    });
    for (const failure of summary.failures) {
      warnings.push({ kind: 'fetch_failed', message: `${failure.accession}: ${failure.error}` });
    }

    step(`Wrote sequences to ${fastaPath}`);
    step('Done');

    return {
      fileType,
      filtered: parsed.filtered,
      records: parsed.records,
      fastaPath,
      logPath: logResult.status === 'written' ? logPath : null,
      summary,
      diagnostics: { warnings },
    };
  }

  private parseTxt(content: string, options: RunOptions, warnings: RunWarning[]): ParsedQuery {
    const { counts, warnings: formatWarnings } = parseTxtQuery(content);

    for (const formatWarning of formatWarnings) {
      warn(formatWarning.message);
      warnings.push({ kind: 'format', message: formatWarning.message });
    }

    if (options.listPath) {
      const message = `${options.listPath} is ignored: lists only filter CSV queries`;
      warn(message);
      warnings.push({ kind: 'list_ignored', message });
    }

    return { records: buildRecords(counts), filtered: false };
  }

  private async parseCsv(content: string, options: RunOptions): Promise<ParsedQuery> {
    const parsed = parseCsvContent(content);
    const groups = toIdentifierGroups(parsed.groups);

    if (!(await confirmParsing(groups, this.prompt))) {
      throw new AccFetchError(
        ErrorCode.USER_REJECTED_PARSING,
        'Parsing results were rejected',
        false,
        'Please change the sequence identifiers, they look too much like ACC numbers'
      );
    }

    if (!options.listPath) {
      return { records: buildRecords(parsed.counts), filtered: false };
    }

    step(`Parsing list in ${options.listPath}`);
    const accepted = parseListContent(await readInputFile(options.listPath));
    const weights = resolveSelection(parsed, accepted);

    if (!(await confirmParsing(groups, this.prompt, weights))) {
      throw new AccFetchError(
        ErrorCode.USER_REJECTED_PARSING,
        'Filtered parsing results were rejected',
        false,
        `Please take a look at ${options.listPath}. Usual problems involve the end of the lines (spaces, newline characters)`
      );
    }

    return { records: buildRecords(parsed.counts, weights), filtered: true };
  }
}
