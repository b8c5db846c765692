/**
 * Comparison Service — Facade over the whole run
 * Layer: Application
 * Pattern: Facade Pattern
 *
 * Calling `run()` hides the full pipeline:
 *   - picking a reader for the input file and parsing it
 *   - recognising the geohash columns (fatal before any HTTP call if absent)
 *   - running every pair through both providers
 *   - writing the CSV and the workbook
 *
 * The CLI only ever talks to this class.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { InputReaderFactory } from '@application/factories/InputReaderFactory';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import type { IReportWriter } from '@domain/interfaces/IReportWriter';
import { OUTPUT_FILE_PREFIX } from '@shared/constants';
import { NotFoundError } from '@shared/errors/AppError';
import type { OutputOptions, RunRequest, RunResult, TabularInput } from '@shared/types';
import fs from 'fs';
import path from 'path';
import { inject, injectable } from 'tsyringe';

import { BatchRunner } from './BatchRunner';

export interface OutputPaths {
  csvPath: string;
  workbookPath: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHmmss. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * CSV path is --output, or `<dir>/comparison_<timestamp>.csv`. The workbook
 * sits beside it: `.csv` swapped for `.xlsx`, or `.xlsx` appended.
 */
export function resolveOutputPaths(
  outputPath: string | undefined,
  outputDir: string,
  now: Date,
): OutputPaths {
  const csvPath = path.resolve(
    outputPath ?? path.join(outputDir, `${OUTPUT_FILE_PREFIX}_${formatTimestamp(now)}.csv`),
  );
  const workbookPath =
    path.extname(csvPath).toLowerCase() === '.csv'
      ? csvPath.slice(0, -'.csv'.length) + '.xlsx'
      : `${csvPath}.xlsx`;
  return { csvPath, workbookPath };
}

@injectable()
export class ComparisonService {
  constructor(
    @inject(TOKENS.InputReaderFactory) private readerFactory: InputReaderFactory,
    @inject(TOKENS.DataSourceAdapter) private adapter: IDataSourceAdapter<TabularInput>,
    @inject(TOKENS.BatchRunner) private runner: BatchRunner,
    @inject(TOKENS.ReportWriter) private writer: IReportWriter,
    @inject(TOKENS.OutputOptions) private output: OutputOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async run(request: RunRequest): Promise<RunResult> {
    const startTime = Date.now();
    const inputPath = path.resolve(request.inputPath);
    if (!fs.existsSync(inputPath)) {
      throw new NotFoundError('Input file', inputPath);
    }

    const reader = this.readerFactory.create(inputPath);
    const pairs = this.adapter.toPairs(await reader.read(inputPath));
    this.log.info({ inputPath, pairs: pairs.length }, 'Input loaded');

    const { records, summary } = await this.runner.runBatch(
      pairs,
      request.directionsKey,
      request.routesKey,
    );

    const { csvPath, workbookPath } = resolveOutputPaths(
      request.outputPath,
      this.output.dir,
      new Date(),
    );
    await this.writer.write(records, summary, csvPath, workbookPath);

    return { csvPath, workbookPath, summary, durationMs: Date.now() - startTime };
  }
}
