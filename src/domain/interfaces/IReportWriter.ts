import type { BatchSummary } from '@domain/entities/BatchSummary';
import type { ComparisonRecord } from '@domain/entities/ComparisonRecord';

/**
 * Report Writer Interface
 * Layer: Domain
 *
 * Output is the program's whole purpose, so a writer that cannot write must
 * reject with WriteError rather than skip a file.
 */
export interface IReportWriter {
  write(
    records: readonly ComparisonRecord[],
    summary: BatchSummary,
    csvPath: string,
    workbookPath: string,
  ): Promise<void>;
}
