/**
 * Batch Runner — Bounded Row Pool
 * Layer: Application
 *
 * I run every pair through the RowComparator and hand back the records in input
 * order plus the BatchSummary. Rows are pulled by a small pool of async workers
 * sharing one cursor: `concurrency` rows in flight at most, so at most
 * 2 × concurrency HTTP calls. With the default of 1 the run is sequential.
 *
 * Pacing: each worker sleeps `rowDelayMs` before taking its next row, to stay
 * under provider rate limits. Completion order may differ from input order
 * when concurrency > 1; each record is stored at its input index.
 *
 * A row never aborts the batch: the comparator reports row failures as data.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { summarizeBatch } from '@application/statistics/batchStatistics';
import type { BatchSummary } from '@domain/entities/BatchSummary';
import type { ComparisonRecord } from '@domain/entities/ComparisonRecord';
import type { GeohashPair } from '@domain/entities/GeohashPair';
import type { BatchOptions } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { RowComparator } from './RowComparator';

export interface BatchRun {
  records: ComparisonRecord[];
  summary: BatchSummary;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

@injectable()
export class BatchRunner {
  constructor(
    @inject(TOKENS.RowComparator) private comparator: RowComparator,
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.BatchOptions) private options: BatchOptions,
  ) {}

  async runBatch(
    pairs: readonly GeohashPair[],
    directionsKey: string,
    routesKey: string,
  ): Promise<BatchRun> {
    const total = pairs.length;
    const records = new Array<ComparisonRecord>(total);
    const { concurrency, rowDelayMs, progressInterval } = this.options;
    let cursor = 0;
    let completed = 0;

    const worker = async (): Promise<void> => {
      while (cursor < total) {
        const index = cursor++;
        records[index] = await this.comparator.compareRow(pairs[index], directionsKey, routesKey);
        completed++;

        if (completed % progressInterval === 0 || completed === total) {
          this.log.info({ processed: completed, total }, 'Comparison progress');
        }
        if (rowDelayMs > 0 && cursor < total) await delay(rowDelayMs);
      }
    };

    const workerCount = Math.max(1, Math.min(concurrency, total));
    this.log.info({ total, workers: workerCount }, 'Starting comparison batch');
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const summary = summarizeBatch(records);
    this.log.info(
      {
        totalRows: summary.totalRows,
        bothSucceeded: summary.bothSucceeded,
        rowErrors: summary.rowErrors,
      },
      'Comparison batch complete',
    );
    return { records, summary };
  }
}
