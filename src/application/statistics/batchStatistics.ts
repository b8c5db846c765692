/**
 * Batch Statistics
 * Layer: Application
 *
 * Pure aggregation over finished ComparisonRecords. Absent diffs are excluded
 * from a field's statistics and counted in `excluded`, so
 * `count + excluded === totalRows` always holds.
 */
import type { BatchSummary, DiffField, DiffStatistics } from '@domain/entities/BatchSummary';
import type { ComparisonRecord } from '@domain/entities/ComparisonRecord';
import { STATUS_OK } from '@shared/constants';

/** Reads the record field behind each report diff column. */
export const DIFF_ACCESSORS: Record<DiffField, (record: ComparisonRecord) => number | undefined> = {
  distance_diff_meters: (record) => record.distanceDiffMeters,
  duration_diff_seconds: (record) => record.durationDiffSeconds,
  response_time_diff_ms: (record) => record.responseTimeDiffMs,
};

export function describeValues(values: readonly number[], totalRows: number): DiffStatistics {
  const count = values.length;
  const excluded = totalRows - count;
  if (count === 0) {
    return { count, excluded, mean: null, median: null, max: null, min: null, std: null };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((acc, value) => acc + value, 0);
  const mean = sum / count;
  const middle = Math.floor(count / 2);
  const median = count % 2 === 1 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;

  let std: number | null = null;
  if (count > 1) {
    const squared = sorted.reduce((acc, value) => acc + (value - mean) ** 2, 0);
    std = Math.sqrt(squared / (count - 1));
  }

  return {
    count,
    excluded,
    mean,
    median,
    max: sorted[count - 1],
    min: sorted[0],
    std,
  };
}

export function summarizeBatch(records: readonly ComparisonRecord[]): BatchSummary {
  const totalRows = records.length;
  const fasterProvider = { directions: 0, routes: 0, tie: 0 };
  let bothSucceeded = 0;
  let rowErrors = 0;
  let directionsFailures = 0;
  let routesFailures = 0;

  for (const record of records) {
    if (record.error !== null) {
      rowErrors++;
      continue;
    }
    const directionsOk = record.directions?.status === STATUS_OK;
    const routesOk = record.routes?.status === STATUS_OK;
    if (!directionsOk) directionsFailures++;
    if (!routesOk) routesFailures++;
    if (directionsOk && routesOk) bothSucceeded++;
    if (record.fasterProvider) fasterProvider[record.fasterProvider]++;
  }

  const describeField = (field: DiffField): DiffStatistics =>
    describeValues(
      records.map(DIFF_ACCESSORS[field]).filter((value): value is number => value !== undefined),
      totalRows,
    );

  return {
    totalRows,
    bothSucceeded,
    rowErrors,
    directionsFailures,
    routesFailures,
    fasterProvider,
    diffs: {
      distance_diff_meters: describeField('distance_diff_meters'),
      duration_diff_seconds: describeField('duration_diff_seconds'),
      response_time_diff_ms: describeField('response_time_diff_ms'),
    },
  };
}
