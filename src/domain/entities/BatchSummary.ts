/**
 * BatchSummary — aggregate view of a finished run
 * Layer: Domain
 *
 * Built once after every row has completed, read-only afterwards. For each diff
 * field, `count + excluded === totalRows`: rows where the diff was absent are
 * excluded from that field's statistics, never counted as zero.
 */
import type { DIFF_FIELDS } from '@shared/constants';

export type DiffField = (typeof DIFF_FIELDS)[number];

export interface DiffStatistics {
  count: number;
  excluded: number;
  mean: number | null;
  median: number | null;
  max: number | null;
  min: number | null;
  /** Sample standard deviation; null below two values. */
  std: number | null;
}

export interface BatchSummary {
  totalRows: number;
  /** Rows where both providers returned status OK. */
  bothSucceeded: number;
  /** Rows whose geohashes could not be decoded. */
  rowErrors: number;
  directionsFailures: number;
  routesFailures: number;
  fasterProvider: {
    directions: number;
    routes: number;
    tie: number;
  };
  diffs: Record<DiffField, DiffStatistics>;
}
