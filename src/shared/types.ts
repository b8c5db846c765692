/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Option objects and request/result shapes that no single layer owns.
 * The *Options interfaces are config slices: the container builds them from
 * `config`, tests build them by hand.
 */
import type { BatchSummary } from '@domain/entities/BatchSummary';

export interface ProviderOptions {
  directionsUrl: string;
  routesUrl: string;
  routesFieldMask: string;
  languageCode: string;
}

export interface BatchOptions {
  /** Rows in flight at once. */
  concurrency: number;
  /** Pause each worker takes between rows. */
  rowDelayMs: number;
  /** Log progress every N completed rows. */
  progressInterval: number;
}

export interface OutputOptions {
  /** Directory for auto-named output when --output is omitted. */
  dir: string;
}

/** One raw input row keyed by header, as read from CSV or XLSX. */
export type RawInputRow = Record<string, string>;

/** A parsed input file. `headers` survives even when there are no data rows. */
export interface TabularInput {
  headers: string[];
  rows: RawInputRow[];
}

export interface RunRequest {
  inputPath: string;
  outputPath?: string;
  directionsKey: string;
  routesKey: string;
}

export interface RunResult {
  csvPath: string;
  workbookPath: string;
  summary: BatchSummary;
  durationMs: number;
}
