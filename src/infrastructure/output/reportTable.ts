/**
 * Report Table — ComparisonRecord → flat row
 *
 * The one place that decides column names and order. CSV and the workbook's
 * Full_Data sheet both come from here, so they can never disagree.
 *
 * Order: original geohashes first, then row context, then every directions
 * field, every routes field, the derived differences, and finally each
 * provider's raw response body. Absent values are null, which both writers
 * render as an empty cell.
 */
import type { ComparisonRecord } from '@domain/entities/ComparisonRecord';
import type { ProviderResult } from '@domain/entities/ProviderResult';

export type ReportCell = string | number | null;

const PROVIDER_FIELDS = [
  'status',
  'distance_meters',
  'distance_text',
  'duration_seconds',
  'duration_text',
  'polyline',
  'start_address',
  'end_address',
  'response_time_ms',
] as const;

export const REPORT_COLUMNS: readonly string[] = [
  'customer_geohash',
  'restaurant_geohash',
  'row_number',
  'customer_lat',
  'customer_lng',
  'restaurant_lat',
  'restaurant_lng',
  'row_error',
  ...PROVIDER_FIELDS.map((field) => `directions_${field}`),
  ...PROVIDER_FIELDS.map((field) => `routes_${field}`),
  'distance_diff_meters',
  'duration_diff_seconds',
  'response_time_diff_ms',
  'faster_provider',
  'directions_raw_response',
  'routes_raw_response',
];

function providerCells(result: ProviderResult | null): ReportCell[] {
  if (!result) return PROVIDER_FIELDS.map(() => null);
  return [
    result.status,
    result.distanceMeters ?? null,
    result.distanceText ?? null,
    result.durationSeconds ?? null,
    result.durationText ?? null,
    result.polyline ?? null,
    result.startAddress ?? null,
    result.endAddress ?? null,
    result.responseTimeMs,
  ];
}

export function toReportRow(record: ComparisonRecord, rowNumber: number): ReportCell[] {
  return [
    record.pair.customerGeohash,
    record.pair.restaurantGeohash,
    rowNumber,
    record.origin?.latitude ?? null,
    record.origin?.longitude ?? null,
    record.destination?.latitude ?? null,
    record.destination?.longitude ?? null,
    record.error,
    ...providerCells(record.directions),
    ...providerCells(record.routes),
    record.distanceDiffMeters ?? null,
    record.durationDiffSeconds ?? null,
    record.responseTimeDiffMs ?? null,
    record.fasterProvider ?? null,
    record.directions?.rawResponse ?? null,
    record.routes?.rawResponse ?? null,
  ];
}

export function toReportRows(records: readonly ComparisonRecord[]): ReportCell[][] {
  return records.map((record, index) => toReportRow(record, index + 1));
}
