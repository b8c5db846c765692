import type { GeohashPair } from '@domain/entities/GeohashPair';

/**
 * Data Source Adapter Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * Converts a raw tabular input (whatever headers the spreadsheet happened to use)
 * into GeohashPairs. The batch pipeline doesn't care whether the rows came
 * from a CSV or a workbook; it just calls `toPairs()`.
 *
 * The generic `TRaw` type parameter lets each adapter declare what row shape
 * it expects.
 */
export interface IDataSourceAdapter<TRaw = unknown> {
  toPairs(raw: TRaw): GeohashPair[];
}
