/**
 * Geohash Pair Adapter — raw rows → GeohashPair
 * Layer: Infrastructure
 * Pattern: Adapter Pattern (implements IDataSourceAdapter<TabularInput>)
 *
 * Input sheets name their columns in one of three ways (CX_GH/RX_GH,
 * customer_geohash/restaurant_geohash, cx_geohash/rx_geohash). I find the
 * first convention whose BOTH columns appear in the header, ignoring case,
 * and read every row through it. If none matches, the run stops before a
 * single provider call is made.
 *
 * Cell values are trimmed but not validated: an empty or malformed geohash is
 * a row-level problem the comparator records, not an input-format problem.
 */
import type { GeohashPair } from '@domain/entities/GeohashPair';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import { GEOHASH_COLUMN_PAIRS } from '@shared/constants';
import { InputFormatError } from '@shared/errors/AppError';
import type { TabularInput } from '@shared/types';

export interface ColumnMapping {
  customer: string;
  restaurant: string;
}

/** Resolves the actual header names (original casing) of the first matching convention. */
export function detectColumns(headers: readonly string[]): ColumnMapping {
  const byLowerCase = new Map(headers.map((header) => [header.trim().toLowerCase(), header]));

  for (const convention of GEOHASH_COLUMN_PAIRS) {
    const customer = byLowerCase.get(convention.customer.toLowerCase());
    const restaurant = byLowerCase.get(convention.restaurant.toLowerCase());
    if (customer !== undefined && restaurant !== undefined) {
      return { customer, restaurant };
    }
  }

  const expected = GEOHASH_COLUMN_PAIRS.map((p) => `{${p.customer}, ${p.restaurant}}`).join(' | ');
  throw new InputFormatError(
    `No recognised geohash columns. Expected one of ${expected}; found [${headers.join(', ')}]`,
  );
}

export class GeohashPairAdapter implements IDataSourceAdapter<TabularInput> {
  toPairs(input: TabularInput): GeohashPair[] {
    const columns = detectColumns(input.headers);

    return input.rows.map((row) => ({
      customerGeohash: row[columns.customer]?.trim() ?? '',
      restaurantGeohash: row[columns.restaurant]?.trim() ?? '',
    }));
  }
}

