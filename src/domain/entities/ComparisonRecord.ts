/**
 * ComparisonRecord — one row of final output
 * Layer: Domain
 *
 * Carries the original pair, the decoded coordinates, both provider results
 * and the derived differences. A diff field is present if and only if both of
 * its operands are present; when present it is |directions − routes|, exact.
 *
 * `error` is the row-level failure marker. A row whose geohashes could not be
 * decoded has `error` set, null coordinates and null provider results.
 */
import type { Coordinate, GeohashPair } from './GeohashPair';
import type { ProviderName, ProviderResult } from './ProviderResult';

export type FasterProvider = ProviderName | 'tie';

export interface ComparisonRecord {
  pair: GeohashPair;
  origin: Coordinate | null;
  destination: Coordinate | null;
  directions: ProviderResult | null;
  routes: ProviderResult | null;
  error: string | null;
  distanceDiffMeters?: number;
  durationDiffSeconds?: number;
  responseTimeDiffMs?: number;
  fasterProvider?: FasterProvider;
}
