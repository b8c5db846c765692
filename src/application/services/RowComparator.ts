/**
 * Row Comparator
 * Layer: Application
 *
 * Turns one GeohashPair into one ComparisonRecord: decode both geohashes, ask
 * both providers for a route, derive the differences.
 *
 * Failure model: nothing here rejects for a row-level problem. A geohash that
 * won't decode becomes `record.error` and no provider is called; a provider
 * failure is already a ProviderResult with a non-OK status. The batch keeps
 * going either way. Each non-OK provider result is logged here as a warning
 * carrying the pair, so a failure in the log can be traced to its input row.
 *
 * The two provider calls share no state, so they are issued together.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ComparisonRecord, FasterProvider } from '@domain/entities/ComparisonRecord';
import type { Coordinate, GeohashPair } from '@domain/entities/GeohashPair';
import type { ProviderResult } from '@domain/entities/ProviderResult';
import type { IRoutingProvider } from '@domain/interfaces/IRoutingProvider';
import { STATUS_OK } from '@shared/constants';
import { DecodeError } from '@shared/errors/AppError';
import { decode } from '@shared/geohash';
import { inject, injectable } from 'tsyringe';

/** |a − b| when both sides are present, otherwise absent. */
export function absoluteDifference(
  a: number | undefined,
  b: number | undefined,
): number | undefined {
  return a !== undefined && b !== undefined ? Math.abs(a - b) : undefined;
}

/** A failed call's timing is reported per provider but never compared. */
function comparableTime(result: ProviderResult): number | undefined {
  return result.status === STATUS_OK ? result.responseTimeMs : undefined;
}

export function fasterOf(
  directions: ProviderResult,
  routes: ProviderResult,
): FasterProvider | undefined {
  const a = comparableTime(directions);
  const b = comparableTime(routes);
  if (a === undefined || b === undefined) return undefined;
  if (a === b) return 'tie';
  return a < b ? 'directions' : 'routes';
}

@injectable()
export class RowComparator {
  constructor(
    @inject(TOKENS.DirectionsProvider) private directionsProvider: IRoutingProvider,
    @inject(TOKENS.RoutesProvider) private routesProvider: IRoutingProvider,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async compareRow(
    pair: GeohashPair,
    directionsKey: string,
    routesKey: string,
  ): Promise<ComparisonRecord> {
    let origin: Coordinate;
    let destination: Coordinate;
    try {
      origin = decode(pair.customerGeohash);
      destination = decode(pair.restaurantGeohash);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.log.warn({ pair }, err.message);
      return {
        pair,
        origin: null,
        destination: null,
        directions: null,
        routes: null,
        error: err.message,
      };
    }

    const [directions, routes] = await Promise.all([
      this.directionsProvider.fetchRoute(origin, destination, directionsKey),
      this.routesProvider.fetchRoute(origin, destination, routesKey),
    ]);
    this.warnIfFailed(pair, this.directionsProvider.name, directions);
    this.warnIfFailed(pair, this.routesProvider.name, routes);

    return {
      pair,
      origin,
      destination,
      directions,
      routes,
      error: null,
      distanceDiffMeters: absoluteDifference(directions.distanceMeters, routes.distanceMeters),
      durationDiffSeconds: absoluteDifference(directions.durationSeconds, routes.durationSeconds),
      responseTimeDiffMs: absoluteDifference(comparableTime(directions), comparableTime(routes)),
      fasterProvider: fasterOf(directions, routes),
    };
  }

  private warnIfFailed(pair: GeohashPair, provider: string, result: ProviderResult): void {
    if (result.status === STATUS_OK) return;
    this.log.warn(
      { pair, provider, status: result.status, responseTimeMs: result.responseTimeMs },
      `${provider} returned ${result.status}`,
    );
  }
}
