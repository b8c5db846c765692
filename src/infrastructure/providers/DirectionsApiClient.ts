/**
 * Directions API Client — legacy routing endpoint
 * Layer: Infrastructure
 * Pattern: Strategy (implements IRoutingProvider)
 *
 * GET with origin/destination/key as query params. The body carries a
 * top-level `status` and a list of route candidates, each made of legs with
 * `{ value, text }` distance and duration objects.
 *
 * Selection rule: the first route candidate is used. Its distance and duration
 * are the sums over its legs (an origin→destination request without waypoints
 * has exactly one leg). Texts are the leg texts joined with " + ".
 *
 * Failures are logged at debug only; the row comparator owns the warning,
 * since it knows which pair the request belonged to.
 */
import type { Logger } from '@core/logger';
import { type Clock, TOKENS } from '@core/types';
import { type Coordinate, formatCoordinate } from '@domain/entities/GeohashPair';
import type { ProviderResult } from '@domain/entities/ProviderResult';
import type { IRoutingProvider } from '@domain/interfaces/IRoutingProvider';
import { CLIENT_STATUS, STATUS_OK } from '@shared/constants';
import { ProviderError } from '@shared/errors/AppError';
import type { ProviderOptions } from '@shared/types';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod/v4';

import {
  elapsedSince,
  isSuccessStatus,
  serializeBody,
  statusBodySchema,
  toTransportError,
} from './transport';

const valueTextSchema = z.object({
  value: z.number(),
  text: z.string().optional(),
});

const legSchema = z.object({
  distance: valueTextSchema.optional(),
  duration: valueTextSchema.optional(),
  start_address: z.string().optional(),
  end_address: z.string().optional(),
});

const directionsResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  routes: z
    .array(
      z.object({
        overview_polyline: z.object({ points: z.string() }).optional(),
        legs: z.array(legSchema).default([]),
      }),
    )
    .default([]),
});

type DirectionsLeg = z.infer<typeof legSchema>;
type RouteFields = Omit<ProviderResult, 'status' | 'responseTimeMs'>;

@injectable()
export class DirectionsApiClient implements IRoutingProvider {
  readonly name = 'directions' as const;

  constructor(
    @inject(TOKENS.HttpClient) private http: AxiosInstance,
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.Clock) private clock: Clock,
    @inject(TOKENS.ProviderOptions) private options: ProviderOptions,
  ) {}

  async fetchRoute(
    origin: Coordinate,
    destination: Coordinate,
    apiKey: string,
  ): Promise<ProviderResult> {
    const startedAt = this.clock();
    try {
      const fields = await this.request(origin, destination, apiKey);
      const responseTimeMs = elapsedSince(this.clock, startedAt);
      this.log.debug({ provider: this.name, responseTimeMs }, 'Directions route received');
      return { ...fields, status: STATUS_OK, responseTimeMs };
    } catch (err) {
      if (!(err instanceof ProviderError)) throw err;
      const responseTimeMs = elapsedSince(this.clock, startedAt);
      this.log.debug(
        { provider: this.name, status: err.status, responseTimeMs },
        err.message,
      );
      return { status: err.status, responseTimeMs, rawResponse: err.rawResponse };
    }
  }

  private async request(
    origin: Coordinate,
    destination: Coordinate,
    apiKey: string,
  ): Promise<RouteFields> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(this.options.directionsUrl, {
        params: {
          origin: formatCoordinate(origin),
          destination: formatCoordinate(destination),
          key: apiKey,
          language: this.options.languageCode,
        },
      });
    } catch (err) {
      throw toTransportError(this.name, err);
    }

    const rawResponse = serializeBody(response.data);
    if (!isSuccessStatus(response.status)) {
      const body = statusBodySchema.safeParse(response.data);
      const status = body.success ? body.data.status : `HTTP_${response.status}`;
      throw new ProviderError(this.name, status, undefined, rawResponse);
    }

    const parsed = directionsResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ProviderError(
        this.name,
        CLIENT_STATUS.INVALID_RESPONSE,
        'response body does not match the Directions schema',
        rawResponse,
      );
    }

    const { status, error_message: errorMessage, routes } = parsed.data;
    if (status !== STATUS_OK) {
      throw new ProviderError(this.name, status, errorMessage, rawResponse);
    }

    const route = routes[0];
    if (!route) {
      throw new ProviderError(
        this.name,
        CLIENT_STATUS.ZERO_RESULTS,
        'status OK without routes',
        rawResponse,
      );
    }

    const { legs } = route;
    return {
      distanceMeters: sumLegValues(legs, (leg) => leg.distance?.value),
      distanceText: joinLegTexts(legs, (leg) => leg.distance?.text),
      durationSeconds: sumLegValues(legs, (leg) => leg.duration?.value),
      durationText: joinLegTexts(legs, (leg) => leg.duration?.text),
      polyline: route.overview_polyline?.points,
      startAddress: legs[0]?.start_address,
      endAddress: legs[legs.length - 1]?.end_address,
      rawResponse,
    };
  }
}

/** Sum of a per-leg value; absent if there are no legs or any leg lacks it. */
function sumLegValues(
  legs: DirectionsLeg[],
  pick: (leg: DirectionsLeg) => number | undefined,
): number | undefined {
  if (legs.length === 0) return undefined;
  let total = 0;
  for (const leg of legs) {
    const value = pick(leg);
    if (value === undefined) return undefined;
    total += value;
  }
  return total;
}

function joinLegTexts(
  legs: DirectionsLeg[],
  pick: (leg: DirectionsLeg) => string | undefined,
): string | undefined {
  const texts = legs.map(pick).filter((text): text is string => text !== undefined);
  return texts.length > 0 ? texts.join(' + ') : undefined;
}
