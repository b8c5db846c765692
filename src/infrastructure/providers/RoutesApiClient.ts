/**
 * Routes API Client — computeRoutes endpoint
 * Layer: Infrastructure
 * Pattern: Strategy (implements IRoutingProvider)
 *
 * POST with a JSON body and an X-Goog-FieldMask header naming the fields to
 * return. Routes come back flat: `distanceMeters` is already in meters and
 * `duration` is a protobuf Duration string like "754s" or "12.5s".
 *
 * The response has no top-level status. A 2xx body with routes counts as OK,
 * a 2xx body without routes as ZERO_RESULTS, and an error body carries
 * `error.status` (e.g. PERMISSION_DENIED).
 *
 * The Routes API returns no formatted addresses, so start/end addresses are
 * rendered from the leg locations as "lat,lng".
 *
 * proto3 JSON drops zero-valued fields, so a route without `distanceMeters`
 * or `duration` means 0, but only when the field mask asked for that field.
 * A field the mask leaves out stays unknown.
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

const latLngSchema = z.object({ latitude: z.number(), longitude: z.number() });
const locationSchema = z.object({ latLng: latLngSchema.optional() });
const localizedTextSchema = z.object({ text: z.string() });

const routeSchema = z.object({
  distanceMeters: z.number().optional(),
  duration: z.string().optional(),
  polyline: z.object({ encodedPolyline: z.string().optional() }).optional(),
  localizedValues: z
    .object({
      distance: localizedTextSchema.optional(),
      duration: localizedTextSchema.optional(),
    })
    .optional(),
  legs: z
    .array(
      z.object({
        startLocation: locationSchema.optional(),
        endLocation: locationSchema.optional(),
      }),
    )
    .default([]),
});

const routesResponseSchema = z.object({
  routes: z.array(routeSchema).default([]),
});

const errorBodySchema = z.object({
  error: z.object({
    status: z.string().optional(),
    message: z.string().optional(),
  }),
});

type RouteFields = Omit<ProviderResult, 'status' | 'responseTimeMs'>;

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)s$/;

/** "754s" → 754, "12.5s" → 12.5; anything else → undefined. */
export function parseDurationSeconds(duration: string | undefined): number | undefined {
  if (duration === undefined) return undefined;
  const match = DURATION_PATTERN.exec(duration.trim());
  return match ? Number(match[1]) : undefined;
}

/**
 * Whether a comma-separated field mask selects `path`: a `*` entry, the path
 * itself, or any ancestor of it ("routes" covers "routes.duration").
 */
export function fieldMaskIncludes(mask: string, path: string): boolean {
  return mask
    .split(',')
    .map((entry) => entry.trim())
    .some((entry) => entry === '*' || entry === path || path.startsWith(`${entry}.`));
}

@injectable()
export class RoutesApiClient implements IRoutingProvider {
  readonly name = 'routes' as const;
  private readonly masksDistance: boolean;
  private readonly masksDuration: boolean;

  constructor(
    @inject(TOKENS.HttpClient) private http: AxiosInstance,
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.Clock) private clock: Clock,
    @inject(TOKENS.ProviderOptions) private options: ProviderOptions,
  ) {
    this.masksDistance = fieldMaskIncludes(options.routesFieldMask, 'routes.distanceMeters');
    this.masksDuration = fieldMaskIncludes(options.routesFieldMask, 'routes.duration');
  }

  async fetchRoute(
    origin: Coordinate,
    destination: Coordinate,
    apiKey: string,
  ): Promise<ProviderResult> {
    const startedAt = this.clock();
    try {
      const fields = await this.request(origin, destination, apiKey);
      const responseTimeMs = elapsedSince(this.clock, startedAt);
      this.log.debug({ provider: this.name, responseTimeMs }, 'Routes route received');
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
    const body = {
      origin: { location: { latLng: origin } },
      destination: { location: { latLng: destination } },
      travelMode: 'DRIVE',
      languageCode: this.options.languageCode,
    };

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(this.options.routesUrl, body, {
        headers: {
          'Content-Type': 'application/json',
          'X-Goog-Api-Key': apiKey,
          'X-Goog-FieldMask': this.options.routesFieldMask,
        },
      });
    } catch (err) {
      throw toTransportError(this.name, err);
    }

    const rawResponse = serializeBody(response.data);
    if (!isSuccessStatus(response.status)) {
      throw new ProviderError(
        this.name,
        errorStatus(response),
        errorMessage(response),
        rawResponse,
      );
    }

    const parsed = routesResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ProviderError(
        this.name,
        CLIENT_STATUS.INVALID_RESPONSE,
        'response body does not match the Routes schema',
        rawResponse,
      );
    }

    const route = parsed.data.routes[0];
    if (!route) {
      throw new ProviderError(
        this.name,
        CLIENT_STATUS.ZERO_RESULTS,
        'no routes returned',
        rawResponse,
      );
    }

    const firstLeg = route.legs[0];
    const lastLeg = route.legs[route.legs.length - 1];
    const start = firstLeg?.startLocation?.latLng;
    const end = lastLeg?.endLocation?.latLng;

    return {
      distanceMeters: route.distanceMeters ?? omittedValue(this.masksDistance),
      distanceText: route.localizedValues?.distance?.text,
      durationSeconds:
        route.duration === undefined
          ? omittedValue(this.masksDuration)
          : parseDurationSeconds(route.duration),
      durationText: route.localizedValues?.duration?.text,
      polyline: route.polyline?.encodedPolyline,
      startAddress: start ? formatCoordinate(start) : undefined,
      endAddress: end ? formatCoordinate(end) : undefined,
      rawResponse,
    };
  }
}

/** A masked field the body leaves out was zero; an unmasked one is unknown. */
function omittedValue(requestedByMask: boolean): number | undefined {
  return requestedByMask ? 0 : undefined;
}

function errorStatus(response: AxiosResponse<unknown>): string {
  const errorBody = errorBodySchema.safeParse(response.data);
  if (errorBody.success && errorBody.data.error.status) return errorBody.data.error.status;
  const statusBody = statusBodySchema.safeParse(response.data);
  if (statusBody.success) return statusBody.data.status;
  return `HTTP_${response.status}`;
}

function errorMessage(response: AxiosResponse<unknown>): string | undefined {
  const errorBody = errorBodySchema.safeParse(response.data);
  return errorBody.success ? errorBody.data.error.message : undefined;
}
