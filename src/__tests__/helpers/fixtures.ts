/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Geohashes are arbitrary valid cells; response bodies mirror the shapes the
 * two routing APIs return, trimmed to the fields the clients read.
 */
import type { Coordinate, GeohashPair } from '@domain/entities/GeohashPair';
import type { ProviderResult } from '@domain/entities/ProviderResult';

export const samplePair: GeohashPair = {
  customerGeohash: '9q8yy9mur',
  restaurantGeohash: '9q8yy9mvr',
};

export const invalidPair: GeohashPair = {
  customerGeohash: '9q8yy9maa',
  restaurantGeohash: '9q8yy9mvr',
};

export const sampleOrigin: Coordinate = { latitude: 37.77, longitude: -122.42 };
export const sampleDestination: Coordinate = { latitude: 37.78, longitude: -122.41 };

/** A one-leg Directions API body with status OK. */
export function directionsOkBody(distanceMeters: number, durationSeconds: number) {
  return {
    status: 'OK',
    geocoded_waypoints: [],
    routes: [
      {
        summary: 'Market St',
        overview_polyline: { points: 'a~l~Fjk~uOwHJy@P' },
        legs: [
          {
            distance: { text: `${distanceMeters} m`, value: distanceMeters },
            duration: { text: `${Math.round(durationSeconds / 60)} mins`, value: durationSeconds },
            start_address: '1 Test Street, Testville',
            end_address: '9 Sample Road, Testville',
          },
        ],
      },
    ],
  };
}

/** A Routes API computeRoutes body with one route. */
export function routesOkBody(distanceMeters: number, durationSeconds: number) {
  return {
    routes: [
      {
        distanceMeters,
        duration: `${durationSeconds}s`,
        polyline: { encodedPolyline: 'b~l~Fjk~uOwHJy@Q' },
        localizedValues: {
          distance: { text: `${distanceMeters} m` },
          duration: { text: `${Math.round(durationSeconds / 60)} mins` },
        },
        legs: [
          {
            startLocation: { latLng: { latitude: 37.77, longitude: -122.42 } },
            endLocation: { latLng: { latitude: 37.78, longitude: -122.41 } },
          },
        ],
      },
    ],
  };
}

export function okResult(
  distanceMeters: number,
  durationSeconds: number,
  responseTimeMs: number,
): ProviderResult {
  return {
    distanceMeters,
    distanceText: `${distanceMeters} m`,
    durationSeconds,
    durationText: `${durationSeconds} s`,
    polyline: 'poly',
    startAddress: 'start',
    endAddress: 'end',
    status: 'OK',
    responseTimeMs,
  };
}

export function failedResult(status: string, responseTimeMs: number): ProviderResult {
  return { status, responseTimeMs };
}
