/**
 * Geohash Codec
 * Layer: Shared
 *
 * A geohash interleaves longitude and latitude bisections, five bits per
 * base-32 character, starting with longitude. Each character narrows the cell;
 * `decode` returns the cell's center, which is what the providers route from.
 *
 * Input is trimmed and lower-cased before decoding, so "9Q8YY" and "9q8yy"
 * name the same cell.
 */
import type { Coordinate } from '@domain/entities/GeohashPair';

import { GEOHASH_ALPHABET } from './constants';
import { DecodeError } from './errors/AppError';

export interface GeohashBounds {
  minLatitude: number;
  maxLatitude: number;
  minLongitude: number;
  maxLongitude: number;
}

const CHAR_VALUES = new Map<string, number>(
  [...GEOHASH_ALPHABET].map((char, index) => [char, index]),
);

export function decodeBounds(geohash: string): GeohashBounds {
  const normalized = geohash.trim().toLowerCase();
  if (normalized.length === 0) {
    throw new DecodeError(geohash, 'empty geohash');
  }

  let minLat = -90;
  let maxLat = 90;
  let minLon = -180;
  let maxLon = 180;
  let evenBit = true;

  for (const char of normalized) {
    const value = CHAR_VALUES.get(char);
    if (value === undefined) {
      throw new DecodeError(geohash, `invalid character "${char}"`);
    }
    for (let bit = 4; bit >= 0; bit--) {
      const isSet = ((value >> bit) & 1) === 1;
      if (evenBit) {
        const mid = (minLon + maxLon) / 2;
        if (isSet) minLon = mid;
        else maxLon = mid;
      } else {
        const mid = (minLat + maxLat) / 2;
        if (isSet) minLat = mid;
        else maxLat = mid;
      }
      evenBit = !evenBit;
    }
  }

  return { minLatitude: minLat, maxLatitude: maxLat, minLongitude: minLon, maxLongitude: maxLon };
}

export function decode(geohash: string): Coordinate {
  const bounds = decodeBounds(geohash);
  return {
    latitude: (bounds.minLatitude + bounds.maxLatitude) / 2,
    longitude: (bounds.minLongitude + bounds.maxLongitude) / 2,
  };
}

export function encode(latitude: number, longitude: number, precision: number): string {
  if (!Number.isInteger(precision) || precision < 1) {
    throw new RangeError(`Geohash precision must be a positive integer, got ${precision}`);
  }

  let minLat = -90;
  let maxLat = 90;
  let minLon = -180;
  let maxLon = 180;
  let evenBit = true;
  let hash = '';
  let value = 0;
  let bits = 0;

  while (hash.length < precision) {
    if (evenBit) {
      const mid = (minLon + maxLon) / 2;
      if (longitude >= mid) {
        value = (value << 1) | 1;
        minLon = mid;
      } else {
        value = value << 1;
        maxLon = mid;
      }
    } else {
      const mid = (minLat + maxLat) / 2;
      if (latitude >= mid) {
        value = (value << 1) | 1;
        minLat = mid;
      } else {
        value = value << 1;
        maxLat = mid;
      }
    }
    evenBit = !evenBit;

    if (++bits === 5) {
      hash += GEOHASH_ALPHABET[value];
      bits = 0;
      value = 0;
    }
  }

  return hash;
}
