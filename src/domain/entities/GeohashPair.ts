/**
 * GeohashPair & Coordinate
 * Layer: Domain
 *
 * A GeohashPair is one input row: where the customer is and where the
 * restaurant is, each as a geohash cell. A Coordinate is the center of a
 * decoded cell and is what the providers are actually asked to route between.
 *
 * Both live only for the duration of one row.
 */
export interface GeohashPair {
  readonly customerGeohash: string;
  readonly restaurantGeohash: string;
}

export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

/** The "lat,lng" form both providers accept and the report prints. */
export function formatCoordinate(coordinate: Coordinate): string {
  return `${coordinate.latitude},${coordinate.longitude}`;
}
