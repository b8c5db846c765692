import type { Coordinate } from '@domain/entities/GeohashPair';
import type { ProviderName, ProviderResult } from '@domain/entities/ProviderResult';

/**
 * Routing Provider Interface
 * Layer: Domain
 * Pattern: Strategy Pattern
 *
 * The Directions client and the Routes client speak completely different
 * request/response dialects — GET with query params vs POST with a field mask,
 * nested legs vs flat route objects, integer seconds vs "123s" strings. Both
 * hide that behind this one method, so the RowComparator can call either
 * without knowing which one it holds.
 *
 * Contract: `fetchRoute` never rejects for a provider failure. Network errors,
 * timeouts and non-OK statuses come back as a ProviderResult whose `status`
 * names the failure and whose route fields are absent.
 */
export interface IRoutingProvider {
  readonly name: ProviderName;
  fetchRoute(origin: Coordinate, destination: Coordinate, apiKey: string): Promise<ProviderResult>;
}
