/**
 * ProviderResult — one provider's answer for one row
 * Layer: Domain
 *
 * Both routing clients normalise their very different response shapes into
 * this single record, so nothing downstream ever branches on provider identity.
 *
 * Route fields are optional: when the call fails or the provider status is not
 * OK they are absent and `status` carries the reason. `responseTimeMs` is
 * always present because every attempt is timed, successful or not.
 *
 * `rawResponse` is the body as received: JSON text, or the body string when
 * it was not JSON. It is kept for OK and non-OK answers alike and is absent
 * only when no body arrived (timeout, network error, empty body).
 */
export type ProviderName = 'directions' | 'routes';

export interface ProviderResult {
  distanceMeters?: number;
  distanceText?: string;
  durationSeconds?: number;
  durationText?: string;
  polyline?: string;
  startAddress?: string;
  endAddress?: string;
  status: string;
  responseTimeMs: number;
  rawResponse?: string;
}
