/** Provider status for a usable route. Anything else means the route fields are absent. */
export const STATUS_OK = 'OK';

/** Statuses this tool assigns itself when the provider never produced one. */
export const CLIENT_STATUS = {
  ZERO_RESULTS: 'ZERO_RESULTS',
  TIMEOUT: 'TIMEOUT',
  NETWORK_ERROR: 'NETWORK_ERROR',
  INVALID_RESPONSE: 'INVALID_RESPONSE',
} as const;

/**
 * Recognised input column pairs, in priority order. Matching is
 * case-insensitive, and both columns of a pair must be present.
 */
export const GEOHASH_COLUMN_PAIRS = [
  { customer: 'CX_GH', restaurant: 'RX_GH' },
  { customer: 'customer_geohash', restaurant: 'restaurant_geohash' },
  { customer: 'cx_geohash', restaurant: 'rx_geohash' },
] as const;

export const GEOHASH_ALPHABET = '0123456789bcdefghjkmnpqrstuvwxyz';

export const DIFF_FIELDS = [
  'distance_diff_meters',
  'duration_diff_seconds',
  'response_time_diff_ms',
] as const;

export const SHEET_NAMES = {
  SUMMARY: 'Summary',
  FULL_DATA: 'Full_Data',
  STATISTICS: 'Statistics',
} as const;

export const OUTPUT_FILE_PREFIX = 'comparison';
