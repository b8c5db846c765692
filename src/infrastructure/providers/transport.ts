/**
 * Transport helpers shared by both routing clients.
 *
 * The axios instance is created with `validateStatus: () => true`, so a non-2xx
 * reply resolves normally and the client decides what it means. Only timeouts
 * and socket-level failures reject, and they end up here.
 */
import type { Clock } from '@core/types';
import type { ProviderName } from '@domain/entities/ProviderResult';
import { CLIENT_STATUS } from '@shared/constants';
import { ProviderError } from '@shared/errors/AppError';
import axios from 'axios';
import { z } from 'zod/v4';

/** Any error body that at least names a status (Directions-style). */
export const statusBodySchema = z.object({ status: z.string().min(1) });

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export function toTransportError(provider: ProviderName, err: unknown): ProviderError {
  if (axios.isAxiosError(err) && err.code && TIMEOUT_CODES.has(err.code)) {
    return new ProviderError(provider, CLIENT_STATUS.TIMEOUT, err.message);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ProviderError(provider, `${CLIENT_STATUS.NETWORK_ERROR}: ${message}`, message);
}

/** Body as text for the report: strings pass through, anything else becomes JSON. */
export function serializeBody(data: unknown): string | undefined {
  if (data === undefined || data === null || data === '') return undefined;
  return typeof data === 'string' ? data : JSON.stringify(data);
}

export function isSuccessStatus(httpStatus: number): boolean {
  return httpStatus >= 200 && httpStatus < 300;
}

/** Milliseconds since `startedAt`, rounded to two decimals. */
export function elapsedSince(clock: Clock, startedAt: number): number {
  return Math.round((clock() - startedAt) * 100) / 100;
}
