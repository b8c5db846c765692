/**
 * Unit Tests — BatchRunner
 *
 * The RowComparator is built over mock providers so the runner is exercised
 * through its real collaborator; delays are zero so tests stay fast.
 */
import { BatchRunner } from '@application/services/BatchRunner';
import { RowComparator } from '@application/services/RowComparator';
import type { Coordinate, GeohashPair } from '@domain/entities/GeohashPair';
import { decode, encode } from '@shared/geohash';
import pino from 'pino';

import { failedResult, okResult } from '../helpers/fixtures';
import {
  createMockProvider,
  immediateBatchOptions,
  type MockProvider,
  silentLogger,
} from '../helpers/testDoubles';

/** Distinct valid pairs, one per customer latitude step. */
function buildPairs(count: number): GeohashPair[] {
  return Array.from({ length: count }, (_, index) => ({
    customerGeohash: encode(10 + index, 20, 7),
    restaurantGeohash: encode(10 + index, 20.01, 7),
  }));
}

function delayed<T>(value: T, ms: number): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

describe('BatchRunner', () => {
  let directions: MockProvider;
  let routes: MockProvider;
  let comparator: RowComparator;

  beforeEach(() => {
    directions = createMockProvider('directions');
    routes = createMockProvider('routes');
    comparator = new RowComparator(directions, routes, silentLogger);
  });

  it('should return one record per pair in input order', async () => {
    const pairs = buildPairs(5);
    directions.fetchRoute.mockResolvedValue(okResult(500, 120, 10));
    routes.fetchRoute.mockResolvedValue(okResult(510, 115, 10));
    const runner = new BatchRunner(comparator, silentLogger, immediateBatchOptions);

    const { records, summary } = await runner.runBatch(pairs, 'k1', 'k2');

    expect(records.map((record) => record.pair)).toEqual(pairs);
    expect(summary.totalRows).toBe(5);
    expect(summary.bothSucceeded).toBe(5);
  });

  it('should keep input order when later rows finish first', async () => {
    const pairs = buildPairs(6);
    // Earlier rows (lower latitude) answer slower than later ones.
    directions.fetchRoute.mockImplementation((origin: Coordinate) =>
      delayed(okResult(origin.latitude, 1, 1), 60 - (origin.latitude - 10) * 10),
    );
    routes.fetchRoute.mockImplementation(() => Promise.resolve(okResult(0, 1, 1)));
    const runner = new BatchRunner(comparator, silentLogger, {
      ...immediateBatchOptions,
      concurrency: 3,
    });

    const { records } = await runner.runBatch(pairs, 'k1', 'k2');

    expect(records.map((record) => record.pair)).toEqual(pairs);
    const latitudes = records.map((record) => record.origin?.latitude ?? NaN);
    expect(latitudes).toEqual([...latitudes].sort((a, b) => a - b));
  });

  it('should never exceed the configured number of rows in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    directions.fetchRoute.mockImplementation(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delayed(null, 5);
      inFlight--;
      return okResult(1, 1, 1);
    });
    routes.fetchRoute.mockResolvedValue(okResult(1, 1, 1));
    const runner = new BatchRunner(comparator, silentLogger, {
      ...immediateBatchOptions,
      concurrency: 2,
    });

    await runner.runBatch(buildPairs(7), 'k1', 'k2');

    expect(peak).toBe(2);
  });

  it('should leave every other row unchanged when one row fails', async () => {
    const pairs = buildPairs(10);
    const overLimitOrigin = decode(pairs[1].customerGeohash);
    directions.fetchRoute.mockResolvedValue(okResult(500, 120, 10));
    routes.fetchRoute.mockImplementation((origin: Coordinate) =>
      Promise.resolve(
        origin.latitude === overLimitOrigin.latitude
          ? failedResult('OVER_QUERY_LIMIT', 5)
          : okResult(510, 115, 10),
      ),
    );
    const runner = new BatchRunner(comparator, silentLogger, immediateBatchOptions);
    const baseline = await runner.runBatch(pairs, 'k1', 'k2');

    const withBadRow = [...pairs];
    withBadRow[2] = { customerGeohash: 'not-a-geohash', restaurantGeohash: pairs[2].restaurantGeohash };
    const { records, summary } = await runner.runBatch(withBadRow, 'k1', 'k2');

    expect(records).toHaveLength(10);
    expect(records[2].error).toBe('Invalid geohash "not-a-geohash": invalid character "o"');
    for (const index of [0, 1, 3, 4, 5, 6, 7, 8, 9]) {
      expect(records[index]).toEqual(baseline.records[index]);
    }
    expect(records[1].routes?.status).toBe('OVER_QUERY_LIMIT');
    expect(records[3].distanceDiffMeters).toBe(10);
    expect(summary.rowErrors).toBe(1);
    expect(summary.routesFailures).toBe(1);
    expect(summary.bothSucceeded).toBe(8);
  });

  it('should handle an empty batch', async () => {
    const runner = new BatchRunner(comparator, silentLogger, immediateBatchOptions);

    const { records, summary } = await runner.runBatch([], 'k1', 'k2');

    expect(records).toEqual([]);
    expect(summary.totalRows).toBe(0);
    expect(directions.fetchRoute).not.toHaveBeenCalled();
  });

  it('should log progress at the configured interval', async () => {
    directions.fetchRoute.mockResolvedValue(okResult(1, 1, 1));
    routes.fetchRoute.mockResolvedValue(okResult(1, 1, 1));
    const lines: Array<{ msg: string; processed?: number; total?: number }> = [];
    const capturing = pino({ level: 'info' }, { write: (line: string) => lines.push(JSON.parse(line)) });
    const runner = new BatchRunner(new RowComparator(directions, routes, capturing), capturing, {
      ...immediateBatchOptions,
      progressInterval: 2,
    });

    await runner.runBatch(buildPairs(5), 'k1', 'k2');

    const progress = lines.filter((line) => line.msg === 'Comparison progress');
    expect(progress.map(({ processed, total }) => ({ processed, total }))).toEqual([
      { processed: 2, total: 5 },
      { processed: 4, total: 5 },
      { processed: 5, total: 5 },
    ]);
  });
});
