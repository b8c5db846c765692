/**
 * Unit Tests — Geohash Codec
 *
 * Known cells decode to their exact centers; malformed input raises
 * DecodeError; and decode → encode at the same precision lands back in the
 * original cell for a deterministic spread of generated geohashes.
 */
import { GEOHASH_ALPHABET } from '@shared/constants';
import { DecodeError } from '@shared/errors/AppError';
import { decode, decodeBounds, encode } from '@shared/geohash';

/** Deterministic pseudo-random geohashes (MINSTD generator). */
function generateGeohashes(count: number): string[] {
  let seed = 12345;
  const next = (): number => {
    seed = (seed * 48271) % 2147483647;
    return seed;
  };
  const hashes: string[] = [];
  for (let i = 0; i < count; i++) {
    const length = 1 + (next() % 12);
    let hash = '';
    for (let j = 0; j < length; j++) hash += GEOHASH_ALPHABET[next() % 32];
    hashes.push(hash);
  }
  return hashes;
}

describe('decode()', () => {
  it('should return the center of a single-character cell', () => {
    expect(decode('s')).toEqual({ latitude: 22.5, longitude: 22.5 });
  });

  it('should decode a five-character cell to its exact center', () => {
    expect(decode('ezs42')).toEqual({ latitude: 42.60498046875, longitude: -5.60302734375 });
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(decode('  EZS42 ')).toEqual(decode('ezs42'));
  });

  it('should be deterministic', () => {
    expect(decode('9q8yy9mur')).toEqual(decode('9q8yy9mur'));
  });

  it('should throw DecodeError for an empty string', () => {
    expect(() => decode('')).toThrow(DecodeError);
    expect(() => decode('   ')).toThrow('Invalid geohash "   ": empty geohash');
  });

  it.each(['a', 'i', 'l', 'o'])('should reject the excluded letter "%s"', (letter) => {
    expect(() => decode(`9q8${letter}`)).toThrow(`invalid character "${letter}"`);
  });

  it('should reject punctuation', () => {
    expect(() => decode('9q8-yy')).toThrow(DecodeError);
  });
});

describe('decodeBounds()', () => {
  it('should return the cell edges', () => {
    expect(decodeBounds('ezs42')).toEqual({
      minLatitude: 42.5830078125,
      maxLatitude: 42.626953125,
      minLongitude: -5.625,
      maxLongitude: -5.5810546875,
    });
  });
});

describe('encode()', () => {
  it('should encode a known coordinate', () => {
    expect(encode(42.605, -5.603, 5)).toBe('ezs42');
  });

  it('should reject a non-positive precision', () => {
    expect(() => encode(0, 0, 0)).toThrow(RangeError);
  });

  it('should reproduce every generated geohash from its decoded center', () => {
    for (const hash of generateGeohashes(200)) {
      const { latitude, longitude } = decode(hash);
      const reencoded = encode(latitude, longitude, hash.length);

      expect(reencoded).toBe(hash);

      const cell = decodeBounds(hash);
      const center = decode(reencoded);
      expect(center.latitude).toBeGreaterThanOrEqual(cell.minLatitude);
      expect(center.latitude).toBeLessThanOrEqual(cell.maxLatitude);
      expect(center.longitude).toBeGreaterThanOrEqual(cell.minLongitude);
      expect(center.longitude).toBeLessThanOrEqual(cell.maxLongitude);
    }
  });
});
