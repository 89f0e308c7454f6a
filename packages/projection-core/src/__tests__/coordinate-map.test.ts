import { describe, it, expect } from 'vitest';
import {
  cloneCoordinateMap,
  coordinateMapFromPoints,
  coordinateMapToImage,
  createCoordinateMap,
  flipLatitude,
  getCell,
  isInvalidCell,
  normalizeCoordinateMap,
  setCell,
} from '../coordinate-map/index.js';
import { getPixel } from '../images/index.js';
import { InvalidParameterError } from '../errors.js';

describe('createCoordinateMap', () => {
  it('allocates three values per cell', () => {
    const map = createCoordinateMap(4, 3);
    expect(map.data).toHaveLength(36);
    expect(getCell(map, 2, 3)).toEqual({ latitude: 0, longitude: 0, invalid: false });
  });

  it('rejects fractional dimensions', () => {
    expect(() => createCoordinateMap(2.5, 1)).toThrow(InvalidParameterError);
  });
});

describe('cells', () => {
  it('stores invalid cells as (0, 0, 1)', () => {
    const map = createCoordinateMap(1, 1);
    setCell(map, 0, 0, 1.2, -0.4, true);
    expect(Array.from(map.data)).toEqual([0, 0, 1]);
    expect(isInvalidCell(map, 0)).toBe(true);
  });

  it('throws outside the map', () => {
    const map = createCoordinateMap(2, 2);
    expect(() => getCell(map, 2, 0)).toThrow(RangeError);
    expect(() => setCell(map, 0, -1, 0, 0, false)).toThrow(RangeError);
  });

  it('builds a one-row map from points', () => {
    const map = coordinateMapFromPoints([
      { latitude: 0.5, longitude: 1 },
      { latitude: 2, longitude: -3 },
    ]);
    expect(map.width).toBe(2);
    expect(map.height).toBe(1);
    expect(getCell(map, 0, 1)).toEqual({ latitude: 2, longitude: -3, invalid: false });
  });

  it('clones independently', () => {
    const map = coordinateMapFromPoints([{ latitude: 1, longitude: 1 }]);
    const copy = cloneCoordinateMap(map);
    setCell(copy, 0, 0, 2, 2, false);
    expect(getCell(map, 0, 0).latitude).toBe(1);
  });
});

describe('flipLatitude', () => {
  it('maps valid latitudes to π − latitude', () => {
    const map = coordinateMapFromPoints([{ latitude: Math.PI / 4, longitude: 0.7 }]);
    const flipped = flipLatitude(map);
    expect(getCell(flipped, 0, 0)).toEqual({
      latitude: Math.PI - Math.PI / 4,
      longitude: 0.7,
      invalid: false,
    });
    expect(getCell(map, 0, 0).latitude).toBe(Math.PI / 4);
  });

  it('leaves invalid cells alone', () => {
    const map = createCoordinateMap(1, 1);
    setCell(map, 0, 0, 0, 0, true);
    expect(Array.from(flipLatitude(map).data)).toEqual([0, 0, 1]);
  });
});

describe('normalizeCoordinateMap', () => {
  it('wraps longitudes into (-π, π]', () => {
    const map = coordinateMapFromPoints([
      { latitude: 1, longitude: 2.5 * Math.PI },
      { latitude: 1, longitude: -Math.PI },
      { latitude: 1, longitude: 0.5 },
    ]);
    const normalized = normalizeCoordinateMap(map);
    expect(getCell(normalized, 0, 0).longitude).toBeCloseTo(Math.PI / 2, 12);
    expect(getCell(normalized, 0, 1).longitude).toBe(Math.PI);
    expect(getCell(normalized, 0, 2).longitude).toBe(0.5);
  });
});

describe('coordinateMapToImage', () => {
  it('stretches latitude over the valid range and marks invalid cells blue', () => {
    const map = createCoordinateMap(3, 1);
    setCell(map, 0, 0, 0.5, 0, false);
    setCell(map, 0, 1, 1.5, -Math.PI / 2, false);
    setCell(map, 0, 2, 3, 3, true);

    const image = coordinateMapToImage(map);

    // green: (0 + π) / 2π * 255 = 127.5 -> 128
    expect(getPixel(image, 0, 0)).toEqual([0, 128, 0]);
    // green: (π/2) / 2π * 255 = 63.75 -> 64
    expect(getPixel(image, 0, 1)).toEqual([255, 64, 0]);
    expect(getPixel(image, 0, 2)).toEqual([0, 0, 255]);
  });
});
