// ---------------------------------------------------------------------------
// Coordinate maps — the data every projection image exchanges
// ---------------------------------------------------------------------------

import {
  CHANNELS,
  INVALID,
  LATITUDE,
  LONGITUDE,
  type CoordinateMap,
  type PixelBuffer,
  type SphericalCoordinate,
} from '../types.js';
import { InvalidParameterError } from '../errors.js';
import { FULL_TURN, normalizeLongitude } from '../math/angles.js';
import { createPixelBuffer } from '../images/pixel-buffer.js';

/** A decoded coordinate-map cell. */
export interface CoordinateCell extends SphericalCoordinate {
  invalid: boolean;
}

/**
 * Allocate a coordinate map with every cell at `(0, 0, valid)`.
 */
export function createCoordinateMap(width: number, height: number): CoordinateMap {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new InvalidParameterError(
      'dimensions',
      `width and height must be non-negative integers, got ${width}x${height}`,
    );
  }
  return { width, height, data: new Float64Array(width * height * CHANNELS) };
}

/** Deep copy of a map. */
export function cloneCoordinateMap(map: CoordinateMap): CoordinateMap {
  return { width: map.width, height: map.height, data: map.data.slice() };
}

/**
 * Build a one-row map holding the given points, in order. Handy for asking
 * an image which colour it shows at specific spherical coordinates.
 */
export function coordinateMapFromPoints(points: readonly SphericalCoordinate[]): CoordinateMap {
  const map = createCoordinateMap(points.length, points.length > 0 ? 1 : 0);
  points.forEach((point, col) => {
    setCell(map, 0, col, point.latitude, point.longitude, false);
  });
  return map;
}

function cellIndex(map: CoordinateMap, row: number, col: number): number {
  if (row < 0 || row >= map.height || col < 0 || col >= map.width) {
    throw new RangeError(`Cell (${row}, ${col}) is outside a ${map.width}x${map.height} map`);
  }
  return (row * map.width + col) * CHANNELS;
}

export function getCell(map: CoordinateMap, row: number, col: number): CoordinateCell {
  const i = cellIndex(map, row, col);
  return {
    latitude: map.data[i + LATITUDE]!,
    longitude: map.data[i + LONGITUDE]!,
    invalid: map.data[i + INVALID] !== 0,
  };
}

/** Write a cell. Invalid cells are stored as `(0, 0, 1)`. */
export function setCell(
  map: CoordinateMap,
  row: number,
  col: number,
  latitude: number,
  longitude: number,
  invalid: boolean,
): void {
  const i = cellIndex(map, row, col);
  map.data[i + LATITUDE] = invalid ? 0 : latitude;
  map.data[i + LONGITUDE] = invalid ? 0 : longitude;
  map.data[i + INVALID] = invalid ? 1 : 0;
}

/** Whether the cell starting at data offset `offset` is marked invalid. */
export function isInvalidCell(map: CoordinateMap, offset: number): boolean {
  return map.data[offset + INVALID] !== 0;
}

/**
 * Map every valid latitude to `π − latitude`, leaving longitude and the
 * invalid cells untouched. Expresses a map in the frame of a sensor that
 * looks the opposite way.
 */
export function flipLatitude(map: CoordinateMap): CoordinateMap {
  const out = cloneCoordinateMap(map);
  const data = out.data;
  for (let i = 0; i < data.length; i += CHANNELS) {
    if (data[i + INVALID] !== 0) continue;
    data[i + LATITUDE] = Math.PI - data[i + LATITUDE]!;
  }
  return out;
}

/** Wrap every valid longitude into `(-π, π]`. */
export function normalizeCoordinateMap(map: CoordinateMap): CoordinateMap {
  const out = cloneCoordinateMap(map);
  const data = out.data;
  for (let i = 0; i < data.length; i += CHANNELS) {
    if (data[i + INVALID] !== 0) continue;
    data[i + LONGITUDE] = normalizeLongitude(data[i + LONGITUDE]!);
  }
  return out;
}

// ---------------------------------------------------------------------------
// coordinateMapToImage
// ---------------------------------------------------------------------------

/**
 * Render a map as a false-colour image for inspection.
 *
 * - red: latitude, stretched over the valid cells' min..max
 * - green: longitude, `(-π, π]` onto 0..255
 * - blue: 255 for invalid cells
 */
export function coordinateMapToImage(map: CoordinateMap): PixelBuffer {
  const out = createPixelBuffer(map.width, map.height);
  const src = map.data;

  let minLatitude = Infinity;
  let maxLatitude = -Infinity;
  for (let i = 0; i < src.length; i += CHANNELS) {
    if (src[i + INVALID] !== 0) continue;
    const latitude = src[i + LATITUDE]!;
    if (latitude < minLatitude) minLatitude = latitude;
    if (latitude > maxLatitude) maxLatitude = latitude;
  }
  const span = maxLatitude - minLatitude;

  for (let i = 0; i < src.length; i += CHANNELS) {
    if (src[i + INVALID] !== 0) {
      out.data[i + 2] = 255;
      continue;
    }
    const latitude = src[i + LATITUDE]!;
    const longitude = normalizeLongitude(src[i + LONGITUDE]!);
    out.data[i] = span > 0 ? Math.round(((latitude - minLatitude) / span) * 255) : 0;
    out.data[i + 1] = Math.round(((longitude + Math.PI) / FULL_TURN) * 255);
  }
  return out;
}
