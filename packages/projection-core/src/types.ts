// ---------------------------------------------------------------------------
// @lensmap/projection-core — Buffer, map and vector types
// ---------------------------------------------------------------------------

/** Values stored per pixel (RGB) and per coordinate-map cell. */
export const CHANNELS = 3;

/** Offset of the latitude inside a coordinate-map cell. */
export const LATITUDE = 0;
/** Offset of the longitude inside a coordinate-map cell. */
export const LONGITUDE = 1;
/** Offset of the invalid marker inside a coordinate-map cell. */
export const INVALID = 2;

/**
 * An RGB image, 8 bits per channel, row-major.
 *
 * Pixel (row, col) starts at `(row * width + col) * 3`.
 */
export interface PixelBuffer {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * One `[latitude, longitude, invalid]` triple per destination pixel,
 * row-major, float64.
 *
 * Latitude is measured from the pole in `[0, π]`, longitude is the azimuth
 * in `(-π, π]`. A cell whose invalid value is non-zero has no source pixel.
 */
export interface CoordinateMap {
  width: number;
  height: number;
  data: Float64Array;
}

/** A single RGB value. */
export type RGB = [r: number, g: number, b: number];

/** 3D vector. */
export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/** A point on the unit sphere in the map's angular convention. */
export interface SphericalCoordinate {
  latitude: number;
  longitude: number;
}

/**
 * 3x3 matrix stored as a 9-element Float64Array in column-major order.
 *
 * Element at row r, col c is at index c*3 + r.
 */
export type Matrix3x3 = Float64Array;

/** Half-open row interval `[start, end)`. */
export interface RowRange {
  start: number;
  end: number;
}
