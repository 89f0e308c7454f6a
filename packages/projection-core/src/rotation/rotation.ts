// ---------------------------------------------------------------------------
// Rotation — re-aim a coordinate map by pitch, yaw and roll
// ---------------------------------------------------------------------------

import type { RotationAngles } from '@lensmap/shared';
import { rotationAnglesSchema, degreesToRadians } from '@lensmap/shared';
import { CHANNELS, INVALID, LATITUDE, LONGITUDE, type CoordinateMap, type Matrix3x3 } from '../types.js';
import { parseParameter } from '../errors.js';
import {
  mat3IsIdentity,
  mat3Multiply,
  mat3RotationX,
  mat3RotationY,
  mat3RotationZ,
  mat3TransformVector,
} from '../math/matrix.js';
import { sphericalToVector, vectorToSpherical } from '../math/spherical.js';
import { cloneCoordinateMap, createCoordinateMap } from '../coordinate-map/coordinate-map.js';

/**
 * `Rx(pitch) · Ry(yaw) · Rz(roll)`.
 *
 * Pitch turns about the x axis, yaw about the pole (y), roll about z.
 */
export function rotationMatrix(pitch: number, yaw: number, roll: number): Matrix3x3 {
  return mat3Multiply(mat3Multiply(mat3RotationX(pitch), mat3RotationY(yaw)), mat3RotationZ(roll));
}

/**
 * An immutable 3-axis rotation applied to coordinate maps.
 *
 * Rotations compose by applying one after another; each call to
 * {@link Rotation.rotate} returns a new map.
 *
 * @example
 * const map = destination.getCoordinateMap();
 * const rotated = new Rotation(Math.PI / 2, 0, 0).rotate(map);
 * const pixels = source.processCoordinateMap(rotated);
 */
export class Rotation {
  readonly pitch: number;
  readonly yaw: number;
  readonly roll: number;
  readonly matrix: Matrix3x3;

  constructor(pitch: number, yaw: number, roll: number) {
    const [p, y, r] = parseParameter(rotationAnglesSchema, [pitch, yaw, roll], 'rotation');
    this.pitch = p;
    this.yaw = y;
    this.roll = r;
    this.matrix = rotationMatrix(p, y, r);
  }

  static fromAngles([pitch, yaw, roll]: RotationAngles): Rotation {
    return new Rotation(pitch, yaw, roll);
  }

  static fromDegrees(pitch: number, yaw: number, roll: number): Rotation {
    return new Rotation(degreesToRadians(pitch), degreesToRadians(yaw), degreesToRadians(roll));
  }

  /** Whether this rotation leaves every map unchanged. */
  get isIdentity(): boolean {
    return mat3IsIdentity(this.matrix);
  }

  /**
   * Rotate every valid cell of `map`. Invalid cells come out as
   * `(0, 0, invalid)`; the input is not modified.
   */
  rotate(map: CoordinateMap): CoordinateMap {
    const identity = this.isIdentity;
    const out = identity ? cloneCoordinateMap(map) : createCoordinateMap(map.width, map.height);
    const src = map.data;
    const dst = out.data;

    for (let i = 0; i < src.length; i += CHANNELS) {
      if (src[i + INVALID] !== 0) {
        dst[i + LATITUDE] = 0;
        dst[i + LONGITUDE] = 0;
        dst[i + INVALID] = src[i + INVALID]!;
        continue;
      }
      if (identity) continue;
      const v = sphericalToVector(src[i + LATITUDE]!, src[i + LONGITUDE]!);
      const { latitude, longitude } = vectorToSpherical(mat3TransformVector(this.matrix, v));
      dst[i + LATITUDE] = latitude;
      dst[i + LONGITUDE] = longitude;
    }
    return out;
  }
}
