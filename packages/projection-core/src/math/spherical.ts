// ---------------------------------------------------------------------------
// Sphere <-> vector conversion
//
// The pole is the +y axis: latitude 0 points along +y and longitude is the
// angle in the x/z plane measured from +x towards +z.
// ---------------------------------------------------------------------------

import type { SphericalCoordinate, Vector3 } from '../types.js';
import { clamp } from './angles.js';

/** `(sinλ·cosφ, cosλ, sinλ·sinφ)` for latitude λ and longitude φ. */
export function sphericalToVector(latitude: number, longitude: number): Vector3 {
  const sinLat = Math.sin(latitude);
  return {
    x: sinLat * Math.cos(longitude),
    y: Math.cos(latitude),
    z: sinLat * Math.sin(longitude),
  };
}

/**
 * Inverse of {@link sphericalToVector} for a unit vector.
 *
 * `y` is clamped to [-1, 1] first so rounding never yields NaN. On the poles
 * the longitude is 0.
 */
export function vectorToSpherical(v: Vector3): SphericalCoordinate {
  return {
    latitude: Math.acos(clamp(v.y, -1, 1)),
    longitude: Math.atan2(v.z, v.x),
  };
}
