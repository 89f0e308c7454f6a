// ---------------------------------------------------------------------------
// @lensmap/projection-core — Lens models, coordinate maps, rotations and
// resampling between camera, double-sensor and panorama projections
// ---------------------------------------------------------------------------

export * from './types.js';
export * from './errors.js';
export { HALF_PI, FULL_TURN, normalizeLongitude, clamp } from './math/angles.js';
export { sphericalToVector, vectorToSpherical } from './math/spherical.js';
export * from './lens/index.js';
export * from './coordinate-map/index.js';
export * from './rotation/index.js';
export * from './parallel/index.js';
export * from './images/index.js';
export * from './conversion/index.js';
