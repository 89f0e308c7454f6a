// ---------------------------------------------------------------------------
// Lens models — closed-form forward/reverse projection functions
// ---------------------------------------------------------------------------
// `forward` maps an incidence angle (radians from the optical axis) to a
// distance from the image centre in focal-distance units; `reverse` maps
// back. Both work on a single number or element-wise on a Float64Array.
// ---------------------------------------------------------------------------

import type { LensName } from '@lensmap/shared';
import { LensDomainError } from '../errors.js';

/** A lens function that accepts a scalar or a Float64Array. */
export interface LensFunction {
  (value: number): number;
  (values: Float64Array): Float64Array;
}

export interface Lens {
  readonly name: LensName;
  /** Largest incidence angle `forward` accepts, inclusive. */
  readonly maxIncidence: number;
  readonly forward: LensFunction;
  readonly reverse: LensFunction;
}

function elementwise(fn: (value: number) => number): LensFunction {
  function apply(value: number): number;
  function apply(values: Float64Array): Float64Array;
  function apply(arg: number | Float64Array): number | Float64Array {
    if (typeof arg === 'number') return fn(arg);
    const out = new Float64Array(arg.length);
    for (let i = 0; i < arg.length; i++) {
      out[i] = fn(arg[i]!);
    }
    return out;
  }
  return apply;
}

function defineLens(
  name: LensName,
  maxIncidence: number,
  forward: (theta: number) => number,
  reverse: (distance: number) => number,
): Lens {
  const guardedForward = (theta: number): number => {
    if (!(theta >= 0 && theta <= maxIncidence)) {
      throw new LensDomainError(name, theta, maxIncidence);
    }
    return forward(theta);
  };
  return Object.freeze({
    name,
    maxIncidence,
    forward: elementwise(guardedForward),
    reverse: elementwise(reverse),
  });
}

// ---------------------------------------------------------------------------
// The six lenses
// ---------------------------------------------------------------------------

/** Thoby's empirical fisheye fit. */
const THOBY_K1 = 1.47;
const THOBY_K2 = 0.713;

/** tan diverges at 90°, so the model stops a degree short. */
const RECTILINEAR_MAX = (89 / 180) * Math.PI;

export const rectilinear: Lens = defineLens(
  'rectilinear',
  RECTILINEAR_MAX,
  (theta) => Math.tan(theta),
  (distance) => Math.atan(distance),
);

export const equisolid: Lens = defineLens(
  'equisolid',
  Math.PI,
  (theta) => 2 * Math.sin(theta / 2),
  (distance) => {
    // Rounding can push the argument just past 1.
    const theta = 2 * Math.asin(distance / 2);
    return Number.isNaN(theta) ? 0 : theta;
  },
);

export const equidistant: Lens = defineLens(
  'equidistant',
  Math.PI,
  (theta) => theta,
  (distance) => distance,
);

export const orthographic: Lens = defineLens(
  'orthographic',
  Math.PI / 2,
  (theta) => Math.sin(theta),
  (distance) => Math.asin(distance),
);

export const stereographic: Lens = defineLens(
  'stereographic',
  Math.PI,
  (theta) => 2 * Math.tan(theta / 2),
  (distance) => 2 * Math.atan(distance / 2),
);

export const thoby: Lens = defineLens(
  'thoby',
  Math.PI / (2 * THOBY_K2),
  (theta) => THOBY_K1 * Math.sin(THOBY_K2 * theta),
  (distance) => Math.asin(distance / THOBY_K1) / THOBY_K2,
);

export const LENSES: Readonly<Record<LensName, Lens>> = Object.freeze({
  rectilinear,
  equisolid,
  equidistant,
  orthographic,
  stereographic,
  thoby,
});

/** Resolve a lens by name; a {@link Lens} passes through unchanged. */
export function getLens(lens: Lens | LensName): Lens {
  return typeof lens === 'string' ? LENSES[lens] : lens;
}
