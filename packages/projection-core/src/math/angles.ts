// ---------------------------------------------------------------------------
// Angle helpers
// ---------------------------------------------------------------------------

export const HALF_PI = Math.PI / 2;
export const FULL_TURN = 2 * Math.PI;

/**
 * Wrap a longitude into `(-π, π]`.
 *
 * Non-finite input comes back as NaN.
 */
export function normalizeLongitude(longitude: number): number {
  if (longitude > -Math.PI && longitude <= Math.PI) return longitude;
  let shifted = (longitude + Math.PI) % FULL_TURN;
  if (shifted <= 0) shifted += FULL_TURN;
  return shifted - Math.PI;
}

/** Clamp `value` into `[min, max]`. */
export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}
