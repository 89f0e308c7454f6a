// ---------------------------------------------------------------------------
// The projection image contract
// ---------------------------------------------------------------------------

import type { CameraLayout } from '@lensmap/shared';
import type { CoordinateMap, PixelBuffer } from '../types.js';
import { InvalidParameterError } from '../errors.js';

/**
 * An image that can describe where each of its pixels points on the sphere,
 * and can render any such description from its own pixels.
 *
 * Conversions run `destination.getCoordinateMap()`, optionally rotate the
 * map, then `source.processCoordinateMap(map)`.
 */
export interface ProjectionImage {
  readonly image: PixelBuffer;
  /** A newly allocated map with one cell per pixel of {@link image}. */
  getCoordinateMap(): CoordinateMap;
  /**
   * A newly allocated image the size of `map`, each pixel taken from this
   * image. Cells that are invalid or fall outside this image come out black.
   */
  processCoordinateMap(map: CoordinateMap): PixelBuffer;
}

export interface KernelOptions {
  /** Number of row ranges each pass is split into. Defaults to 1. */
  rowChunks?: number;
}

export function resolveRowChunks(options: KernelOptions): number {
  const chunks = options.rowChunks ?? 1;
  if (!Number.isInteger(chunks) || chunks < 1) {
    throw new InvalidParameterError('rowChunks', `must be a positive integer, got ${chunks}`);
  }
  return chunks;
}

/**
 * Pixel radius at which a camera image reaches half its field of view.
 *
 * Distances are measured between pixel centres, hence the `- 0.5`.
 */
export function computeMagnitude(layout: CameraLayout, width: number, height: number): number {
  switch (layout) {
    case 'inscribed':
      return Math.min(width, height) / 2 - 0.5;
    case 'cropped':
      // The circle spans the full width; top and bottom are cut off.
      return width / 2 - 0.5;
    case 'full-frame':
      return Math.hypot(width / 2 - 0.5, height / 2 - 0.5);
  }
}

/** Pixel radius of each sensor of a side-by-side double image. */
export function computeDoubleMagnitude(height: number): number {
  return height / 2 - 0.5;
}
