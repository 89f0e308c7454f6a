// ---------------------------------------------------------------------------
// DoubleCameraImage — two back-to-back sensors side by side on one canvas
// ---------------------------------------------------------------------------
// The left half is sensor A looking at latitude 0. The right half is sensor
// B, looking at latitude π, stored mirrored left to right. Where their
// fields of view overlap the two samples are feathered linearly.
// ---------------------------------------------------------------------------

import { sensorFovSchema, type LensName } from '@lensmap/shared';
import { CHANNELS, INVALID, LATITUDE, LONGITUDE, type CoordinateMap, type PixelBuffer } from '../types.js';
import { InvalidParameterError, parseParameter } from '../errors.js';
import { HALF_PI } from '../math/angles.js';
import type { Lens } from '../lens/lens.js';
import { createCoordinateMap, flipLatitude } from '../coordinate-map/coordinate-map.js';
import { forEachRowRange } from '../parallel/row-partition.js';
import { createPixelBuffer, cropPixelBuffer, mirrorPixelBuffer } from './pixel-buffer.js';
import { CameraImage } from './camera-image.js';
import {
  computeDoubleMagnitude,
  resolveRowChunks,
  type KernelOptions,
  type ProjectionImage,
} from './projection-image.js';

/** Half a degree, in radians. */
export const DEFAULT_BLEND_MARGIN = Math.PI / 360;

export interface DoubleCameraImageOptions extends KernelOptions {
  /** Field of view of each sensor in radians, `π ≤ fov ≤ 2π`. */
  fov: number;
  lens: Lens | LensName;
  /** Overlap left unblended at each edge, in radians. */
  blendMargin?: number;
  /** Pixel radius of each sensor's circle. Defaults to half the height. */
  magnitude?: number;
}

/**
 * Weight of sensor A at `latitude`.
 *
 * The feather band spans `π/2 ± (halfOverlap - margin)`; A wins above it,
 * B below it. Without a band the split is hard at `π/2`.
 */
export function sensorBlendWeight(latitude: number, halfOverlap: number, margin: number): number {
  const band = halfOverlap - margin;
  if (band <= 0) {
    return latitude <= HALF_PI ? 1 : 0;
  }
  if (latitude <= HALF_PI - band) return 1;
  if (latitude >= HALF_PI + band) return 0;
  return (HALF_PI + band - latitude) / (2 * band);
}

export class DoubleCameraImage implements ProjectionImage {
  readonly image: PixelBuffer;
  readonly fov: number;
  readonly magnitude: number;
  readonly blendMargin: number;
  readonly rowChunks: number;
  /** Sensor A, the left half as stored. */
  readonly sensorA: CameraImage;
  /** Sensor B, the right half un-mirrored. */
  readonly sensorB: CameraImage;

  private readonly halfOverlap: number;

  constructor(image: PixelBuffer, options: DoubleCameraImageOptions) {
    this.image = createPixelBuffer(image.width, image.height, image.data);
    if (image.width % 2 !== 0) {
      throw new InvalidParameterError(
        'dimensions',
        `a double image needs an even width, got ${image.width}x${image.height}`,
      );
    }
    this.fov = parseParameter(sensorFovSchema, options.fov, 'fov');
    this.rowChunks = resolveRowChunks(options);

    const blendMargin = options.blendMargin ?? DEFAULT_BLEND_MARGIN;
    if (!(blendMargin >= 0) || !Number.isFinite(blendMargin)) {
      throw new InvalidParameterError('blendMargin', `must be a non-negative number, got ${blendMargin}`);
    }
    this.blendMargin = blendMargin;
    this.halfOverlap = Math.max(0, this.fov / 2 - HALF_PI);
    const magnitude = options.magnitude ?? computeDoubleMagnitude(image.height);
    if (!(magnitude > 0) || !Number.isFinite(magnitude)) {
      throw new InvalidParameterError(
        'magnitude',
        `must be a positive number, got ${magnitude} for a ${image.width}x${image.height} image`,
      );
    }
    this.magnitude = magnitude;

    const half = image.width / 2;
    const sensorOptions = {
      fov: this.fov,
      lens: options.lens,
      magnitude: this.magnitude,
      rowChunks: this.rowChunks,
    };
    this.sensorA = new CameraImage(cropPixelBuffer(this.image, 0, 0, half, image.height), sensorOptions);
    this.sensorB = new CameraImage(
      mirrorPixelBuffer(cropPixelBuffer(this.image, half, 0, half, image.height)),
      sensorOptions,
    );
  }

  getCoordinateMap(): CoordinateMap {
    const { width, height } = this.image;
    const half = width / 2;
    const map = createCoordinateMap(width, height);
    const a = this.sensorA.getCoordinateMap().data;
    const b = flipLatitude(this.sensorB.getCoordinateMap()).data;
    const out = map.data;

    forEachRowRange(height, this.rowChunks, ({ start, end }) => {
      for (let row = start; row < end; row++) {
        for (let col = 0; col < half; col++) {
          const from = (row * half + col) * CHANNELS;
          out.set(a.subarray(from, from + CHANNELS), (row * width + col) * CHANNELS);
        }
        // Canvas column half + j holds sensor B column half - 1 - j.
        for (let j = 0; j < half; j++) {
          const from = (row * half + (half - 1 - j)) * CHANNELS;
          out.set(b.subarray(from, from + CHANNELS), (row * width + half + j) * CHANNELS);
        }
      }
    });

    return map;
  }

  processCoordinateMap(map: CoordinateMap): PixelBuffer {
    const a = this.sensorA.processCoordinateMap(map).data;
    const b = this.sensorB.processCoordinateMap(flipLatitude(map)).data;
    const out = createPixelBuffer(map.width, map.height);
    const dst = out.data;
    const cells = map.data;
    const { halfOverlap, blendMargin } = this;

    forEachRowRange(map.height, this.rowChunks, ({ start, end }) => {
      for (let i = start * map.width * CHANNELS; i < end * map.width * CHANNELS; i += CHANNELS) {
        if (cells[i + INVALID] !== 0) continue;
        const latitude = cells[i + LATITUDE]!;
        if (!Number.isFinite(latitude) || !Number.isFinite(cells[i + LONGITUDE]!)) continue;

        const weight = sensorBlendWeight(latitude, halfOverlap, blendMargin);
        for (let c = 0; c < CHANNELS; c++) {
          dst[i + c] = Math.round(weight * a[i + c]! + (1 - weight) * b[i + c]!);
        }
      }
    });

    return out;
  }
}
