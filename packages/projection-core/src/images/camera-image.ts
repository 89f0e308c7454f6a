// ---------------------------------------------------------------------------
// CameraImage — a single lens projecting onto one sensor
// ---------------------------------------------------------------------------

import { cameraLayoutSchema, fovSchema, type CameraLayout, type LensName } from '@lensmap/shared';
import { CHANNELS, INVALID, LATITUDE, LONGITUDE, type CoordinateMap, type PixelBuffer } from '../types.js';
import { InvalidParameterError, parseParameter } from '../errors.js';
import { getLens, type Lens } from '../lens/lens.js';
import { createCoordinateMap } from '../coordinate-map/coordinate-map.js';
import { forEachRowRange } from '../parallel/row-partition.js';
import { createPixelBuffer } from './pixel-buffer.js';
import {
  computeMagnitude,
  resolveRowChunks,
  type KernelOptions,
  type ProjectionImage,
} from './projection-image.js';

export interface CameraImageOptions extends KernelOptions {
  /** Full field of view in radians, `0 < fov ≤ 2π`. */
  fov: number;
  lens: Lens | LensName;
  /** Defaults to `'inscribed'`. */
  layout?: CameraLayout;
  /** Pixel radius of the image circle. Overrides the layout's value. */
  magnitude?: number;
}

export class CameraImage implements ProjectionImage {
  readonly image: PixelBuffer;
  readonly fov: number;
  readonly lens: Lens;
  readonly layout: CameraLayout;
  /** Pixel distance from the centre at which `fov / 2` is reached. */
  readonly magnitude: number;
  /** Focal distance in pixels. */
  readonly focalDistance: number;
  readonly rowChunks: number;

  private readonly centerX: number;
  private readonly centerY: number;

  constructor(image: PixelBuffer, options: CameraImageOptions) {
    this.image = createPixelBuffer(image.width, image.height, image.data);
    this.fov = parseParameter(fovSchema, options.fov, 'fov');
    this.lens = getLens(options.lens);
    this.layout = parseParameter(cameraLayoutSchema, options.layout ?? 'inscribed', 'layout');
    this.rowChunks = resolveRowChunks(options);

    const magnitude = options.magnitude ?? computeMagnitude(this.layout, image.width, image.height);
    if (!(magnitude > 0) || !Number.isFinite(magnitude)) {
      throw new InvalidParameterError(
        'magnitude',
        `must be a positive number, got ${magnitude} for a ${image.width}x${image.height} image`,
      );
    }
    this.magnitude = magnitude;
    // Throws LensDomainError when fov / 2 lies outside the lens model.
    this.focalDistance = magnitude / this.lens.forward(this.fov / 2);

    this.centerX = image.width / 2 - 0.5;
    this.centerY = image.height / 2 - 0.5;
  }

  getCoordinateMap(): CoordinateMap {
    const { width, height } = this.image;
    const map = createCoordinateMap(width, height);
    const out = map.data;
    const { centerX, centerY, magnitude, focalDistance, lens } = this;

    forEachRowRange(height, this.rowChunks, ({ start, end }) => {
      for (let row = start; row < end; row++) {
        const y = centerY - row;
        for (let col = 0; col < width; col++) {
          const x = col - centerX;
          const i = (row * width + col) * CHANNELS;
          const distance = Math.hypot(x, y);
          if (distance > magnitude) {
            out[i + INVALID] = 1;
            continue;
          }
          out[i + LATITUDE] = lens.reverse(distance / focalDistance);
          out[i + LONGITUDE] = Math.atan2(y, x);
        }
      }
    });

    return map;
  }

  processCoordinateMap(map: CoordinateMap): PixelBuffer {
    const out = createPixelBuffer(map.width, map.height);
    const src = this.image.data;
    const dst = out.data;
    const cells = map.data;
    const { width, height } = this.image;
    const { centerX, centerY, focalDistance, lens } = this;
    const maxIncidence = lens.maxIncidence;

    forEachRowRange(map.height, this.rowChunks, ({ start, end }) => {
      for (let i = start * map.width * CHANNELS; i < end * map.width * CHANNELS; i += CHANNELS) {
        if (cells[i + INVALID] !== 0) continue;
        const latitude = cells[i + LATITUDE]!;
        if (!(latitude >= 0 && latitude <= maxIncidence)) continue;
        const longitude = cells[i + LONGITUDE]!;

        const distance = lens.forward(latitude) * focalDistance;
        const col = Math.floor(centerX + distance * Math.cos(longitude) + 0.5);
        const row = Math.floor(centerY - distance * Math.sin(longitude) + 0.5);
        if (!(col >= 0 && col < width && row >= 0 && row < height)) continue;

        const from = (row * width + col) * CHANNELS;
        dst[i] = src[from]!;
        dst[i + 1] = src[from + 1]!;
        dst[i + 2] = src[from + 2]!;
      }
    });

    return out;
  }
}
