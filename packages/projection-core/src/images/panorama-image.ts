// ---------------------------------------------------------------------------
// PanoramaImage — equirectangular, 360 x 180 degrees
// ---------------------------------------------------------------------------

import { CHANNELS, INVALID, LATITUDE, LONGITUDE, type CoordinateMap, type PixelBuffer } from '../types.js';
import { InvalidParameterError } from '../errors.js';
import { createCoordinateMap } from '../coordinate-map/coordinate-map.js';
import { forEachRowRange } from '../parallel/row-partition.js';
import { createPixelBuffer } from './pixel-buffer.js';
import { resolveRowChunks, type KernelOptions, type ProjectionImage } from './projection-image.js';

/** Non-negative remainder. */
function wrap(value: number, size: number): number {
  return ((value % size) + size) % size;
}

/**
 * Rows run from latitude 0 at the top to π at the bottom; columns run from
 * longitude -π on the left to π on the right.
 */
export class PanoramaImage implements ProjectionImage {
  readonly image: PixelBuffer;
  readonly rowChunks: number;

  constructor(image: PixelBuffer, options: KernelOptions = {}) {
    this.image = createPixelBuffer(image.width, image.height, image.data);
    if (image.height === 0 || image.width !== 2 * image.height) {
      throw new InvalidParameterError(
        'dimensions',
        `a panorama must be twice as wide as it is tall, got ${image.width}x${image.height}`,
      );
    }
    this.rowChunks = resolveRowChunks(options);
  }

  getCoordinateMap(): CoordinateMap {
    const { width, height } = this.image;
    const halfWidth = width / 2;
    const map = createCoordinateMap(width, height);
    const out = map.data;

    forEachRowRange(height, this.rowChunks, ({ start, end }) => {
      for (let row = start; row < end; row++) {
        const latitude = ((row + 0.5) / height) * Math.PI;
        for (let col = 0; col < width; col++) {
          const i = (row * width + col) * CHANNELS;
          out[i + LATITUDE] = latitude;
          out[i + LONGITUDE] = ((col + 0.5 - halfWidth) / halfWidth) * Math.PI;
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
    const halfWidth = width / 2;

    forEachRowRange(map.height, this.rowChunks, ({ start, end }) => {
      for (let i = start * map.width * CHANNELS; i < end * map.width * CHANNELS; i += CHANNELS) {
        if (cells[i + INVALID] !== 0) continue;
        const latitude = cells[i + LATITUDE]!;
        const longitude = cells[i + LONGITUDE]!;
        if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) continue;

        const row = wrap(Math.floor((latitude / Math.PI) * height), height);
        const col = wrap(Math.floor((longitude / Math.PI) * halfWidth + halfWidth), width);
        const from = (row * width + col) * CHANNELS;
        dst[i] = src[from]!;
        dst[i + 1] = src[from + 1]!;
        dst[i + 2] = src[from + 2]!;
      }
    });

    return out;
  }
}
