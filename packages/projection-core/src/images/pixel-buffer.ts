// ---------------------------------------------------------------------------
// Pixel buffers — allocation, access, cropping, mirroring, downsampling
// ---------------------------------------------------------------------------

import { CHANNELS, type PixelBuffer, type RGB } from '../types.js';
import { InvalidParameterError } from '../errors.js';

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new InvalidParameterError(
      'dimensions',
      `width and height must be non-negative integers, got ${width}x${height}`,
    );
  }
}

/**
 * Create a pixel buffer, black unless `data` is given.
 *
 * `data` is wrapped, not copied, so the buffer can be used as a write
 * target for an existing array.
 */
export function createPixelBuffer(width: number, height: number, data?: Uint8Array): PixelBuffer {
  assertDimensions(width, height);
  const expected = width * height * CHANNELS;
  if (data && data.length !== expected) {
    throw new InvalidParameterError(
      'pixel data',
      `expected ${expected} bytes for ${width}x${height} RGB, got ${data.length}`,
    );
  }
  return { width, height, data: data ?? new Uint8Array(expected) };
}

/** Create a buffer where every pixel has the same colour. */
export function fillPixelBuffer(width: number, height: number, color: RGB): PixelBuffer {
  const buffer = createPixelBuffer(width, height);
  for (let i = 0; i < buffer.data.length; i += CHANNELS) {
    buffer.data[i] = color[0];
    buffer.data[i + 1] = color[1];
    buffer.data[i + 2] = color[2];
  }
  return buffer;
}

/** Whether (row, col) falls on the buffer. */
export function isPosition(buffer: PixelBuffer, row: number, col: number): boolean {
  return row >= 0 && row < buffer.height && col >= 0 && col < buffer.width;
}

export function getPixel(buffer: PixelBuffer, row: number, col: number): RGB {
  if (!isPosition(buffer, row, col)) {
    throw new RangeError(`Pixel (${row}, ${col}) is outside a ${buffer.width}x${buffer.height} image`);
  }
  const i = (row * buffer.width + col) * CHANNELS;
  return [buffer.data[i]!, buffer.data[i + 1]!, buffer.data[i + 2]!];
}

export function setPixel(buffer: PixelBuffer, row: number, col: number, color: RGB): void {
  if (!isPosition(buffer, row, col)) {
    throw new RangeError(`Pixel (${row}, ${col}) is outside a ${buffer.width}x${buffer.height} image`);
  }
  const i = (row * buffer.width + col) * CHANNELS;
  buffer.data[i] = color[0];
  buffer.data[i + 1] = color[1];
  buffer.data[i + 2] = color[2];
}

/** Copy the `width` x `height` region whose top-left corner is (top, left). */
export function cropPixelBuffer(
  buffer: PixelBuffer,
  left: number,
  top: number,
  width: number,
  height: number,
): PixelBuffer {
  if (left < 0 || top < 0 || left + width > buffer.width || top + height > buffer.height) {
    throw new RangeError(
      `Crop ${width}x${height} at (${left}, ${top}) exceeds a ${buffer.width}x${buffer.height} image`,
    );
  }
  const out = createPixelBuffer(width, height);
  const rowBytes = width * CHANNELS;
  for (let row = 0; row < height; row++) {
    const from = ((top + row) * buffer.width + left) * CHANNELS;
    out.data.set(buffer.data.subarray(from, from + rowBytes), row * rowBytes);
  }
  return out;
}

/** Copy `source` into `target` with its top-left corner at (top, left). */
export function pastePixelBuffer(
  target: PixelBuffer,
  source: PixelBuffer,
  left: number,
  top: number,
): void {
  if (left < 0 || top < 0 || left + source.width > target.width || top + source.height > target.height) {
    throw new RangeError(
      `Paste ${source.width}x${source.height} at (${left}, ${top}) exceeds a ` +
        `${target.width}x${target.height} image`,
    );
  }
  const rowBytes = source.width * CHANNELS;
  for (let row = 0; row < source.height; row++) {
    const from = row * rowBytes;
    target.data.set(
      source.data.subarray(from, from + rowBytes),
      ((top + row) * target.width + left) * CHANNELS,
    );
  }
}

/** Flip a buffer left to right. */
export function mirrorPixelBuffer(buffer: PixelBuffer): PixelBuffer {
  const { width, height } = buffer;
  const out = createPixelBuffer(width, height);
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      const from = (row * width + col) * CHANNELS;
      const to = (row * width + (width - 1 - col)) * CHANNELS;
      out.data[to] = buffer.data[from]!;
      out.data[to + 1] = buffer.data[from + 1]!;
      out.data[to + 2] = buffer.data[from + 2]!;
    }
  }
  return out;
}

/**
 * Average each `factor` x `factor` block into one pixel, rounding to the
 * nearest byte. Both dimensions must be multiples of `factor`.
 */
export function downsamplePixelBuffer(buffer: PixelBuffer, factor: number): PixelBuffer {
  if (!Number.isInteger(factor) || factor < 1) {
    throw new InvalidParameterError('supersampling', `factor must be a positive integer, got ${factor}`);
  }
  if (factor === 1) return createPixelBuffer(buffer.width, buffer.height, buffer.data.slice());
  if (buffer.width % factor !== 0 || buffer.height % factor !== 0) {
    throw new InvalidParameterError(
      'supersampling',
      `${buffer.width}x${buffer.height} is not a multiple of ${factor}`,
    );
  }

  const width = buffer.width / factor;
  const height = buffer.height / factor;
  const out = createPixelBuffer(width, height);
  const samples = factor * factor;

  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      let r = 0;
      let g = 0;
      let b = 0;
      for (let dy = 0; dy < factor; dy++) {
        for (let dx = 0; dx < factor; dx++) {
          const i = ((row * factor + dy) * buffer.width + (col * factor + dx)) * CHANNELS;
          r += buffer.data[i]!;
          g += buffer.data[i + 1]!;
          b += buffer.data[i + 2]!;
        }
      }
      const o = (row * width + col) * CHANNELS;
      out.data[o] = Math.round(r / samples);
      out.data[o + 1] = Math.round(g / samples);
      out.data[o + 2] = Math.round(b / samples);
    }
  }
  return out;
}
