import { createPixelBuffer, setPixel } from '../images/index.js';
import type { PixelBuffer } from '../types.js';

/** An image whose every pixel is distinct enough to trace where it went. */
export function patternImage(width: number, height: number): PixelBuffer {
  const buffer = createPixelBuffer(width, height);
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      setPixel(buffer, row, col, [(row * 7) % 256, (col * 13) % 256, (row + col + 1) % 256]);
    }
  }
  return buffer;
}
