import { describe, it, expect } from 'vitest';
import { PanoramaImage, createPixelBuffer, getPixel } from '../images/index.js';
import { coordinateMapFromPoints, createCoordinateMap, getCell, setCell } from '../coordinate-map/index.js';
import { InvalidParameterError } from '../errors.js';
import { patternImage } from './helpers.js';

describe('PanoramaImage', () => {
  it('requires a 2:1 aspect ratio', () => {
    expect(() => new PanoramaImage(createPixelBuffer(10, 4))).toThrow(InvalidParameterError);
    expect(() => new PanoramaImage(createPixelBuffer(0, 0))).toThrow(InvalidParameterError);
  });

  it('maps pixel centres to latitude and longitude', () => {
    const map = new PanoramaImage(createPixelBuffer(8, 4)).getCoordinateMap();

    const topLeft = getCell(map, 0, 0);
    expect(topLeft.latitude).toBeCloseTo(Math.PI / 8, 12);
    expect(topLeft.longitude).toBeCloseTo((-7 * Math.PI) / 8, 12);
    expect(topLeft.invalid).toBe(false);

    const bottomRight = getCell(map, 3, 7);
    expect(bottomRight.latitude).toBeCloseTo((7 * Math.PI) / 8, 12);
    expect(bottomRight.longitude).toBeCloseTo((7 * Math.PI) / 8, 12);
  });

  it('samples the pixel under a coordinate', () => {
    const image = patternImage(8, 4);
    const panorama = new PanoramaImage(image);
    const out = panorama.processCoordinateMap(
      coordinateMapFromPoints([
        { latitude: Math.PI / 2, longitude: 0 },
        { latitude: 0, longitude: -Math.PI },
      ]),
    );
    expect(getPixel(out, 0, 0)).toEqual(getPixel(image, 2, 4));
    expect(getPixel(out, 0, 1)).toEqual(getPixel(image, 0, 0));
  });

  it('wraps the seam and the bottom pole', () => {
    const image = patternImage(8, 4);
    const out = new PanoramaImage(image).processCoordinateMap(
      coordinateMapFromPoints([
        { latitude: Math.PI / 2, longitude: Math.PI },
        { latitude: Math.PI, longitude: 0 },
      ]),
    );
    // Longitude π lands on column 8, which wraps to 0; latitude π on row 4, which wraps to 0.
    expect(getPixel(out, 0, 0)).toEqual(getPixel(image, 2, 0));
    expect(getPixel(out, 0, 1)).toEqual(getPixel(image, 0, 4));
  });

  it('renders invalid and non-finite cells black', () => {
    const panorama = new PanoramaImage(patternImage(8, 4));
    const map = createCoordinateMap(2, 1);
    setCell(map, 0, 0, 1, 1, true);
    setCell(map, 0, 1, Number.POSITIVE_INFINITY, 0, false);

    const out = panorama.processCoordinateMap(map);

    expect(getPixel(out, 0, 0)).toEqual([0, 0, 0]);
    expect(getPixel(out, 0, 1)).toEqual([0, 0, 0]);
  });

  it('reproduces itself through its own map', () => {
    const image = patternImage(16, 8);
    const panorama = new PanoramaImage(image, { rowChunks: 3 });
    const out = panorama.processCoordinateMap(panorama.getCoordinateMap());
    expect(Array.from(out.data)).toEqual(Array.from(image.data));
  });
});
