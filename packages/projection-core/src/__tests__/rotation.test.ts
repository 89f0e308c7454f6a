import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Rotation } from '../rotation/index.js';
import { coordinateMapFromPoints, getCell, setCell, createCoordinateMap } from '../coordinate-map/index.js';
import { sphericalToVector } from '../math/spherical.js';
import { InvalidParameterError } from '../errors.js';
import type { CoordinateMap } from '../types.js';

function rotatePoint(rotation: Rotation, latitude: number, longitude: number) {
  return getCell(rotation.rotate(coordinateMapFromPoints([{ latitude, longitude }])), 0, 0);
}

describe('Rotation', () => {
  it('zero rotation copies the map unchanged', () => {
    const map = coordinateMapFromPoints([
      { latitude: 0.3, longitude: -2 },
      { latitude: 2.9, longitude: 3.1 },
    ]);
    const rotation = new Rotation(0, 0, 0);
    const rotated = rotation.rotate(map);

    expect(rotation.isIdentity).toBe(true);
    expect(rotated).not.toBe(map);
    expect(Array.from(rotated.data)).toEqual(Array.from(map.data));
  });

  it('does not modify its input', () => {
    const map = coordinateMapFromPoints([{ latitude: 1, longitude: 1 }]);
    const before = Array.from(map.data);
    new Rotation(0.4, 0.5, 0.6).rotate(map);
    expect(Array.from(map.data)).toEqual(before);
  });

  it('pitch of a quarter turn moves the pole to the equator', () => {
    const cell = rotatePoint(new Rotation(Math.PI / 2, 0, 0), 0, 0);
    expect(cell.latitude).toBeCloseTo(Math.PI / 2, 12);
    expect(cell.longitude).toBeCloseTo(Math.PI / 2, 12);
  });

  it('yaw subtracts from longitude', () => {
    const cell = rotatePoint(new Rotation(0, Math.PI / 2, 0), Math.PI / 2, 0);
    expect(cell.latitude).toBeCloseTo(Math.PI / 2, 12);
    expect(cell.longitude).toBeCloseTo(-Math.PI / 2, 12);
  });

  it('yaw wraps longitude into (-π, π]', () => {
    const cell = rotatePoint(new Rotation(0, Math.PI / 2, 0), Math.PI / 2, (-3 * Math.PI) / 4);
    expect(cell.longitude).toBeCloseTo((3 * Math.PI) / 4, 12);
  });

  it('zeroes invalid cells and keeps their flag', () => {
    const map: CoordinateMap = createCoordinateMap(2, 1);
    setCell(map, 0, 0, 1, 1, false);
    map.data[3] = 2;
    map.data[4] = 2;
    map.data[5] = 1;

    const rotated = new Rotation(0.1, 0.2, 0.3).rotate(map);

    expect(getCell(rotated, 0, 1)).toEqual({ latitude: 0, longitude: 0, invalid: true });
    expect(getCell(rotated, 0, 0).invalid).toBe(false);
  });

  it('builds from degrees', () => {
    const rotation = Rotation.fromDegrees(90, -45, 0);
    expect(rotation.pitch).toBeCloseTo(Math.PI / 2, 12);
    expect(rotation.yaw).toBeCloseTo(-Math.PI / 4, 12);
    expect(rotation.roll).toBe(0);
  });

  it('rejects a non-finite angle', () => {
    expect(() => new Rotation(Number.NaN, 0, 0)).toThrow(InvalidParameterError);
  });

  it('applying the inverse axis by axis restores each point', () => {
    const angle = fc.double({ min: -Math.PI, max: Math.PI, noNaN: true });
    fc.assert(
      fc.property(
        angle,
        angle,
        angle,
        fc.double({ min: 0, max: Math.PI, noNaN: true }),
        angle,
        (pitch, yaw, roll, latitude, longitude) => {
          let map = new Rotation(pitch, yaw, roll).rotate(coordinateMapFromPoints([{ latitude, longitude }]));
          map = new Rotation(-pitch, 0, 0).rotate(map);
          map = new Rotation(0, -yaw, 0).rotate(map);
          map = new Rotation(0, 0, -roll).rotate(map);

          const cell = getCell(map, 0, 0);
          const restored = sphericalToVector(cell.latitude, cell.longitude);
          const original = sphericalToVector(latitude, longitude);
          expect(restored.x).toBeCloseTo(original.x, 6);
          expect(restored.y).toBeCloseTo(original.y, 6);
          expect(restored.z).toBeCloseTo(original.z, 6);
        },
      ),
    );
  });
});
