import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  LENSES,
  equidistant,
  equisolid,
  getLens,
  orthographic,
  rectilinear,
  stereographic,
  thoby,
} from '../lens/index.js';
import { LensDomainError } from '../errors.js';

// ---------------------------------------------------------------------------
// Closed-form values
// ---------------------------------------------------------------------------

describe('lens forward functions', () => {
  it('equidistant is the identity', () => {
    expect(equidistant.forward(1)).toBe(1);
    expect(equidistant.reverse(0.25)).toBe(0.25);
  });

  it('equisolid reaches 2 at a half turn', () => {
    expect(equisolid.forward(Math.PI)).toBe(2);
  });

  it('stereographic reaches 2 at a quarter turn', () => {
    expect(stereographic.forward(Math.PI / 2)).toBeCloseTo(2, 12);
  });

  it('rectilinear reaches 1 at 45 degrees', () => {
    expect(rectilinear.forward(Math.PI / 4)).toBeCloseTo(1, 12);
  });

  it('orthographic reaches 1 at a quarter turn', () => {
    expect(orthographic.forward(Math.PI / 2)).toBe(1);
  });

  it('thoby uses its fitted constants', () => {
    expect(thoby.forward(1)).toBeCloseTo(1.47 * Math.sin(0.713), 12);
  });

  it('works element-wise on arrays', () => {
    const out = equidistant.forward(new Float64Array([0, 0.5, 1.5]));
    expect(out).toBeInstanceOf(Float64Array);
    expect(Array.from(out)).toEqual([0, 0.5, 1.5]);
  });
});

// ---------------------------------------------------------------------------
// Domains
// ---------------------------------------------------------------------------

describe('lens domains', () => {
  it('rejects rectilinear angles above 89 degrees', () => {
    expect(() => rectilinear.forward((90 / 180) * Math.PI)).toThrow(LensDomainError);
    expect(() => rectilinear.forward((89 / 180) * Math.PI)).not.toThrow();
  });

  it('rejects orthographic angles past a quarter turn', () => {
    expect(() => orthographic.forward(2)).toThrow(LensDomainError);
  });

  it('rejects negative angles', () => {
    expect(() => equidistant.forward(-0.1)).toThrow(LensDomainError);
  });

  it('rejects NaN', () => {
    expect(() => stereographic.forward(Number.NaN)).toThrow(LensDomainError);
  });

  it('rejects an array holding one bad angle', () => {
    expect(() => orthographic.forward(new Float64Array([0.1, 3]))).toThrow(LensDomainError);
  });

  it('names the lens in the error', () => {
    try {
      thoby.forward(3);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LensDomainError);
      if (error instanceof LensDomainError) {
        expect(error.lens).toBe('thoby');
        expect(error.angle).toBe(3);
        expect(error.maxAngle).toBe(Math.PI / (2 * 0.713));
      }
    }
  });

  it('equisolid reverse maps out-of-range distances to 0', () => {
    expect(equisolid.reverse(2.5)).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

describe('getLens', () => {
  it('resolves a name', () => {
    expect(getLens('thoby')).toBe(thoby);
  });

  it('passes a lens through', () => {
    expect(getLens(equisolid)).toBe(equisolid);
  });

  it('registers six lenses under their own names', () => {
    for (const [name, lens] of Object.entries(LENSES)) {
      expect(lens.name).toBe(name);
    }
    expect(Object.keys(LENSES)).toHaveLength(6);
  });
});

// ---------------------------------------------------------------------------
// Round trip
// ---------------------------------------------------------------------------

describe('reverse(forward(θ)) = θ', () => {
  for (const lens of Object.values(LENSES)) {
    it(`holds for ${lens.name}`, () => {
      fc.assert(
        fc.property(fc.double({ min: 0, max: lens.maxIncidence * 0.99, noNaN: true }), (theta) => {
          expect(lens.reverse(lens.forward(theta))).toBeCloseTo(theta, 9);
        }),
      );
    });
  }
});
