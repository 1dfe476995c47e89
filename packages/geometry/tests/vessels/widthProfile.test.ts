/**
 * Tests for width profiles and narrowing bumps.
 */

import { describe, it, expect } from "vitest";
import {
  WidthProfile,
  narrowingFactor,
  narrowingSupport,
} from "../../src/vessels/WidthProfile.js";
import {
  InvalidGeometryError,
  OutOfRangeError,
} from "../../src/vessels/errors.js";

const SAMPLES = Array.from({ length: 21 }, (_, i) => i / 20);

describe("narrowingFactor", () => {
  const narrowing = { loc: 0.5, length: 0.4, scale: 0.3 };

  it("reaches the scale at the centre", () => {
    expect(narrowingFactor(narrowing, 0.5)).toBeCloseTo(0.3, 12);
  });

  it("is 1 at the support boundary and outside it", () => {
    expect(narrowingFactor(narrowing, 0.3)).toBeCloseTo(1, 12);
    expect(narrowingFactor(narrowing, 0.7)).toBeCloseTo(1, 12);
    expect(narrowingFactor(narrowing, 0.1)).toBe(1);
    expect(narrowingFactor(narrowing, 0.95)).toBe(1);
  });

  it("is halfway between scale and 1 halfway to the boundary", () => {
    expect(narrowingFactor(narrowing, 0.4)).toBeCloseTo(0.65, 12);
    expect(narrowingFactor(narrowing, 0.6)).toBeCloseTo(0.65, 12);
  });

  it("flattens out at the boundary", () => {
    const h = 1e-4;
    const slope =
      (narrowingFactor(narrowing, 0.7) - narrowingFactor(narrowing, 0.7 - h)) /
      h;
    expect(Math.abs(slope)).toBeLessThan(0.01);
  });

  it("has no effect at scale 1", () => {
    for (const t of SAMPLES) {
      expect(narrowingFactor({ loc: 0.5, length: 0.4, scale: 1 }, t)).toBe(1);
    }
  });

  it("is a no-op with zero length away from its centre", () => {
    const point = { loc: 0.5, length: 0, scale: 0.2 };
    expect(narrowingFactor(point, 0.4)).toBe(1);
    expect(narrowingFactor(point, 0.6)).toBe(1);
  });
});

describe("narrowingSupport", () => {
  it("centres the support on loc", () => {
    const support = narrowingSupport({ loc: 0.5, length: 0.4, scale: 0.5 });
    expect(support.lo).toBeCloseTo(0.3, 12);
    expect(support.hi).toBeCloseTo(0.7, 12);
    expect(support.clamped).toBe(false);
  });

  it("clamps a support reaching past the end", () => {
    const support = narrowingSupport({ loc: 0.9, length: 0.4, scale: 0.5 });
    expect(support.lo).toBeCloseTo(0.7, 12);
    expect(support.hi).toBe(1);
    expect(support.clamped).toBe(true);
  });

  it("keeps the bump inside a clamped support", () => {
    const narrowing = { loc: 0.9, length: 0.4, scale: 0.5 };
    expect(narrowingFactor(narrowing, 0.9)).toBeCloseTo(0.5, 12);
    expect(narrowingFactor(narrowing, 1)).toBeCloseTo(1, 12);
    expect(narrowingFactor(narrowing, 0.95)).toBeCloseTo(0.75, 12);
  });
});

describe("WidthProfile", () => {
  it("is constant until tapered", () => {
    const profile = new WidthProfile();
    for (const t of SAMPLES) {
      expect(profile.widthAt(16, t)).toBe(16);
    }
    expect(profile.taper).toBeNull();
  });

  it("interpolates linearly between start and end width", () => {
    const profile = new WidthProfile();
    profile.taperTo(8);

    for (const t of SAMPLES) {
      expect(profile.widthAt(16, t)).toBeCloseTo(16 + (8 - 16) * t, 12);
    }
  });

  it("keeps only the latest taper", () => {
    const profile = new WidthProfile();
    profile.taperTo(4);
    profile.taperTo(12);

    expect(profile.taper).toBe(12);
    expect(profile.widthAt(16, 1)).toBe(12);
  });

  it("multiplies narrowings into the baseline", () => {
    const profile = new WidthProfile();
    profile.taperTo(8);
    profile.addNarrowing({ loc: 0.5, length: 0.4, scale: 0.5 });

    expect(profile.widthAt(16, 0.5)).toBeCloseTo(12 * 0.5, 12);
    expect(profile.widthAt(16, 0.1)).toBeCloseTo(16 + (8 - 16) * 0.1, 12);
  });

  it("composes narrowings independent of order", () => {
    const a = { loc: 0.4, length: 0.4, scale: 0.5 };
    const b = { loc: 0.55, length: 0.3, scale: 0.7 };
    const c = { loc: 0.9, length: 0.1, scale: 0.2 };

    const forward = new WidthProfile();
    const backward = new WidthProfile();
    for (const n of [a, b, c]) forward.addNarrowing(n);
    for (const n of [c, b, a]) backward.addNarrowing(n);

    for (const t of SAMPLES) {
      expect(forward.widthAt(10, t)).toBeCloseTo(backward.widthAt(10, t), 12);
    }
  });

  it("approaches the plain profile as the scale approaches 1", () => {
    const plain = new WidthProfile();
    const narrowed = new WidthProfile();
    narrowed.addNarrowing({ loc: 0.5, length: 0.4, scale: 0.999 });

    for (const t of SAMPLES) {
      const delta = Math.abs(narrowed.widthAt(16, t) - plain.widthAt(16, t));
      expect(delta).toBeLessThanOrEqual(0.016 + 1e-12);
    }
  });

  it("rejects non-positive end widths", () => {
    const profile = new WidthProfile();
    expect(() => profile.taperTo(0)).toThrow(InvalidGeometryError);
    expect(() => profile.taperTo(-3)).toThrow(InvalidGeometryError);
    expect(() => profile.taperTo(Number.NaN)).toThrow(InvalidGeometryError);
    expect(profile.taper).toBeNull();
  });

  it("rejects narrowing parameters outside [0, 1]", () => {
    const profile = new WidthProfile();
    expect(() =>
      profile.addNarrowing({ loc: 0.5, length: 0.4, scale: 1.2 }),
    ).toThrow(OutOfRangeError);
    expect(() =>
      profile.addNarrowing({ loc: -0.1, length: 0.4, scale: 0.5 }),
    ).toThrow(OutOfRangeError);
    expect(() =>
      profile.addNarrowing({ loc: 0.5, length: 1.5, scale: 0.5 }),
    ).toThrow(OutOfRangeError);
    expect(profile.narrowings).toHaveLength(0);
  });
});
