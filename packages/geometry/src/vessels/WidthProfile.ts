/**
 * Width Profile
 *
 * The width of a vessel at arc-length fraction t is the linear taper
 * between its start and end widths, multiplied by the factor of every
 * narrowing. Factors multiply, so the order narrowings were added in has
 * no effect.
 *
 * A narrowing is a raised cosine bump: `scale` at `loc`, easing back to 1
 * with zero slope at both edges of its support, so the lumen edge has no
 * kinks.
 */

import type { Narrowing } from "../types.js";
import { InvalidGeometryError, OutOfRangeError } from "./errors.js";

/**
 * Support of a narrowing after clamping to [0, 1].
 */
export type NarrowingSupport = {
  lo: number;
  hi: number;
  /** True when the requested support reached past either end */
  clamped: boolean;
};

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * Throw unless `width` is a finite, positive number.
 */
export function assertWidth(width: number, label = "width"): void {
  if (!Number.isFinite(width) || width <= 0) {
    throw new InvalidGeometryError(
      `[WidthProfile] ${label} must be a positive number, got ${width}`,
    );
  }
}

function assertUnit(value: number, label: string): void {
  if (!(value >= 0 && value <= 1)) {
    throw new OutOfRangeError(
      `[WidthProfile] narrowing ${label} must be between 0 and 1, got ${value}`,
    );
  }
}

/**
 * Check a narrowing's parameters, throwing OutOfRangeError on the first bad one.
 */
export function validateNarrowing(narrowing: Narrowing): void {
  assertUnit(narrowing.loc, "loc");
  assertUnit(narrowing.length, "length");
  assertUnit(narrowing.scale, "scale");
}

/**
 * Support interval of a narrowing centred on `loc`, clamped to [0, 1].
 */
export function narrowingSupport(narrowing: Narrowing): NarrowingSupport {
  const half = narrowing.length / 2;
  const lo = narrowing.loc - half;
  const hi = narrowing.loc + half;
  return {
    lo: Math.max(0, lo),
    hi: Math.min(1, hi),
    clamped: lo < 0 || hi > 1,
  };
}

/**
 * Width factor of a single narrowing at arc-length fraction t.
 *
 * Each side of the bump spans from `loc` to its (clamped) support edge.
 */
export function narrowingFactor(narrowing: Narrowing, t: number): number {
  const { lo, hi } = narrowingSupport(narrowing);
  const { loc, scale } = narrowing;

  if (t < lo || t > hi) return 1;

  const half = t < loc ? loc - lo : hi - loc;
  if (half <= 0) {
    return t === loc ? scale : 1;
  }

  const u = Math.min(1, Math.abs(t - loc) / half);
  const bump = (1 + Math.cos(Math.PI * u)) / 2;
  return 1 - (1 - scale) * bump;
}

/**
 * Baseline taper plus narrowing stack for one vessel.
 *
 * The start width is passed in on every evaluation because a child vessel
 * takes it from its parent's terminus.
 */
export class WidthProfile {
  private endWidth: number | null = null;
  private readonly modifiers: Narrowing[] = [];

  /**
   * End width, or null while the profile is untapered.
   */
  get taper(): number | null {
    return this.endWidth;
  }

  get narrowings(): readonly Narrowing[] {
    return this.modifiers;
  }

  /**
   * Set the end width of the linear taper. Last call wins.
   */
  taperTo(endWidth: number): void {
    assertWidth(endWidth, "end width");
    this.endWidth = endWidth;
  }

  /**
   * Append a narrowing after validating it.
   */
  addNarrowing(narrowing: Narrowing): void {
    validateNarrowing(narrowing);
    this.modifiers.push({ ...narrowing });
  }

  /**
   * Width before narrowings at arc-length fraction t.
   */
  baseWidthAt(startWidth: number, t: number): number {
    return lerp(startWidth, this.endWidth ?? startWidth, t);
  }

  /**
   * Width at arc-length fraction t.
   */
  widthAt(startWidth: number, t: number): number {
    let width = this.baseWidthAt(startWidth, t);
    for (const narrowing of this.modifiers) {
      width *= narrowingFactor(narrowing, t);
    }
    return width;
  }
}
