/**
 * Arc-length parameterization of a Bezier segment.
 *
 * Vessel widths and probe points are expressed as fractions of arc length,
 * while the Bezier formula takes a curve parameter. The table built here
 * maps one to the other with a binary search and linear interpolation.
 */

import * as THREE from "three";
import type { BezierSplinePoint } from "./Bezier.js";
import { calcPointOnBezierInto } from "./Bezier.js";

/** Number of curve samples in each lookup table */
export const ARC_LENGTH_SAMPLES = 256;

export class ArcLengthTable {
  /** Total arc length of the segment */
  readonly totalLength: number;

  private readonly params: Float64Array;
  private readonly lengths: Float64Array;

  constructor(
    startPoint: BezierSplinePoint,
    endPoint: BezierSplinePoint,
    samples = ARC_LENGTH_SAMPLES,
  ) {
    this.params = new Float64Array(samples + 1);
    this.lengths = new Float64Array(samples + 1);

    const prev = startPoint.co.clone();
    const point = new THREE.Vector2();
    let total = 0;

    for (let i = 1; i <= samples; i++) {
      const t = i / samples;
      calcPointOnBezierInto(t, startPoint, endPoint, point);
      total += point.distanceTo(prev);
      prev.copy(point);
      this.params[i] = t;
      this.lengths[i] = total;
    }

    this.totalLength = total;
  }

  /**
   * Curve parameter at a fraction of the total arc length.
   *
   * @param fraction - Arc-length fraction, clamped to [0, 1]
   */
  paramAt(fraction: number): number {
    if (fraction <= 0) return 0;
    if (fraction >= 1) return 1;

    const target = fraction * this.totalLength;
    let lo = 0;
    let hi = this.lengths.length - 1;
    while (lo < hi - 1) {
      const mid = (lo + hi) >>> 1;
      if (this.lengths[mid] < target) {
        lo = mid;
      } else {
        hi = mid;
      }
    }

    const span = this.lengths[hi] - this.lengths[lo];
    const f = span > 0 ? (target - this.lengths[lo]) / span : 0;
    return this.params[lo] + (this.params[hi] - this.params[lo]) * f;
  }
}
