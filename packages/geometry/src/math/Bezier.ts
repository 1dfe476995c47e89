/**
 * Bezier Curve Utilities
 *
 * Functions for evaluating 2D cubic Bezier curves, used for vessel centerlines.
 * Each vessel is a single cubic segment between its two endpoints; the
 * handles carry the boundary tangent directions.
 *
 * Optimized versions with "Into" suffix write to an existing Vector2 to avoid allocations.
 */

import * as THREE from "three";

/**
 * A point on a Bezier spline with handles for curve control.
 */
export type BezierSplinePoint = {
  /** Position of the control point */
  co: THREE.Vector2;
  /** Left handle position (incoming tangent control) */
  handleLeft: THREE.Vector2;
  /** Right handle position (outgoing tangent control) */
  handleRight: THREE.Vector2;
};

function assertOffset(offset: number): void {
  if (!(offset >= 0 && offset <= 1)) {
    throw new Error(
      `Bezier offset out of range: ${offset} not between 0 and 1`,
    );
  }
}

/**
 * Evaluate a cubic Bezier curve at a given parameter.
 *
 * At offset=0, returns the start point position.
 * At offset=1, returns the end point position.
 *
 * @param offset - Parameter value in [0, 1]
 */
export function calcPointOnBezier(
  offset: number,
  startPoint: BezierSplinePoint,
  endPoint: BezierSplinePoint,
): THREE.Vector2 {
  assertOffset(offset);
  return calcPointOnBezierInto(
    offset,
    startPoint,
    endPoint,
    new THREE.Vector2(),
  );
}

/**
 * Calculate the tangent to a cubic Bezier curve at a given parameter.
 *
 * @param offset - Parameter value in [0, 1]
 * @returns Tangent vector at the given offset (not normalized)
 */
export function calcTangentToBezier(
  offset: number,
  startPoint: BezierSplinePoint,
  endPoint: BezierSplinePoint,
): THREE.Vector2 {
  assertOffset(offset);
  return calcTangentToBezierInto(
    offset,
    startPoint,
    endPoint,
    new THREE.Vector2(),
  );
}

/**
 * Optimized: Calculate point on Bezier curve, writing to existing Vector2.
 * No range check - use in hot loops.
 */
export function calcPointOnBezierInto(
  offset: number,
  startPoint: BezierSplinePoint,
  endPoint: BezierSplinePoint,
  out: THREE.Vector2,
): THREE.Vector2 {
  const t = offset;
  const oneMinusT = 1 - t;

  // B(t) = (1-t)³P0 + 3(1-t)²tP1 + 3(1-t)t²P2 + t³P3
  const p0 = startPoint.co;
  const p1 = startPoint.handleRight;
  const p2 = endPoint.handleLeft;
  const p3 = endPoint.co;

  const c0 = oneMinusT * oneMinusT * oneMinusT;
  const c1 = 3 * oneMinusT * oneMinusT * t;
  const c2 = 3 * oneMinusT * t * t;
  const c3 = t * t * t;

  out.x = c0 * p0.x + c1 * p1.x + c2 * p2.x + c3 * p3.x;
  out.y = c0 * p0.y + c1 * p1.y + c2 * p2.y + c3 * p3.y;

  return out;
}

/**
 * Optimized: Calculate tangent to Bezier curve, writing to existing Vector2.
 */
export function calcTangentToBezierInto(
  offset: number,
  startPoint: BezierSplinePoint,
  endPoint: BezierSplinePoint,
  out: THREE.Vector2,
): THREE.Vector2 {
  const t = offset;
  const oneMinusT = 1 - t;

  // B'(t) = 3(1-t)²(P1-P0) + 6(1-t)t(P2-P1) + 3t²(P3-P2)
  const p0 = startPoint.co;
  const p1 = startPoint.handleRight;
  const p2 = endPoint.handleLeft;
  const p3 = endPoint.co;

  const c0 = 3 * oneMinusT * oneMinusT;
  const c1 = 6 * oneMinusT * t;
  const c2 = 3 * t * t;

  out.x = c0 * (p1.x - p0.x) + c1 * (p2.x - p1.x) + c2 * (p3.x - p2.x);
  out.y = c0 * (p1.y - p0.y) + c1 * (p2.y - p1.y) + c2 * (p3.y - p2.y);

  return out;
}

/**
 * Create a BezierSplinePoint with position and symmetric handles.
 *
 * @param tangent - Direction for handles (will be normalized and scaled)
 * @param handleLength - Distance from position to each handle
 */
export function createBezierPoint(
  position: THREE.Vector2,
  tangent: THREE.Vector2,
  handleLength: number,
): BezierSplinePoint {
  const offset = tangent.clone().normalize().multiplyScalar(handleLength);
  return {
    co: position.clone(),
    handleLeft: position.clone().sub(offset),
    handleRight: position.clone().add(offset),
  };
}
