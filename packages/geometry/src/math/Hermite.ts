/**
 * Hermite centerline construction.
 *
 * A vessel's centerline is the cubic Hermite blend between its endpoints
 * with unit boundary directions scaled by the chord length. Written as a
 * Bezier segment, both handles sit one third of the chord away from their
 * endpoint along the declared direction. The curve passes through both
 * endpoints and its tangent matches the declared angle at each end, which
 * is what keeps parent/child joins C¹.
 */

import * as THREE from "three";
import type { BezierSplinePoint } from "./Bezier.js";
import { createBezierPoint } from "./Bezier.js";
import { directionFromAngle } from "./Angle.js";
import type { Point2 } from "../types.js";

/**
 * Start and end control points of one centerline segment.
 */
export type HermiteSegment = {
  start: BezierSplinePoint;
  end: BezierSplinePoint;
};

/**
 * Build the Bezier control points of a Hermite blend.
 *
 * @param angleFrom - Start direction in degrees
 * @param angleTo - End direction in degrees
 */
export function createHermiteSegment(
  from: Point2,
  angleFrom: number,
  to: Point2,
  angleTo: number,
): HermiteSegment {
  const p0 = new THREE.Vector2(from.x, from.y);
  const p3 = new THREE.Vector2(to.x, to.y);
  const handleLength = p0.distanceTo(p3) / 3;

  return {
    start: createBezierPoint(p0, directionFromAngle(angleFrom), handleLength),
    end: createBezierPoint(p3, directionFromAngle(angleTo), handleLength),
  };
}
