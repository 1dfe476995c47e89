/**
 * Math utilities for vessel geometry.
 */

export {
  DEG_TO_RAD,
  RAD_TO_DEG,
  radians,
  degrees,
  directionFromAngle,
  angleBetweenPoints,
} from "./Angle.js";
export {
  type BezierSplinePoint,
  calcPointOnBezier,
  calcTangentToBezier,
  calcPointOnBezierInto,
  calcTangentToBezierInto,
  createBezierPoint,
} from "./Bezier.js";
export { type HermiteSegment, createHermiteSegment } from "./Hermite.js";
export { ArcLengthTable, ARC_LENGTH_SAMPLES } from "./ArcLength.js";
