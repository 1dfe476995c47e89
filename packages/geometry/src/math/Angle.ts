/**
 * Angle utilities
 *
 * Angles are in degrees, measured in pixel space (y down).
 */

import * as THREE from "three";
import type { Point2 } from "../types.js";

/** Degrees to radians conversion factor */
export const DEG_TO_RAD = Math.PI / 180;

/** Radians to degrees conversion factor */
export const RAD_TO_DEG = 180 / Math.PI;

/**
 * Convert degrees to radians
 */
export function radians(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

/**
 * Convert radians to degrees
 */
export function degrees(radians: number): number {
  return radians * RAD_TO_DEG;
}

/**
 * Unit direction vector for an angle in degrees.
 */
export function directionFromAngle(angle: number): THREE.Vector2 {
  const rad = radians(angle);
  return new THREE.Vector2(Math.cos(rad), Math.sin(rad));
}

/**
 * Direction of the straight line from `from` to `to`, in degrees.
 */
export function angleBetweenPoints(from: Point2, to: Point2): number {
  return degrees(Math.atan2(to.y - from.y, to.x - from.x));
}
