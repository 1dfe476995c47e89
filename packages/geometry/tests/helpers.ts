/**
 * Shared assertions for geometry tests.
 */

import { expect } from "vitest";

/**
 * Assert that a point is within 10^-digits of (x, y) on both axes.
 */
export function expectPointClose(
  received: { x: number; y: number },
  expected: { x: number; y: number },
  digits = 6,
): void {
  const epsilon = Math.pow(10, -digits);
  const pass =
    Math.abs(received.x - expected.x) < epsilon &&
    Math.abs(received.y - expected.y) < epsilon;

  expect(
    pass,
    `expected (${received.x}, ${received.y}) to be close to (${expected.x}, ${expected.y})`,
  ).toBe(true);
}
