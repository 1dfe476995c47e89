/**
 * Vessel Rasterizer
 *
 * Converts a set of vessels into a grayscale image. Each vessel's
 * centerline is sampled at short arc-length steps; consecutive samples
 * form a tapered capsule whose radius is interpolated between them. For
 * every pixel the rasterizer keeps the smallest signed distance to any
 * capsule of any vessel, so overlapping vessels merge into one lumen
 * without seams or double intensity. The distance is then turned into
 * coverage of a one-pixel footprint for anti-aliased edges.
 *
 * Each capsule only touches the pixels in its bounding box, clipped to
 * the canvas.
 */

import type { Vessel } from "../vessels/Vessel.js";
import { RenderFailureError } from "../vessels/errors.js";
import type { CenterlineSample } from "../types.js";
import {
  DEFAULT_RENDER_CONFIG,
  type GrayscaleImage,
  type RenderConfig,
} from "./types.js";

function assertIntensity(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new RenderFailureError(
      `[Rasterizer] ${label} intensity must be an integer between 0 and 255, got ${value}`,
    );
  }
}

/**
 * Throw unless width and height are positive integers.
 */
export function assertCanvasSize(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height)) {
    throw new RenderFailureError(
      `[Rasterizer] canvas size must be integer, got ${width}x${height}`,
    );
  }
  if (width <= 0 || height <= 0) {
    throw new RenderFailureError(
      `[Rasterizer] canvas size must be positive, got ${width}x${height}`,
    );
  }
}

/**
 * Merge render overrides over the defaults and validate the result.
 */
export function resolveRenderConfig(
  overrides: Partial<RenderConfig> = {},
): RenderConfig {
  const config: RenderConfig = { ...DEFAULT_RENDER_CONFIG, ...overrides };

  assertIntensity(config.background, "background");
  assertIntensity(config.lumen, "lumen");
  if (config.background === config.lumen) {
    throw new RenderFailureError(
      `[Rasterizer] background and lumen intensities are both ${config.lumen}`,
    );
  }
  if (!Number.isFinite(config.sampleSpacing) || config.sampleSpacing <= 0) {
    throw new RenderFailureError(
      `[Rasterizer] sample spacing must be a positive number, got ${config.sampleSpacing}`,
    );
  }

  return config;
}

/**
 * Lower the signed distance field wherever the capsule between two
 * centerline samples is closer than what is already stored.
 */
function stampCapsule(
  field: Float32Array,
  width: number,
  height: number,
  a: CenterlineSample,
  b: CenterlineSample,
): void {
  const reach = Math.max(a.radius, b.radius) + 1;
  const minCol = Math.max(0, Math.floor(Math.min(a.x, b.x) - reach));
  const maxCol = Math.min(width - 1, Math.ceil(Math.max(a.x, b.x) + reach));
  const minRow = Math.max(0, Math.floor(Math.min(a.y, b.y) - reach));
  const maxRow = Math.min(height - 1, Math.ceil(Math.max(a.y, b.y) + reach));
  if (minCol > maxCol || minRow > maxRow) return;

  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const len2 = dx * dx + dy * dy;

  for (let row = minRow; row <= maxRow; row++) {
    const offset = row * width;
    for (let col = minCol; col <= maxCol; col++) {
      const px = col - a.x;
      const py = row - a.y;
      let h = len2 > 0 ? (px * dx + py * dy) / len2 : 0;
      h = h < 0 ? 0 : h > 1 ? 1 : h;

      const ex = px - h * dx;
      const ey = py - h * dy;
      const radius = a.radius + (b.radius - a.radius) * h;
      const distance = Math.sqrt(ex * ex + ey * ey) - radius;

      if (distance < field[offset + col]) {
        field[offset + col] = distance;
      }
    }
  }
}

/**
 * Fraction of a pixel covered by the lumen, from its signed distance.
 */
function coverage(distance: number, antialias: boolean): number {
  if (!antialias) {
    return distance <= 0 ? 1 : 0;
  }
  const c = 0.5 - distance;
  return c <= 0 ? 0 : c >= 1 ? 1 : c;
}

/**
 * Rasterize vessels into a fresh grayscale image.
 *
 * The result depends only on the vessels' current geometry and the
 * config, so repeated calls return identical pixels.
 */
export function rasterizeVessels(
  vessels: readonly Vessel[],
  width: number,
  height: number,
  config: RenderConfig = DEFAULT_RENDER_CONFIG,
): GrayscaleImage {
  assertCanvasSize(width, height);

  const field = new Float32Array(width * height).fill(Infinity);

  for (const vessel of vessels) {
    const samples = vessel.sampleCenterline(config.sampleSpacing);
    for (let i = 1; i < samples.length; i++) {
      stampCapsule(field, width, height, samples[i - 1], samples[i]);
    }
  }

  const data = new Uint8ClampedArray(width * height);
  const range = config.lumen - config.background;
  for (let i = 0; i < field.length; i++) {
    data[i] = Math.round(
      config.background + coverage(field[i], config.antialias) * range,
    );
  }

  return { width, height, data };
}
