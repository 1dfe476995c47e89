/**
 * Grayscale image accessors.
 */

import { OutOfRangeError } from "../vessels/errors.js";
import {
  DEFAULT_RENDER_CONFIG,
  type GrayscaleImage,
  type RenderConfig,
} from "./types.js";

/**
 * Intensity of the pixel in column `col`, row `row`.
 */
export function pixelAt(
  image: GrayscaleImage,
  col: number,
  row: number,
): number {
  if (
    !Number.isInteger(col) ||
    !Number.isInteger(row) ||
    col < 0 ||
    row < 0 ||
    col >= image.width ||
    row >= image.height
  ) {
    throw new OutOfRangeError(
      `[GrayscaleImage] pixel (${col}, ${row}) outside ${image.width}x${image.height} image`,
    );
  }
  return image.data[row * image.width + col];
}

/**
 * Summed lumen coverage of one image column, in pixels.
 *
 * For a vessel crossing the column once this is its vertical extent.
 */
export function columnCoverage(
  image: GrayscaleImage,
  col: number,
  config: Pick<RenderConfig, "background" | "lumen"> = DEFAULT_RENDER_CONFIG,
): number {
  const range = config.lumen - config.background;
  let total = 0;
  for (let row = 0; row < image.height; row++) {
    total += (pixelAt(image, col, row) - config.background) / range;
  }
  return total;
}

/**
 * Summed lumen coverage of one image row, in pixels.
 */
export function rowCoverage(
  image: GrayscaleImage,
  row: number,
  config: Pick<RenderConfig, "background" | "lumen"> = DEFAULT_RENDER_CONFIG,
): number {
  const range = config.lumen - config.background;
  let total = 0;
  for (let col = 0; col < image.width; col++) {
    total += (pixelAt(image, col, row) - config.background) / range;
  }
  return total;
}

/**
 * Copy the image into an array of rows, e.g. for an image encoder that
 * takes nested arrays.
 */
export function toRows(image: GrayscaleImage): number[][] {
  const rows: number[][] = [];
  for (let row = 0; row < image.height; row++) {
    const start = row * image.width;
    rows.push(Array.from(image.data.subarray(start, start + image.width)));
  }
  return rows;
}
