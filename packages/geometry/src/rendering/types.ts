/**
 * Rendering types and defaults.
 */

/**
 * Render settings for a canvas.
 */
export type RenderConfig = {
  /** Intensity of pixels outside every vessel (0-255) */
  background: number;
  /** Intensity of pixels fully inside a vessel (0-255) */
  lumen: number;
  /** Maximum centerline step between samples, in pixels */
  sampleSpacing: number;
  /** Blend boundary pixels by coverage instead of thresholding */
  antialias: boolean;
};

/**
 * Default render settings: black background, white lumen.
 */
export const DEFAULT_RENDER_CONFIG: RenderConfig = {
  background: 0,
  lumen: 255,
  sampleSpacing: 0.5,
  antialias: true,
};

/**
 * An 8-bit grayscale image.
 *
 * `data` is row-major with shape (height, width): the pixel in column
 * `col` and row `row` is `data[row * width + col]`, centred on the
 * pixel-space point (col, row).
 */
export type GrayscaleImage = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};
