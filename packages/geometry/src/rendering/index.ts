/**
 * Rasterization of vessel trees into grayscale images.
 */

export {
  rasterizeVessels,
  resolveRenderConfig,
  assertCanvasSize,
} from "./Rasterizer.js";
export { pixelAt, columnCoverage, rowCoverage, toRows } from "./image.js";
export {
  DEFAULT_RENDER_CONFIG,
  type RenderConfig,
  type GrayscaleImage,
} from "./types.js";
