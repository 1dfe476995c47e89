/**
 * Vessel tree: canvas, vessels, width profiles and errors.
 */

export { VesselCanvas } from "./VesselCanvas.js";
export {
  Vessel,
  validateGeometry,
  type VesselGeometry,
  type VesselRegistry,
} from "./Vessel.js";
export {
  WidthProfile,
  lerp,
  assertWidth,
  validateNarrowing,
  narrowingSupport,
  narrowingFactor,
  type NarrowingSupport,
} from "./WidthProfile.js";
export {
  VesselError,
  InvalidGeometryError,
  OutOfRangeError,
  RenderFailureError,
  type VesselErrorCode,
} from "./errors.js";
