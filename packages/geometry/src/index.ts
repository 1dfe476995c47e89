/**
 * @vesselforge/geometry
 *
 * Parametric 2D vessel trees: tapering tube segments with Hermite
 * centerlines, localized narrowings and branch sockets, rendered into
 * grayscale images and sampled with probe points.
 */

export * from "./vessels/index.js";
export * from "./rendering/index.js";
export * from "./probes/index.js";
export * from "./presets/index.js";
export * from "./sweep/index.js";
export * from "./math/index.js";
export type {
  Point2,
  Narrowing,
  VesselEnd,
  AddVesselOptions,
  AppendVesselOptions,
  CenterlineSample,
} from "./types.js";
