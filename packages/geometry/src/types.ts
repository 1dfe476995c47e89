/**
 * Shared types for vessel geometry.
 *
 * Coordinates are in pixel space: x grows to the right, y grows downward,
 * and pixel (col, row) is centred on the point (col, row). Angles are in
 * degrees measured from +x towards +y, so -90 points to the top edge.
 */

/**
 * A 2D point in pixel space. THREE.Vector2 satisfies it.
 */
export type Point2 = {
  readonly x: number;
  readonly y: number;
};

/**
 * A localized multiplicative narrowing (stenosis) of a vessel's width.
 */
export type Narrowing = {
  /** Centre of the support as a fraction of arc length (0-1) */
  loc: number;
  /** Length of the support as a fraction of arc length (0-1) */
  length: number;
  /** Width factor reached at the centre (0-1) */
  scale: number;
};

/**
 * A branch socket declared on the terminus of a vessel.
 *
 * Ends are plain records; the owning vessel tracks which ones have been
 * consumed by a child.
 */
export type VesselEnd = {
  /** Id of the vessel that declared this end */
  readonly vesselId: number;
  /** Index of the end on its vessel */
  readonly index: number;
  /** Socket position (the vessel's end point), frozen */
  readonly position: Point2;
  /** Outward direction in degrees */
  readonly angle: number;
  /** Offset from the vessel's end tangent in degrees */
  readonly angleOffset: number;
};

/**
 * Options for creating a root vessel on a canvas.
 */
export type AddVesselOptions = {
  from: Point2;
  to: Point2;
  /** Uniform starting width; the end width follows until tapered */
  width: number;
  /** Start direction in degrees (defaults to the straight-line direction) */
  angleFrom?: number;
  /** End direction in degrees (defaults to the straight-line direction) */
  angleTo?: number;
};

/**
 * Options for attaching a child vessel to a declared end.
 */
export type AppendVesselOptions = {
  end: VesselEnd;
  pos: Point2;
  /** End width of the child; the start width follows the parent */
  width: number;
  angleTo?: number;
};

/**
 * A centerline sample used by the rasterizer.
 */
export type CenterlineSample = {
  x: number;
  y: number;
  /** Half of the local width */
  radius: number;
};
