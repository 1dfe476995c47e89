/**
 * Vessel geometry errors.
 *
 * Every error is raised by the call that receives the bad input, before
 * any state is touched.
 */

export type VesselErrorCode =
  | "INVALID_GEOMETRY"
  | "OUT_OF_RANGE"
  | "RENDER_FAILURE";

/**
 * Base class for all vessel geometry errors.
 * The `code` property identifies the kind of violation.
 */
export class VesselError extends Error {
  override readonly name: string = "VesselError";
  readonly code: VesselErrorCode;

  constructor(code: VesselErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Degenerate geometry: coincident endpoints, non-positive widths,
 * reuse of a consumed end.
 */
export class InvalidGeometryError extends VesselError {
  override readonly name = "InvalidGeometryError";

  constructor(message: string) {
    super("INVALID_GEOMETRY", message);
  }
}

/**
 * A normalized parameter outside [0, 1].
 */
export class OutOfRangeError extends VesselError {
  override readonly name = "OutOfRangeError";

  constructor(message: string) {
    super("OUT_OF_RANGE", message);
  }
}

/**
 * Canvas dimensions or render settings that cannot produce an image.
 */
export class RenderFailureError extends VesselError {
  override readonly name = "RenderFailureError";

  constructor(message: string) {
    super("RENDER_FAILURE", message);
  }
}
