/**
 * Bifurcation preset
 *
 * A straight inlet along the horizontal centre line splits into two
 * branches that leave the inlet at ±angle and reach the right edge
 * horizontally, one at a quarter and one at three quarters of the height.
 * The upper branch is the one meant to be narrowed.
 */

import type { Vessel } from "../vessels/Vessel.js";
import { VesselCanvas } from "../vessels/VesselCanvas.js";
import type { RenderConfig } from "../rendering/types.js";

export type BifurcationOptions = {
  /** Canvas width in pixels */
  width: number;
  /** Canvas height in pixels */
  height: number;
  /** Length of the inlet before the split */
  length: number;
  /** Branch angle away from the inlet direction, in degrees */
  angle?: number;
  /** Inlet width (default: height / 10) */
  vesselWidth?: number;
  /** End width of both branches (default: 0.8 * vesselWidth) */
  branchWidth?: number;
  render?: Partial<RenderConfig>;
};

export type Bifurcation = {
  canvas: VesselCanvas;
  /** Inlet vessel */
  inlet: Vessel;
  /** Upper branch */
  narrowed: Vessel;
  /** Lower branch */
  normal: Vessel;
};

/**
 * Build a single bifurcation.
 */
export function buildBifurcation(options: BifurcationOptions): Bifurcation {
  const { width, height, length, angle = 20 } = options;
  const vesselWidth = options.vesselWidth ?? height / 10;
  const branchWidth = options.branchWidth ?? vesselWidth * 0.8;

  const canvas = new VesselCanvas(width, height, options.render);
  const inlet = canvas.addVessel({
    from: { x: 0, y: height / 2 },
    to: { x: length, y: height / 2 },
    width: vesselWidth,
  });

  // Negative angles point towards the top edge
  const upperEnd = inlet.addEnd(-angle);
  const lowerEnd = inlet.addEnd(angle);

  const narrowed = inlet.appendVessel({
    end: upperEnd,
    pos: { x: width, y: height / 4 },
    width: branchWidth,
    angleTo: 0,
  });
  const normal = inlet.appendVessel({
    end: lowerEnd,
    pos: { x: width, y: (height * 3) / 4 },
    width: branchWidth,
    angleTo: 0,
  });

  return { canvas, inlet, narrowed, normal };
}
