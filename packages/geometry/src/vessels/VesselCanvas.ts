/**
 * Vessel Canvas
 *
 * Owns a fixed-size pixel canvas and every vessel drawn on it. Roots are
 * added here; children are appended to declared ends of existing vessels
 * and registered back with the canvas. The tree only grows.
 *
 * @example
 * ```typescript
 * const canvas = new VesselCanvas(400, 160);
 * const inlet = canvas.addVessel({ from: { x: 0, y: 80 }, to: { x: 80, y: 80 }, width: 16 });
 * const straight = inlet.addEnd(0);
 * const outlet = inlet.appendVessel({ end: straight, pos: { x: 400, y: 80 }, width: 16 });
 * outlet.addNarrowing({ loc: 0.5, length: 0.4, scale: 0.3 });
 *
 * const image = canvas.getImage();
 * const probe = outlet.getProbePoint(0.5);
 * ```
 */

import { angleBetweenPoints } from "../math/Angle.js";
import {
  assertCanvasSize,
  rasterizeVessels,
  resolveRenderConfig,
} from "../rendering/Rasterizer.js";
import type { GrayscaleImage, RenderConfig } from "../rendering/types.js";
import type { AddVesselOptions } from "../types.js";
import { Vessel, type VesselRegistry } from "./Vessel.js";

export class VesselCanvas implements VesselRegistry {
  /** Canvas width in pixels */
  readonly width: number;

  /** Canvas height in pixels */
  readonly height: number;

  private readonly config: RenderConfig;
  private readonly vessels: Vessel[] = [];

  /**
   * @throws RenderFailureError if the size is not a positive integer pair
   *   or the render config is unusable
   */
  constructor(
    width: number,
    height: number,
    config: Partial<RenderConfig> = {},
  ) {
    assertCanvasSize(width, height);
    this.width = width;
    this.height = height;
    this.config = resolveRenderConfig(config);
  }

  /** Number of vessels on the canvas */
  get size(): number {
    return this.vessels.length;
  }

  /**
   * Effective render settings.
   */
  getRenderConfig(): RenderConfig {
    return { ...this.config };
  }

  /**
   * Add a root vessel. Omitted angles follow the straight line between
   * the two points.
   */
  addVessel(options: AddVesselOptions): Vessel {
    const straight = angleBetweenPoints(options.from, options.to);
    const vessel = new Vessel(
      this,
      {
        from: options.from,
        to: options.to,
        angleFrom: options.angleFrom ?? straight,
        angleTo: options.angleTo ?? straight,
      },
      options.width,
    );
    this.register(vessel);
    return vessel;
  }

  /**
   * Record a vessel created on this canvas. Called by Vessel.appendVessel.
   */
  register(vessel: Vessel): void {
    if (vessel.id !== this.vessels.length) {
      throw new Error(
        `[VesselCanvas] vessel ${vessel.id} registered out of order (expected ${this.vessels.length})`,
      );
    }
    this.vessels.push(vessel);
  }

  getVessel(id: number): Vessel | undefined {
    return this.vessels[id];
  }

  /**
   * All vessels in creation order.
   */
  getVessels(): readonly Vessel[] {
    return this.vessels;
  }

  /**
   * Vessels without a parent.
   */
  getRoots(): Vessel[] {
    return this.vessels.filter((vessel) => vessel.parent === null);
  }

  /**
   * Render every vessel into a new (height, width) grayscale image.
   */
  getImage(): GrayscaleImage {
    return rasterizeVessels(this.vessels, this.width, this.height, this.config);
  }
}
