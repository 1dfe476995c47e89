/**
 * Stenosis Sweep
 *
 * Renders a series of bifurcations whose upper branch is narrowed by an
 * increasing amount, plus the probe points of the unnarrowed geometry.
 * Writing the frames and the probe report to disk is up to the caller.
 */

import { buildBifurcation } from "../presets/bifurcation.js";
import { probe, type ProbeRecord } from "../probes/ProbeReport.js";
import type { GrayscaleImage } from "../rendering/types.js";
import { OutOfRangeError } from "../vessels/errors.js";

export type StenosisSweepOptions = {
  /** Canvas width in pixels */
  width: number;
  /** Canvas height in pixels */
  height: number;
  /** Number of frames */
  count: number;
  /** Narrowing scale of the first frame */
  min: number;
  /** Narrowing scale of the last frame */
  max: number;
  /** Branch angle in degrees */
  angle: number;
};

export const DEFAULT_SWEEP_OPTIONS: StenosisSweepOptions = {
  width: 400,
  height: 160,
  count: 10,
  min: 0.0,
  max: 0.9,
  angle: 20,
};

/** Narrowing applied to the upper branch, apart from its scale */
export const SWEEP_NARROWING = { loc: 0.5, length: 0.4 } as const;

export type SweepFrame = {
  /** Narrowing scale of this frame */
  scale: number;
  /** Suggested file name */
  name: string;
  image: GrayscaleImage;
};

export type StenosisSweep = {
  frames: SweepFrame[];
  probes: ProbeRecord[];
};

/**
 * `count` evenly spaced values from `min` to `max` inclusive.
 */
export function linspace(min: number, max: number, count: number): number[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new OutOfRangeError(
      `[StenosisSweep] frame count must be a positive integer, got ${count}`,
    );
  }
  if (count === 1) return [min];

  const step = (max - min) / (count - 1);
  return Array.from({ length: count }, (_, i) =>
    i === count - 1 ? max : min + step * i,
  );
}

/**
 * File name of a sweep frame.
 */
export function frameName(scale: number): string {
  return `bifurcation_${scale.toFixed(4)}.png`;
}

/**
 * Render every frame of the sweep and probe the unnarrowed bifurcation.
 */
export function generateStenosisSweep(
  options: Partial<StenosisSweepOptions> = {},
): StenosisSweep {
  const { width, height, count, min, max, angle } = {
    ...DEFAULT_SWEEP_OPTIONS,
    ...options,
  };
  const scales = linspace(min, max, count);
  const shape = { width, height, length: width / 5, angle };

  const frames = scales.map((scale): SweepFrame => {
    const { canvas, narrowed } = buildBifurcation(shape);
    narrowed.addNarrowing({ ...SWEEP_NARROWING, scale });
    return { scale, name: frameName(scale), image: canvas.getImage() };
  });

  const { inlet, narrowed, normal } = buildBifurcation(shape);
  const probes = [
    probe("inlet", inlet, 0.3),
    probe("normal vein", normal, 0.8),
    probe("start narrow vein", narrowed, 0.2),
    probe("end narrow vein", narrowed, 0.8),
  ];

  return { frames, probes };
}
