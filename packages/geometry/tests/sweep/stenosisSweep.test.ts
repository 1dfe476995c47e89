/**
 * Tests for the stenosis sweep.
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_SWEEP_OPTIONS,
  frameName,
  generateStenosisSweep,
  linspace,
} from "../../src/sweep/StenosisSweep.js";
import { buildBifurcation } from "../../src/presets/bifurcation.js";
import { pixelAt } from "../../src/rendering/image.js";
import { OutOfRangeError } from "../../src/vessels/errors.js";
import { expectPointClose } from "../helpers.js";

describe("linspace", () => {
  it("includes both ends", () => {
    const values = linspace(0, 0.9, 10);

    expect(values).toHaveLength(10);
    expect(values[0]).toBe(0);
    expect(values[3]).toBeCloseTo(0.3, 12);
    expect(values[9]).toBe(0.9);
  });

  it("returns the minimum for a single value", () => {
    expect(linspace(0.2, 0.8, 1)).toEqual([0.2]);
  });

  it("rejects counts below one", () => {
    expect(() => linspace(0, 1, 0)).toThrow(OutOfRangeError);
    expect(() => linspace(0, 1, 2.5)).toThrow(OutOfRangeError);
  });
});

describe("frameName", () => {
  it("formats the scale with four decimals", () => {
    expect(frameName(0.1)).toBe("bifurcation_0.1000.png");
    expect(frameName(0)).toBe("bifurcation_0.0000.png");
  });
});

describe("generateStenosisSweep", () => {
  const options = { width: 200, height: 80, count: 3, min: 0, max: 0.8 };

  it("renders one frame per scale", () => {
    const { frames } = generateStenosisSweep(options);

    expect(frames.map((f) => f.name)).toEqual([
      "bifurcation_0.0000.png",
      "bifurcation_0.4000.png",
      "bifurcation_0.8000.png",
    ]);
    for (const frame of frames) {
      expect(frame.image.width).toBe(200);
      expect(frame.image.height).toBe(80);
    }
  });

  it("narrows the upper branch more at lower scales", () => {
    const { frames } = generateStenosisSweep(options);
    const { narrowed } = buildBifurcation({
      width: 200,
      height: 80,
      length: 40,
    });
    const centre = narrowed.getProbePoint(0.5);
    const col = Math.round(centre.x);
    const row = Math.round(centre.y);

    const closed = pixelAt(frames[0].image, col, row);
    const open = pixelAt(frames[2].image, col, row);

    expect(open).toBe(255);
    expect(closed).toBeLessThan(open);
  });

  it("leaves the lower branch alone", () => {
    const { frames } = generateStenosisSweep(options);
    const { normal } = buildBifurcation({ width: 200, height: 80, length: 40 });
    const centre = normal.getProbePoint(0.5);
    const col = Math.round(centre.x);
    const row = Math.round(centre.y);

    for (const frame of frames) {
      expect(pixelAt(frame.image, col, row)).toBe(255);
    }
  });

  it("probes the unnarrowed bifurcation", () => {
    const { probes } = generateStenosisSweep(options);

    expect(probes.map((p) => p.name)).toEqual([
      "inlet",
      "normal vein",
      "start narrow vein",
      "end narrow vein",
    ]);
    expectPointClose(probes[0].point, { x: 12, y: 40 });
  });

  it("sweeps 400x160 bifurcations from 0 to 0.9 by default", () => {
    expect(DEFAULT_SWEEP_OPTIONS).toEqual({
      width: 400,
      height: 160,
      count: 10,
      min: 0,
      max: 0.9,
      angle: 20,
    });
  });
});
