/**
 * Tests for the bifurcation preset.
 */

import { describe, it, expect } from "vitest";
import { buildBifurcation } from "../../src/presets/bifurcation.js";
import { pixelAt } from "../../src/rendering/image.js";
import { expectPointClose } from "../helpers.js";

describe("buildBifurcation", () => {
  it("splits the inlet into two branches", () => {
    const { canvas, inlet, narrowed, normal } = buildBifurcation({
      width: 400,
      height: 160,
      length: 80,
    });

    expect(canvas.size).toBe(3);
    expect(inlet.children).toEqual([narrowed, normal]);
    expect(narrowed.parent).toBe(inlet);
    expect(normal.parent).toBe(inlet);
  });

  it("lays the branches out to the right edge", () => {
    const { inlet, narrowed, normal } = buildBifurcation({
      width: 400,
      height: 160,
      length: 80,
    });

    expectPointClose(inlet.getProbePoint(0), { x: 0, y: 80 });
    expectPointClose(inlet.getProbePoint(1), { x: 80, y: 80 });
    expectPointClose(narrowed.getProbePoint(1), { x: 400, y: 40 });
    expectPointClose(normal.getProbePoint(1), { x: 400, y: 120 });
    expect(narrowed.startAngle).toBe(-20);
    expect(normal.startAngle).toBe(20);
    expect(narrowed.endAngle).toBe(0);
  });

  it("derives widths from the canvas height", () => {
    const { inlet, narrowed } = buildBifurcation({
      width: 400,
      height: 160,
      length: 80,
    });

    expect(inlet.widthAt(0)).toBe(16);
    expect(narrowed.startWidth).toBe(16);
    expect(narrowed.endWidth).toBeCloseTo(12.8, 12);
  });

  it("takes explicit angle and widths", () => {
    const { narrowed, normal } = buildBifurcation({
      width: 300,
      height: 100,
      length: 60,
      angle: 35,
      vesselWidth: 12,
      branchWidth: 6,
    });

    expect(narrowed.startAngle).toBe(-35);
    expect(normal.startAngle).toBe(35);
    expect(normal.startWidth).toBe(12);
    expect(normal.endWidth).toBe(6);
  });

  it("renders lumen along the inlet and both outlets", () => {
    const { canvas } = buildBifurcation({ width: 400, height: 160, length: 80 });
    const image = canvas.getImage();

    expect(pixelAt(image, 40, 80)).toBe(255);
    expect(pixelAt(image, 399, 40)).toBe(255);
    expect(pixelAt(image, 399, 120)).toBe(255);
    expect(pixelAt(image, 399, 80)).toBe(0);
    expect(pixelAt(image, 40, 20)).toBe(0);
  });
});
