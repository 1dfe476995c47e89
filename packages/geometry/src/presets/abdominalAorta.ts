/**
 * Abdominal aorta preset
 *
 * An idealized, flattened abdominal aorta from the supraceliac aorta down
 * to the iliac bifurcation, with the celiac, superior and inferior
 * mesenteric, renal and iliac arteries. Lengths and diameters are in
 * centimetres and scaled to pixels; the layout follows the abdominal aorta
 * model of Taylor, Hughes & Zarins (Annals of Biomedical Engineering,
 * 1998) with CT-based aortoiliac diameters.
 */

import type { Vessel } from "../vessels/Vessel.js";
import { VesselCanvas } from "../vessels/VesselCanvas.js";

/** Diameters in cm */
const DIAMETER = {
  supraceliacAorta: 2.07,
  aortaStart: 1.75,
  aortaEnd: 1.6,
  celiac: 0.78,
  renal: 0.5,
  superiorMesenteric: 0.7,
  inferiorMesenteric: 0.4,
  iliac: 1.04,
} as const;

/** Positions along the aorta in cm */
const POSITION = {
  celiac: 1,
  renal: 4,
  bifurcation: 11,
  superiorMesenteric: 3,
  inferiorMesenteric: 8,
} as const;

/** Canvas size in cm */
const CANVAS_CM = { width: 15, height: 6 } as const;

/** Sideways shift of side branch origins into the aorta wall, in cm */
const WALL_INSET = 0.3;

export type AbdominalArtery =
  | "supraceliacAorta"
  | "aorta"
  | "celiac"
  | "superiorMesenteric"
  | "leftRenal"
  | "rightRenal"
  | "inferiorMesenteric"
  | "leftIliac"
  | "rightIliac";

export type AbdominalAorta = {
  canvas: VesselCanvas;
  arteries: Record<AbdominalArtery, Vessel>;
};

/**
 * Build the abdominal aorta model.
 *
 * @param scale - Pixels per centimetre. The canvas size is rounded to
 *   whole pixels.
 */
export function buildAbdominalAorta(scale = 10): AbdominalAorta {
  const width = Math.round(scale * CANVAS_CM.width);
  const height = Math.round(scale * CANVAS_CM.height);
  const mid = height / 2;

  const aortaTop =
    mid -
    (Math.min(DIAMETER.aortaStart, DIAMETER.aortaEnd) * scale) / 2 +
    WALL_INSET * scale;

  const canvas = new VesselCanvas(width, height);

  const supraceliacAorta = canvas.addVessel({
    from: { x: 0, y: mid },
    to: { x: POSITION.renal * scale, y: mid },
    width: DIAMETER.supraceliacAorta * scale,
  });
  const renalLeftEnd = supraceliacAorta.addEnd(30);
  const aortaEnd = supraceliacAorta.addEnd(0);
  const renalRightEnd = supraceliacAorta.addEnd(-30);

  const aorta = supraceliacAorta.appendVessel({
    end: aortaEnd,
    pos: { x: POSITION.bifurcation * scale, y: mid },
    width: DIAMETER.aortaStart * scale,
  });
  aorta.taperTo(DIAMETER.aortaEnd * scale);
  const iliacLeftEnd = aorta.addEnd(30);
  const iliacRightEnd = aorta.addEnd(-30);

  const leftIliac = aorta.appendVessel({
    end: iliacLeftEnd,
    pos: { x: width, y: 5 * scale },
    width: DIAMETER.iliac * scale,
  });
  const rightIliac = aorta.appendVessel({
    end: iliacRightEnd,
    pos: { x: width, y: 1 * scale },
    width: DIAMETER.iliac * scale,
  });

  const celiac = canvas.addVessel({
    from: { x: POSITION.celiac * scale, y: aortaTop - WALL_INSET * scale },
    to: { x: (POSITION.celiac + 1) * scale, y: 0 },
    width: DIAMETER.celiac * scale,
    angleFrom: -50,
    angleTo: -90,
  });

  const leftRenal = supraceliacAorta.appendVessel({
    end: renalLeftEnd,
    pos: { x: (POSITION.renal + 2.5) * scale, y: height },
    width: DIAMETER.renal * scale,
    angleTo: 90,
  });
  const rightRenal = supraceliacAorta.appendVessel({
    end: renalRightEnd,
    pos: { x: (POSITION.renal + 2.5) * scale, y: 0 },
    width: DIAMETER.renal * scale,
    angleTo: -90,
  });

  const superiorMesenteric = canvas.addVessel({
    from: {
      x: POSITION.superiorMesenteric * scale,
      y: aortaTop - WALL_INSET * scale,
    },
    to: { x: (POSITION.superiorMesenteric + 0.9) * scale, y: 0 },
    width: DIAMETER.superiorMesenteric * scale,
    angleFrom: -40,
    angleTo: -90,
  });
  const inferiorMesenteric = canvas.addVessel({
    from: { x: POSITION.inferiorMesenteric * scale, y: aortaTop },
    to: { x: (POSITION.inferiorMesenteric + 1) * scale, y: 0 },
    width: DIAMETER.inferiorMesenteric * scale,
    angleFrom: -60,
    angleTo: -90,
  });

  return {
    canvas,
    arteries: {
      supraceliacAorta,
      aorta,
      celiac,
      superiorMesenteric,
      leftRenal,
      rightRenal,
      inferiorMesenteric,
      leftIliac,
      rightIliac,
    },
  };
}
