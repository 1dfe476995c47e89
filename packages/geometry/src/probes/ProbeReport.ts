/**
 * Probe records and the plain-text probe report.
 *
 * A report has one `name,x,y` line per probe, in the order given, with
 * coordinates in pixel space.
 */

import type * as THREE from "three";
import type { Vessel } from "../vessels/Vessel.js";

export type ProbeRecord = {
  name: string;
  point: THREE.Vector2;
};

/**
 * Probe a vessel at arc-length fraction t and label the result.
 */
export function probe(name: string, vessel: Vessel, t: number): ProbeRecord {
  return { name, point: vessel.getProbePoint(t) };
}

/**
 * Format probes as `name,x,y` lines, each terminated by a newline.
 */
export function formatProbeReport(records: readonly ProbeRecord[]): string {
  return records
    .map((record) => `${record.name},${record.point.x},${record.point.y}\n`)
    .join("");
}
