/**
 * Vessel Class
 *
 * A single tapering tube: a Hermite centerline between two endpoints with
 * prescribed directions, and a width profile along its arc length.
 *
 * Vessels are created only by a VesselCanvas (roots) or by appending to a
 * declared end of another vessel (children). The canvas owns them; callers
 * hold references. Endpoints and directions are fixed at construction;
 * tapering and narrowing only change the width.
 */

import * as THREE from "three";
import type { BezierSplinePoint } from "../math/Bezier.js";
import {
  calcPointOnBezierInto,
  calcTangentToBezierInto,
} from "../math/Bezier.js";
import { createHermiteSegment } from "../math/Hermite.js";
import { ArcLengthTable } from "../math/ArcLength.js";
import { angleBetweenPoints } from "../math/Angle.js";
import type {
  AppendVesselOptions,
  CenterlineSample,
  Narrowing,
  Point2,
  VesselEnd,
} from "../types.js";
import { InvalidGeometryError, OutOfRangeError } from "./errors.js";
import { WidthProfile, assertWidth, narrowingSupport } from "./WidthProfile.js";

/**
 * Minimum number of centerline pieces per vessel, so short curved
 * vessels still render smoothly.
 */
const MIN_CENTERLINE_PIECES = 16;

/**
 * Owner of vessels. Assigns ids in creation order.
 */
export interface VesselRegistry {
  /** Number of registered vessels (the next id) */
  readonly size: number;
  register(vessel: Vessel): void;
}

/**
 * Endpoint geometry of a vessel.
 */
export type VesselGeometry = {
  from: Point2;
  to: Point2;
  /** Start direction in degrees */
  angleFrom: number;
  /** End direction in degrees */
  angleTo: number;
};

type EndRecord = {
  end: VesselEnd;
  consumedBy: Vessel | null;
};

function assertFinitePoint(point: Point2, label: string): void {
  if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
    throw new InvalidGeometryError(
      `[Vessel] ${label} must have finite coordinates, got (${point.x}, ${point.y})`,
    );
  }
}

function assertFiniteAngle(angle: number, label: string): void {
  if (!Number.isFinite(angle)) {
    throw new InvalidGeometryError(
      `[Vessel] ${label} must be a finite angle, got ${angle}`,
    );
  }
}

/**
 * Throw unless `t` is an arc-length fraction in [0, 1].
 */
function assertFraction(t: number, label: string): void {
  if (!(t >= 0 && t <= 1)) {
    throw new OutOfRangeError(
      `[Vessel] ${label} must be between 0 and 1, got ${t}`,
    );
  }
}

/**
 * Validate endpoint geometry, throwing InvalidGeometryError on degenerate input.
 */
export function validateGeometry(geometry: VesselGeometry): void {
  assertFinitePoint(geometry.from, "start point");
  assertFinitePoint(geometry.to, "end point");
  assertFiniteAngle(geometry.angleFrom, "start angle");
  assertFiniteAngle(geometry.angleTo, "end angle");
  if (geometry.from.x === geometry.to.x && geometry.from.y === geometry.to.y) {
    throw new InvalidGeometryError(
      `[Vessel] start and end points coincide at (${geometry.from.x}, ${geometry.from.y})`,
    );
  }
}

export class Vessel {
  /** Index in the owning canvas */
  readonly id: number;

  /** Vessel this one was appended to (null for roots) */
  readonly parent: Vessel | null;

  private readonly registry: VesselRegistry;
  private readonly startPoint: BezierSplinePoint;
  private readonly endPoint: BezierSplinePoint;
  private readonly arcLength: ArcLengthTable;
  private readonly profile = new WidthProfile();
  private readonly rootWidth: number;
  private readonly ends: EndRecord[] = [];
  private readonly childList: Vessel[] = [];

  readonly startAngle: number;
  readonly endAngle: number;

  /**
   * Create a vessel. Only a registry or a parent vessel should call this;
   * the new vessel is not registered here.
   *
   * @param width - Start width of a root vessel; ignored for children,
   *   whose start width follows the parent's terminus
   */
  constructor(
    registry: VesselRegistry,
    geometry: VesselGeometry,
    width: number,
    parent: Vessel | null = null,
  ) {
    validateGeometry(geometry);
    if (parent === null) {
      assertWidth(width);
    }

    const segment = createHermiteSegment(
      geometry.from,
      geometry.angleFrom,
      geometry.to,
      geometry.angleTo,
    );

    this.id = registry.size;
    this.registry = registry;
    this.parent = parent;
    this.startPoint = segment.start;
    this.endPoint = segment.end;
    this.startAngle = geometry.angleFrom;
    this.endAngle = geometry.angleTo;
    this.rootWidth = width;
    this.arcLength = new ArcLengthTable(segment.start, segment.end);
  }

  /** Start point of the centerline */
  get start(): THREE.Vector2 {
    return this.startPoint.co.clone();
  }

  /** End point of the centerline */
  get end(): THREE.Vector2 {
    return this.endPoint.co.clone();
  }

  /** Arc length of the centerline in pixels */
  get length(): number {
    return this.arcLength.totalLength;
  }

  /**
   * Start width. Children take the current width of their parent's terminus.
   */
  get startWidth(): number {
    return this.parent ? this.parent.widthAt(1) : this.rootWidth;
  }

  /**
   * End width of the baseline taper (before narrowings).
   */
  get endWidth(): number {
    return this.profile.taper ?? this.startWidth;
  }

  get narrowings(): readonly Narrowing[] {
    return this.profile.narrowings;
  }

  get children(): readonly Vessel[] {
    return this.childList;
  }

  /**
   * Declare a branch socket at the terminus.
   *
   * @param angleOffset - Degrees relative to the end tangent (0 = straight on)
   */
  addEnd(angleOffset = 0): VesselEnd {
    assertFiniteAngle(angleOffset, "end angle offset");
    const { x, y } = this.endPoint.co;
    const end: VesselEnd = Object.freeze({
      vesselId: this.id,
      index: this.ends.length,
      position: Object.freeze({ x, y }),
      angle: this.endAngle + angleOffset,
      angleOffset,
    });
    this.ends.push({ end, consumedBy: null });
    return end;
  }

  /**
   * All ends declared on this vessel, in declaration order.
   */
  getEnds(): readonly VesselEnd[] {
    return this.ends.map((record) => record.end);
  }

  isEndConsumed(end: VesselEnd): boolean {
    return this.resolveEnd(end).consumedBy !== null;
  }

  /**
   * Attach a child vessel to one of this vessel's ends.
   *
   * The child starts at the end's position and direction. Its start width
   * follows this vessel's width at the terminus; `width` is its end width.
   */
  appendVessel(options: AppendVesselOptions): Vessel {
    const record = this.resolveEnd(options.end);
    if (record.consumedBy !== null) {
      throw new InvalidGeometryError(
        `[Vessel] end ${record.end.index} of vessel ${this.id} is already used by vessel ${record.consumedBy.id}`,
      );
    }
    assertWidth(options.width);
    assertFinitePoint(options.pos, "end point");

    const from = record.end.position;
    const child = new Vessel(
      this.registry,
      {
        from,
        to: options.pos,
        angleFrom: record.end.angle,
        angleTo: options.angleTo ?? angleBetweenPoints(from, options.pos),
      },
      options.width,
      this,
    );
    child.profile.taperTo(options.width);

    this.registry.register(child);
    record.consumedBy = child;
    this.childList.push(child);
    return child;
  }

  /**
   * Taper linearly from the current start width to `endWidth`. Last call wins.
   */
  taperTo(endWidth: number): void {
    this.profile.taperTo(endWidth);
  }

  /**
   * Add a localized narrowing (stenosis).
   *
   * `loc` is the centre and `length` the extent of the affected stretch, both
   * as fractions of arc length. A stretch reaching past either end is clamped.
   */
  addNarrowing(narrowing: Narrowing): void {
    this.profile.addNarrowing(narrowing);
    const support = narrowingSupport(narrowing);
    if (support.clamped) {
      console.warn(
        `[Vessel] narrowing at ${narrowing.loc} with length ${narrowing.length} on vessel ${this.id} clamped to [${support.lo}, ${support.hi}]`,
      );
    }
  }

  /**
   * Width at arc-length fraction t, including narrowings.
   */
  widthAt(t: number): number {
    assertFraction(t, "width parameter");
    return this.profile.widthAt(this.startWidth, t);
  }

  /**
   * Centerline point at arc-length fraction t.
   */
  pointAt(t: number): THREE.Vector2 {
    assertFraction(t, "centerline parameter");
    return calcPointOnBezierInto(
      this.arcLength.paramAt(t),
      this.startPoint,
      this.endPoint,
      new THREE.Vector2(),
    );
  }

  /**
   * Unit tangent at arc-length fraction t.
   */
  tangentAt(t: number): THREE.Vector2 {
    assertFraction(t, "tangent parameter");
    return calcTangentToBezierInto(
      this.arcLength.paramAt(t),
      this.startPoint,
      this.endPoint,
      new THREE.Vector2(),
    ).normalize();
  }

  /**
   * Probe coordinate at arc-length fraction t, in pixel space.
   */
  getProbePoint(t: number): THREE.Vector2 {
    assertFraction(t, "probe parameter");
    return this.pointAt(t);
  }

  /**
   * Sample the centerline at even arc-length steps no longer than `spacing`.
   */
  sampleCenterline(spacing: number): CenterlineSample[] {
    const pieces = Math.max(
      MIN_CENTERLINE_PIECES,
      Math.ceil(this.length / spacing),
    );
    const startWidth = this.startWidth;
    const point = new THREE.Vector2();
    const samples: CenterlineSample[] = [];

    for (let i = 0; i <= pieces; i++) {
      const t = i / pieces;
      calcPointOnBezierInto(
        this.arcLength.paramAt(t),
        this.startPoint,
        this.endPoint,
        point,
      );
      samples.push({
        x: point.x,
        y: point.y,
        radius: this.profile.widthAt(startWidth, t) / 2,
      });
    }

    return samples;
  }

  private resolveEnd(end: VesselEnd): EndRecord {
    const record = this.ends[end.index];
    if (record === undefined || record.end !== end) {
      throw new InvalidGeometryError(
        `[Vessel] end ${end.index} of vessel ${end.vesselId} is not declared on vessel ${this.id}`,
      );
    }
    return record;
  }
}
