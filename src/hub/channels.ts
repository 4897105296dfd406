import type { HubConfig } from "../config.js";
import { part } from "../dsl/core.js";
import { axisVector, booleanOp, extrude, profilePolygon, selectorNamed } from "../dsl/geometry.js";
import { ChannelPlacementError } from "../errors.js";
import type { Point2D, Point3D, Profile } from "../ir.js";
import { invertRigidMatrix, transformDirection, transformPoint } from "../transform.js";
import { add, dot, scale } from "../vec.js";
import type { ShellEnvelope, SlotBody } from "./feature_library.js";
import { oppositeSide, SIDE_ANGLES, SIDES, type Side } from "./hexagon.js";
import type { ResolvedSlot, SlotLabel, SlotPosition } from "./layout.js";

export type AdjacencyEdge = Readonly<{
  a: SlotLabel;
  b: SlotLabel;
  /** Side of `a` facing `b`. */
  sideA: Side;
  sideB: Side;
  distance: number;
}>;

export type ChannelCutout = Readonly<{
  edge: AdjacencyEdge;
  /** Unit vector from the center of `a` to the center of `b`. */
  axis: Point3D;
  /** World-space pentagon at the near end of the channel. */
  profile: Point3D[];
  length: number;
}>;

function angleBetween(a: number, b: number): number {
  const diff = Math.abs(a - b) % (2 * Math.PI);
  return Math.min(diff, 2 * Math.PI - diff);
}

function sideFacing(angle: number, tolerance: number): Side | null {
  for (const side of SIDES) {
    if (angleBetween(angle, (SIDE_ANGLES[side] * Math.PI) / 180) <= tolerance) return side;
  }
  return null;
}

/**
 * Pairs of slots sharing a wall: centers one grid pitch apart along one of
 * the six side normals. Edges are unordered and listed with `a < b`.
 */
export function computeAdjacency(
  config: HubConfig,
  positions: readonly SlotPosition[]
): AdjacencyEdge[] {
  const { rowPitch, neighborTolerance, angleTolerance } = config.grid;
  const sorted = [...positions].sort((p, q) => p.label - q.label);
  const edges: AdjacencyEdge[] = [];
  for (let i = 0; i < sorted.length; i += 1) {
    for (let j = i + 1; j < sorted.length; j += 1) {
      const a = sorted[i];
      const b = sorted[j];
      if (!a || !b || a.label === b.label) continue;
      const dx = b.translation[0] - a.translation[0];
      const dy = b.translation[1] - a.translation[1];
      const distance = Math.hypot(dx, dy);
      if (Math.abs(distance - rowPitch) > neighborTolerance) continue;
      const sideA = sideFacing(Math.atan2(dy, dx), angleTolerance);
      if (!sideA) continue;
      edges.push(
        Object.freeze({ a: a.label, b: b.label, sideA, sideB: oppositeSide(sideA), distance })
      );
    }
  }
  return edges;
}

// Wall top at local y, lowered by the slope toward the south edge and by the groove.
function wallTopAt(envelope: ShellEnvelope, y: number): number {
  const south = -envelope.outerApothem;
  const clamped = Math.max(y, south);
  const top =
    clamped >= envelope.slopeStartY
      ? envelope.wallTop
      : envelope.southWallTop +
        ((envelope.wallTop - envelope.southWallTop) * (clamped - south)) /
          (envelope.slopeStartY - south);
  return top - envelope.recessDepth;
}

/**
 * World-space cutter for one shared wall. The pentagon sits in the plane
 * perpendicular to the center axis and is swept across both walls and rims.
 */
export function planChannel(
  config: HubConfig,
  edge: AdjacencyEdge,
  a: ResolvedSlot,
  b: ResolvedSlot
): ChannelCutout {
  const { channel, grid, shell, hub } = config;
  const pair: readonly [number, number] = [edge.a, edge.b];
  const origin = a.position.translation;
  const target = b.position.translation;
  const dx = target[0] - origin[0];
  const dy = target[1] - origin[1];
  const distance = Math.hypot(dx, dy);
  if (distance === 0) {
    throw new ChannelPlacementError(pair, "slot centers coincide");
  }
  const u: Point3D = [dx / distance, dy / distance, 0];
  const t: Point3D = [-u[1], u[0], 0];
  const length = grid.clearance + 2 * (hub.wallThickness + shell.rimThickness + channel.wallOvershoot);
  const center: Point3D = add(
    [(origin[0] + target[0]) / 2, (origin[1] + target[1]) / 2, shell.floorHeight],
    scale(t, channel.tangentOffset)
  );
  const start = add(center, scale(u, -length / 2));
  const half = channel.width / 2;
  const corners: Point2D[] = [
    [-half, 0],
    [half, 0],
    [half, channel.sideHeight],
    [0, channel.height],
    [-half, channel.sideHeight],
  ];
  const profile = corners.map(([along, up]) => add(add(start, scale(t, along)), [0, 0, up]));

  for (const slot of [a, b]) {
    checkFit(config, pair, slot, start, u, t, length);
  }

  return Object.freeze({ edge, axis: u, profile, length });
}

function checkFit(
  config: HubConfig,
  pair: readonly [number, number],
  slot: ResolvedSlot,
  start: Point3D,
  u: Point3D,
  t: Point3D,
  length: number
): void {
  const envelope = slot.body.envelope;
  const label = slot.position.label;
  if (!envelope) {
    throw new ChannelPlacementError(pair, `slot ${label} has no shell`, { slot: label });
  }
  const half = config.channel.width / 2;
  const center = slot.position.translation;
  const rel: Point3D = [start[0] - center[0], start[1] - center[1], 0];

  // Projections onto the shared side normal (±u) and its tangent, measured from this slot.
  const alongStart = dot(rel, u);
  const alongEnd = alongStart + length;
  const near = Math.min(Math.abs(alongStart), Math.abs(alongEnd));
  const far = Math.max(Math.abs(alongStart), Math.abs(alongEnd));
  if (alongStart * alongEnd < 0 || near > envelope.innerApothem || far < envelope.rimApothem) {
    throw new ChannelPlacementError(pair, `does not cross the full wall of slot ${label}`, {
      slot: label,
      near,
      far,
      innerApothem: envelope.innerApothem,
      rimApothem: envelope.rimApothem,
    });
  }
  const offset = Math.abs(dot(rel, t));
  if (offset + half > envelope.innerRadius / 2) {
    throw new ChannelPlacementError(pair, `leaves the wall of slot ${label}`, {
      slot: label,
      offset,
      limit: envelope.innerRadius / 2,
    });
  }

  const inverse = invertRigidMatrix(slot.position.matrix);
  const top = config.shell.floorHeight + config.channel.height;
  for (const a of [0, length]) {
    for (const b of [-half, half]) {
      const corner = transformPoint(inverse, add(add(start, scale(u, a)), scale(t, b)));
      const limit = wallTopAt(envelope, corner[1]);
      if (top > limit) {
        throw new ChannelPlacementError(pair, `rises above the wall of slot ${label}`, {
          slot: label,
          top,
          limit,
        });
      }
    }
  }
}

function cutoutProfile(cutout: ChannelCutout, inverse: number[]): Profile {
  return profilePolygon(cutout.profile.map((point) => transformPoint(inverse, point)));
}

function cutChannel(slot: ResolvedSlot, cutout: ChannelCutout): ResolvedSlot {
  const { body, position } = slot;
  const inverse = invertRigidMatrix(position.matrix);
  const id = `channel-${cutout.edge.a}-${cutout.edge.b}`;
  const cutter = extrude(`${id}.cutter`, cutoutProfile(cutout, inverse), cutout.length, undefined, undefined, {
    axis: axisVector(transformDirection(inverse, cutout.axis)),
  });
  const result = booleanOp(id, "subtract", selectorNamed(body.output), selectorNamed(cutter.result));
  const next: SlotBody = Object.freeze({
    ...body,
    part: part(body.part.id, [...body.part.features, cutter, result]),
    output: result.result,
  });
  return Object.freeze({ position, body: next });
}

/** Subtract each cutout from both of its slots. Any cutout order gives the same solids. */
export function applyChannels(
  slots: readonly ResolvedSlot[],
  cutouts: readonly ChannelCutout[]
): ResolvedSlot[] {
  const byLabel = new Map<number, ResolvedSlot>(slots.map((slot) => [slot.position.label, slot]));
  for (const cutout of cutouts) {
    for (const label of [cutout.edge.a, cutout.edge.b]) {
      const slot = byLabel.get(label);
      if (!slot) {
        throw new ChannelPlacementError([cutout.edge.a, cutout.edge.b], `slot ${label} is not placed`, {
          slot: label,
        });
      }
      byLabel.set(label, cutChannel(slot, cutout));
    }
  }
  return slots.map((slot) => byLabel.get(slot.position.label) ?? slot);
}

export function planChannels(
  config: HubConfig,
  slots: readonly ResolvedSlot[],
  edges: readonly AdjacencyEdge[] = computeAdjacency(
    config,
    slots.map((slot) => slot.position)
  )
): ChannelCutout[] {
  const byLabel = new Map<number, ResolvedSlot>(slots.map((slot) => [slot.position.label, slot]));
  return edges.map((edge) => {
    const a = byLabel.get(edge.a);
    const b = byLabel.get(edge.b);
    if (!a || !b) {
      throw new ChannelPlacementError([edge.a, edge.b], "edge names a slot that is not placed");
    }
    return planChannel(config, edge, a, b);
  });
}

export function synthesizeChannels(config: HubConfig, slots: readonly ResolvedSlot[]): ResolvedSlot[] {
  return applyChannels(slots, planChannels(config, slots));
}
