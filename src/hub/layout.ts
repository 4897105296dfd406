import type { HubConfig } from "../config.js";
import { UnknownAssemblyType, UnknownSlot } from "../errors.js";
import type { Point3D } from "../ir.js";
import { matrixFromTranslation, type Matrix4 } from "../transform.js";
import {
  CONNECTOR_SIDES,
  type ConnectorSide,
  type FeatureLibrary,
  type SlotBody,
} from "./feature_library.js";
import { createVariantCache, type SlotVariant } from "./variants.js";

export type AssemblyType = "A" | "B";

export type SlotLabel = 1 | 2 | 3 | 4 | 5 | 6;

export type SlotAssignment = Readonly<{
  row: 0 | 1;
  column: 0 | 1 | 2;
  variant: SlotVariant;
}>;

/** A male rail on one slot and the socket that takes it on the neighbor. */
export type RailPair = Readonly<{
  male: Readonly<{ slot: SlotLabel; side: "NE" | "NW" }>;
  female: Readonly<{ slot: SlotLabel; side: "SE" | "SW" }>;
}>;

export type AssemblyLayout = Readonly<{
  type: AssemblyType;
  /** Direction of the middle-column shift along +Y: raised (A) or lowered (B). */
  columnOffsetSign: 1 | -1;
  slots: Readonly<Record<SlotLabel, SlotAssignment>>;
  rails: readonly RailPair[];
}>;

export type SlotPosition = Readonly<{
  label: SlotLabel;
  row: 0 | 1;
  column: 0 | 1 | 2;
  /** Signed shift applied to y: +h, -h or 0. */
  columnOffset: number;
  translation: Point3D;
  matrix: Matrix4;
  variant: SlotVariant;
  /** Rail walls of this slot, in wall order. */
  connectors: readonly ConnectorSide[];
}>;

export type ResolvedSlot = Readonly<{
  position: SlotPosition;
  body: SlotBody;
}>;

export const SLOT_LABELS: readonly SlotLabel[] = Object.freeze([1, 2, 3, 4, 5, 6]);

// Labels run row-major: 1-3 on the top row, 4-6 below.
const GRID: Readonly<Record<SlotLabel, { row: 0 | 1; column: 0 | 1 | 2 }>> = {
  1: { row: 0, column: 0 },
  2: { row: 0, column: 1 },
  3: { row: 0, column: 2 },
  4: { row: 1, column: 0 },
  5: { row: 1, column: 1 },
  6: { row: 1, column: 2 },
};

function layoutFor(
  type: AssemblyType,
  columnOffsetSign: 1 | -1,
  variants: Partial<Record<SlotLabel, SlotVariant>>,
  rails: RailPair[]
): AssemblyLayout {
  const slot = (label: SlotLabel): SlotAssignment =>
    Object.freeze({ ...GRID[label], variant: variants[label] ?? "basic" });
  const slots = { 1: slot(1), 2: slot(2), 3: slot(3), 4: slot(4), 5: slot(5), 6: slot(6) };
  return Object.freeze({
    type,
    columnOffsetSign,
    slots: Object.freeze(slots),
    rails: Object.freeze(rails.map((pair) => Object.freeze(pair))),
  });
}

const rail = (
  male: SlotLabel,
  maleSide: "NE" | "NW",
  female: SlotLabel,
  femaleSide: "SE" | "SW"
): RailPair => ({ male: { slot: male, side: maleSide }, female: { slot: female, side: femaleSide } });

export const ASSEMBLY_LAYOUTS: Readonly<Record<AssemblyType, AssemblyLayout>> = Object.freeze({
  A: layoutFor("A", 1, { 2: "controller", 3: "usb" }, [
    rail(5, "NE", 3, "SW"),
    rail(5, "NW", 1, "SE"),
  ]),
  B: layoutFor("B", -1, { 5: "controller", 3: "usb" }, [
    rail(4, "NE", 2, "SW"),
    rail(6, "NW", 2, "SE"),
  ]),
});

/**
 * Rails per slot. A pair whose socket would sit on the USB wall is dropped
 * on both slots, so no pin runs into a wall without a socket.
 */
function slotConnectors(
  config: HubConfig,
  layout: AssemblyLayout
): Record<SlotLabel, ConnectorSide[]> {
  const out: Record<SlotLabel, ConnectorSide[]> = { 1: [], 2: [], 3: [], 4: [], 5: [], 6: [] };
  for (const pair of layout.rails) {
    const host = layout.slots[pair.female.slot];
    if (host.variant === "usb" && pair.female.side === config.usb.wallSide) continue;
    out[pair.male.slot].push(pair.male.side);
    out[pair.female.slot].push(pair.female.side);
  }
  for (const label of SLOT_LABELS) {
    out[label].sort((a, b) => CONNECTOR_SIDES.indexOf(a) - CONNECTOR_SIDES.indexOf(b));
  }
  return out;
}

export function isAssemblyType(value: string): value is AssemblyType {
  return value === "A" || value === "B";
}

/** Accepts `A`, `b`, `type-a`, `Type B` and similar spellings. */
export function parseAssemblyType(text: string): AssemblyType {
  const normalized = text.trim().toUpperCase().replace(/^TYPE[\s_-]*/, "");
  if (isAssemblyType(normalized)) return normalized;
  throw new UnknownAssemblyType(text);
}

export function slotPositions(config: HubConfig, type: string): SlotPosition[] {
  if (!isAssemblyType(type)) throw new UnknownAssemblyType(type);
  const layout = ASSEMBLY_LAYOUTS[type];
  const { columnPitch, rowPitch, columnOffset } = config.grid;
  const connectors = slotConnectors(config, layout);
  return SLOT_LABELS.map((label) => {
    const { row, column, variant } = layout.slots[label];
    const offset = column === 1 ? layout.columnOffsetSign * columnOffset : 0;
    const translation: Point3D = [column * columnPitch, -row * rowPitch + offset, 0];
    return Object.freeze({
      label,
      row,
      column,
      columnOffset: offset,
      translation,
      matrix: matrixFromTranslation(translation),
      variant,
      connectors: Object.freeze(connectors[label]),
    });
  });
}

/**
 * Place the six slots of an assembly type. Each distinct variant and rail
 * combination is composed once per call and shared by every slot that uses it.
 */
export function resolveAssembly(
  config: HubConfig,
  library: FeatureLibrary,
  type: string
): ResolvedSlot[] {
  const positions = slotPositions(config, type);
  const variants = createVariantCache(library);
  return positions.map((position) => {
    const body = variants.get(position.variant, position.connectors);
    return Object.freeze({
      position,
      body: Object.freeze({
        ...body,
        part: { ...body.part, id: `slot-${position.label}` },
      }),
    });
  });
}

export function positionOf(slots: readonly ResolvedSlot[], label: number): SlotPosition {
  const hit = slots.find((slot) => slot.position.label === label);
  if (!hit) throw new UnknownSlot(label);
  return hit.position;
}
