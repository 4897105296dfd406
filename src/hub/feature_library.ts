import type { HubConfig, HubDimensions, ShellConfig, UsbWallSide } from "../config.js";
import {
  axisVector,
  booleanOp,
  cone,
  extrude,
  profileCircle,
  profilePolygon,
  profileRect,
  selectorNamed,
} from "../dsl/geometry.js";
import { part } from "../dsl/core.js";
import { InvalidPlacement, UnknownFeature } from "../errors.js";
import type {
  BooleanOp,
  ExtrudeAxis,
  IntentFeature,
  IntentPart,
  Point2D,
  Point3D,
  Profile,
} from "../ir.js";
import {
  circleInsideHexagon,
  hexagonProfile,
  rotate2d,
  sideNormal,
  type Side,
} from "./hexagon.js";

export type FeatureKind =
  | "base-shell"
  | "floor-holes"
  | "magnet-bosses"
  | "pogo-bosses"
  | "controller-bosses"
  | "usb-bosses"
  | "usb-cutout"
  | "connector-ne"
  | "connector-nw"
  | "connector-se"
  | "connector-sw";

/** Walls that can carry a side rail: male on NE/NW, female on SE/SW. */
export type ConnectorSide = "NE" | "NW" | "SE" | "SW";

export const CONNECTOR_SIDES: readonly ConnectorSide[] = Object.freeze(["NE", "NW", "SE", "SW"]);

export const CONNECTOR_FEATURES: Readonly<Record<ConnectorSide, FeatureKind>> = Object.freeze({
  NE: "connector-ne",
  NW: "connector-nw",
  SE: "connector-se",
  SW: "connector-sw",
});

/** Male rail: a pin swept along +Y, trimmed to the wall and beyond. */
export type RailParameters = {
  side: "NE" | "NW";
  /** Pin start on the XY plane. */
  anchor: Point2D;
  /** Cross-section in the XZ plane, relative to the anchor. */
  profile: Point2D[];
  length: number;
};

/** Female rail: a housing block trimmed to the slot with a socket for the mating pin. */
export type SocketParameters = {
  side: "SE" | "SW";
  /** Housing center on the XY plane. */
  center: Point2D;
  housingWidth: number;
  housingDepth: number;
  housingHeight: number;
  /** Pin cross-section grown by the clearance. */
  profile: Point2D[];
  /** Y range of the socket cut. */
  yStart: number;
  yEnd: number;
};

export type FeatureEffect = "base" | "additive" | "subtractive";

export type FeaturePhase = "shell" | "structural" | "connector" | "cutout";

export const PHASE_RANK: Readonly<Record<FeaturePhase, number>> = Object.freeze({
  shell: 0,
  structural: 1,
  connector: 2,
  cutout: 3,
});

/** Pillars with optional center holes, standing on the floor. */
export type PillarParameters = {
  positions: Point2D[];
  outerRadius: number;
  height: number;
  holeRadius: number;
  /** Z where the hole starts; defaults to the floor top. */
  holeStart?: number;
  /** Hole length above `holeStart`. */
  holeDepth: number;
};

export type FeatureParameters = {
  "base-shell": { hub: HubDimensions; shell: ShellConfig };
  "floor-holes": {
    count: number;
    distance: number;
    radius: number;
    /** Countersink width on the underside. */
    chamfer: number;
    positions: Point2D[];
  };
  "magnet-bosses": {
    positions: Point2D[];
    outerRadius: number;
    innerRadius: number;
    baseHeight: number;
    rimHeight: number;
  };
  "pogo-bosses": PillarParameters;
  "controller-bosses": PillarParameters;
  "usb-bosses": PillarParameters;
  "usb-cutout": {
    side: UsbWallSide;
    /** Rotation about +Z from the south wall, in radians. */
    angle: number;
    width: number;
    height: number;
    cornerRadius: number;
    top: number;
    /** Y range of the through-cut on the south wall, outside to inside. */
    yStart: number;
    yEnd: number;
  };
  "connector-ne": RailParameters;
  "connector-nw": RailParameters;
  "connector-se": SocketParameters;
  "connector-sw": SocketParameters;
};

export type Feature<K extends FeatureKind = FeatureKind> = Readonly<{
  kind: K;
  effect: FeatureEffect;
  phase: FeaturePhase;
  parameters: Readonly<FeatureParameters[K]>;
}>;

export type AnyFeature = { [K in FeatureKind]: Feature<K> }[FeatureKind];

const TRAITS: Readonly<Record<FeatureKind, { effect: FeatureEffect; phase: FeaturePhase }>> =
  Object.freeze({
    "base-shell": { effect: "base", phase: "shell" },
    "floor-holes": { effect: "subtractive", phase: "structural" },
    "magnet-bosses": { effect: "additive", phase: "structural" },
    "pogo-bosses": { effect: "additive", phase: "structural" },
    "controller-bosses": { effect: "additive", phase: "connector" },
    "usb-bosses": { effect: "additive", phase: "connector" },
    "usb-cutout": { effect: "subtractive", phase: "cutout" },
    "connector-ne": { effect: "additive", phase: "connector" },
    "connector-nw": { effect: "additive", phase: "connector" },
    "connector-se": { effect: "subtractive", phase: "connector" },
    "connector-sw": { effect: "subtractive", phase: "connector" },
  });

export const FEATURE_KINDS: readonly FeatureKind[] = Object.freeze(
  Object.keys(TRAITS).filter(isFeatureKind)
);

export function isFeatureKind(kind: string): kind is FeatureKind {
  return Object.prototype.hasOwnProperty.call(TRAITS, kind);
}

/** Shell measurements later features and channels check their placement against. */
export type ShellEnvelope = Readonly<{
  outerApothem: number;
  innerApothem: number;
  innerRadius: number;
  rimApothem: number;
  floorHeight: number;
  wallHeight: number;
  wallTop: number;
  southWallTop: number;
  slopeStartY: number;
  recessDepth: number;
}>;

/**
 * Value handle on a slot recipe. `output` names the feature result that
 * currently represents the whole body.
 */
export type SlotBody = Readonly<{
  part: IntentPart;
  output: string;
  applied: readonly FeatureKind[];
  envelope: ShellEnvelope | null;
}>;

export function emptySlotBody(id = "slot"): SlotBody {
  return Object.freeze({ part: part(id, []), output: "", applied: [], envelope: null });
}

export function defineFeature<K extends FeatureKind>(
  kind: K,
  parameters: FeatureParameters[K]
): Feature<K> {
  if (!isFeatureKind(kind)) throw new UnknownFeature(kind);
  const traits = TRAITS[kind];
  return deepFreeze({
    kind,
    effect: traits.effect,
    phase: traits.phase,
    parameters: structuredClone(parameters),
  });
}

export type FeatureLibrary = Readonly<{
  config: HubConfig;
  kinds: readonly FeatureKind[];
  get(kind: string): AnyFeature;
}>;

export function createFeatureLibrary(config: HubConfig): FeatureLibrary {
  const { hub, shell } = config;
  const features: AnyFeature[] = [
    defineFeature("base-shell", { hub, shell }),
    defineFeature("floor-holes", {
      count: config.floorHoles.count,
      distance: config.floorHoles.distance,
      radius: config.floorHoles.radius,
      chamfer: config.floorHoles.chamfer,
      positions: ringPositions(config.floorHoles.count, config.floorHoles.distance),
    }),
    defineFeature("magnet-bosses", {
      positions: magnetPositions(config),
      outerRadius: config.magnet.outerRadius,
      innerRadius: config.magnet.innerRadius,
      baseHeight: config.magnet.baseHeight,
      rimHeight: config.magnet.rimHeight,
    }),
    defineFeature("pogo-bosses", {
      positions: [
        [config.pogo.xLeft, config.pogo.yRef + config.pogo.yOffset],
        [config.pogo.xLeft, config.pogo.yRef - config.pogo.yOffset],
        [config.pogo.xRight, config.pogo.yRef + config.pogo.yOffset],
        [config.pogo.xRight, config.pogo.yRef - config.pogo.yOffset],
      ],
      outerRadius: config.pogo.outerRadius,
      height: config.pogo.height,
      holeRadius: config.pogo.holeRadius,
      holeDepth: config.pogo.height + config.pogo.holeExtra,
    }),
    defineFeature("controller-bosses", {
      positions: [
        [-config.controller.topX, config.controller.topY],
        [config.controller.topX, config.controller.topY],
        [-config.controller.midX, 0],
        [config.controller.midX, 0],
        [-config.controller.bottomX, config.controller.bottomY],
        [config.controller.bottomX, config.controller.bottomY],
      ],
      outerRadius: config.controller.outerRadius,
      height: config.controller.height,
      holeRadius: config.controller.holeRadius,
      holeDepth: config.controller.height + config.controller.holeExtra,
    }),
    defineFeature("usb-bosses", usbBossParameters(config)),
    defineFeature("usb-cutout", {
      side: config.usb.wallSide,
      angle: config.usb.wallAngle,
      width: config.usbCutout.width,
      height: config.usbCutout.height,
      cornerRadius: config.usbCutout.cornerRadius,
      top: shell.southWallTop - config.usbCutout.materialAbove,
      yStart: -hub.outerApothem - config.usbCutout.outerOvershoot,
      yEnd: -hub.innerApothem + config.usbCutout.innerOvershoot,
    }),
    ...connectorFeatures(config),
  ];

  const byKind = new Map<string, AnyFeature>(features.map((f) => [f.kind, f]));
  return Object.freeze({
    config,
    kinds: FEATURE_KINDS,
    get(kind: string): AnyFeature {
      const hit = byKind.get(kind);
      if (!hit) throw new UnknownFeature(kind);
      return hit;
    },
  });
}

function ringPositions(count: number, distance: number): Point2D[] {
  const positions: Point2D[] = [];
  for (let i = 0; i < count; i += 1) {
    positions.push(rotate2d([distance, 0], (2 * Math.PI * i) / count));
  }
  return positions;
}

function magnetPositions(config: HubConfig): Point2D[] {
  const north: Point2D = [0, config.magnet.distance];
  return [
    [0, 0],
    north,
    rotate2d(north, config.magnet.sideAngle),
    rotate2d(north, -config.magnet.sideAngle),
  ];
}

function usbBossParameters(config: HubConfig): PillarParameters {
  const { usb } = config;
  const southY = -config.hub.innerApothem + usb.wallInset;
  const northY = southY + usb.pitchY;
  const x = usb.pitchX / 2;
  const onSouthWall: Point2D[] = [
    [-x, northY],
    [x, northY],
    [-x, southY],
    [x, southY],
  ];
  return {
    positions: onSouthWall.map((p) => rotate2d(p, usb.wallAngle)),
    outerRadius: usb.outerRadius,
    height: usb.height,
    holeRadius: usb.holeRadius,
    holeStart: usb.holeStart,
    holeDepth: usb.height + usb.holeExtra,
  };
}

function connectorFeatures(config: HubConfig): AnyFeature[] {
  const { hub, connector, grid } = config;
  const R = hub.outerRadius;
  const ap = hub.outerApothem;
  const d = connector.vertexDistance;
  const pin = railProfile(connector.edgeLength, connector.drop);
  const socket = offsetConvexPolygon(pin, connector.clearance);
  // NE rail sits near the north end of its wall, NW near the west end.
  const ne: Point2D = [R / 2 + d / 2, ap - (d * Math.sqrt(3)) / 2 - connector.inset];
  const nw: Point2D = [-(R - d / 2), (d * Math.sqrt(3)) / 2 - connector.inset];

  const rail = (side: "NE" | "NW", anchor: Point2D): RailParameters => ({
    side,
    anchor,
    profile: pin,
    length: connector.pinLength,
  });
  // The socket sits where the mate's pin lands in the neighbor's frame.
  const housing = (side: "SE" | "SW", mate: Side, anchor: Point2D): SocketParameters => {
    const [nx, ny] = sideNormal(mate);
    const center: Point2D = [
      anchor[0] - grid.rowPitch * nx,
      anchor[1] - grid.rowPitch * ny + 2 * connector.inset,
    ];
    return {
      side,
      center,
      housingWidth: connector.housingWidth,
      housingDepth: connector.pinLength,
      housingHeight: connector.housingHeight,
      profile: socket,
      yStart: center[1] - connector.pinLength,
      yEnd: center[1] + connector.pinLength / 2,
    };
  };
  return [
    defineFeature("connector-ne", rail("NE", ne)),
    defineFeature("connector-nw", rail("NW", nw)),
    defineFeature("connector-se", housing("SE", "NW", nw)),
    defineFeature("connector-sw", housing("SW", "NE", ne)),
  ];
}

/**
 * Rail cross-section: a square of `edge` standing on a corner, sunk by `drop`
 * and cut flat at z = 0. Counter-clockwise in (x, z).
 */
function railProfile(edge: number, drop: number): Point2D[] {
  const half = (edge * Math.SQRT2) / 2;
  const mid = half - drop;
  return [
    [-drop, 0],
    [drop, 0],
    [half, mid],
    [0, mid + half],
    [-half, mid],
  ];
}

/** Mitered outward offset of a convex counter-clockwise polygon. */
function offsetConvexPolygon(points: readonly Point2D[], distance: number): Point2D[] {
  const n = points.length;
  const at = (i: number): Point2D => points[((i % n) + n) % n] ?? [0, 0];
  const shifted = (i: number): { p: Point2D; d: Point2D } => {
    const a = at(i);
    const b = at(i + 1);
    const len = Math.hypot(b[0] - a[0], b[1] - a[1]);
    const dx = (b[0] - a[0]) / len;
    const dy = (b[1] - a[1]) / len;
    // Right-hand normal points outward for a counter-clockwise loop.
    return { p: [a[0] + dy * distance, a[1] - dx * distance], d: [dx, dy] };
  };
  const out: Point2D[] = [];
  for (let i = 0; i < n; i += 1) {
    const prev = shifted(i - 1);
    const next = shifted(i);
    const cross = prev.d[0] * next.d[1] - prev.d[1] * next.d[0];
    const wx = next.p[0] - prev.p[0];
    const wy = next.p[1] - prev.p[1];
    const t = (wx * next.d[1] - wy * next.d[0]) / cross;
    out.push([prev.p[0] + prev.d[0] * t, prev.p[1] + prev.d[1] * t]);
  }
  return out;
}

/** Append a feature's recipe steps to a body. Never mutates `body`. */
export function applyFeature(body: SlotBody, feature: AnyFeature): SlotBody {
  if (body.applied.includes(feature.kind)) {
    throw new InvalidPlacement(feature.kind, "feature is already applied");
  }
  if (feature.kind === "base-shell") {
    if (body.envelope || body.part.features.length > 0) {
      throw new InvalidPlacement(feature.kind, "body already has geometry");
    }
    return applyBaseShell(body, feature);
  }
  const envelope = body.envelope;
  if (!envelope) {
    throw new InvalidPlacement(feature.kind, "base shell must be applied first");
  }
  switch (feature.kind) {
    case "floor-holes":
      return applyFloorHoles(body, envelope, feature);
    case "magnet-bosses":
      return applyMagnetBosses(body, envelope, feature);
    case "pogo-bosses":
    case "controller-bosses":
    case "usb-bosses":
      return applyPillars(body, envelope, feature.kind, feature.parameters);
    case "usb-cutout":
      return applyUsbCutout(body, envelope, feature);
    case "connector-ne":
    case "connector-nw":
      return applyRail(body, envelope, feature.kind, feature.parameters);
    case "connector-se":
    case "connector-sw":
      return applySocket(body, envelope, feature.kind, feature.parameters);
  }
}

type Step = { features: IntentFeature[]; output: string };

/** Accumulates recipe steps for one feature, threading the body output. */
class RecipeSteps {
  private readonly features: IntentFeature[] = [];
  private current: string;

  constructor(private readonly prefix: string, start: string) {
    this.current = start;
  }

  get output(): string {
    return this.current;
  }

  solid(name: string, profile: Profile, depth: number, axis?: ExtrudeAxis): string {
    const feature = extrude(
      `${this.prefix}.${name}`,
      profile,
      depth,
      undefined,
      undefined,
      axis === undefined ? undefined : { axis }
    );
    this.features.push(feature);
    return feature.result;
  }

  /** Truncated cone standing on `center`, axis +Z. */
  taper(name: string, center: Point3D, radius: number, topRadius: number, height: number): string {
    const feature = cone(`${this.prefix}.${name}`, center, radius, topRadius, height);
    this.features.push(feature);
    return feature.result;
  }

  combine(name: string, op: BooleanOp["op"], left: string, right: string): string {
    const feature = booleanOp(
      `${this.prefix}.${name}`,
      op,
      selectorNamed(left),
      selectorNamed(right)
    );
    this.features.push(feature);
    return feature.result;
  }

  /** Combine `tool` into the running body. */
  apply(name: string, op: "union" | "subtract", tool: string): void {
    this.current = this.combine(name, op, this.current, tool);
  }

  finish(): Step {
    return { features: this.features, output: this.current };
  }
}

function extendBody(
  body: SlotBody,
  kind: FeatureKind,
  step: Step,
  envelope: ShellEnvelope | null = body.envelope
): SlotBody {
  return Object.freeze({
    part: part(body.part.id, [...body.part.features, ...step.features]),
    output: step.output,
    applied: Object.freeze([...body.applied, kind]),
    envelope,
  });
}

function applyBaseShell(body: SlotBody, feature: Feature<"base-shell">): SlotBody {
  const { hub, shell } = feature.parameters;
  if (shell.slopeLength > hub.outerFlatToFlat) {
    throw new InvalidPlacement(feature.kind, "slope is longer than the slot", {
      slopeLength: shell.slopeLength,
    });
  }
  if (shell.recessDepth >= shell.wallHeight || hub.wallThickness <= shell.recessWidth) {
    throw new InvalidPlacement(feature.kind, "lid groove does not fit in the wall", {
      recessDepth: shell.recessDepth,
      recessWidth: shell.recessWidth,
    });
  }
  if (shell.rimHeight > shell.southWallTop) {
    throw new InvalidPlacement(feature.kind, "rim rises above the sloped wall", {
      rimHeight: shell.rimHeight,
    });
  }

  const steps = new RecipeSteps(feature.kind, "");
  const floor = steps.solid("floor", hexagonProfile(hub.outerFlatToFlat, 0), shell.floorHeight);
  const wallOuter = steps.solid(
    "wall-outer",
    hexagonProfile(hub.outerFlatToFlat, shell.floorHeight),
    shell.wallHeight
  );
  const wallInner = steps.solid(
    "wall-inner",
    hexagonProfile(hub.innerFlatToFlat, shell.floorHeight),
    shell.wallHeight
  );
  const wall = steps.combine("wall", "subtract", wallOuter, wallInner);
  let current = steps.combine("walled", "union", floor, wall);

  const slope = steps.solid(
    "slope-cutter",
    slopeCutterProfile(hub, shell, 0),
    2 * hub.outerFlatToFlat,
    "+X"
  );
  current = steps.combine("sloped", "subtract", current, slope);

  const grooveFlatToFlat = hub.innerFlatToFlat + 2 * shell.recessWidth;
  const groove = steps.solid(
    "groove-cutter",
    hexagonProfile(grooveFlatToFlat, shell.wallTop - shell.recessDepth),
    shell.recessDepth + shell.cutterHeadroom
  );
  current = steps.combine("grooved", "subtract", current, groove);

  const loweredSlope = steps.solid(
    "slope-groove-cutter",
    slopeCutterProfile(hub, shell, shell.recessDepth),
    2 * hub.outerFlatToFlat,
    "+X"
  );
  const ringHeight = shell.wallTop + shell.cutterHeadroom;
  const ringOuter = steps.solid("ring-outer", hexagonProfile(grooveFlatToFlat, 0), ringHeight);
  const ringInner = steps.solid("ring-inner", hexagonProfile(hub.innerFlatToFlat, 0), ringHeight);
  const ring = steps.combine("ring", "subtract", ringOuter, ringInner);
  const slopeGroove = steps.combine("slope-groove", "intersect", loweredSlope, ring);
  current = steps.combine("recessed", "subtract", current, slopeGroove);

  const rimOuter = steps.solid(
    "rim-outer",
    hexagonProfile(hub.outerFlatToFlat + 2 * shell.rimThickness, 0),
    shell.rimHeight
  );
  const rimInner = steps.solid("rim-inner", hexagonProfile(hub.outerFlatToFlat, 0), shell.rimHeight);
  const rim = steps.combine("rim", "subtract", rimOuter, rimInner);
  current = steps.combine("shell", "union", current, rim);

  return extendBody(
    body,
    feature.kind,
    { features: steps.finish().features, output: current },
    Object.freeze({
      outerApothem: hub.outerApothem,
      innerApothem: hub.innerApothem,
      innerRadius: hub.innerRadius,
      rimApothem: hub.outerApothem + shell.rimThickness,
      floorHeight: shell.floorHeight,
      wallHeight: shell.wallHeight,
      wallTop: shell.wallTop,
      southWallTop: shell.southWallTop,
      slopeStartY: shell.slopeStartY,
      recessDepth: shell.recessDepth,
    })
  );
}

/**
 * Cutter in the YZ plane removing everything above the line from the slope
 * start (at wall top) down to the south edge, lowered by `drop`.
 */
function slopeCutterProfile(hub: HubDimensions, shell: ShellConfig, drop: number) {
  const x = -hub.outerFlatToFlat;
  const southY = -hub.outerApothem;
  const ceiling = shell.wallTop + shell.cutterHeadroom;
  const points: Point3D[] = [
    [x, shell.slopeStartY, shell.wallTop - drop],
    [x, southY, shell.southWallTop - drop],
    [x, southY, ceiling],
    [x, shell.slopeStartY, ceiling],
  ];
  return profilePolygon(points);
}

const COUNTERSINK_OVERSHOOT = 0.5;

function applyFloorHoles(
  body: SlotBody,
  envelope: ShellEnvelope,
  feature: Feature<"floor-holes">
): SlotBody {
  const { positions, radius, chamfer } = feature.parameters;
  requirePositive(feature.kind, { radius, chamfer });
  if (chamfer >= envelope.floorHeight) {
    throw new InvalidPlacement(feature.kind, "countersink is deeper than the floor", {
      chamfer,
      floorHeight: envelope.floorHeight,
    });
  }
  positions.forEach((center, index) =>
    requireInside(feature.kind, center, radius + chamfer, envelope.innerApothem, index)
  );
  const steps = new RecipeSteps(feature.kind, body.output);
  positions.forEach(([x, y], index) => {
    const hole = steps.solid(
      `hole-${index}`,
      profileCircle(radius, [x, y, -1]),
      envelope.floorHeight + 2
    );
    // 45 degree countersink on the underside, started below the floor.
    const sink = steps.taper(
      `sink-${index}`,
      [x, y, -COUNTERSINK_OVERSHOOT],
      radius + chamfer + COUNTERSINK_OVERSHOOT,
      radius,
      chamfer + COUNTERSINK_OVERSHOOT
    );
    const cutter = steps.combine(`cutter-${index}`, "union", hole, sink);
    steps.apply(`cut-${index}`, "subtract", cutter);
  });
  return extendBody(body, feature.kind, steps.finish());
}

function applyMagnetBosses(
  body: SlotBody,
  envelope: ShellEnvelope,
  feature: Feature<"magnet-bosses">
): SlotBody {
  const { positions, outerRadius, innerRadius, baseHeight, rimHeight } = feature.parameters;
  requirePositive(feature.kind, { outerRadius, innerRadius, baseHeight, rimHeight });
  if (innerRadius >= outerRadius) {
    throw new InvalidPlacement(feature.kind, "rim inner radius must be below the outer radius", {
      innerRadius,
      outerRadius,
    });
  }
  requireHeight(feature.kind, baseHeight + rimHeight, envelope);
  positions.forEach((center, index) =>
    requireInside(feature.kind, center, outerRadius, envelope.innerApothem, index)
  );

  const z = envelope.floorHeight;
  const steps = new RecipeSteps(feature.kind, body.output);
  positions.forEach(([x, y], index) => {
    const base = steps.solid(`base-${index}`, profileCircle(outerRadius, [x, y, z]), baseHeight);
    const rimOuter = steps.solid(
      `rim-outer-${index}`,
      profileCircle(outerRadius, [x, y, z + baseHeight]),
      rimHeight
    );
    const rimInner = steps.solid(
      `rim-inner-${index}`,
      profileCircle(innerRadius, [x, y, z + baseHeight]),
      rimHeight
    );
    const rim = steps.combine(`rim-${index}`, "subtract", rimOuter, rimInner);
    const pillar = steps.combine(`pillar-${index}`, "union", base, rim);
    steps.apply(`union-${index}`, "union", pillar);
  });
  return extendBody(body, feature.kind, steps.finish());
}

function applyPillars(
  body: SlotBody,
  envelope: ShellEnvelope,
  kind: FeatureKind,
  parameters: Readonly<PillarParameters>
): SlotBody {
  const { positions, outerRadius, height, holeRadius, holeDepth } = parameters;
  requirePositive(kind, { outerRadius, height, holeRadius, holeDepth });
  if (holeRadius >= outerRadius) {
    throw new InvalidPlacement(kind, "hole is wider than the pillar", {
      holeRadius,
      outerRadius,
    });
  }
  requireHeight(kind, height, envelope);
  positions.forEach((center, index) =>
    requireInside(kind, center, outerRadius, envelope.innerApothem, index)
  );

  const z = envelope.floorHeight;
  const holeStart = parameters.holeStart ?? z;
  const steps = new RecipeSteps(kind, body.output);
  positions.forEach(([x, y], index) => {
    const pillar = steps.solid(`pillar-${index}`, profileCircle(outerRadius, [x, y, z]), height);
    steps.apply(`union-${index}`, "union", pillar);
  });
  positions.forEach(([x, y], index) => {
    const hole = steps.solid(
      `hole-${index}`,
      profileCircle(holeRadius, [x, y, holeStart]),
      holeDepth
    );
    steps.apply(`cut-${index}`, "subtract", hole);
  });
  return extendBody(body, kind, steps.finish());
}

function applyUsbCutout(
  body: SlotBody,
  envelope: ShellEnvelope,
  feature: Feature<"usb-cutout">
): SlotBody {
  const { angle, width, height, cornerRadius, top, yStart, yEnd } = feature.parameters;
  requirePositive(feature.kind, { width, height, cornerRadius });
  if (cornerRadius > Math.min(width, height) / 2) {
    throw new InvalidPlacement(feature.kind, "corner radius exceeds half the opening", {
      cornerRadius,
    });
  }
  if (top > envelope.southWallTop || top - height < 0) {
    throw new InvalidPlacement(feature.kind, "opening leaves the wall vertically", {
      top,
      bottom: top - height,
      southWallTop: envelope.southWallTop,
    });
  }
  if (yStart > -envelope.rimApothem || yEnd < -envelope.innerApothem || yEnd <= yStart) {
    throw new InvalidPlacement(feature.kind, "cut does not pass through the south wall", {
      yStart,
      yEnd,
    });
  }
  if (width / 2 > envelope.innerRadius / 2) {
    throw new InvalidPlacement(feature.kind, "opening is wider than the wall", { width });
  }

  const outline = roundedRectangle(width, height, cornerRadius).map(([x, z]): Point3D => {
    const [rx, ry] = rotate2d([x, yStart], angle);
    return [rx, ry, top - height / 2 + z];
  });
  const inward = rotate2d([0, 1], angle);
  const steps = new RecipeSteps(feature.kind, body.output);
  const cutter = steps.solid(
    "cutter",
    profilePolygon(outline),
    yEnd - yStart,
    angle === 0 ? "+Y" : axisVector([inward[0], inward[1], 0])
  );
  steps.apply("cut", "subtract", cutter);
  return extendBody(body, feature.kind, steps.finish());
}

function applyRail(
  body: SlotBody,
  envelope: ShellEnvelope,
  kind: FeatureKind,
  parameters: Readonly<RailParameters>
): SlotBody {
  const { anchor, profile, length } = parameters;
  requirePositive(kind, { length });
  const tip: Point2D = [anchor[0], anchor[1] + length];
  if (!circleInsideHexagon(anchor, 0, envelope.outerApothem) ||
      circleInsideHexagon(tip, 0, envelope.outerApothem)) {
    throw new InvalidPlacement(kind, "rail does not cross the wall", {
      anchor: [anchor[0], anchor[1]],
      length,
    });
  }
  const steps = new RecipeSteps(kind, body.output);
  const pin = steps.solid("pin", railOutline(profile, anchor, 0), length, "+Y");
  const interior = steps.solid(
    "interior",
    hexagonProfile(2 * envelope.innerApothem, -CONNECTOR_MARGIN),
    envelope.wallTop + 2 * CONNECTOR_MARGIN
  );
  const rail = steps.combine("rail", "subtract", pin, interior);
  steps.apply("union", "union", rail);
  return extendBody(body, kind, steps.finish());
}

function applySocket(
  body: SlotBody,
  envelope: ShellEnvelope,
  kind: FeatureKind,
  parameters: Readonly<SocketParameters>
): SlotBody {
  const { center, housingWidth, housingDepth, housingHeight, profile, yStart, yEnd } = parameters;
  requirePositive(kind, { housingWidth, housingDepth, housingHeight });
  if (!circleInsideHexagon(center, 0, envelope.outerApothem) ||
      circleInsideHexagon([center[0], yStart], 0, envelope.outerApothem) ||
      yEnd <= yStart) {
    throw new InvalidPlacement(kind, "socket does not open through the wall", {
      center: [center[0], center[1]],
      yStart,
      yEnd,
    });
  }
  const steps = new RecipeSteps(kind, body.output);
  const block = steps.solid(
    "housing",
    profileRect(housingWidth, housingDepth, [center[0], center[1], 0]),
    housingHeight
  );
  const outline = steps.solid(
    "outline",
    hexagonProfile(2 * envelope.outerApothem, -CONNECTOR_MARGIN),
    envelope.wallTop + 2 * CONNECTOR_MARGIN
  );
  const housing = steps.combine("housing-trim", "intersect", block, outline);
  steps.apply("housing-union", "union", housing);
  const socket = steps.solid(
    "socket",
    railOutline(profile, [center[0], yStart], 0),
    yEnd - yStart,
    "+Y"
  );
  steps.apply("socket-cut", "subtract", socket);
  return extendBody(body, kind, steps.finish());
}

const CONNECTOR_MARGIN = 5;

/** Rail cross-section placed in the XZ plane through `origin`. */
function railOutline(profile: readonly Point2D[], origin: Point2D, z: number): Profile {
  return profilePolygon(
    profile.map(([x, pz]): Point3D => [origin[0] + x, origin[1], z + pz])
  );
}

const CORNER_SEGMENTS = 6;

/** Rounded rectangle centered on the origin, counter-clockwise. */
function roundedRectangle(width: number, height: number, radius: number): Point2D[] {
  const hw = width / 2 - radius;
  const hh = height / 2 - radius;
  const corners: Array<[Point2D, number]> = [
    [[hw, -hh], -Math.PI / 2],
    [[hw, hh], 0],
    [[-hw, hh], Math.PI / 2],
    [[-hw, -hh], Math.PI],
  ];
  const points: Point2D[] = [];
  for (const [[cx, cy], start] of corners) {
    for (let i = 0; i <= CORNER_SEGMENTS; i += 1) {
      const angle = start + (Math.PI / 2) * (i / CORNER_SEGMENTS);
      points.push([cx + radius * Math.cos(angle), cy + radius * Math.sin(angle)]);
    }
  }
  return points;
}

function requirePositive(kind: FeatureKind, values: Record<string, number>): void {
  for (const [name, value] of Object.entries(values)) {
    if (!(value > 0)) {
      throw new InvalidPlacement(kind, `${name} must be positive`, { [name]: value });
    }
  }
}

function requireHeight(kind: FeatureKind, height: number, envelope: ShellEnvelope): void {
  if (height > envelope.wallHeight) {
    throw new InvalidPlacement(kind, "pillar is taller than the wall", {
      height,
      wallHeight: envelope.wallHeight,
    });
  }
}

function requireInside(
  kind: FeatureKind,
  center: Point2D,
  radius: number,
  apothem: number,
  index: number
): void {
  if (!circleInsideHexagon(center, radius, apothem)) {
    throw new InvalidPlacement(kind, `footprint ${index} leaves the slot interior`, {
      index,
      center: [center[0], center[1]],
      radius,
    });
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const entry of Object.values(value)) {
    if (typeof entry === "object" && entry !== null && !Object.isFrozen(entry)) {
      deepFreeze(entry);
    }
  }
  return Object.freeze(value);
}
