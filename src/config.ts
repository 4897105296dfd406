import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { CompileError } from "./errors.js";
import {
  buildParamTable,
  parseParamDocument,
  type ParamOverrides,
  type ParamTable,
} from "./params.js";

export const DEFAULT_CONFIG_PATH = fileURLToPath(
  new URL("../config/hub.parameters.json", import.meta.url)
);

export type HubDimensions = {
  outerFlatToFlat: number;
  wallThickness: number;
  innerFlatToFlat: number;
  outerApothem: number;
  innerApothem: number;
  outerRadius: number;
  innerRadius: number;
};

export type ShellConfig = {
  floorHeight: number;
  wallHeight: number;
  slopeLength: number;
  slopeAngle: number;
  recessDepth: number;
  recessWidth: number;
  rimThickness: number;
  rimHeight: number;
  cutterHeadroom: number;
  /** Top of the full-height walls. */
  wallTop: number;
  /** Wall top at the south edge, after the slope. */
  southWallTop: number;
  /** Y where the slope starts (north end). */
  slopeStartY: number;
};

export type BossConfig = {
  outerRadius: number;
  holeRadius: number;
  height: number;
  holeExtra: number;
};

/** Wall that carries the USB opening: south, or turned 60 degrees either way. */
export type UsbWallSide = "S" | "SE" | "SW";

export type HubConfig = {
  hub: HubDimensions;
  shell: ShellConfig;
  floorHoles: { count: number; distance: number; radius: number; chamfer: number };
  magnet: {
    distance: number;
    sideAngle: number;
    outerRadius: number;
    innerRadius: number;
    baseHeight: number;
    rimHeight: number;
  };
  pogo: BossConfig & { yRef: number; yOffset: number; xLeft: number; xRight: number };
  controller: BossConfig & {
    topX: number;
    topY: number;
    midX: number;
    bottomX: number;
    bottomY: number;
  };
  usb: BossConfig & {
    wallInset: number;
    pitchX: number;
    pitchY: number;
    holeStart: number;
    /** Rotation of the USB mount about +Z, in radians: 0 or +-60 degrees. */
    wallAngle: number;
    wallSide: UsbWallSide;
  };
  usbCutout: {
    width: number;
    height: number;
    cornerRadius: number;
    materialAbove: number;
    outerOvershoot: number;
    innerOvershoot: number;
  };
  grid: {
    clearance: number;
    neighborTolerance: number;
    angleTolerance: number;
    flatToFlat: number;
    circumradius: number;
    columnPitch: number;
    rowPitch: number;
    /** Magnitude of the middle-column shift; the assembly type picks the sign. */
    columnOffset: number;
  };
  connector: {
    /** Edge of the square the rail section is cut from. */
    edgeLength: number;
    drop: number;
    /** Distance along the wall from the nearest vertex. */
    vertexDistance: number;
    inset: number;
    pinLength: number;
    clearance: number;
    housingWidth: number;
    housingHeight: number;
  };
  channel: {
    width: number;
    height: number;
    roofAngle: number;
    /** Height of the vertical sides below the roof. */
    sideHeight: number;
    tangentOffset: number;
    wallOvershoot: number;
  };
};

// Keys that may be zero or negative (coordinates).
const SIGNED_KEYS = new Set([
  "pogo.xLeft",
  "pogo.xRight",
  "pogo.yRef",
  "controller.topX",
  "controller.topY",
  "controller.midX",
  "controller.bottomX",
  "controller.bottomY",
  "channel.tangentOffset",
  "usbCutout.outerOvershoot",
  "usbCutout.innerOvershoot",
  "channel.wallOvershoot",
  "usb.wallAngle",
]);

const REQUIRED_KEYS = [
  "hub.outerFlatToFlat",
  "hub.wallThickness",
  "shell.floorHeight",
  "shell.wallHeight",
  "shell.slopeLength",
  "shell.slopeAngle",
  "shell.recessDepth",
  "shell.recessWidth",
  "shell.rimThickness",
  "shell.rimHeight",
  "shell.cutterHeadroom",
  "floorHoles.count",
  "floorHoles.distance",
  "floorHoles.radius",
  "floorHoles.chamfer",
  "magnet.distance",
  "magnet.sideAngle",
  "magnet.outerRadius",
  "magnet.innerRadius",
  "magnet.baseHeight",
  "magnet.rimHeight",
  "pogo.outerRadius",
  "pogo.holeRadius",
  "pogo.height",
  "pogo.yRef",
  "pogo.yOffset",
  "pogo.xLeft",
  "pogo.xRight",
  "pogo.holeExtra",
  "controller.outerRadius",
  "controller.holeRadius",
  "controller.height",
  "controller.holeExtra",
  "controller.topX",
  "controller.topY",
  "controller.midX",
  "controller.bottomX",
  "controller.bottomY",
  "usb.outerRadius",
  "usb.holeRadius",
  "usb.height",
  "usb.wallInset",
  "usb.pitchX",
  "usb.pitchY",
  "usb.holeStart",
  "usb.holeExtra",
  "usb.wallAngle",
  "usbCutout.width",
  "usbCutout.height",
  "usbCutout.cornerRadius",
  "usbCutout.materialAbove",
  "usbCutout.outerOvershoot",
  "usbCutout.innerOvershoot",
  "connector.edgeLength",
  "connector.drop",
  "connector.vertexDistance",
  "connector.inset",
  "connector.pinLength",
  "connector.clearance",
  "connector.housingWidth",
  "connector.housingHeight",
  "grid.clearance",
  "grid.neighborTolerance",
  "grid.angleTolerance",
  "channel.width",
  "channel.height",
  "channel.roofAngle",
  "channel.tangentOffset",
  "channel.wallOvershoot",
] as const;

const OPTIONAL_KEYS = ["grid.columnOffset"] as const;

const KNOWN_KEYS = new Set<string>([...REQUIRED_KEYS, ...OPTIONAL_KEYS]);

export async function loadHubConfig(
  path: string = DEFAULT_CONFIG_PATH,
  overrides?: ParamOverrides
): Promise<HubConfig> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new CompileError("param_document_invalid", `${path} is not valid JSON: ${msg}`);
  }
  const table = buildParamTable(
    parseParamDocument(raw, path),
    overrides,
    new Set<string>(OPTIONAL_KEYS)
  );
  return hubConfigFromParams(table);
}

export function defaultHubConfig(overrides?: ParamOverrides): Promise<HubConfig> {
  return loadHubConfig(DEFAULT_CONFIG_PATH, overrides);
}

export function hubConfigFromParams(table: ParamTable): HubConfig {
  for (const key of table.keys()) {
    if (!KNOWN_KEYS.has(key)) {
      console.warn(`Hubforge: ignoring unknown parameter ${key}.`);
    }
  }
  const get = (key: (typeof REQUIRED_KEYS)[number]): number => {
    const value = table.get(key);
    if (value === undefined) {
      throw new CompileError("param_missing", `Missing required param ${key}`, { key });
    }
    if (!SIGNED_KEYS.has(key) && value <= 0) {
      throw new CompileError("param_range", `Param ${key} must be positive, got ${value}`, {
        key,
        value,
      });
    }
    return value;
  };

  const outerFlatToFlat = get("hub.outerFlatToFlat");
  const wallThickness = get("hub.wallThickness");
  const innerFlatToFlat = outerFlatToFlat - 2 * wallThickness;
  if (innerFlatToFlat <= 0) {
    throw new CompileError(
      "param_range",
      `Wall thickness ${wallThickness} leaves no interior in a ${outerFlatToFlat} hexagon`,
      { key: "hub.wallThickness", value: wallThickness }
    );
  }

  const floorHeight = get("shell.floorHeight");
  const wallHeight = get("shell.wallHeight");
  const slopeLength = get("shell.slopeLength");
  const slopeAngle = get("shell.slopeAngle");
  if (slopeAngle > Math.PI / 2) {
    throw new CompileError("param_range", "shell.slopeAngle must be at most 90 degrees", {
      key: "shell.slopeAngle",
      value: slopeAngle,
    });
  }
  const wallTop = floorHeight + wallHeight;
  const southWallTop = wallTop - slopeLength * Math.tan(Math.PI / 2 - slopeAngle);
  if (southWallTop <= floorHeight) {
    throw new CompileError("param_range", "The slope cuts through the floor", {
      key: "shell.slopeAngle",
      value: slopeAngle,
    });
  }

  const count = get("floorHoles.count");
  if (!Number.isInteger(count)) {
    throw new CompileError("param_range", "floorHoles.count must be an integer", {
      key: "floorHoles.count",
      value: count,
    });
  }

  const clearance = get("grid.clearance");
  const gridFlatToFlat = outerFlatToFlat + clearance;
  const circumradius = gridFlatToFlat / Math.sqrt(3);
  const rowPitch = gridFlatToFlat;
  const columnOffset = table.get("grid.columnOffset") ?? rowPitch / 2;
  if (!(columnOffset >= 0)) {
    throw new CompileError("param_range", "grid.columnOffset must not be negative", {
      key: "grid.columnOffset",
      value: columnOffset,
    });
  }

  const wallAngle = get("usb.wallAngle");
  const wallSide = usbWallSide(wallAngle);

  const edgeLength = get("connector.edgeLength");
  const drop = get("connector.drop");
  if (drop >= (edgeLength * Math.SQRT2) / 2) {
    throw new CompileError("param_range", "connector.drop removes the whole rail", {
      key: "connector.drop",
      value: drop,
    });
  }

  const channelWidth = get("channel.width");
  const channelHeight = get("channel.height");
  const roofAngle = get("channel.roofAngle");
  const sideHeight = channelHeight - (channelWidth / 2) * Math.tan(roofAngle);
  if (roofAngle >= Math.PI / 2 || sideHeight < 0) {
    throw new CompileError("param_range", "channel roof does not fit in channel.height", {
      key: "channel.roofAngle",
      value: roofAngle,
    });
  }

  return deepFreeze({
    hub: {
      outerFlatToFlat,
      wallThickness,
      innerFlatToFlat,
      outerApothem: outerFlatToFlat / 2,
      innerApothem: innerFlatToFlat / 2,
      outerRadius: outerFlatToFlat / Math.sqrt(3),
      innerRadius: innerFlatToFlat / Math.sqrt(3),
    },
    shell: {
      floorHeight,
      wallHeight,
      slopeLength,
      slopeAngle,
      recessDepth: get("shell.recessDepth"),
      recessWidth: get("shell.recessWidth"),
      rimThickness: get("shell.rimThickness"),
      rimHeight: get("shell.rimHeight"),
      cutterHeadroom: get("shell.cutterHeadroom"),
      wallTop,
      southWallTop,
      slopeStartY: -outerFlatToFlat / 2 + slopeLength,
    },
    floorHoles: {
      count,
      distance: get("floorHoles.distance"),
      radius: get("floorHoles.radius"),
      chamfer: get("floorHoles.chamfer"),
    },
    magnet: {
      distance: get("magnet.distance"),
      sideAngle: get("magnet.sideAngle"),
      outerRadius: get("magnet.outerRadius"),
      innerRadius: get("magnet.innerRadius"),
      baseHeight: get("magnet.baseHeight"),
      rimHeight: get("magnet.rimHeight"),
    },
    pogo: {
      outerRadius: get("pogo.outerRadius"),
      holeRadius: get("pogo.holeRadius"),
      height: get("pogo.height"),
      holeExtra: get("pogo.holeExtra"),
      yRef: get("pogo.yRef"),
      yOffset: get("pogo.yOffset"),
      xLeft: get("pogo.xLeft"),
      xRight: get("pogo.xRight"),
    },
    controller: {
      outerRadius: get("controller.outerRadius"),
      holeRadius: get("controller.holeRadius"),
      height: get("controller.height"),
      holeExtra: get("controller.holeExtra"),
      topX: get("controller.topX"),
      topY: get("controller.topY"),
      midX: get("controller.midX"),
      bottomX: get("controller.bottomX"),
      bottomY: get("controller.bottomY"),
    },
    usb: {
      outerRadius: get("usb.outerRadius"),
      holeRadius: get("usb.holeRadius"),
      height: get("usb.height"),
      holeExtra: get("usb.holeExtra"),
      wallInset: get("usb.wallInset"),
      pitchX: get("usb.pitchX"),
      pitchY: get("usb.pitchY"),
      holeStart: get("usb.holeStart"),
      wallAngle,
      wallSide,
    },
    usbCutout: {
      width: get("usbCutout.width"),
      height: get("usbCutout.height"),
      cornerRadius: get("usbCutout.cornerRadius"),
      materialAbove: get("usbCutout.materialAbove"),
      outerOvershoot: get("usbCutout.outerOvershoot"),
      innerOvershoot: get("usbCutout.innerOvershoot"),
    },
    grid: {
      clearance,
      neighborTolerance: get("grid.neighborTolerance"),
      angleTolerance: get("grid.angleTolerance"),
      flatToFlat: gridFlatToFlat,
      circumradius,
      columnPitch: 1.5 * circumradius,
      rowPitch,
      columnOffset,
    },
    connector: {
      edgeLength,
      drop,
      vertexDistance: get("connector.vertexDistance"),
      inset: get("connector.inset"),
      pinLength: get("connector.pinLength"),
      clearance: get("connector.clearance"),
      housingWidth: get("connector.housingWidth"),
      housingHeight: get("connector.housingHeight"),
    },
    channel: {
      width: channelWidth,
      height: channelHeight,
      roofAngle,
      sideHeight,
      tangentOffset: get("channel.tangentOffset"),
      wallOvershoot: get("channel.wallOvershoot"),
    },
  });
}

const USB_WALLS: ReadonlyArray<[number, UsbWallSide]> = [
  [0, "S"],
  [60, "SE"],
  [-60, "SW"],
];

function usbWallSide(angle: number): UsbWallSide {
  const degrees = (angle * 180) / Math.PI;
  const hit = USB_WALLS.find(([wall]) => Math.abs(degrees - wall) < 0.1);
  if (!hit) {
    throw new CompileError("param_range", "usb.wallAngle must be 0, 60 or -60 degrees", {
      key: "usb.wallAngle",
      value: angle,
    });
  }
  return hit[1];
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const entry of Object.values(value)) {
    if (typeof entry === "object" && entry !== null && !Object.isFrozen(entry)) {
      deepFreeze(entry);
    }
  }
  return Object.freeze(value);
}
