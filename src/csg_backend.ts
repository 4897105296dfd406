import type {
  Backend,
  BackendCapabilities,
  ExecuteInput,
  KernelObject,
  KernelResult,
  MeshData,
} from "./backend.js";
import type { BooleanOp, Cone, Extrude, Point2D, Point3D } from "./ir.js";
import { BackendError } from "./errors.js";
import { extrusionVector, profileLoop, profilePlane, toPlane, type ProfilePlane } from "./profile.js";
import { add, dot } from "./vec.js";

export type Bounds = { min: Point3D; max: Point3D };

type Region =
  | { kind: "circle"; center: Point2D; radius: number }
  | { kind: "loop"; points: Point2D[] };

export type CsgNode =
  | {
      kind: "prism";
      plane: ProfilePlane;
      region: Region;
      sweep: Point3D;
      bounds: Bounds;
    }
  | {
      // Axis along +Z from the base center.
      kind: "cone";
      center: Point3D;
      radius: number;
      topRadius: number;
      height: number;
      bounds: Bounds;
    }
  | {
      kind: "boolean";
      op: BooleanOp["op"];
      left: CsgNode;
      right: CsgNode;
      bounds: Bounds;
    };

let seq = 0;

/**
 * Constructive-solid backend that keeps each solid as a tree of extruded
 * regions and booleans. It answers point-membership queries exactly but
 * produces no meshes; it exists for dry runs and kernel-free tests.
 */
export class CsgBackend implements Backend {
  private readonly nodes = new WeakMap<KernelObject, CsgNode>();

  capabilities(): BackendCapabilities {
    return {
      name: "csg",
      featureKinds: ["feature.extrude", "feature.cone", "feature.boolean"],
      mesh: false,
      exports: { step: false },
    };
  }

  execute(input: ExecuteInput): KernelResult {
    const feature = input.feature;
    switch (feature.kind) {
      case "feature.extrude":
        return this.emit(feature.result, this.prism(feature));
      case "feature.cone":
        return this.emit(feature.result, cone(feature));
      case "feature.boolean": {
        const left = this.node(input.resolve(feature.left, input.upstream));
        const right = this.node(input.resolve(feature.right, input.upstream));
        return this.emit(feature.result, {
          kind: "boolean",
          op: feature.op,
          left,
          right,
          bounds: combineBounds(feature.op, left.bounds, right.bounds),
        });
      }
    }
  }

  mesh(_target: KernelObject): MeshData {
    throw new BackendError("mesh_unsupported", "CSG backend does not produce meshes");
  }

  checkValid(target: KernelObject): boolean {
    return this.nodes.has(target);
  }

  /** Point-membership test against a solid built by this backend. */
  contains(target: KernelObject, point: Point3D): boolean {
    return containsPoint(this.node(target), point);
  }

  bounds(target: KernelObject): Bounds {
    return this.node(target).bounds;
  }

  node(target: KernelObject): CsgNode {
    const hit = this.nodes.get(target);
    if (!hit) {
      throw new BackendError(
        "foreign_object",
        `Kernel object ${target.id} was not created by the CSG backend`
      );
    }
    return hit;
  }

  private prism(feature: Extrude): CsgNode {
    const plane = profilePlane(feature.profile);
    const sweep = extrusionVector(feature);
    if (Math.abs(dot(sweep, plane.normal)) < 1e-9) {
      throw new BackendError(
        "extrude_parallel",
        `Extrude ${feature.id} axis lies in its profile plane`
      );
    }
    const profile = feature.profile;
    const loop = profileLoop(profile);
    let region: Region;
    let corners: Point3D[];
    if (loop) {
      region = { kind: "loop", points: loop.map((p) => toPlane(plane, p)) };
      corners = loop;
    } else {
      const center: Point3D = profile.kind === "profile.circle" && profile.center
        ? profile.center
        : [0, 0, 0];
      const radius = profile.kind === "profile.circle" ? profile.radius : 0;
      region = { kind: "circle", center: toPlane(plane, center), radius };
      corners = [
        [center[0] - radius, center[1] - radius, center[2]],
        [center[0] + radius, center[1] + radius, center[2]],
      ];
    }
    return {
      kind: "prism",
      plane,
      region,
      sweep,
      bounds: pointBounds(corners.concat(corners.map((p) => add(p, sweep)))),
    };
  }

  private emit(name: string, node: CsgNode): KernelResult {
    seq += 1;
    const obj: KernelObject = {
      id: `csg-${seq}`,
      kind: "solid",
      meta: { op: node.kind === "boolean" ? node.op : node.kind, bounds: node.bounds },
    };
    this.nodes.set(obj, node);
    return { outputs: new Map([[name, obj]]) };
  }
}

export function containsPoint(node: CsgNode, point: Point3D): boolean {
  if (!insideBounds(node.bounds, point)) return false;
  switch (node.kind) {
    case "prism": {
      const height = dot(node.sweep, node.plane.normal);
      const offset = dot(
        [point[0] - node.plane.origin[0], point[1] - node.plane.origin[1], point[2] - node.plane.origin[2]],
        node.plane.normal
      );
      const t = offset / height;
      if (t < 0 || t > 1) return false;
      const base: Point3D = [
        point[0] - node.sweep[0] * t,
        point[1] - node.sweep[1] * t,
        point[2] - node.sweep[2] * t,
      ];
      return regionContains(node.region, toPlane(node.plane, base));
    }
    case "cone": {
      const t = (point[2] - node.center[2]) / node.height;
      if (t < 0 || t > 1) return false;
      const radius = node.radius + (node.topRadius - node.radius) * t;
      return Math.hypot(point[0] - node.center[0], point[1] - node.center[1]) <= radius;
    }
    case "boolean": {
      const inLeft = containsPoint(node.left, point);
      switch (node.op) {
        case "union":
          return inLeft || containsPoint(node.right, point);
        case "subtract":
          return inLeft && !containsPoint(node.right, point);
        case "intersect":
          return inLeft && containsPoint(node.right, point);
      }
    }
  }
}

function cone(feature: Cone): CsgNode {
  const [x, y, z] = feature.center;
  const reach = Math.max(feature.radius, feature.topRadius);
  return {
    kind: "cone",
    center: feature.center,
    radius: feature.radius,
    topRadius: feature.topRadius,
    height: feature.height,
    bounds: {
      min: [x - reach, y - reach, z],
      max: [x + reach, y + reach, z + feature.height],
    },
  };
}

function regionContains(region: Region, p: Point2D): boolean {
  if (region.kind === "circle") {
    return Math.hypot(p[0] - region.center[0], p[1] - region.center[1]) <= region.radius;
  }
  // Even-odd ray cast.
  let inside = false;
  const pts = region.points;
  for (let i = 0, j = pts.length - 1; i < pts.length; j = i, i += 1) {
    const a = pts[i];
    const b = pts[j];
    if (!a || !b) continue;
    if (a[1] > p[1] !== b[1] > p[1]) {
      const x = ((b[0] - a[0]) * (p[1] - a[1])) / (b[1] - a[1]) + a[0];
      if (p[0] < x) inside = !inside;
    }
  }
  return inside;
}

const EPS = 1e-9;

function insideBounds(bounds: Bounds, p: Point3D): boolean {
  for (let i = 0; i < 3; i += 1) {
    const lo = bounds.min[i] ?? 0;
    const hi = bounds.max[i] ?? 0;
    const v = p[i] ?? 0;
    if (v < lo - EPS || v > hi + EPS) return false;
  }
  return true;
}

function pointBounds(points: Point3D[]): Bounds {
  const min: Point3D = [Infinity, Infinity, Infinity];
  const max: Point3D = [-Infinity, -Infinity, -Infinity];
  for (const p of points) {
    for (let i = 0; i < 3; i += 1) {
      min[i] = Math.min(min[i] ?? Infinity, p[i] ?? 0);
      max[i] = Math.max(max[i] ?? -Infinity, p[i] ?? 0);
    }
  }
  return { min, max };
}

function combineBounds(op: BooleanOp["op"], a: Bounds, b: Bounds): Bounds {
  switch (op) {
    case "subtract":
      return a;
    case "union":
      return pointBounds([a.min, a.max, b.min, b.max]);
    case "intersect":
      return {
        min: [
          Math.max(a.min[0], b.min[0]),
          Math.max(a.min[1], b.min[1]),
          Math.max(a.min[2], b.min[2]),
        ],
        max: [
          Math.min(a.max[0], b.max[0]),
          Math.min(a.max[1], b.max[1]),
          Math.min(a.max[2], b.max[2]),
        ],
      };
  }
}
