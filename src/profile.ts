import type { AxisDirection, Extrude, ExtrudeAxis, Point2D, Point3D, Profile } from "./ir.js";
import { CompileError } from "./errors.js";
import { cross, dot, length, normalize, scale, sub } from "./vec.js";

/** Plane a profile lies in, with an in-plane basis (u, v) and unit normal. */
export type ProfilePlane = {
  origin: Point3D;
  normal: Point3D;
  u: Point3D;
  v: Point3D;
};

const AXIS_VECTORS: Record<AxisDirection, Point3D> = {
  "+X": [1, 0, 0],
  "-X": [-1, 0, 0],
  "+Y": [0, 1, 0],
  "-Y": [0, -1, 0],
  "+Z": [0, 0, 1],
  "-Z": [0, 0, -1],
};

const XY_PLANE_Z = (z: number): ProfilePlane => ({
  origin: [0, 0, z],
  normal: [0, 0, 1],
  u: [1, 0, 0],
  v: [0, 1, 0],
});

export function axisVector(axis: ExtrudeAxis | undefined): Point3D {
  if (axis === undefined) return AXIS_VECTORS["+Z"];
  if (typeof axis === "string") return AXIS_VECTORS[axis];
  return normalize(axis.direction);
}

/** Full sweep vector of an extrusion: unit axis scaled by depth. */
export function extrusionVector(feature: Extrude): Point3D {
  return scale(axisVector(feature.axis), feature.depth);
}

/**
 * Closed vertex loop of a profile. Circles have no loop and return null;
 * rectangles, regular polygons and point loops are returned as-is.
 */
export function profileLoop(profile: Profile): Point3D[] | null {
  switch (profile.kind) {
    case "profile.circle":
      return null;
    case "profile.rectangle": {
      const [cx, cy, cz] = profile.center ?? [0, 0, 0];
      const hw = profile.width / 2;
      const hh = profile.height / 2;
      return [
        [cx - hw, cy - hh, cz],
        [cx + hw, cy - hh, cz],
        [cx + hw, cy + hh, cz],
        [cx - hw, cy + hh, cz],
      ];
    }
    case "profile.poly": {
      const [cx, cy, cz] = profile.center ?? [0, 0, 0];
      const rotation = profile.rotation ?? 0;
      const points: Point3D[] = [];
      for (let i = 0; i < profile.sides; i += 1) {
        const angle = rotation + (2 * Math.PI * i) / profile.sides;
        points.push([
          cx + profile.radius * Math.cos(angle),
          cy + profile.radius * Math.sin(angle),
          cz,
        ]);
      }
      return points;
    }
    case "profile.polygon":
      return profile.points.map((p): Point3D => [p[0], p[1], p[2]]);
  }
}

export function profilePlane(profile: Profile): ProfilePlane {
  if (profile.kind !== "profile.polygon") {
    return XY_PLANE_Z(profile.center?.[2] ?? 0);
  }
  const points = profile.points;
  // Newell's method; tolerant of collinear runs.
  let nx = 0;
  let ny = 0;
  let nz = 0;
  for (let i = 0; i < points.length; i += 1) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    if (!a || !b) continue;
    nx += (a[1] - b[1]) * (a[2] + b[2]);
    ny += (a[2] - b[2]) * (a[0] + b[0]);
    nz += (a[0] - b[0]) * (a[1] + b[1]);
  }
  const raw: Point3D = [nx, ny, nz];
  if (length(raw) < 1e-12) {
    throw new CompileError("profile_degenerate", "Polygon profile has no area");
  }
  const normal = normalize(raw);
  const origin = points[0] ?? [0, 0, 0];
  const reference: Point3D = Math.abs(normal[2]) < 0.9 ? [0, 0, 1] : [1, 0, 0];
  const u = normalize(cross(reference, normal));
  const v = cross(normal, u);
  return { origin, normal, u, v };
}

export function toPlane(plane: ProfilePlane, point: Point3D): Point2D {
  const rel = sub(point, plane.origin);
  return [dot(rel, plane.u), dot(rel, plane.v)];
}
