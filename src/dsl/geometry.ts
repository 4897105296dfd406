import type {
  BooleanOp,
  Cone,
  Extrude,
  ExtrudeAxis,
  ID,
  NamedOutput,
  Point3D,
  Profile,
  Selector,
} from "../ir.js";

const withDeps = (deps?: ID[]) => (deps ? { deps } : {});
const withCenter = (center?: Point3D) => (center ? { center } : {});

export const extrude = (
  id: ID,
  profile: Profile,
  depth: number,
  result?: string,
  deps?: ID[],
  opts?: { axis?: ExtrudeAxis }
): Extrude => ({
  id,
  kind: "feature.extrude",
  profile,
  depth,
  result: result ?? `body:${id}`,
  ...withDeps(deps),
  ...(opts?.axis ? { axis: opts.axis } : {}),
});

export const cone = (
  id: ID,
  center: Point3D,
  radius: number,
  topRadius: number,
  height: number,
  result?: string,
  deps?: ID[]
): Cone => ({
  id,
  kind: "feature.cone",
  center,
  radius,
  topRadius,
  height,
  result: result ?? `body:${id}`,
  ...withDeps(deps),
});

export const booleanOp = (
  id: ID,
  op: BooleanOp["op"],
  left: Selector,
  right: Selector,
  result?: string,
  deps?: ID[]
): BooleanOp => ({
  id,
  kind: "feature.boolean",
  op,
  left,
  right,
  result: result ?? `body:${id}`,
  ...withDeps(deps),
});

export const profileRect = (width: number, height: number, center?: Point3D): Profile => ({
  kind: "profile.rectangle",
  width,
  height,
  ...withCenter(center),
});

export const profileCircle = (radius: number, center?: Point3D): Profile => ({
  kind: "profile.circle",
  radius,
  ...withCenter(center),
});

export const profilePoly = (
  sides: number,
  radius: number,
  center?: Point3D,
  rotation?: number
): Profile => ({
  kind: "profile.poly",
  sides,
  radius,
  ...withCenter(center),
  ...(rotation !== undefined ? { rotation } : {}),
});

export const profilePolygon = (points: Point3D[]): Profile => ({
  kind: "profile.polygon",
  points,
});

export const selectorNamed = (name: string): NamedOutput => ({
  kind: "selector.named",
  name,
});

export const axisVector = (direction: Point3D): ExtrudeAxis => ({
  kind: "axis.vector",
  direction,
});
