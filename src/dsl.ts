import { part } from "./dsl/core.js";
import {
  assembly,
  instance as assemblyInstance,
  transform,
} from "./dsl/assembly.js";
import {
  axisVector,
  booleanOp,
  cone,
  extrude,
  profileCircle,
  profilePoly,
  profilePolygon,
  profileRect,
  selectorNamed,
} from "./dsl/geometry.js";
import type {
  AssemblyInstance,
  BooleanOp,
  Cone,
  Extrude,
  ExtrudeAxis,
  ID,
  IntentAssembly,
  IntentFeature,
  IntentPart,
  NamedOutput,
  Point3D,
  Profile,
  Selector,
  Transform,
} from "./ir.js";

export * from "./ir.js";

export type DslHelpers = {
  /** Create a part from a list of features. */
  part: (id: ID, features: IntentFeature[]) => IntentPart;
  /** Create an assembly of part instances. */
  assembly: (id: ID, instances: AssemblyInstance[]) => IntentAssembly;
  /** Place a part in an assembly. */
  assemblyInstance: (
    id: ID,
    part: ID,
    transform?: Transform,
    tags?: string[]
  ) => AssemblyInstance;
  /** Normalize a translation or matrix into a matrix transform. */
  transform: (opts?: Transform) => Transform;
  /**
   * Extrude a planar profile. Without an axis the profile is extruded along +Z;
   * `result` defaults to `body:<id>`.
   */
  extrude: (
    id: ID,
    profile: Profile,
    depth: number,
    result?: string,
    deps?: ID[],
    opts?: { axis?: ExtrudeAxis }
  ) => Extrude;
  /** Truncated cone standing on `center`, narrowing (or widening) toward +Z. */
  cone: (
    id: ID,
    center: Point3D,
    radius: number,
    topRadius: number,
    height: number,
    result?: string,
    deps?: ID[]
  ) => Cone;
  booleanOp: (
    id: ID,
    op: BooleanOp["op"],
    left: Selector,
    right: Selector,
    result?: string,
    deps?: ID[]
  ) => BooleanOp;
  profileRect: (width: number, height: number, center?: Point3D) => Profile;
  profileCircle: (radius: number, center?: Point3D) => Profile;
  /** Regular polygon; the first vertex sits at `rotation` radians from +X. */
  profilePoly: (sides: number, radius: number, center?: Point3D, rotation?: number) => Profile;
  profilePolygon: (points: Point3D[]) => Profile;
  selectorNamed: (name: string) => NamedOutput;
  axisVector: (direction: Point3D) => ExtrudeAxis;
};

export const dsl: DslHelpers = {
  part,
  assembly,
  assemblyInstance,
  transform,
  extrude,
  cone,
  booleanOp,
  profileRect,
  profileCircle,
  profilePoly,
  profilePolygon,
  selectorNamed,
  axisVector,
};
