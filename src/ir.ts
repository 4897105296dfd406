export type ID = string;

export type LengthUnit = "mm" | "cm" | "m" | "in";
export type AngleUnit = "rad" | "deg";
export type Unit = LengthUnit | AngleUnit;
export type AxisDirection = "+X" | "-X" | "+Y" | "-Y" | "+Z" | "-Z";

export type Point2D = [number, number];
export type Point3D = [number, number, number];

export type ExtrudeAxis = AxisDirection | { kind: "axis.vector"; direction: Point3D };

export type IntentPart = {
  id: ID;
  features: IntentFeature[];
};

export type IntentAssembly = {
  id: ID;
  instances: AssemblyInstance[];
};

export type AssemblyInstance = {
  id: ID;
  part: ID;
  transform?: Transform;
  tags?: string[];
};

export type Transform = {
  translation?: [number, number, number];
  // 4x4 column-major matrix, length 16 when provided.
  matrix?: number[];
};

export type IntentFeature = Extrude | Cone | BooleanOp;

export type FeatureBase = {
  id: ID;
  kind: string;
  deps?: ID[];
};

export type Extrude = FeatureBase & {
  kind: "feature.extrude";
  profile: Profile;
  depth: number;
  result: string;
  // Defaults to +Z. A vector axis is normalized and scaled by depth.
  axis?: ExtrudeAxis;
};

// Truncated cone along +Z from `center`; a zero top radius gives a point.
export type Cone = FeatureBase & {
  kind: "feature.cone";
  center: Point3D;
  radius: number;
  topRadius: number;
  height: number;
  result: string;
};

export type BooleanOp = FeatureBase & {
  kind: "feature.boolean";
  op: "union" | "subtract" | "intersect";
  left: Selector;
  right: Selector;
  result: string;
};

export type Profile =
  | {
      kind: "profile.rectangle";
      width: number;
      height: number;
      center?: Point3D;
    }
  | {
      kind: "profile.circle";
      radius: number;
      center?: Point3D;
    }
  | {
      kind: "profile.poly";
      sides: number;
      radius: number;
      center?: Point3D;
      rotation?: number;
    }
  | {
      // Closed planar loop; the last point connects back to the first.
      kind: "profile.polygon";
      points: Point3D[];
    };

export type Selector = NamedOutput;

export type NamedOutput = {
  kind: "selector.named";
  name: string;
};

export type CompileResult = {
  partId: ID;
  featureOrder: ID[];
  graph: Graph;
};

export type Graph = {
  nodes: ID[];
  edges: Array<{ from: ID; to: ID }>;
};
