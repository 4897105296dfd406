import type {
  Backend,
  BackendCapabilities,
  ExecuteInput,
  KernelObject,
  KernelResult,
  MeshData,
  MeshOptions,
  StepExportOptions,
} from "./backend.js";
import type { BooleanOp, Cone, Extrude, Point3D, Profile } from "./ir.js";
import { BackendError, describeCause } from "./errors.js";
import { extrusionVector, profileLoop } from "./profile.js";

// Emscripten bindings; constructors are overloaded by numeric suffix.
export type OcctModule = any;

export type OcctBackendOptions = {
  occt: OcctModule;
};

const BOOLEAN_BUILDERS: Record<BooleanOp["op"], string> = {
  union: "BRepAlgoAPI_Fuse",
  subtract: "BRepAlgoAPI_Cut",
  intersect: "BRepAlgoAPI_Common",
};

export class OcctBackend implements Backend {
  private occt: OcctModule;
  private stepSeq = 0;

  constructor(options: OcctBackendOptions) {
    this.occt = options.occt;
  }

  capabilities(): BackendCapabilities {
    return {
      name: "opencascade.js",
      featureKinds: ["feature.extrude", "feature.cone", "feature.boolean"],
      mesh: true,
      exports: { step: true },
    };
  }

  execute(input: ExecuteInput): KernelResult {
    const feature = input.feature;
    switch (feature.kind) {
      case "feature.extrude":
        return this.emit(feature.id, feature.result, this.execExtrude(feature));
      case "feature.cone":
        return this.emit(feature.id, feature.result, this.execCone(feature));
      case "feature.boolean": {
        const left = this.shapeOf(input.resolve(feature.left, input.upstream));
        const right = this.shapeOf(input.resolve(feature.right, input.upstream));
        return this.emit(feature.id, feature.result, this.execBoolean(feature, left, right));
      }
    }
  }

  mesh(target: KernelObject, opts: MeshOptions = {}): MeshData {
    const shape = this.shapeOf(target);
    this.ensureTriangulation(shape, opts);

    const occt = this.occt;
    const explorer = new occt.TopExp_Explorer_1();
    explorer.Init(
      shape,
      occt.TopAbs_ShapeEnum.TopAbs_FACE,
      occt.TopAbs_ShapeEnum.TopAbs_SHAPE
    );

    const positions: number[] = [];
    const indices: number[] = [];
    let vertexOffset = 0;

    for (; explorer.More(); explorer.Next()) {
      const face = occt.TopoDS.Face_1(explorer.Current());
      const loc = new occt.TopLoc_Location_1();
      const handle = occt.BRep_Tool.Triangulation(face, loc, 0);
      if (handle.IsNull()) continue;
      const triangulation = handle.get();
      const trsf = loc.Transformation();
      const reversed =
        face.Orientation_1() === occt.TopAbs_Orientation.TopAbs_REVERSED;

      const nbNodes: number = triangulation.NbNodes();
      for (let i = 1; i <= nbNodes; i += 1) {
        const pnt = triangulation.Node(i).Transformed(trsf);
        positions.push(pnt.X(), pnt.Y(), pnt.Z());
      }

      const nbTriangles: number = triangulation.NbTriangles();
      for (let i = 1; i <= nbTriangles; i += 1) {
        const tri = triangulation.Triangle(i);
        const n1: number = tri.Value(1);
        const n2: number = tri.Value(2);
        const n3: number = tri.Value(3);
        if (reversed) {
          indices.push(vertexOffset + n1 - 1, vertexOffset + n3 - 1, vertexOffset + n2 - 1);
        } else {
          indices.push(vertexOffset + n1 - 1, vertexOffset + n2 - 1, vertexOffset + n3 - 1);
        }
      }
      vertexOffset += nbNodes;
    }

    return { positions, indices, normals: computeNormals(positions, indices) };
  }

  exportStep(target: KernelObject, _opts: StepExportOptions = {}): Uint8Array {
    const occt = this.occt;
    const shape = this.shapeOf(target);
    const writer = new occt.STEPControl_Writer_1();
    writer.Transfer(
      shape,
      occt.STEPControl_StepModelType.STEPControl_AsIs,
      true,
      this.makeProgressRange()
    );
    this.stepSeq += 1;
    const filename = `/export-${this.stepSeq}.step`;
    const status = writer.Write(filename);
    if (status !== occt.IFSelect_ReturnStatus.IFSelect_RetDone) {
      writer.delete();
      throw new BackendError("step_write_failed", `STEP export of ${target.id} failed`);
    }
    const data: Uint8Array = occt.FS.readFile(filename);
    occt.FS.unlink(filename);
    writer.delete();
    return new Uint8Array(data);
  }

  checkValid(target: KernelObject): boolean {
    const analyzer = new this.occt.BRepCheck_Analyzer(this.shapeOf(target), true, true);
    return analyzer.IsValid_2() === true;
  }

  /** Enclosed volume in mm^3. */
  volume(target: KernelObject): number {
    const occt = this.occt;
    const props = new occt.GProp_GProps_1();
    occt.BRepGProp.VolumeProperties_1(this.shapeOf(target), props, true, true, true);
    return props.Mass();
  }

  private execExtrude(feature: Extrude): any {
    const face = this.buildProfileFace(feature.profile);
    const [x, y, z] = extrusionVector(feature);
    const prism = this.newOcct("BRepPrimAPI_MakePrism", face, this.makeVec(x, y, z), false, true);
    return this.readShape(prism, feature.id);
  }

  private execCone(feature: Cone): any {
    const [x, y, z] = feature.center;
    const axes = new this.occt.gp_Ax2_3(this.makePnt(x, y, z), this.makeDir(0, 0, 1));
    const cone = new this.occt.BRepPrimAPI_MakeCone_3(
      axes,
      feature.radius,
      feature.topRadius,
      feature.height
    );
    return this.readShape(cone, feature.id);
  }

  private execBoolean(feature: BooleanOp, left: any, right: any): any {
    const name = BOOLEAN_BUILDERS[feature.op];
    const builder = new this.occt[`${name}_3`](left, right, this.makeProgressRange());
    builder.Build(this.makeProgressRange());
    if (!builder.IsDone()) {
      throw new BackendError("boolean_failed", `OCCT backend: ${name} failed for ${feature.id}`);
    }
    return this.dropSlivers(this.readShape(builder, feature.id));
  }

  private emit(featureId: string, result: string, shape: any): KernelResult {
    const obj: KernelObject = {
      id: `${featureId}:solid`,
      kind: "solid",
      meta: { shape },
    };
    return { outputs: new Map([[result, obj]]) };
  }

  private shapeOf(target: KernelObject): any {
    const shape = target.meta["shape"];
    if (!shape) {
      throw new BackendError("shape_missing", `OCCT backend: ${target.id} has no shape`);
    }
    return shape;
  }

  private dropSlivers(shape: any): any {
    const occt = this.occt;
    const explorer = new occt.TopExp_Explorer_1();
    explorer.Init(
      shape,
      occt.TopAbs_ShapeEnum.TopAbs_SOLID,
      occt.TopAbs_ShapeEnum.TopAbs_SHAPE
    );
    const solids: any[] = [];
    for (; explorer.More(); explorer.Next()) solids.push(explorer.Current());
    if (solids.length <= 1) return solids[0] ?? shape;
    // Keep the compound when a cut splits the body; drop only empty slivers.
    const compound = new occt.TopoDS_Compound();
    const builder = new occt.BRep_Builder();
    builder.MakeCompound(compound);
    for (const solid of solids) {
      const props = new occt.GProp_GProps_1();
      occt.BRepGProp.VolumeProperties_1(solid, props, true, true, true);
      if (props.Mass() > 1e-9) builder.Add(compound, solid);
    }
    return compound;
  }

  private buildProfileFace(profile: Profile): any {
    const occt = this.occt;
    if (profile.kind === "profile.circle") {
      const [cx, cy, cz] = profile.center ?? [0, 0, 0];
      const ax2 = new occt.gp_Ax2_3(this.makePnt(cx, cy, cz), this.makeDir(0, 0, 1));
      const circle = new occt.gp_Circ_2(ax2, profile.radius);
      const edge = new occt.BRepBuilderAPI_MakeEdge_8(circle);
      const wire = new occt.BRepBuilderAPI_MakeWire_2(edge.Edge());
      return new occt.BRepBuilderAPI_MakeFace_15(wire.Wire(), true).Face();
    }
    const loop = profileLoop(profile);
    if (!loop) {
      throw new BackendError("profile_unsupported", `OCCT backend: no loop for ${profile.kind}`);
    }
    return this.makePolygonFace(loop);
  }

  private makePolygonFace(points: Point3D[]): any {
    const poly = new this.occt.BRepBuilderAPI_MakePolygon_1();
    for (const [x, y, z] of points) {
      poly.Add_1(this.makePnt(x, y, z));
    }
    poly.Close();
    return new this.occt.BRepBuilderAPI_MakeFace_15(poly.Wire(), true).Face();
  }

  private readShape(builder: any, featureId: string): any {
    if (typeof builder.Shape !== "function") {
      throw new BackendError("shape_missing", `OCCT backend: ${featureId} builder has no Shape()`);
    }
    return builder.Shape();
  }

  private newOcct(name: string, ...args: unknown[]): any {
    const candidates = [name];
    for (let i = 1; i <= 25; i += 1) candidates.push(`${name}_${i}`);
    let lastError: unknown;
    for (const key of candidates) {
      const Ctor = this.occt[key];
      if (typeof Ctor !== "function") continue;
      try {
        return new Ctor(...args);
      } catch (err) {
        lastError = err;
      }
    }
    const reason = lastError === undefined ? "not available" : describeCause(lastError);
    throw new BackendError("occt_constructor", `OCCT backend: no constructor for ${name} (${reason})`);
  }

  private makePnt(x: number, y: number, z: number): any {
    return new this.occt.gp_Pnt_3(x, y, z);
  }

  private makeDir(x: number, y: number, z: number): any {
    return new this.occt.gp_Dir_3(new this.occt.gp_XYZ_2(x, y, z));
  }

  private makeVec(x: number, y: number, z: number): any {
    return new this.occt.gp_Vec_3(new this.occt.gp_XYZ_2(x, y, z));
  }

  private makeProgressRange(): any {
    return new this.occt.Message_ProgressRange_1();
  }

  private ensureTriangulation(shape: any, opts: MeshOptions): void {
    const linear = opts.linearDeflection ?? 0.2;
    const angular = opts.angularDeflection ?? 0.3;
    const relative = opts.relative ?? false;
    new this.occt.BRepMesh_IncrementalMesh_2(
      shape,
      linear,
      relative,
      angular,
      false
    );
  }
}

function computeNormals(positions: number[], indices: number[]): number[] {
  const normals = new Array<number>(positions.length).fill(0);
  const at = (i: number) => positions[i] ?? 0;
  for (let i = 0; i + 2 < indices.length; i += 3) {
    const ia = (indices[i] ?? 0) * 3;
    const ib = (indices[i + 1] ?? 0) * 3;
    const ic = (indices[i + 2] ?? 0) * 3;
    const abx = at(ib) - at(ia);
    const aby = at(ib + 1) - at(ia + 1);
    const abz = at(ib + 2) - at(ia + 2);
    const acx = at(ic) - at(ia);
    const acy = at(ic + 1) - at(ia + 1);
    const acz = at(ic + 2) - at(ia + 2);
    const n = [aby * acz - abz * acy, abz * acx - abx * acz, abx * acy - aby * acx];
    for (const base of [ia, ib, ic]) {
      for (let k = 0; k < 3; k += 1) {
        normals[base + k] = (normals[base + k] ?? 0) + (n[k] ?? 0);
      }
    }
  }
  for (let i = 0; i < normals.length; i += 3) {
    const nx = normals[i] ?? 0;
    const ny = normals[i + 1] ?? 0;
    const nz = normals[i + 2] ?? 0;
    const len = Math.hypot(nx, ny, nz);
    const inv = len > 1e-12 ? 1 / len : 0;
    normals[i] = nx * inv;
    normals[i + 1] = ny * inv;
    normals[i + 2] = nz * inv;
  }
  return normals;
}
