import type { ID, IntentFeature, Selector } from "./ir.js";

export type KernelResult = {
  outputs: Map<string, KernelObject>;
};

export type KernelObject = {
  id: ID;
  kind: "solid";
  meta: Record<string, unknown>;
};

export type BackendCapabilities = {
  name?: string;
  featureKinds?: string[];
  mesh?: boolean;
  exports?: {
    step?: boolean;
  };
};

export type MeshOptions = {
  linearDeflection?: number;
  angularDeflection?: number;
  relative?: boolean;
};

export type StepSchema = "AP203" | "AP214" | "AP242";
export type StepExportOptions = {
  schema?: StepSchema;
};

export type MeshData = {
  positions: number[];
  indices?: number[];
  normals?: number[];
};

export type ExecuteInput = {
  feature: IntentFeature;
  upstream: KernelResult;
  resolve: (selector: Selector, upstream: KernelResult) => KernelObject;
};

/**
 * Geometry kernel adapter. The executor hands each compiled feature to
 * `execute` in order; everything a feature refers to arrives through
 * `upstream` and `resolve`.
 */
export interface Backend {
  capabilities?(): BackendCapabilities;
  execute(input: ExecuteInput): KernelResult;
  mesh(target: KernelObject, opts?: MeshOptions): MeshData;
  exportStep?(target: KernelObject, opts?: StepExportOptions): Uint8Array;
  checkValid?(target: KernelObject): boolean;
}
