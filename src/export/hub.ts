import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Backend, MeshData, MeshOptions } from "../backend.js";
import { BackendError } from "../errors.js";
import type { HubConfig } from "../config.js";
import { generateHub, type GenerateOptions, type HubBuild } from "../hub/generate.js";
import type { SlotVariant } from "../hub/variants.js";
import { transformDirection, transformPoint, type Matrix4 } from "../transform.js";
import { exportStl } from "./stl.js";
import { export3mf } from "./three_mf.js";

export const VARIANT_COLORS: Readonly<Record<SlotVariant, string>> = Object.freeze({
  basic: "#B4B4B4",
  controller: "#3A6FB0",
  usb: "#C4572E",
});

export type HubExportOptions = {
  mesh?: MeshOptions;
  /** Write STEP files when the backend can. Defaults to true. */
  step?: boolean;
};

export type HubExportResult = {
  files: string[];
};

/** Copy of `mesh` moved by a placement matrix. */
export function placeMesh(mesh: MeshData, matrix: Matrix4): MeshData {
  const positions: number[] = [];
  for (let i = 0; i + 2 < mesh.positions.length; i += 3) {
    positions.push(
      ...transformPoint(matrix, [
        mesh.positions[i] ?? 0,
        mesh.positions[i + 1] ?? 0,
        mesh.positions[i + 2] ?? 0,
      ])
    );
  }
  const placed: MeshData = { positions };
  if (mesh.indices) placed.indices = mesh.indices.slice();
  if (mesh.normals) {
    const normals: number[] = [];
    for (let i = 0; i + 2 < mesh.normals.length; i += 3) {
      normals.push(
        ...transformDirection(matrix, [
          mesh.normals[i] ?? 0,
          mesh.normals[i + 1] ?? 0,
          mesh.normals[i + 2] ?? 0,
        ])
      );
    }
    placed.normals = normals;
  }
  return placed;
}

/**
 * Write one STL (and STEP where supported) per slot plus the assembled hub
 * as a multi-object 3MF. Every file is rendered before the first write.
 */
export async function exportHub(
  build: HubBuild,
  backend: Backend,
  outDir: string,
  opts: HubExportOptions = {}
): Promise<HubExportResult> {
  const caps = backend.capabilities?.();
  if (caps?.mesh === false) {
    throw new BackendError(
      "export_unsupported",
      `Backend ${caps.name ?? "unknown"} cannot mesh; nothing exported`
    );
  }
  const withStep = (opts.step ?? true) && caps?.exports?.step === true && !!backend.exportStep;

  const outputs = new Map<string, Uint8Array>();
  const objects = build.slots.map((slot) => {
    const name = `hub-${build.type}-slot-${slot.position.label}`;
    const mesh = backend.mesh(slot.solid, opts.mesh);
    outputs.set(`${name}.stl`, exportStl(mesh, name));
    if (withStep && backend.exportStep) {
      outputs.set(`${name}.step`, backend.exportStep(slot.solid));
    }
    return {
      name: `slot-${slot.position.label}`,
      mesh: placeMesh(mesh, slot.position.matrix),
      color: VARIANT_COLORS[slot.position.variant],
    };
  });
  outputs.set(`hub-${build.type}.3mf`, export3mf(objects, { unit: "mm" }));

  await mkdir(outDir, { recursive: true });
  const files: string[] = [];
  for (const [file, data] of outputs) {
    const target = path.join(outDir, file);
    await writeFile(target, data);
    files.push(target);
  }
  return { files };
}

export type HubRunOptions = HubExportOptions &
  GenerateOptions & {
    onBuilt?: (build: HubBuild, elapsedMs: number) => void;
    onWritten?: (build: HubBuild, files: string[]) => void;
  };

/**
 * Generate every requested assembly type, then export them in turn. A type
 * that fails to generate stops the run before any file is written.
 */
export async function generateAndExport(
  config: HubConfig,
  types: readonly string[],
  backend: Backend,
  outDir: string,
  opts: HubRunOptions = {}
): Promise<HubExportResult> {
  const builds = types.map((type) => {
    const started = Date.now();
    const build = generateHub(config, type, backend, opts);
    opts.onBuilt?.(build, Date.now() - started);
    return build;
  });
  const files: string[] = [];
  for (const build of builds) {
    const written = await exportHub(build, backend, outDir, opts);
    opts.onWritten?.(build, written.files);
    files.push(...written.files);
  }
  return { files };
}
