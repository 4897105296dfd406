import type { Backend, KernelObject } from "../backend.js";
import type { HubConfig } from "../config.js";
import { assembly, instance } from "../dsl/assembly.js";
import { HubGenerationError } from "../errors.js";
import { buildPart, finalOutput, type BuildResult } from "../executor.js";
import type { IntentAssembly } from "../ir.js";
import { applyChannels, computeAdjacency, planChannels, type AdjacencyEdge } from "./channels.js";
import { createFeatureLibrary } from "./feature_library.js";
import { parseAssemblyType, resolveAssembly, type AssemblyType, type ResolvedSlot } from "./layout.js";

export type HubStage = "library" | "layout" | "channels" | "build";

export const HUB_STAGES: readonly HubStage[] = Object.freeze([
  "library",
  "layout",
  "channels",
  "build",
]);

export type BuiltSlot = ResolvedSlot &
  Readonly<{
    build: BuildResult;
    solid: KernelObject;
  }>;

export type HubBuild = {
  type: AssemblyType;
  slots: BuiltSlot[];
  edges: AdjacencyEdge[];
  assembly: IntentAssembly;
};

export type GenerateOptions = {
  onStage?: (stage: HubStage, type: string) => void;
};

export function buildHubAssembly(type: AssemblyType, slots: readonly ResolvedSlot[]): IntentAssembly {
  return assembly(
    `hub-${type}`,
    slots.map(({ position, body }) =>
      instance(`hub-${type}.slot-${position.label}`, body.part.id, { matrix: position.matrix.slice() }, [
        position.variant,
      ])
    )
  );
}

/**
 * Run one assembly type end to end. Stages run in order and the first
 * failure stops the run, reported as the stage it happened in.
 */
export function generateHub(
  config: HubConfig,
  type: string,
  backend: Backend,
  options: GenerateOptions = {}
): HubBuild {
  const stage = <T>(name: HubStage, run: () => T): T => {
    options.onStage?.(name, type);
    try {
      return run();
    } catch (err) {
      throw new HubGenerationError(name, type, err);
    }
  };

  const library = stage("library", () => createFeatureLibrary(config));
  const { assemblyType, placed } = stage("layout", () => {
    const assemblyType = parseAssemblyType(type);
    return { assemblyType, placed: resolveAssembly(config, library, assemblyType) };
  });
  const { edges, slots } = stage("channels", () => {
    const edges = computeAdjacency(
      config,
      placed.map((slot) => slot.position)
    );
    return { edges, slots: applyChannels(placed, planChannels(config, placed, edges)) };
  });
  const built = stage("build", () =>
    slots.map((slot): BuiltSlot => {
      const build = buildPart(slot.body.part, backend);
      return { ...slot, build, solid: finalOutput(build, slot.body.output) };
    })
  );

  return {
    type: assemblyType,
    slots: built,
    edges,
    assembly: buildHubAssembly(assemblyType, slots),
  };
}
