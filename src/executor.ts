import type { Backend, BackendCapabilities, KernelObject, KernelResult } from "./backend.js";
import { compilePart } from "./compiler.js";
import type { IntentPart, Selector } from "./ir.js";
import { hashFeature } from "./hash.js";
import { resolveSelector } from "./selectors.js";
import { BackendError } from "./errors.js";

export type FeatureStep = {
  featureId: string;
  result: KernelResult;
};

export type BuildResult = {
  partId: string;
  order: string[];
  final: KernelResult;
  steps: FeatureStep[];
  featureHashes: Record<string, string>;
};

/** Error thrown by a backend, tagged with the feature that was executing. */
export type FeatureFailure = Error & { featureId?: string };

export function buildPart(part: IntentPart, backend: Backend): BuildResult {
  const compiled = compilePart(part);
  const byId = new Map(part.features.map((f) => [f.id, f]));
  const caps = backend.capabilities ? backend.capabilities() : undefined;

  let current: KernelResult = { outputs: new Map() };
  const steps: FeatureStep[] = [];

  for (const id of compiled.featureOrder) {
    const feature = byId.get(id);
    if (!feature) throw new Error(`Missing feature ${id}`);
    ensureBackendSupports(caps, feature.kind);

    let result: KernelResult;
    try {
      result = backend.execute({
        feature,
        upstream: current,
        resolve: (selector: Selector, upstream: KernelResult) =>
          resolveSelector(selector, upstream),
      });
    } catch (err) {
      throw withFeatureId(err, id);
    }

    current = mergeResults(current, result);
    steps.push({ featureId: id, result });
  }

  return {
    partId: compiled.partId,
    order: compiled.featureOrder,
    final: current,
    steps,
    featureHashes: hashFeatures(part),
  };
}

/** The solid bound to `output` once the part has been built. */
export function finalOutput(result: BuildResult, output: string): KernelObject {
  const hit = result.final.outputs.get(output);
  if (!hit) {
    throw new BackendError(
      "output_missing",
      `Part ${result.partId} produced no output ${output}`
    );
  }
  return hit;
}

function mergeResults(a: KernelResult, b: KernelResult): KernelResult {
  const outputs = new Map(a.outputs);
  for (const [key, value] of b.outputs) outputs.set(key, value);
  return { outputs };
}

function hashFeatures(part: IntentPart): Record<string, string> {
  const hashes: Record<string, string> = {};
  for (const feature of part.features) {
    hashes[feature.id] = hashFeature(feature);
  }
  return hashes;
}

function withFeatureId(err: unknown, featureId: string): unknown {
  if (!(err instanceof Error)) return err;
  const target: FeatureFailure = err;
  if (typeof target.featureId !== "string") target.featureId = featureId;
  return target;
}

function ensureBackendSupports(caps: BackendCapabilities | undefined, featureKind: string): void {
  if (!caps || !caps.featureKinds) return;
  if (caps.featureKinds.includes(featureKind)) return;
  const name = caps.name ? ` (${caps.name})` : "";
  throw new BackendError(
    "backend_unsupported_feature",
    `Backend${name} does not support feature ${featureKind}`
  );
}
