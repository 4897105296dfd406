import type { Graph, ID, IntentFeature, IntentPart, Selector } from "./ir.js";
import { CompileError } from "./errors.js";

export function buildDependencyGraph(part: IntentPart): Graph {
  const nodes = part.features.map((f) => f.id);
  const byId = new Map<ID, IntentFeature>();
  for (const feature of part.features) {
    if (byId.has(feature.id)) {
      throw new CompileError("feature_duplicate", `Duplicate feature id ${feature.id}`);
    }
    byId.set(feature.id, feature);
  }
  const outputToFeature = buildOutputIndex(part);
  const edges: Array<{ from: ID; to: ID }> = [];

  for (const feature of part.features) {
    const deps = new Set<ID>();
    for (const dep of feature.deps ?? []) {
      if (!byId.has(dep)) {
        throw new CompileError(
          "dep_missing",
          `Feature ${feature.id} depends on missing feature ${dep}`
        );
      }
      deps.add(dep);
    }
    for (const selector of featureSelectors(feature)) {
      deps.add(selectorDependency(selector, feature.id, outputToFeature));
    }
    for (const dep of deps) {
      if (dep === feature.id) {
        throw new CompileError("cycle", `Feature ${feature.id} depends on itself`);
      }
      edges.push({ from: dep, to: feature.id });
    }
  }
  return { nodes, edges };
}

function buildOutputIndex(part: IntentPart): Map<string, ID> {
  const outputToFeature = new Map<string, ID>();
  for (const feature of part.features) {
    const existing = outputToFeature.get(feature.result);
    if (existing) {
      throw new CompileError(
        "output_duplicate",
        `Duplicate output name ${feature.result} on features ${existing} and ${feature.id}`
      );
    }
    outputToFeature.set(feature.result, feature.id);
  }
  return outputToFeature;
}

function featureSelectors(feature: IntentFeature): Selector[] {
  switch (feature.kind) {
    case "feature.boolean":
      return [feature.left, feature.right];
    case "feature.extrude":
    case "feature.cone":
      return [];
  }
}

function selectorDependency(
  selector: Selector,
  featureId: ID,
  outputToFeature: Map<string, ID>
): ID {
  const hit = outputToFeature.get(selector.name);
  if (!hit) {
    throw new CompileError(
      "selector_named_missing",
      `Feature ${featureId} references missing output ${selector.name}`
    );
  }
  return hit;
}

/**
 * Kahn's algorithm with a lexicographically sorted ready queue, so the order
 * depends only on feature ids and edges, never on declaration order.
 */
export function topoSortDeterministic(features: IntentFeature[], graph: Graph): ID[] {
  const indegree = new Map<ID, number>();
  for (const node of graph.nodes) indegree.set(node, 0);
  for (const edge of graph.edges) {
    indegree.set(edge.to, (indegree.get(edge.to) ?? 0) + 1);
  }

  const known = new Set<ID>(features.map((f) => f.id));
  const queue: ID[] = [];
  for (const [id, deg] of indegree) {
    if (deg === 0) queue.push(id);
  }
  queue.sort();

  const result: ID[] = [];
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    result.push(id);
    for (const edge of graph.edges) {
      if (edge.from !== id) continue;
      const next = edge.to;
      const remaining = (indegree.get(next) ?? 0) - 1;
      indegree.set(next, remaining);
      if (remaining === 0) {
        queue.push(next);
        queue.sort();
      }
    }
  }

  if (result.length !== graph.nodes.length) {
    const missing = graph.nodes.filter((n) => !result.includes(n));
    throw new CompileError("cycle", `Dependency cycle detected: ${missing.join(", ")}`);
  }

  for (const id of result) {
    if (!known.has(id)) {
      throw new CompileError("missing_feature", `Missing feature ${id}`);
    }
  }

  return result;
}
