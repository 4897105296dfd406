import type { AssemblyInstance, ID, IntentAssembly, Transform } from "../ir.js";
import { normalizeTransform } from "../transform.js";

export const assembly = (id: ID, instances: AssemblyInstance[]): IntentAssembly => ({
  id,
  instances,
});

export const instance = (
  id: ID,
  part: ID,
  transform?: Transform,
  tags?: string[]
): AssemblyInstance => ({
  id,
  part,
  ...(transform ? { transform } : {}),
  ...(tags ? { tags } : {}),
});

export const transform = (opts: Transform = {}): Transform => ({
  matrix: normalizeTransform(opts),
});
