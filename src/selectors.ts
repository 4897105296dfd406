import type { KernelObject, KernelResult } from "./backend.js";
import type { Selector } from "./ir.js";
import { CompileError } from "./errors.js";

export function resolveSelector(selector: Selector, upstream: KernelResult): KernelObject {
  const hit = upstream.outputs.get(selector.name);
  if (!hit) {
    throw new CompileError(
      "selector_named_missing",
      `Named output ${selector.name} is not available`
    );
  }
  return hit;
}
