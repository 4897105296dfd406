import type { IntentFeature, IntentPart } from "./ir.js";

export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== "object") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  const entries = Object.entries(value)
    .filter(([, entry]) => entry !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const body = entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return `{${body.join(",")}}`;
}

export function hashFeature(feature: IntentFeature): string {
  return hashValue(feature);
}

/** Fingerprint of a whole recipe: identical recipes hash identically. */
export function hashPart(part: IntentPart): string {
  return hashValue(part);
}

export function hashValue(value: unknown): string {
  const normalized = stableStringify(value);
  // 64-bit FNV-1a.
  let hash = 0xcbf29ce484222325n;
  const prime = 0x100000001b3n;
  const mask = 0xffffffffffffffffn;
  for (let i = 0; i < normalized.length; i += 1) {
    hash ^= BigInt(normalized.charCodeAt(i));
    hash = (hash * prime) & mask;
  }
  return `h${hash.toString(16).padStart(16, "0")}`;
}
