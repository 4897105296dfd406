import { CompositionFailed, UnknownVariant } from "../errors.js";
import {
  applyFeature,
  CONNECTOR_FEATURES,
  CONNECTOR_SIDES,
  emptySlotBody,
  PHASE_RANK,
  type ConnectorSide,
  type FeatureKind,
  type FeatureLibrary,
  type SlotBody,
} from "./feature_library.js";

export type SlotVariant = "basic" | "controller" | "usb";

const BASIC: readonly FeatureKind[] = ["base-shell", "floor-holes", "magnet-bosses", "pogo-bosses"];

/** Feature list of every variant, base shell first. */
export const VARIANT_FEATURES: Readonly<Record<SlotVariant, readonly FeatureKind[]>> =
  Object.freeze({
    basic: Object.freeze([...BASIC]),
    controller: Object.freeze<FeatureKind[]>([...BASIC, "controller-bosses"]),
    usb: Object.freeze<FeatureKind[]>([...BASIC, "usb-bosses", "usb-cutout"]),
  });

export const SLOT_VARIANTS: readonly SlotVariant[] = Object.freeze(["basic", "controller", "usb"]);

export function isSlotVariant(name: string): name is SlotVariant {
  return Object.prototype.hasOwnProperty.call(VARIANT_FEATURES, name);
}

/**
 * Compose a variant with optional side rails. A rail on the wall that
 * carries the USB opening is left off.
 */
export function composeVariant(
  library: FeatureLibrary,
  name: string,
  connectors: readonly ConnectorSide[] = []
): SlotBody {
  if (!isSlotVariant(name)) throw new UnknownVariant(name);
  const sides = connectorsFor(library, name, connectors);
  const label = sides.length > 0 ? `${name}-${sides.join("-").toLowerCase()}` : name;
  return composeFeatures(
    library,
    [...VARIANT_FEATURES[name], ...sides.map((side) => CONNECTOR_FEATURES[side])],
    label
  );
}

/** Distinct rails in wall order, minus the USB wall. */
function connectorsFor(
  library: FeatureLibrary,
  variant: SlotVariant,
  connectors: readonly ConnectorSide[]
): ConnectorSide[] {
  const usbWall = variant === "usb" ? library.config.usb.wallSide : null;
  return CONNECTOR_SIDES.filter((side) => connectors.includes(side) && side !== usbWall);
}

/**
 * Build a body from any feature selection. The base shell goes first, then
 * the rest by phase, keeping list order within a phase so subtractive
 * cutouts always follow the bosses.
 */
export function composeFeatures(
  library: FeatureLibrary,
  kinds: readonly string[],
  label: string
): SlotBody {
  const features = kinds.map((kind) => library.get(kind));
  const ordered = features
    .map((feature, index) => ({ feature, index }))
    .sort(
      (a, b) =>
        PHASE_RANK[a.feature.phase] - PHASE_RANK[b.feature.phase] || a.index - b.index
    )
    .map((entry) => entry.feature);

  let body = emptySlotBody(`slot-${label}`);
  for (const feature of ordered) {
    try {
      body = applyFeature(body, feature);
    } catch (err) {
      throw new CompositionFailed(label, feature.kind, err);
    }
  }
  return body;
}

export type VariantCache = {
  get(name: string, connectors?: readonly ConnectorSide[]): SlotBody;
  readonly size: number;
};

/**
 * Composes each variant and rail combination at most once for the lifetime
 * of the cache.
 */
export function createVariantCache(library: FeatureLibrary): VariantCache {
  const cache = new Map<string, SlotBody>();
  return {
    get(name: string, connectors: readonly ConnectorSide[] = []): SlotBody {
      if (!isSlotVariant(name)) throw new UnknownVariant(name);
      const key = [name, ...connectorsFor(library, name, connectors)].join("|");
      const hit = cache.get(key);
      if (hit) return hit;
      const body = composeVariant(library, name, connectors);
      cache.set(key, body);
      return body;
    },
    get size() {
      return cache.size;
    },
  };
}
