export class CompileError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

export class BackendError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.code = code;
  }
}

export type HubErrorCode =
  | "unknown_feature"
  | "invalid_placement"
  | "unknown_variant"
  | "composition_failed"
  | "unknown_assembly_type"
  | "unknown_slot"
  | "channel_placement"
  | "generation_failed";

/**
 * Base class for every failure raised while generating a hub. `details`
 * carries the configuration context (feature kind, variant, slot, edge)
 * needed to trace the failure back to a parameter.
 */
export class HubError extends Error {
  readonly code: HubErrorCode;
  readonly details: Record<string, unknown>;
  constructor(
    code: HubErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.details = details;
  }
}

export class UnknownFeature extends HubError {
  readonly kind: string;
  constructor(kind: string) {
    super("unknown_feature", `Unknown slot feature ${kind}`, { kind });
    this.kind = kind;
  }
}

export class InvalidPlacement extends HubError {
  readonly kind: string;
  constructor(kind: string, detail: string, details: Record<string, unknown> = {}) {
    super("invalid_placement", `Invalid placement for ${kind}: ${detail}`, {
      kind,
      ...details,
    });
    this.kind = kind;
  }
}

export class UnknownVariant extends HubError {
  readonly variant: string;
  constructor(variant: string) {
    super("unknown_variant", `Unknown slot variant ${variant}`, { variant });
    this.variant = variant;
  }
}

export class CompositionFailed extends HubError {
  readonly variant: string;
  readonly feature: string;
  constructor(variant: string, feature: string, cause: unknown) {
    super(
      "composition_failed",
      `Composing variant ${variant} failed at ${feature}: ${describeCause(cause)}`,
      { variant, feature },
      { cause }
    );
    this.variant = variant;
    this.feature = feature;
  }
}

export class UnknownAssemblyType extends HubError {
  readonly assemblyType: string;
  constructor(assemblyType: string) {
    super("unknown_assembly_type", `Unknown assembly type ${assemblyType}`, {
      assemblyType,
    });
    this.assemblyType = assemblyType;
  }
}

export class UnknownSlot extends HubError {
  readonly slot: number;
  constructor(slot: number) {
    super("unknown_slot", `No slot labelled ${slot}`, { slot });
    this.slot = slot;
  }
}

export class ChannelPlacementError extends HubError {
  readonly edge: readonly [number, number];
  constructor(edge: readonly [number, number], detail: string, details: Record<string, unknown> = {}) {
    super("channel_placement", `Channel ${edge[0]}-${edge[1]}: ${detail}`, {
      edge: [edge[0], edge[1]],
      ...details,
    });
    this.edge = edge;
  }
}

export class HubGenerationError extends HubError {
  readonly stage: string;
  constructor(stage: string, assemblyType: string, cause: unknown) {
    super(
      "generation_failed",
      `Hub type ${assemblyType} failed during ${stage}: ${describeCause(cause)}`,
      { stage, assemblyType },
      { cause }
    );
    this.stage = stage;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
