export * from "./ir.js";
export * from "./dsl.js";
export { buildPart, finalOutput } from "./executor.js";
export { compilePart, validatePart } from "./compiler.js";
export { hashFeature, hashPart, hashValue, stableStringify } from "./hash.js";
export * from "./errors.js";
export * from "./export/index.js";
export type { BuildResult, FeatureStep, FeatureFailure } from "./executor.js";
export type {
  Backend,
  BackendCapabilities,
  ExecuteInput,
  KernelObject,
  KernelResult,
  MeshData,
  MeshOptions,
  StepExportOptions,
  StepSchema,
} from "./backend.js";
export { OcctBackend } from "./backend_occt.js";
export type { OcctBackendOptions, OcctModule } from "./backend_occt.js";
export { CsgBackend, containsPoint } from "./csg_backend.js";
export type { Bounds, CsgNode } from "./csg_backend.js";

export { buildParamTable, normalizeEntry, parseParamDocument } from "./params.js";
export type { ParamDocument, ParamEntry, ParamOverrides, ParamTable } from "./params.js";
export {
  DEFAULT_CONFIG_PATH,
  defaultHubConfig,
  hubConfigFromParams,
  loadHubConfig,
} from "./config.js";
export type { BossConfig, HubConfig, HubDimensions, ShellConfig, UsbWallSide } from "./config.js";

export {
  applyFeature,
  CONNECTOR_FEATURES,
  CONNECTOR_SIDES,
  createFeatureLibrary,
  defineFeature,
  emptySlotBody,
  FEATURE_KINDS,
  isFeatureKind,
} from "./hub/feature_library.js";
export type {
  AnyFeature,
  ConnectorSide,
  Feature,
  FeatureKind,
  FeatureLibrary,
  FeatureParameters,
  RailParameters,
  ShellEnvelope,
  SlotBody,
  SocketParameters,
} from "./hub/feature_library.js";
export {
  composeFeatures,
  composeVariant,
  createVariantCache,
  isSlotVariant,
  SLOT_VARIANTS,
  VARIANT_FEATURES,
} from "./hub/variants.js";
export type { SlotVariant, VariantCache } from "./hub/variants.js";
export {
  ASSEMBLY_LAYOUTS,
  parseAssemblyType,
  positionOf,
  resolveAssembly,
  slotPositions,
} from "./hub/layout.js";
export type { AssemblyType, RailPair, ResolvedSlot, SlotLabel, SlotPosition } from "./hub/layout.js";
export {
  applyChannels,
  computeAdjacency,
  planChannel,
  planChannels,
  synthesizeChannels,
} from "./hub/channels.js";
export type { AdjacencyEdge, ChannelCutout } from "./hub/channels.js";
export { buildHubAssembly, generateHub, HUB_STAGES } from "./hub/generate.js";
export type { BuiltSlot, GenerateOptions, HubBuild, HubStage } from "./hub/generate.js";
