import type {
  CompileResult,
  ExtrudeAxis,
  IntentFeature,
  IntentPart,
  Point3D,
  Profile,
} from "./ir.js";
import { CompileError } from "./errors.js";
import { buildDependencyGraph, topoSortDeterministic } from "./graph.js";

export function compilePart(part: IntentPart): CompileResult {
  validatePart(part);
  const graph = buildDependencyGraph(part);
  const order = topoSortDeterministic(part.features, graph);
  return { partId: part.id, featureOrder: order, graph };
}

export function validatePart(part: IntentPart): void {
  if (part.id.length === 0) {
    throw new CompileError("part_id_empty", "Part id must be non-empty");
  }
  if (part.features.length === 0) {
    throw new CompileError("part_empty", `Part ${part.id} has no features`);
  }
  for (const feature of part.features) {
    validateFeature(feature);
  }
}

function validateFeature(feature: IntentFeature): void {
  switch (feature.kind) {
    case "feature.extrude":
      requirePositive(feature.depth, `${feature.id}.depth`);
      validateProfile(feature.profile, feature.id);
      if (feature.axis !== undefined) validateAxis(feature.axis, feature.id);
      return;
    case "feature.cone":
      requirePoint(feature.center, `${feature.id}.center`);
      requirePositive(feature.radius, `${feature.id}.radius`);
      requireFinite(feature.topRadius, `${feature.id}.topRadius`);
      if (feature.topRadius < 0) {
        throw new CompileError("value_negative", `${feature.id}.topRadius must not be negative`);
      }
      requirePositive(feature.height, `${feature.id}.height`);
      if (feature.topRadius === feature.radius) {
        throw new CompileError("cone_cylinder", `${feature.id} has equal radii; extrude a circle instead`);
      }
      return;
    case "feature.boolean":
      if (feature.left.name === feature.right.name) {
        throw new CompileError(
          "boolean_self",
          `Feature ${feature.id} combines ${feature.left.name} with itself`
        );
      }
      return;
  }
}

function validateProfile(profile: Profile, featureId: string): void {
  switch (profile.kind) {
    case "profile.rectangle":
      requirePositive(profile.width, `${featureId}.profile.width`);
      requirePositive(profile.height, `${featureId}.profile.height`);
      if (profile.center) requirePoint(profile.center, `${featureId}.profile.center`);
      return;
    case "profile.circle":
      requirePositive(profile.radius, `${featureId}.profile.radius`);
      if (profile.center) requirePoint(profile.center, `${featureId}.profile.center`);
      return;
    case "profile.poly":
      if (!Number.isInteger(profile.sides) || profile.sides < 3) {
        throw new CompileError(
          "profile_sides_invalid",
          `${featureId}.profile.sides must be an integer >= 3`
        );
      }
      requirePositive(profile.radius, `${featureId}.profile.radius`);
      if (profile.center) requirePoint(profile.center, `${featureId}.profile.center`);
      if (profile.rotation !== undefined) {
        requireFinite(profile.rotation, `${featureId}.profile.rotation`);
      }
      return;
    case "profile.polygon":
      if (profile.points.length < 3) {
        throw new CompileError(
          "profile_points_invalid",
          `${featureId}.profile.points needs at least 3 points`
        );
      }
      profile.points.forEach((point, index) =>
        requirePoint(point, `${featureId}.profile.points[${index}]`)
      );
      return;
  }
}

function validateAxis(axis: ExtrudeAxis, featureId: string): void {
  if (typeof axis === "string") return;
  requirePoint(axis.direction, `${featureId}.axis.direction`);
  const [x, y, z] = axis.direction;
  if (Math.hypot(x, y, z) === 0) {
    throw new CompileError("axis_zero", `${featureId}.axis.direction must be non-zero`);
  }
}

function requirePoint(point: Point3D, label: string): void {
  point.forEach((value, index) => requireFinite(value, `${label}[${index}]`));
}

function requireFinite(value: number, label: string): void {
  if (!Number.isFinite(value)) {
    throw new CompileError("value_invalid", `${label} must be finite`);
  }
}

function requirePositive(value: number, label: string): void {
  requireFinite(value, label);
  if (value <= 0) {
    throw new CompileError("value_nonpositive", `${label} must be positive`);
  }
}
