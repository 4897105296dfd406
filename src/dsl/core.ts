import type { ID, IntentFeature, IntentPart } from "../ir.js";

export const part = (id: ID, features: IntentFeature[]): IntentPart => ({
  id,
  features,
});
