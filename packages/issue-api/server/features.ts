import type { FeatureFlagsConfig } from "./config";
import type { Organization } from "./suggestions/types";
import type { Actor } from "./auth";

export const AI_SUGGESTION_FEATURE = "organizations:open-ai-suggestion";

export interface FeatureFlags {
  has(feature: string, organization: Organization, actor: Actor): Promise<boolean>;
}

/**
 * Flags from `FEATURE_FLAGS_JSON`: `true` enables a feature everywhere, a list
 * enables it for those organization slugs. Unknown features are off.
 */
export class ConfigFeatureFlags implements FeatureFlags {
  constructor(private readonly flags: FeatureFlagsConfig) {}

  async has(feature: string, organization: Organization, _actor: Actor): Promise<boolean> {
    if (!Object.hasOwn(this.flags, feature)) return false;
    const rule = this.flags[feature];
    if (typeof rule === "boolean") return rule;
    return rule.includes(organization.slug);
  }
}
