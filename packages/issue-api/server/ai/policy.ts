import type { Organization } from "../suggestions/types";

export type OpenAiPolicy = "allowed" | "subprocessor" | "individual_consent";

/**
 * A receiver may return any string; values outside `OpenAiPolicy` are
 * reported by the caller and otherwise ignored.
 */
export type OpenAiPolicyReceiver = (
  organization: Organization
) => string | null | undefined | Promise<string | null | undefined>;

export type OpenAiPolicyRegistry = {
  connect(receiver: OpenAiPolicyReceiver): () => void;
  resolve(organization: Organization): Promise<string>;
};

export function isKnownPolicy(policy: string): policy is OpenAiPolicy {
  return policy === "allowed" || policy === "subprocessor" || policy === "individual_consent";
}

export function createOpenAiPolicyRegistry(): OpenAiPolicyRegistry {
  const receivers: OpenAiPolicyReceiver[] = [];

  return {
    connect(receiver) {
      receivers.push(receiver);
      return () => {
        const idx = receivers.indexOf(receiver);
        if (idx !== -1) receivers.splice(idx, 1);
      };
    },

    async resolve(organization) {
      let result = "allowed";
      // last one wins
      for (const receiver of receivers) {
        const next = await receiver(organization);
        if (next != null) result = next;
      }
      return result;
    }
  };
}

/** Receiver backed by the static `AI_POLICY_JSON` map (organization slug -> policy). */
export function staticPolicyReceiver(
  policies: Record<string, string>
): OpenAiPolicyReceiver {
  return (organization) =>
    Object.hasOwn(policies, organization.slug) ? policies[organization.slug] : null;
}
