export interface FirePolicy {
  readonly repeats: boolean;
  readonly delays: boolean;
}

// Immediate is only reachable through the lower-level timer constructor: it calls the
// callback right away and still schedules one more fire after the duration.
export const FirePolicies = {
  Immediate: { repeats: false, delays: false },
  Delay: { repeats: false, delays: true },
  Interval: { repeats: true, delays: false },
  DelayedInterval: { repeats: true, delays: true },
} as const satisfies Record<string, FirePolicy>;

export type FirePolicyName = keyof typeof FirePolicies;

export function policyName(policy: FirePolicy): FirePolicyName {
  if (policy.repeats) {
    return policy.delays ? "DelayedInterval" : "Interval";
  }
  return policy.delays ? "Delay" : "Immediate";
}
