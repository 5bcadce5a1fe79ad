/**
 * Feature toggle and bundle types.
 */

/**
 * The closed toggle set, in application order. Fragments land in target files
 * in this order whatever order the answers came in.
 */
export const FEATURE_ORDER = ['docker', 'ci', 'docker_registry', 'swagger'] as const;

export type FeatureName = (typeof FEATURE_ORDER)[number];

export type FeatureToggles = Record<FeatureName, boolean>;

export function isFeatureName(name: string): name is FeatureName {
  return (FEATURE_ORDER as readonly string[]).includes(name);
}

/**
 * Enabled features in application order.
 */
export function enabledFeatures(toggles: FeatureToggles): FeatureName[] {
  return FEATURE_ORDER.filter((name) => toggles[name]);
}

/**
 * Result of applying one feature bundle.
 */
export interface FeatureResult {
  feature: FeatureName;
  /** Files written from the bundle's subtree, relative to the output root */
  files: string[];
  /** Files that received an appended fragment, relative to the output root */
  appended: string[];
  /** Tokens without a binding in the subtree or fragments, left as written */
  unboundTokens: string[];
}
