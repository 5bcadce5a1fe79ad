/**
 * Feature exports barrel file.
 */
export { FeatureEngine } from './engine.js';
export { loadManifest, ManifestSchema, MANIFEST_FILE } from './manifest.js';
export type { TemplateManifest, FeatureBundle, Fragment } from './manifest.js';
export { FEATURE_ORDER, enabledFeatures, isFeatureName } from './types.js';
export type { FeatureName, FeatureToggles, FeatureResult } from './types.js';
