/**
 * The template manifest: which subtree is unconditional and which subtrees
 * and fragments each feature contributes.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { loadYamlWithSchema, isDirectory, fileExists } from '../../utils/index.js';
import { MissingTemplateError } from '../../utils/errors.js';
import { FEATURE_ORDER, isFeatureName, type FeatureName } from './types.js';

export const MANIFEST_FILE = 'manifest.yaml';

export const FragmentSchema = z.object({
  /** Fragment file, relative to the template root */
  source: z.string().min(1),
  /** File to append to, relative to the output root; may carry tokens */
  target: z.string().min(1),
});

export const FeatureBundleSchema = z.object({
  description: z.string().default(''),
  /** Subtree copied into the output root, relative to the template root */
  subtree: z.string().min(1).optional(),
  fragments: z.array(FragmentSchema).default([]),
  requires: z.array(z.enum(FEATURE_ORDER)).default([]),
});

export const ManifestSchema = z.object({
  base: z.string().min(1).default('base'),
  features: z
    .record(z.string(), FeatureBundleSchema)
    .default({})
    .superRefine((features, ctx) => {
      for (const name of Object.keys(features)) {
        if (!isFeatureName(name)) {
          ctx.addIssue({
            code: 'custom',
            path: [name],
            message: `Unknown feature "${name}". Expected one of: ${FEATURE_ORDER.join(', ')}`,
          });
        }
      }
    }),
});

export type Fragment = z.infer<typeof FragmentSchema>;
export type FeatureBundle = z.infer<typeof FeatureBundleSchema>;

/**
 * Manifest with bundles keyed by validated feature names.
 */
export interface TemplateManifest {
  base: string;
  features: Partial<Record<FeatureName, FeatureBundle>>;
}

/**
 * Load manifest.yaml from a template root.
 */
export async function loadManifest(templateRoot: string): Promise<TemplateManifest> {
  if (!(await isDirectory(templateRoot))) {
    throw new MissingTemplateError(templateRoot);
  }
  const manifestPath = path.join(templateRoot, MANIFEST_FILE);
  if (!(await fileExists(manifestPath))) {
    throw new MissingTemplateError(manifestPath);
  }
  const parsed = await loadYamlWithSchema(manifestPath, ManifestSchema);

  const features: Partial<Record<FeatureName, FeatureBundle>> = {};
  for (const [name, bundle] of Object.entries(parsed.features)) {
    if (isFeatureName(name)) {
      features[name] = bundle;
    }
  }
  return { base: parsed.base, features };
}
