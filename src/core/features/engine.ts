/**
 * Feature engine: applies named bundles (subtree + fragments) to an output tree.
 */
import * as path from 'node:path';
import { appendFile, fileExists, readFile, isDirectory } from '../../utils/file-system.js';
import {
  FeatureDependencyError,
  MissingTemplateError,
  UnknownFeatureError,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { TemplateRenderer } from '../render/renderer.js';
import { findUnboundTokens } from '../render/tokens.js';
import type { Bindings } from '../render/types.js';
import type { FeatureBundle, TemplateManifest } from './manifest.js';
import {
  FEATURE_ORDER,
  enabledFeatures,
  isFeatureName,
  type FeatureName,
  type FeatureResult,
  type FeatureToggles,
} from './types.js';

const log = logger.child('features');

export class FeatureEngine {
  constructor(
    private readonly templateRoot: string,
    private readonly manifest: TemplateManifest,
    private readonly renderer: TemplateRenderer
  ) {}

  /**
   * Features the manifest defines, in application order.
   */
  listFeatures(): Array<{ name: FeatureName; bundle: FeatureBundle }> {
    const result: Array<{ name: FeatureName; bundle: FeatureBundle }> = [];
    for (const name of FEATURE_ORDER) {
      const bundle = this.manifest.features[name];
      if (bundle) {
        result.push({ name, bundle });
      }
    }
    return result;
  }

  /**
   * Apply one feature to an existing output tree.
   * `applied` names the features already applied in this run.
   */
  async applyFeature(
    name: string,
    outputRoot: string,
    bindings: Bindings,
    applied: readonly FeatureName[] = []
  ): Promise<FeatureResult> {
    const feature = this.requireFeature(name);
    const bundle = this.requireBundle(feature);

    const missing = bundle.requires.filter((dependency) => !applied.includes(dependency));
    if (missing.length > 0) {
      throw new FeatureDependencyError(feature, missing);
    }

    const files: string[] = [];
    const unbound = new Set<string>();
    if (bundle.subtree) {
      const subtreeRoot = path.join(this.templateRoot, bundle.subtree);
      const rendered = await this.renderer.renderInto(subtreeRoot, outputRoot, bindings);
      files.push(...rendered.files.map((file) => file.path));
      rendered.unboundTokens.forEach((token) => unbound.add(token));
    }

    const appended: string[] = [];
    for (const fragment of bundle.fragments) {
      const sourcePath = path.join(this.templateRoot, fragment.source);
      if (!(await fileExists(sourcePath)) || (await isDirectory(sourcePath))) {
        throw new MissingTemplateError(sourcePath, { feature });
      }
      const targetPath = this.renderer.resolveRenderedPath(outputRoot, fragment.target, bindings);
      const source = await readFile(sourcePath);
      findUnboundTokens(source, bindings).forEach((token) => unbound.add(token));
      const content = this.renderer.renderString(source, bindings);
      await appendFile(targetPath, await this.separatorFor(targetPath) + content);
      appended.push(this.renderer.renderString(fragment.target, bindings));
    }

    log.debug(`applied ${feature}`, { files, appended });
    return { feature, files, appended, unboundTokens: [...unbound].sort() };
  }

  /**
   * Apply every enabled toggle in the fixed order.
   */
  async applyFeatures(
    toggles: FeatureToggles,
    outputRoot: string,
    bindings: Bindings
  ): Promise<FeatureResult[]> {
    const applied: FeatureName[] = [];
    const results: FeatureResult[] = [];
    for (const feature of enabledFeatures(toggles)) {
      results.push(await this.applyFeature(feature, outputRoot, bindings, applied));
      applied.push(feature);
    }
    return results;
  }

  /**
   * Paths a feature would write or append to, relative to the output root.
   */
  async planFeature(name: string, bindings: Bindings): Promise<string[]> {
    const bundle = this.requireBundle(this.requireFeature(name));
    const paths: string[] = [];
    if (bundle.subtree) {
      paths.push(...(await this.renderer.plan(path.join(this.templateRoot, bundle.subtree), bindings)));
    }
    for (const fragment of bundle.fragments) {
      paths.push(this.renderer.renderString(fragment.target, bindings));
    }
    return paths;
  }

  private requireFeature(name: string): FeatureName {
    if (!isFeatureName(name)) {
      throw new UnknownFeatureError(name, FEATURE_ORDER);
    }
    return name;
  }

  private requireBundle(feature: FeatureName): FeatureBundle {
    const bundle = this.manifest.features[feature];
    if (!bundle) {
      throw new UnknownFeatureError(feature, this.listFeatures().map((entry) => entry.name));
    }
    return bundle;
  }

  /**
   * A newline when the target has content that does not end in one.
   */
  private async separatorFor(targetPath: string): Promise<string> {
    if (!(await fileExists(targetPath))) {
      return '';
    }
    const existing = await readFile(targetPath);
    return existing.length > 0 && !existing.endsWith('\n') ? '\n' : '';
  }
}
