/**
 * One generation run: base tree, then enabled features in fixed order, then
 * script permissions. Any failure aborts the run; a half-written output
 * directory is left in place for the user to inspect or delete.
 */
import * as path from 'node:path';
import { MissingTemplateError } from '../../utils/errors.js';
import { isDirectory, listDir } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { WizardConfig } from '../config/schema.js';
import { TemplateRenderer } from '../render/renderer.js';
import { findTokens } from '../render/tokens.js';
import type { Bindings } from '../render/types.js';
import { FeatureEngine } from '../features/engine.js';
import { loadManifest, type TemplateManifest } from '../features/manifest.js';
import { enabledFeatures, type FeatureResult, type FeatureToggles } from '../features/types.js';
import { finalizePermissions, type FinalizeResult } from '../permissions/finalize.js';

const log = logger.child('generator');

export interface GenerateOptions {
  bindings: Bindings;
  toggles: FeatureToggles;
  /** Directory to create; must not exist */
  outputRoot: string;
}

export interface GenerateResult {
  outputRoot: string;
  /** Files written by the base tree, relative to the output root */
  baseFiles: string[];
  features: FeatureResult[];
  permissions: FinalizeResult;
  /** Unbound tokens of the base tree and every applied feature */
  unboundTokens: string[];
}

export class ProjectGenerator {
  private readonly renderer: TemplateRenderer;
  private readonly features: FeatureEngine;

  constructor(
    private readonly config: WizardConfig,
    private readonly manifest: TemplateManifest
  ) {
    this.renderer = new TemplateRenderer(config.render);
    this.features = new FeatureEngine(config.templates_dir, manifest, this.renderer);
  }

  /**
   * Create a generator for the configured template root.
   */
  static async create(config: WizardConfig): Promise<ProjectGenerator> {
    return new ProjectGenerator(config, await loadManifest(config.templates_dir));
  }

  private get baseRoot(): string {
    return path.join(this.config.templates_dir, this.manifest.base);
  }

  async generate(options: GenerateOptions): Promise<GenerateResult> {
    const { bindings, toggles, outputRoot } = options;

    log.debug(`rendering base tree into ${outputRoot}`);
    const base = await this.renderer.render(this.baseRoot, outputRoot, bindings);
    const features = await this.features.applyFeatures(toggles, outputRoot, bindings);
    const permissions = await finalizePermissions(outputRoot, this.config.permissions);

    return {
      outputRoot,
      baseFiles: base.files.map((file) => file.path),
      features,
      permissions,
      unboundTokens: [
        ...new Set([...base.unboundTokens, ...features.flatMap((feature) => feature.unboundTokens)]),
      ].sort(),
    };
  }

  /**
   * Top-level names the base tree and every feature subtree write into the
   * output root. A service or app directory must not take one of them.
   */
  async reservedNames(): Promise<string[]> {
    const roots = [
      this.baseRoot,
      ...this.features
        .listFeatures()
        .flatMap(({ bundle }) => (bundle.subtree ? [path.join(this.config.templates_dir, bundle.subtree)] : [])),
    ];
    const names = new Set<string>();
    for (const root of roots) {
      if (!(await isDirectory(root))) {
        throw new MissingTemplateError(root);
      }
      for (const entry of await listDir(root)) {
        if (findTokens(entry.name).length === 0) {
          names.add(entry.name);
        }
      }
    }
    return [...names].sort();
  }

  /**
   * Relative paths a run would produce or touch, sorted, without writing.
   */
  async plan(bindings: Bindings, toggles: FeatureToggles): Promise<string[]> {
    const paths = new Set(await this.renderer.plan(this.baseRoot, bindings));
    for (const feature of enabledFeatures(toggles)) {
      for (const target of await this.features.planFeature(feature, bindings)) {
        paths.add(target);
      }
    }
    return [...paths].sort();
  }
}
