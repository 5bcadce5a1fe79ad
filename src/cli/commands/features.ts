/**
 * The features command: list the optional bundles of the template set.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/index.js';
import { FeatureEngine, loadManifest } from '../../core/features/index.js';
import { TemplateRenderer } from '../../core/render/index.js';
import { logger as log } from '../../utils/logger.js';

interface FeaturesOptions {
  config?: string;
  json?: boolean;
}

export function createFeaturesCommand(): Command {
  return new Command('features')
    .description('List the optional features of the template set')
    .option('-c, --config <path>', 'Config file (default: service-wizard.yaml)')
    .option('--json', 'Output as JSON')
    .action(async (options: FeaturesOptions) => {
      try {
        await runFeatures(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

export async function runFeatures(options: FeaturesOptions, cwd: string = process.cwd()): Promise<void> {
  const config = await loadConfig(cwd, options.config);
  const manifest = await loadManifest(config.templates_dir);
  const engine = new FeatureEngine(config.templates_dir, manifest, new TemplateRenderer(config.render));
  const features = engine.listFeatures();

  if (options.json) {
    console.log(JSON.stringify(features.map(({ name, bundle }) => ({ name, ...bundle })), null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold(`Features (${config.templates_dir}):`));
  for (const { name, bundle } of features) {
    console.log();
    console.log(`  ${chalk.cyan(name)}  ${bundle.description}`);
    if (bundle.subtree) {
      console.log(chalk.dim(`    subtree:  ${bundle.subtree}/`));
    }
    for (const fragment of bundle.fragments) {
      console.log(chalk.dim(`    appends:  ${fragment.source} -> ${fragment.target}`));
    }
    if (bundle.requires.length > 0) {
      console.log(chalk.dim(`    requires: ${bundle.requires.join(', ')}`));
    }
  }
  console.log();
}
