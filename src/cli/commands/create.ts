/**
 * The create command: ask the questions, then generate the service.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, type WizardConfig } from '../../core/config/index.js';
import { ProjectGenerator, type GenerateResult } from '../../core/generator/index.js';
import {
  collectInputs,
  ReadlinePrompter,
  type CollectedInputs,
  type PresetAnswers,
  type Prompter,
} from '../../core/inputs/index.js';
import { enabledFeatures, type FeatureName } from '../../core/features/index.js';
import { ErrorCodes, OutputExistsError, ValidationError } from '../../utils/errors.js';
import { fileExists } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';

export interface CreateOptions {
  name?: string;
  app?: string;
  docker?: boolean;
  ci?: boolean;
  swagger?: boolean;
  registry?: boolean;
  displayName?: string;
  description?: string;
  registryDomain?: string;
  registryFolder?: string;
  outputDir?: string;
  config?: string;
  yes?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Seams for tests: where to read answers and which directory is "current".
 */
export interface CreateEnvironment {
  cwd?: string;
  prompter?: Prompter;
}

const FEATURE_MESSAGES: Record<FeatureName, string> = {
  docker: 'Docker support was successfully added',
  ci: 'Travis CI support was successfully added. Make sure to configure the needed permissions in the Travis CI web administration panel',
  docker_registry: 'Docker registry deployment was added to Travis CI',
  swagger: 'Swagger API docs were successfully added',
};

/**
 * Create the create command.
 */
export function createCreateCommand(): Command {
  return new Command('create')
    .description('Create a new Django microservice from the bundled templates')
    .option('-n, --name <name>', 'Service (Django project) name, e.g. appointments_service')
    .option('-a, --app <app>', 'Application name, e.g. appointment')
    .option('--docker', 'Add Docker support')
    .option('--no-docker', 'Skip Docker support')
    .option('--ci', 'Add Travis CI support')
    .option('--no-ci', 'Skip Travis CI support')
    .option('--swagger', 'Add Swagger API docs')
    .option('--no-swagger', 'Skip Swagger API docs')
    .option('--registry', 'Add Docker registry deployment to CI (needs --docker and --ci)')
    .option('--no-registry', 'Skip Docker registry deployment')
    .option('--display-name <displayName>', 'Displayed name of the service')
    .option('--description <description>', 'Description of the service')
    .option('--registry-domain <domain>', 'Docker registry domain, e.g. hub.docker.com')
    .option('--registry-folder <folder>', 'Docker registry folder')
    .option('-o, --output-dir <dir>', 'Directory to create the service in (default: current directory)')
    .option('-c, --config <path>', 'Config file (default: service-wizard.yaml)')
    .option('-y, --yes', 'Accept defaults for every question that has one')
    .option('--dry-run', 'List the files that would be generated without writing')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show warnings and errors')
    .action(async (options: CreateOptions) => {
      try {
        await runCreate(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

function toPreset(options: CreateOptions): PresetAnswers {
  return {
    name_project: options.name,
    name_app: options.app,
    docker: options.docker,
    ci: options.ci,
    swagger: options.swagger,
    display_name: options.displayName,
    description: options.description,
    docker_registry: options.registry,
    registry_domain: options.registryDomain,
    registry_folder: options.registryFolder,
  };
}

function printWelcome(): void {
  console.log(chalk.blue('Welcome to the Django microservice wizard!'));
  console.log(chalk.dim('Answer a few questions and a ready-to-run service will be generated.'));
  console.log();
}

function printPlan(outputRoot: string, paths: string[]): void {
  console.log();
  console.log(chalk.bold('Dry Run - Would generate:'));
  console.log(chalk.dim(`Path: ${outputRoot}`));
  console.log();
  for (const relative of paths) {
    console.log(`  ${relative}`);
  }
}

function printSummary(inputs: CollectedInputs, result: GenerateResult): void {
  console.log();
  log.success(`The Django project "${inputs.values.name_project}" was successfully created`);
  log.success(`The app "${inputs.values.name_app}" was successfully created`);
  for (const feature of result.features) {
    log.success(FEATURE_MESSAGES[feature.feature]);
  }
  if (result.permissions.warnings.length > 0) {
    log.warn(`${result.permissions.warnings.length} script(s) could not be marked executable; run chmod +x on them`);
  }

  console.log();
  console.log(chalk.dim('Next steps:'));
  console.log(`  1. cd ${chalk.cyan(result.outputRoot)}`);
  if (enabledFeatures(inputs.toggles).includes('docker')) {
    console.log(`  2. Run ${chalk.cyan('docker-compose up')}`);
  } else {
    console.log(`  2. Run ${chalk.cyan('pip install -r requirements/base.txt')}`);
  }
}

export async function runCreate(options: CreateOptions, env: CreateEnvironment = {}): Promise<GenerateResult | string[]> {
  const cwd = env.cwd ?? process.cwd();
  const config: WizardConfig = await loadConfig(cwd, options.config);
  log.setLevel(options.verbose ? 'debug' : options.quiet ? 'warn' : config.log_level);

  const generator = await ProjectGenerator.create(config);

  if (!options.quiet) {
    printWelcome();
  }

  const outputParent = path.resolve(cwd, options.outputDir ?? '.');
  const prompter = env.prompter ?? new ReadlinePrompter();
  let inputs: CollectedInputs;
  try {
    inputs = await collectInputs(prompter, {
      prompts: config.prompts,
      defaults: config.defaults,
      preset: toPreset(options),
      acceptDefaults: options.yes,
      reservedNames: await generator.reservedNames(),
      checkProjectName: async (name) => {
        const target = path.join(outputParent, name);
        if (await fileExists(target)) {
          throw new ValidationError(
            ErrorCodes.NAME_CONFLICT,
            `Directory already exists: ${target}. Choose another name or remove it first.`,
            { path: target }
          );
        }
      },
    });
  } finally {
    prompter.close();
  }

  const outputRoot = path.join(outputParent, inputs.values.name_project);

  if (options.dryRun) {
    const paths = await generator.plan(inputs.bindings, inputs.toggles);
    printPlan(outputRoot, paths);
    return paths;
  }

  let result: GenerateResult;
  try {
    result = await generator.generate({ bindings: inputs.bindings, toggles: inputs.toggles, outputRoot });
  } catch (error) {
    if (!(error instanceof OutputExistsError) && (await fileExists(outputRoot))) {
      log.warn(`Generation stopped part-way. Remove ${outputRoot} before trying again.`);
    }
    throw error;
  }

  for (const token of result.unboundTokens) {
    log.debug(`Template token left as written: {{ ${token} }}`);
  }

  if (!options.quiet) {
    printSummary(inputs, result);
  }
  return result;
}
