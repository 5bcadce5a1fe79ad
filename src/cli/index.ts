import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createCreateCommand } from './commands/create.js';
import { createFeaturesCommand } from './commands/features.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('service-wizard')
    .description('Interactive generator for Django microservices')
    .version(readVersion());
  program.addCommand(createCreateCommand(), { isDefault: true });
  program.addCommand(createFeaturesCommand());
  return program;
}
