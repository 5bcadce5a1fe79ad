/**
 * Marks generated scripts executable. Failures are downgraded to warnings:
 * a missing permission bit does not corrupt the generated project.
 */
import * as path from 'node:path';
import { chmod, globFiles } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { PermissionSettings } from '../config/schema.js';

const log = logger.child('permissions');

/**
 * A script whose mode could not be set.
 */
export interface PermissionWarning {
  /** Path relative to the output root */
  path: string;
  message: string;
}

export interface FinalizeResult {
  /** Scripts marked executable, relative to the output root */
  executables: string[];
  warnings: PermissionWarning[];
}

export async function finalizePermissions(
  outputRoot: string,
  settings: PermissionSettings
): Promise<FinalizeResult> {
  const scripts = (await globFiles(settings.executable_patterns, { cwd: outputRoot, absolute: false })).sort();

  const result: FinalizeResult = { executables: [], warnings: [] };
  for (const script of scripts) {
    try {
      await chmod(path.join(outputRoot, script), settings.mode);
      result.executables.push(script);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`Could not mark ${script} executable: ${message}`);
      result.warnings.push({ path: script, message });
    }
  }
  return result;
}
