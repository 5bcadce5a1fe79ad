/**
 * Template tree renderer.
 *
 * Walks a template directory in sorted order and materializes it under an
 * output root, substituting tokens in file contents and in every path segment.
 */
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import {
  readFile,
  writeFile,
  copyFile,
  ensureDir,
  fileExists,
  isDirectory,
  isWithin,
  listDir,
} from '../../utils/file-system.js';
import {
  MissingTemplateError,
  OutputExistsError,
  SecurityError,
  ErrorCodes,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { RenderSettings } from '../config/schema.js';
import { substituteTokens, findUnboundTokens } from './tokens.js';
import type { Bindings, RenderedFile, RenderResult } from './types.js';

const log = logger.child('render');

interface TemplateFile {
  /** Template path relative to the template root, POSIX separators */
  source: string;
  /** Rendered output path relative to the output root, POSIX separators */
  target: string;
  verbatim: boolean;
}

/**
 * Renders template trees into output trees.
 */
export class TemplateRenderer {
  private verbatimPatterns: string[];

  constructor(settings: RenderSettings) {
    this.verbatimPatterns = settings.verbatim_patterns;
  }

  /**
   * Render a template tree into a fresh output directory.
   * The output root must not exist; an existing one is left untouched.
   */
  async render(templateRoot: string, outputRoot: string, bindings: Bindings): Promise<RenderResult> {
    if (!(await isDirectory(templateRoot))) {
      throw new MissingTemplateError(templateRoot);
    }
    if (await fileExists(outputRoot)) {
      throw new OutputExistsError(outputRoot);
    }
    await ensureDir(outputRoot);
    return this.renderInto(templateRoot, outputRoot, bindings);
  }

  /**
   * Render a template tree into an output directory that may already exist.
   * Files already present at a rendered path are replaced.
   */
  async renderInto(templateRoot: string, outputRoot: string, bindings: Bindings): Promise<RenderResult> {
    if (!(await isDirectory(templateRoot))) {
      throw new MissingTemplateError(templateRoot);
    }

    const files: RenderedFile[] = [];
    const unbound = new Set<string>();

    await this.walk(templateRoot, '', bindings, async (entry) => {
      const sourcePath = path.join(templateRoot, entry.source);
      const targetPath = this.resolveTarget(outputRoot, entry.target);

      if (entry.verbatim) {
        await copyFile(sourcePath, targetPath);
      } else {
        const content = await readFile(sourcePath);
        for (const name of findUnboundTokens(content, bindings)) {
          unbound.add(name);
        }
        await writeFile(targetPath, substituteTokens(content, bindings));
      }

      log.debug(`wrote ${entry.target}`);
      files.push({ path: entry.target, verbatim: entry.verbatim });
    }, async (relativeDir) => {
      await ensureDir(this.resolveTarget(outputRoot, relativeDir));
    });

    if (unbound.size > 0) {
      log.debug('Unbound tokens left verbatim', { tokens: [...unbound] });
    }

    return { files, unboundTokens: [...unbound].sort() };
  }

  /**
   * List the output paths a template tree would produce, without writing.
   */
  async plan(templateRoot: string, bindings: Bindings): Promise<string[]> {
    if (!(await isDirectory(templateRoot))) {
      throw new MissingTemplateError(templateRoot);
    }
    const targets: string[] = [];
    await this.walk(templateRoot, '', bindings, async (entry) => {
      targets.push(entry.target);
    });
    return targets;
  }

  /**
   * Substitute tokens in a single string.
   */
  renderString(content: string, bindings: Bindings): string {
    return substituteTokens(content, bindings);
  }

  /**
   * Render a relative path template (POSIX separators) and make it absolute
   * under the output root.
   */
  resolveRenderedPath(outputRoot: string, pathTemplate: string, bindings: Bindings): string {
    return this.resolveTarget(outputRoot, substituteTokens(pathTemplate, bindings));
  }

  private isVerbatim(relativePath: string): boolean {
    return this.verbatimPatterns.some((pattern) => minimatch(relativePath, pattern, { dot: true }));
  }

  private resolveTarget(outputRoot: string, relativeTarget: string): string {
    const target = path.resolve(outputRoot, ...relativeTarget.split('/'));
    if (!isWithin(outputRoot, target)) {
      throw new SecurityError(
        ErrorCodes.PATH_TRAVERSAL,
        `Rendered path escapes the output directory: ${relativeTarget}`,
        { outputRoot, target: relativeTarget }
      );
    }
    return target;
  }

  private async walk(
    templateRoot: string,
    relativeDir: string,
    bindings: Bindings,
    onFile: (entry: TemplateFile) => Promise<void>,
    onDir?: (renderedDir: string) => Promise<void>
  ): Promise<void> {
    const absoluteDir = relativeDir ? path.join(templateRoot, ...relativeDir.split('/')) : templateRoot;
    const renderedDir = substituteTokens(relativeDir, bindings);

    for (const entry of await listDir(absoluteDir)) {
      const source = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (entry.isDirectory) {
        if (onDir) {
          await onDir(substituteTokens(source, bindings));
        }
        await this.walk(templateRoot, source, bindings, onFile, onDir);
        continue;
      }
      const name = substituteTokens(entry.name, bindings);
      await onFile({
        source,
        target: renderedDir ? `${renderedDir}/${name}` : name,
        verbatim: this.isVerbatim(source),
      });
    }
  }
}
