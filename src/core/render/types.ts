/**
 * Rendering type definitions.
 */

/**
 * Placeholder name to value. Frozen once created.
 */
export type Bindings = Readonly<Record<string, string>>;

/**
 * Values collected from the user.
 */
export interface ProjectValues {
  /** Python package name of the project (e.g., "customer_service") */
  name_project: string;
  /** Django app name (e.g., "customer") */
  name_app: string;
  /** Human name shown in docs (e.g., "Customer Management Service") */
  display_name: string;
  description: string;
  registry_domain?: string;
  registry_folder?: string;
}

/**
 * One file written by a render.
 */
export interface RenderedFile {
  /** Output path relative to the output root, POSIX separators */
  path: string;
  /** Whether the file was copied without substitution */
  verbatim: boolean;
}

/**
 * Result of rendering a template tree.
 */
export interface RenderResult {
  files: RenderedFile[];
  /** Token names found in templates that had no binding */
  unboundTokens: string[];
}
