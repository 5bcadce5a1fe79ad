import { toPascalCase } from '../../utils/string.js';
import type { Bindings, ProjectValues } from './types.js';

/**
 * Build the frozen binding map for a run, adding the derived names:
 * `name_app_class` for the Django AppConfig class, and `registry_url` when
 * registry coordinates are present.
 */
export function createBindings(values: ProjectValues): Bindings {
  const bindings: Record<string, string> = {
    name_project: values.name_project,
    name_app: values.name_app,
    name_app_class: toPascalCase(values.name_app),
    display_name: values.display_name,
    description: values.description,
  };

  if (values.registry_domain !== undefined && values.registry_folder !== undefined) {
    bindings.registry_domain = values.registry_domain;
    bindings.registry_folder = values.registry_folder;
    bindings.registry_url = [values.registry_domain, values.registry_folder, values.name_project]
      .map((part) => part.replace(/^\/+|\/+$/g, ''))
      .filter((part) => part.length > 0)
      .join('/');
  }

  return Object.freeze(bindings);
}
