/**
 * Configuration exports barrel file.
 */
export {
  loadConfig,
  getDefaultConfig,
  mergeConfig,
  BUNDLED_TEMPLATES_DIR,
  DEFAULT_CONFIG_FILE,
} from './loader.js';
export {
  ConfigSchema,
  LogLevelSchema,
  type Config,
  type WizardConfig,
  type PromptSettings,
  type DefaultAnswers,
  type PermissionSettings,
  type RenderSettings,
} from './schema.js';
