/**
 * Schema for service-wizard.yaml.
 */
import { z } from 'zod';

/**
 * Make an object field optional and apply its inner defaults when missing.
 * Both undefined and null are treated as missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Prompt behavior. */
export const PromptSettingsSchema = z.object({
  /** Failed answers allowed per prompt before the run aborts */
  max_attempts: z.number().int().min(1).max(20).default(3),
});

/** Answers used when the user presses enter on an optional prompt. */
export const DefaultAnswersSchema = z.object({
  docker: z.boolean().default(false),
  ci: z.boolean().default(false),
  swagger: z.boolean().default(true),
  docker_registry: z.boolean().default(false),
  registry_domain: z.string().min(1).default('hub.docker.com'),
});

/** Permission bits applied to generated scripts. */
export const PermissionSettingsSchema = z.object({
  executable_patterns: z.array(z.string()).default(['**/*.sh']),
  mode: z.number().int().min(0).max(0o7777).default(0o755),
});

/** Rendering behavior. */
export const RenderSettingsSchema = z.object({
  /** Template files copied byte-for-byte, without token substitution */
  verbatim_patterns: z.array(z.string()).default(['**/*.png', '**/*.jpg', '**/*.ico', '**/*.gif']),
});

/** Complete service-wizard.yaml schema. */
export const ConfigSchema = z.object({
  /** Template root; defaults to the templates shipped with the package */
  templates_dir: z.string().optional(),
  log_level: LogLevelSchema.default('info'),
  prompts: withDefaults(PromptSettingsSchema),
  defaults: withDefaults(DefaultAnswersSchema),
  permissions: withDefaults(PermissionSettingsSchema),
  render: withDefaults(RenderSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PromptSettings = z.infer<typeof PromptSettingsSchema>;
export type DefaultAnswers = z.infer<typeof DefaultAnswersSchema>;
export type PermissionSettings = z.infer<typeof PermissionSettingsSchema>;
export type RenderSettings = z.infer<typeof RenderSettingsSchema>;

/**
 * Configuration after loading: the template root is always resolved.
 */
export type WizardConfig = Omit<Config, 'templates_dir'> & {
  templates_dir: string;
};
