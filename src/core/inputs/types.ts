/**
 * Prompt type definitions.
 */
import type { Bindings, ProjectValues } from '../render/types.js';
import type { FeatureToggles } from '../features/types.js';
import type { ValidationError } from '../../utils/errors.js';

/**
 * Source of answers. Resolves null when input is closed.
 */
export interface Prompter {
  ask(question: string): Promise<string | null>;
  close(): void;
}

/**
 * One question in the sequence.
 */
export interface PromptDefinition<T> {
  /** Answer key, matching the preset option of the same name */
  key: keyof PresetAnswers;
  message: string;
  required: boolean;
  /** Raw answer used on empty input; shown in the question */
  defaultAnswer?: string;
  /** Hint shown instead of the raw default (e.g., "y/N") */
  hint?: string;
  /** Normalize an answer; throws (or rejects with) ValidationError */
  parse: (raw: string) => T | Promise<T>;
}

/**
 * Answers supplied up front, e.g., from command-line options.
 */
export interface PresetAnswers {
  name_project?: string;
  name_app?: string;
  docker?: boolean;
  ci?: boolean;
  swagger?: boolean;
  display_name?: string;
  description?: string;
  docker_registry?: boolean;
  registry_domain?: string;
  registry_folder?: string;
}

export interface CollectedInputs {
  values: ProjectValues;
  bindings: Bindings;
  toggles: FeatureToggles;
}

/**
 * Called for every rejected answer before the prompt is asked again.
 */
export type InvalidAnswerHandler = (error: ValidationError, prompt: PromptDefinition<unknown>) => void;
