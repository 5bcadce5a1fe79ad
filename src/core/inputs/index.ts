/**
 * Input collection exports barrel file.
 */
export { collectInputs, type CollectOptions } from './collector.js';
export { ReadlinePrompter } from './readline-prompter.js';
export {
  validateIdentifier,
  validateAppName,
  parseYesNo,
  validateText,
  validateRegistryDomain,
  validateRegistryFolder,
} from './validators.js';
export type {
  Prompter,
  PromptDefinition,
  PresetAnswers,
  CollectedInputs,
  InvalidAnswerHandler,
} from './types.js';
