/**
 * Runs the ordered prompt sequence and turns the answers into bindings and
 * feature toggles. Rejected answers are reported and asked again; only
 * exhausted attempts or closed input abort the run.
 */
import { ValidationError, InputAbortedError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { toTitleCase } from '../../utils/string.js';
import type { DefaultAnswers, PromptSettings } from '../config/schema.js';
import { createBindings } from '../render/bindings.js';
import type { ProjectValues } from '../render/types.js';
import type { FeatureToggles } from '../features/types.js';
import {
  parseYesNo,
  validateAppName,
  validateIdentifier,
  validateRegistryDomain,
  validateRegistryFolder,
  validateText,
} from './validators.js';
import type {
  CollectedInputs,
  InvalidAnswerHandler,
  PresetAnswers,
  PromptDefinition,
  Prompter,
} from './types.js';

export interface CollectOptions {
  prompts: PromptSettings;
  defaults: DefaultAnswers;
  preset?: PresetAnswers;
  /** Take the default of every prompt that has one without asking */
  acceptDefaults?: boolean;
  onInvalid?: InvalidAnswerHandler;
  /** Top-level names of the template set; service and app names may not take them */
  reservedNames?: readonly string[];
  /** Extra check on the service name, e.g., that its directory is free */
  checkProjectName?: (name: string) => Promise<void>;
}

const reportInvalid: InvalidAnswerHandler = (error) => {
  logger.warn(error.message);
};

function formatQuestion(prompt: PromptDefinition<unknown>): string {
  const hint = prompt.hint ?? prompt.defaultAnswer;
  return hint ? `${prompt.message} [${hint}] ` : `${prompt.message} `;
}

function yesNoPrompt(key: keyof PresetAnswers, message: string, defaultValue: boolean): PromptDefinition<boolean> {
  return {
    key,
    message,
    required: false,
    defaultAnswer: defaultValue ? 'yes' : 'no',
    hint: defaultValue ? 'Y/n' : 'y/N',
    parse: parseYesNo,
  };
}

class PromptSession {
  private readonly onInvalid: InvalidAnswerHandler;

  constructor(
    private readonly prompter: Prompter,
    private readonly options: CollectOptions
  ) {
    this.onInvalid = options.onInvalid ?? reportInvalid;
  }

  async ask<T>(prompt: PromptDefinition<T>): Promise<T> {
    const preset = this.options.preset?.[prompt.key];
    if (preset !== undefined) {
      const raw = typeof preset === 'boolean' ? (preset ? 'yes' : 'no') : preset;
      try {
        return await prompt.parse(raw);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        this.onInvalid(error, prompt);
      }
    } else if (this.options.acceptDefaults && prompt.defaultAnswer !== undefined) {
      return prompt.parse(prompt.defaultAnswer);
    }

    const maxAttempts = this.options.prompts.max_attempts;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const answer = await this.prompter.ask(formatQuestion(prompt));
      if (answer === null) {
        throw new InputAbortedError(ErrorCodes.INPUT_CLOSED, 'Input closed before all questions were answered', {
          prompt: prompt.key,
        });
      }

      try {
        return await this.parseAnswer(prompt, answer);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        this.onInvalid(error, prompt);
      }
    }

    throw new InputAbortedError(
      ErrorCodes.ATTEMPTS_EXHAUSTED,
      `No valid answer for "${prompt.message}" after ${maxAttempts} attempts`,
      { prompt: prompt.key, attempts: maxAttempts }
    );
  }

  private parseAnswer<T>(prompt: PromptDefinition<T>, answer: string): T | Promise<T> {
    if (answer.trim().length === 0) {
      if (prompt.defaultAnswer !== undefined) {
        return prompt.parse(prompt.defaultAnswer);
      }
      if (prompt.required) {
        throw new ValidationError(ErrorCodes.REQUIRED, 'This answer is required');
      }
    }
    return prompt.parse(answer);
  }
}

/**
 * Collect bindings and toggles.
 *
 * Order: service name, app name, Docker, CI, API docs, display name,
 * description, then registry support and coordinates when both Docker and
 * CI are on.
 */
export async function collectInputs(prompter: Prompter, options: CollectOptions): Promise<CollectedInputs> {
  const session = new PromptSession(prompter, options);
  const { defaults, reservedNames = [], checkProjectName } = options;

  const nameProject = await session.ask({
    key: 'name_project',
    message: 'Type in the name of your service (e.g.: appointments_service):',
    required: true,
    parse: async (raw) => {
      const name = validateIdentifier(raw, 'Service name', reservedNames);
      await checkProjectName?.(name);
      return name;
    },
  });

  const nameApp = await session.ask({
    key: 'name_app',
    message: 'Type in the name of your application (e.g.: appointment):',
    required: true,
    parse: (raw) => validateAppName(raw, nameProject, reservedNames),
  });

  const docker = await session.ask(yesNoPrompt('docker', 'Add Docker support?', defaults.docker));
  const ci = await session.ask(yesNoPrompt('ci', 'Add Travis CI test support?', defaults.ci));
  const swagger = await session.ask(yesNoPrompt('swagger', 'Add Swagger API docs?', defaults.swagger));

  const displayName = await session.ask({
    key: 'display_name',
    message: 'Type in the displayed name of your service:',
    required: false,
    defaultAnswer: toTitleCase(nameProject),
    parse: (raw) => validateText(raw, 'Display name'),
  });

  const description = await session.ask({
    key: 'description',
    message: 'Type in the description of your service:',
    required: false,
    defaultAnswer: `A microservice for ${displayName}.`,
    parse: (raw) => validateText(raw, 'Description'),
  });

  const values: ProjectValues = {
    name_project: nameProject,
    name_app: nameApp,
    display_name: displayName,
    description,
  };

  let dockerRegistry = false;
  if (docker && ci) {
    dockerRegistry = await session.ask(
      yesNoPrompt('docker_registry', 'Add Docker registry support to Travis CI?', defaults.docker_registry)
    );
    if (dockerRegistry) {
      values.registry_domain = await session.ask({
        key: 'registry_domain',
        message: 'Type in the domain of the registry:',
        required: false,
        defaultAnswer: defaults.registry_domain,
        parse: validateRegistryDomain,
      });
      values.registry_folder = await session.ask({
        key: 'registry_folder',
        message: 'Type in the folder of the registry (e.g.: mycompany):',
        required: true,
        parse: validateRegistryFolder,
      });
    }
  }

  const toggles: FeatureToggles = {
    docker,
    ci,
    docker_registry: dockerRegistry,
    swagger,
  };

  return { values, bindings: createBindings(values), toggles };
}
