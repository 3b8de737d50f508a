/**
 * MLflow-backed Template Store
 *
 * Prompts live in the MLflow prompt registry: each prompt is a registered
 * model tagged as a prompt, each template version is a model version whose
 * body sits in the `mlflow.prompt.text` tag.
 */

import type { Logger } from 'pino';
import { Failure, Success, type Result } from '../../types/core';
import { BackendUnavailableError, NotFoundError, errorMessage, toError } from '../../lib/errors';
import type { PromptTemplate } from '../../prompts/template';
import {
  DEFAULT_ALIAS,
  buildRegistrationTags,
  type PromptSummary,
  type StoreLoadError,
  type TemplateStore,
} from '../../prompts/template-store';
import { MlflowRequestError, type MlflowClient } from './client';
import {
  EmptyResponseSchema,
  ModelVersionResponseSchema,
  SearchRegisteredModelsResponseSchema,
  recordToTags,
  tagsToRecord,
  type MlflowModelVersion,
} from './schemas';

export const PROMPT_TEXT_TAG = 'mlflow.prompt.text';
export const IS_PROMPT_TAG = 'mlflow.prompt.is_prompt';
const COMMIT_MESSAGE = 'Prompt Registration - GCP Deployment';
const LIST_PAGE_SIZE = 100;

function toTemplate(version: MlflowModelVersion, alias?: string): PromptTemplate | undefined {
  const tags = tagsToRecord(version.tags);
  const body = tags[PROMPT_TEXT_TAG];
  if (body === undefined) {
    return undefined;
  }
  const { [PROMPT_TEXT_TAG]: _body, [IS_PROMPT_TAG]: _isPrompt, ...metadata } = tags;
  return {
    name: version.name,
    version: version.version,
    ...(alias !== undefined ? { alias } : {}),
    body,
    tags: metadata,
  };
}

export class MlflowTemplateStore implements TemplateStore {
  private readonly logger: Logger;

  constructor(
    private readonly client: MlflowClient,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'MlflowTemplateStore' });
  }

  async load(
    name: string,
    alias: string = DEFAULT_ALIAS,
  ): Promise<Result<PromptTemplate, StoreLoadError>> {
    this.logger.debug({ name, alias }, 'Loading prompt from registry');
    try {
      const { model_version } = await this.client.get(
        '/registered-models/alias',
        { name, alias },
        ModelVersionResponseSchema,
      );
      const template = toTemplate(model_version, alias);
      if (!template) {
        return Failure(
          new NotFoundError(`Registry entry '${name}@${alias}' carries no prompt text`, { name, alias }),
        );
      }
      return Success(template);
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof BackendUnavailableError) {
        return Failure(error);
      }
      return Failure(
        new BackendUnavailableError(
          `Registry lookup for '${name}@${alias}' failed`,
          { name, alias },
          toError(error),
        ),
      );
    }
  }

  async register(name: string, body: string, modelTag: string): Promise<PromptTemplate> {
    await this.ensurePromptEntry(name);

    const tags = {
      ...buildRegistrationTags(modelTag),
      [IS_PROMPT_TAG]: 'true',
      [PROMPT_TEXT_TAG]: body,
    };
    const { model_version } = await this.client.post(
      '/model-versions/create',
      {
        name,
        source: 'dummy-source',
        description: COMMIT_MESSAGE,
        tags: recordToTags(tags),
      },
      ModelVersionResponseSchema,
    );

    this.logger.info({ name, version: model_version.version }, 'Prompt version registered');
    return {
      name,
      version: model_version.version,
      body,
      tags: buildRegistrationTags(modelTag),
    };
  }

  async promote(name: string, version: number, alias: string = DEFAULT_ALIAS): Promise<void> {
    await this.client.post(
      '/registered-models/alias',
      { name, alias, version: String(version) },
      EmptyResponseSchema,
    );
    this.logger.info({ name, version, alias }, 'Prompt alias updated');
  }

  async list(): Promise<PromptSummary[]> {
    const summaries: PromptSummary[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.client.get(
        '/registered-models/search',
        {
          filter: `tags.\`${IS_PROMPT_TAG}\` = 'true'`,
          max_results: LIST_PAGE_SIZE,
          page_token: pageToken,
        },
        SearchRegisteredModelsResponseSchema,
      );

      for (const model of page.registered_models) {
        const latest = model.latest_versions.reduce<number | undefined>(
          (max, version) => (max === undefined || version.version > max ? version.version : max),
          undefined,
        );
        const { [IS_PROMPT_TAG]: _isPrompt, ...tags } = tagsToRecord(model.tags);
        summaries.push({
          name: model.name,
          latestVersion: latest,
          aliases: Object.fromEntries(model.aliases.map((entry) => [entry.alias, entry.version])),
          tags,
        });
      }
      pageToken = page.next_page_token || undefined;
    } while (pageToken);

    return summaries;
  }

  /**
   * Create the registered-model entry for a prompt unless it already exists
   */
  private async ensurePromptEntry(name: string): Promise<void> {
    try {
      await this.client.post(
        '/registered-models/create',
        { name, tags: recordToTags({ [IS_PROMPT_TAG]: 'true' }) },
        EmptyResponseSchema,
      );
    } catch (error) {
      if (error instanceof MlflowRequestError && error.errorCode === 'RESOURCE_ALREADY_EXISTS') {
        this.logger.debug({ name }, 'Prompt entry already exists');
        return;
      }
      this.logger.error({ name, error: errorMessage(error) }, 'Failed to create prompt entry');
      throw error;
    }
  }
}
