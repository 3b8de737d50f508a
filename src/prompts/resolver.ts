/**
 * Prompt resolution pipeline
 *
 * Tiers, each tried only after the previous one failed:
 *   1. registry lookup by alias
 *   2. read the bundled prompt file
 *   3. register the file content, promote the new version, look up again
 *   4. serve the raw file content
 * Only a registry miss together with an unreadable file fails the caller.
 */

import type { Logger } from 'pino';
import { Failure, Success, isFail, isOk, type Result } from '../types/core';
import { createTimer } from '../lib/logger';
import {
  BackendUnavailableError,
  PromptUnavailableError,
  errorMessage,
  isCareerCompanionError,
  toError,
  type CareerCompanionError,
} from '../lib/errors';
import { fromFileContent, fromRegistry, type PromptTemplate, type RenderableTemplate } from './template';
import { DEFAULT_ALIAS, type StoreLoadError, type TemplateStore } from './template-store';
import { readPromptFile, type FileReadError } from './file-loader';

export interface PromptResolverOptions {
  /** Directory relative prompt file paths resolve against */
  promptsDir?: string;
  /** Model tag attached to versions registered from files */
  modelTag: string;
  /** Point the alias at the version registered from the file */
  autoPromote: boolean;
}

/**
 * Failure of the re-registration tier
 */
export type ReseedError = StoreLoadError | CareerCompanionError;

export class PromptResolver {
  private readonly logger: Logger;

  constructor(
    private readonly store: TemplateStore,
    logger: Logger,
    private readonly options: PromptResolverOptions,
  ) {
    this.logger = logger.child({ component: 'PromptResolver' });
  }

  /**
   * Resolve a prompt into a renderable template.
   * Rejects with PromptUnavailableError only when every tier is exhausted.
   */
  async resolve(
    name: string,
    filePath: string,
    alias: string = DEFAULT_ALIAS,
  ): Promise<RenderableTemplate> {
    const timer = createTimer(this.logger, 'resolve-prompt', { name, alias });

    const primary = await this.store.load(name, alias);
    if (isOk(primary)) {
      timer.end({ source: 'registry', version: primary.value.version });
      return fromRegistry(primary.value);
    }
    this.logger.warn(
      { name, alias, reason: primary.error.code, error: primary.error.message },
      'Registry lookup failed, falling back to prompt file',
    );

    const file = await readPromptFile(filePath, this.options.promptsDir);
    if (isFail(file)) {
      const failure = new PromptUnavailableError(name, file.error);
      timer.error(failure, { reason: file.error.code });
      throw failure;
    }

    const reseeded = await this.reseed(name, file.value, alias);
    if (isOk(reseeded)) {
      timer.end({ source: 'registry', version: reseeded.value.version, reseeded: true });
      return fromRegistry(reseeded.value);
    }

    this.logger.warn(
      { name, alias, reason: reseeded.error.code, error: reseeded.error.message },
      'Using prompt file content directly',
    );
    timer.end({ source: 'file' });
    return fromFileContent(name, file.value);
  }

  /**
   * Read the prompt file without touching the registry
   */
  readFile(filePath: string): Promise<Result<string, FileReadError>> {
    return readPromptFile(filePath, this.options.promptsDir);
  }

  /**
   * Register file content as a new version and look the alias up again
   */
  private async reseed(
    name: string,
    content: string,
    alias: string,
  ): Promise<Result<PromptTemplate, ReseedError>> {
    try {
      const registered = await this.store.register(name, content, this.options.modelTag);
      this.logger.info({ name, version: registered.version }, 'Registered prompt from file');

      if (this.options.autoPromote) {
        await this.store.promote(name, registered.version, alias);
      }
    } catch (error) {
      return Failure(this.asStoreError(name, error));
    }

    const retried = await this.store.load(name, alias);
    return isOk(retried) ? Success(retried.value) : Failure(retried.error);
  }

  private asStoreError(name: string, error: unknown): CareerCompanionError {
    if (isCareerCompanionError(error)) {
      return error;
    }
    return new BackendUnavailableError(
      `Re-registration of '${name}' failed: ${errorMessage(error)}`,
      { name },
      toError(error),
    );
  }
}
