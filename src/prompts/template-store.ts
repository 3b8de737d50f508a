/**
 * Template Store
 *
 * Contract shared by every prompt registry backend, plus the in-memory
 * backend and the TTL cache that sits in front of the remote one.
 */

import type { Logger } from 'pino';
import { Failure, Success, type Result } from '../types/core';
import { BackendUnavailableError, NotFoundError } from '../lib/errors';
import { CONSTANTS } from '../config/app-config';
import type { PromptTemplate } from './template';

export type StoreLoadError = NotFoundError | BackendUnavailableError;

export const DEFAULT_ALIAS = CONSTANTS.DEFAULTS.PROMPT_ALIAS;

/**
 * Registry listing entry
 */
export interface PromptSummary {
  name: string;
  latestVersion: number | undefined;
  aliases: Record<string, number>;
  tags: Record<string, string>;
}

export interface TemplateStore {
  /**
   * Template bound to `alias`. Never has side effects.
   */
  load(name: string, alias?: string): Promise<Result<PromptTemplate, StoreLoadError>>;

  /**
   * Create a new version. Never binds an alias.
   * Rejects with BackendUnavailableError when the registry is unreachable.
   */
  register(name: string, body: string, modelTag: string): Promise<PromptTemplate>;

  /**
   * Point `alias` at `version`
   */
  promote(name: string, version: number, alias?: string): Promise<void>;

  list(): Promise<PromptSummary[]>;
}

/**
 * Fixed metadata attached to every registered version
 */
export function buildRegistrationTags(modelTag: string): Record<string, string> {
  return {
    author: 'AI Career Companion',
    task: 'Content Generation',
    language: 'en',
    llm: modelTag,
    platform: CONSTANTS.SERVICE.CLOUD_PROVIDER,
    vertex_ai_model: modelTag,
  };
}

interface StoredPrompt {
  versions: PromptTemplate[];
  aliases: Map<string, number>;
}

/**
 * Registry kept in process memory. Used with REGISTRY_BACKEND=memory.
 */
export class InMemoryTemplateStore implements TemplateStore {
  private readonly prompts = new Map<string, StoredPrompt>();

  async load(
    name: string,
    alias: string = DEFAULT_ALIAS,
  ): Promise<Result<PromptTemplate, StoreLoadError>> {
    const stored = this.prompts.get(name);
    const version = stored?.aliases.get(alias);
    const template = version === undefined ? undefined : stored?.versions[version - 1];
    if (!template) {
      return Failure(new NotFoundError(`No version of '${name}' is bound to alias '${alias}'`, { name, alias }));
    }
    return Success({ ...template, tags: { ...template.tags }, alias });
  }

  async register(name: string, body: string, modelTag: string): Promise<PromptTemplate> {
    const stored: StoredPrompt = this.prompts.get(name) ?? { versions: [], aliases: new Map() };
    this.prompts.set(name, stored);

    const template: PromptTemplate = {
      name,
      version: stored.versions.length + 1,
      body,
      tags: buildRegistrationTags(modelTag),
    };
    stored.versions.push(template);
    return { ...template, tags: { ...template.tags } };
  }

  async promote(name: string, version: number, alias: string = DEFAULT_ALIAS): Promise<void> {
    const stored = this.prompts.get(name);
    if (!stored || version < 1 || version > stored.versions.length) {
      throw new NotFoundError(`Prompt '${name}' has no version ${version}`, { name, version });
    }
    stored.aliases.set(alias, version);
  }

  async list(): Promise<PromptSummary[]> {
    return [...this.prompts.entries()].map(([name, stored]) => {
      const latest = stored.versions[stored.versions.length - 1];
      return {
        name,
        latestVersion: latest?.version,
        aliases: Object.fromEntries(stored.aliases),
        tags: latest ? { ...latest.tags } : {},
      };
    });
  }

  /**
   * Number of versions registered under `name`
   */
  versionCount(name: string): number {
    return this.prompts.get(name)?.versions.length ?? 0;
  }
}

interface CacheEntry {
  template: PromptTemplate;
  expiresAt: number;
}

export interface CachedTemplateStoreOptions {
  ttlSeconds: number;
  now?: () => number;
}

/**
 * TTL cache in front of another store. Only successful loads are cached;
 * register and promote drop every cached alias of the affected name.
 */
export class CachedTemplateStore implements TemplateStore {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly inner: TemplateStore,
    logger: Logger,
    options: CachedTemplateStoreOptions,
  ) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
    this.logger = logger.child({ component: 'CachedTemplateStore' });
  }

  async load(
    name: string,
    alias: string = DEFAULT_ALIAS,
  ): Promise<Result<PromptTemplate, StoreLoadError>> {
    const key = `${name}@${alias}`;
    const entry = this.cache.get(key);
    if (entry && entry.expiresAt > this.now()) {
      this.logger.debug({ name, alias }, 'Template cache hit');
      return Success({ ...entry.template, tags: { ...entry.template.tags } });
    }
    this.cache.delete(key);

    const result = await this.inner.load(name, alias);
    if (result.ok && this.ttlMs > 0) {
      this.cache.set(key, {
        template: { ...result.value, tags: { ...result.value.tags } },
        expiresAt: this.now() + this.ttlMs,
      });
    }
    return result;
  }

  async register(name: string, body: string, modelTag: string): Promise<PromptTemplate> {
    const template = await this.inner.register(name, body, modelTag);
    this.invalidate(name);
    return template;
  }

  async promote(name: string, version: number, alias: string = DEFAULT_ALIAS): Promise<void> {
    await this.inner.promote(name, version, alias);
    this.invalidate(name);
  }

  list(): Promise<PromptSummary[]> {
    return this.inner.list();
  }

  invalidate(name: string): void {
    for (const key of this.cache.keys()) {
      if (key.startsWith(`${name}@`)) {
        this.cache.delete(key);
      }
    }
  }
}
