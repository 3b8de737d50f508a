/**
 * Career service
 *
 * One method per career use case plus prompt administration. Each use case
 * resolves its prompt, renders the request fields into it, calls the model
 * and records the interaction.
 */

import type { Logger } from 'pino';
import { createTimer } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import { isFail } from '../types/core';
import type { PromptResolver } from '../prompts/resolver';
import type { PromptCatalog, Operation } from '../prompts/catalog';
import type { TemplateFields } from '../prompts/template';
import type { PromptSummary, TemplateStore } from '../prompts/template-store';
import type { ModelClient } from '../infrastructure/ai/gemini-client';
import type { TelemetrySink } from '../infrastructure/telemetry';
import type { TrackingBackend } from '../infrastructure/mlflow/tracking';
import type { InteractionRecorder } from '../tracking/interaction-recorder';
import type {
  CareerPlanRequest,
  MentorRequest,
  ReviewRequest,
  SkillGapRequest,
} from './schemas';

export interface CareerServiceDeps {
  resolver: PromptResolver;
  store: TemplateStore;
  catalog: PromptCatalog;
  model: ModelClient;
  recorder: InteractionRecorder;
  tracking: TrackingBackend;
  telemetry: TelemetrySink;
  logger: Logger;
  /** Alias every use case resolves through */
  alias: string;
  now?: () => number;
}

export type PromptListing =
  | (PromptSummary & { status: 'registered' })
  | { name: string; status: 'available' };

export interface EndpointMetrics {
  endpoint: string;
  total_runs: number;
  avg_prompt_tokens: number;
  avg_response_tokens: number;
  success_rate: number;
  period_days: number;
}

export interface PreloadReport {
  loaded: string[];
  failed: string[];
}

export interface SeedResult {
  name: string;
  version?: number;
  error?: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function average(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

export class CareerService {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly deps: CareerServiceDeps) {
    this.logger = deps.logger.child({ component: 'CareerService' });
    this.now = deps.now ?? Date.now;
  }

  analyzeSkills(request: SkillGapRequest): Promise<string> {
    return this.generate('analyze_skills', request);
  }

  generatePlan(request: CareerPlanRequest): Promise<string> {
    return this.generate('generate_plan', request);
  }

  reviewDraft(request: ReviewRequest): Promise<string> {
    return this.generate('performance_review', request);
  }

  mentorTurn(request: MentorRequest): Promise<string> {
    return this.generate('mentor_simulation', request);
  }

  /**
   * Registry listing, or the catalog names when the registry cannot be listed
   */
  async listPrompts(): Promise<PromptListing[]> {
    try {
      const summaries = await this.deps.store.list();
      this.logger.info({ count: summaries.length }, 'Listed prompts from registry');
      return summaries.map((summary) => ({ ...summary, status: 'registered' as const }));
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Prompt listing failed, returning catalog');
      return this.deps.catalog.names().map((name) => ({ name, status: 'available' as const }));
    }
  }

  /**
   * Register a new version and point the service alias at it
   */
  async registerPrompt(name: string, content: string, modelTag: string): Promise<string> {
    const registered = await this.deps.store.register(name, content, modelTag);
    await this.deps.store.promote(name, registered.version, this.deps.alias);
    this.logger.info({ name, version: registered.version, alias: this.deps.alias }, 'Prompt deployed');
    return `Prompt '${name}' successfully registered and deployed (version ${registered.version})`;
  }

  async promotePrompt(name: string, version: number, alias: string): Promise<void> {
    await this.deps.store.promote(name, version, alias);
  }

  /**
   * Usage of one endpoint over the last `days` days, from its tracking runs
   */
  async getEndpointMetrics(endpoint: string, days = 7): Promise<EndpointMetrics> {
    const tag = endpoint.replace(/^\/+/, '');
    const runs = await this.deps.tracking.searchRuns({
      tags: { endpoint: tag },
      startedAfter: this.now() - days * DAY_MS,
    });

    const finished = runs.filter((run) => run.status === 'FINISHED').length;
    return {
      endpoint: tag,
      total_runs: runs.length,
      avg_prompt_tokens: round2(average(runs.map((run) => run.metrics.prompt_tokens ?? 0))),
      avg_response_tokens: round2(average(runs.map((run) => run.metrics.response_tokens ?? 0))),
      success_rate: runs.length === 0 ? 0 : round2((finished / runs.length) * 100),
      period_days: days,
    };
  }

  /**
   * Resolve every catalog prompt so missing registry entries get seeded at startup
   */
  async preloadPrompts(): Promise<PreloadReport> {
    const report: PreloadReport = { loaded: [], failed: [] };
    for (const entry of this.deps.catalog.entries) {
      try {
        const template = await this.deps.resolver.resolve(entry.name, entry.file, this.deps.alias);
        report.loaded.push(entry.name);
        this.logger.info({ name: entry.name, source: template.source }, 'Prompt preloaded');
      } catch (error) {
        report.failed.push(entry.name);
        this.logger.warn({ name: entry.name, error: errorMessage(error) }, 'Failed to preload prompt');
      }
    }
    return report;
  }

  /**
   * Register the current content of every catalog prompt file as a new version
   */
  async seedPrompts(modelTag: string): Promise<SeedResult[]> {
    const results: SeedResult[] = [];
    for (const entry of this.deps.catalog.entries) {
      const file = await this.deps.resolver.readFile(entry.file);
      if (isFail(file)) {
        results.push({ name: entry.name, error: file.error.message });
        continue;
      }
      try {
        const registered = await this.deps.store.register(entry.name, file.value, modelTag);
        await this.deps.store.promote(entry.name, registered.version, this.deps.alias);
        results.push({ name: entry.name, version: registered.version });
      } catch (error) {
        results.push({ name: entry.name, error: errorMessage(error) });
      }
    }
    return results;
  }

  private async generate(operation: Operation, fields: TemplateFields): Promise<string> {
    const entry = this.deps.catalog.get(operation);
    const timer = createTimer(this.logger, operation, { prompt: entry.name });

    try {
      const template = await this.deps.resolver.resolve(entry.name, entry.file, this.deps.alias);
      const prompt = template.render(fields);
      const response = await this.deps.model.generate(prompt);

      await this.deps.recorder.record({
        endpoint: operation,
        prompt,
        response,
        model: this.deps.model.modelName,
      });

      this.deps.telemetry.logEvent(`${operation}_completed`);
      this.deps.telemetry.recordMetric(entry.metric, 1, { status: 'success' });
      timer.end({ source: template.source, version: template.version });
      return response;
    } catch (error) {
      timer.error(error);
      this.deps.telemetry.logEvent(`${operation}_failed`, 'ERROR');
      this.deps.telemetry.recordMetric(entry.metric, 1, { status: 'error' });
      throw error;
    }
  }
}
