import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createLogger } from '../../src/lib/logger';
import { BackendUnavailableError } from '../../src/lib/errors';
import { Failure, type Result } from '../../src/types/core';
import type { PromptTemplate } from '../../src/prompts/template';
import {
  InMemoryTemplateStore,
  type PromptSummary,
  type StoreLoadError,
  type TemplateStore,
} from '../../src/prompts/template-store';
import type { ModelClient } from '../../src/infrastructure/ai/gemini-client';
import type { TelemetrySink } from '../../src/infrastructure/telemetry';
import type { MetricLabels, Severity } from '../../src/types/core';

export const silentLogger = () => createLogger({ level: 'silent' });

/**
 * In-memory store whose operations can be made to fail like an unreachable registry
 */
export class FlakyTemplateStore implements TemplateStore {
  readonly inner = new InMemoryTemplateStore();
  loadDown = false;
  registerDown = false;
  promoteDown = false;
  listDown = false;
  readonly calls: string[] = [];

  async load(name: string, alias?: string): Promise<Result<PromptTemplate, StoreLoadError>> {
    this.calls.push(`load:${name}@${alias ?? 'production'}`);
    if (this.loadDown) {
      return Failure(new BackendUnavailableError('registry down'));
    }
    return this.inner.load(name, alias);
  }

  async register(name: string, body: string, modelTag: string): Promise<PromptTemplate> {
    this.calls.push(`register:${name}`);
    if (this.registerDown) {
      throw new BackendUnavailableError('registry down');
    }
    return this.inner.register(name, body, modelTag);
  }

  async promote(name: string, version: number, alias?: string): Promise<void> {
    this.calls.push(`promote:${name}:${version}@${alias ?? 'production'}`);
    if (this.promoteDown) {
      throw new BackendUnavailableError('registry down');
    }
    return this.inner.promote(name, version, alias);
  }

  async list(): Promise<PromptSummary[]> {
    if (this.listDown) {
      throw new BackendUnavailableError('registry down');
    }
    return this.inner.list();
  }
}

/**
 * Model that echoes its prompt, or fails when told to
 */
export class StubModel implements ModelClient {
  readonly modelName = 'stub-model';
  readonly prompts: string[] = [];
  failure: Error | undefined;

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.failure) {
      throw this.failure;
    }
    return `answer to: ${prompt}`;
  }
}

export interface RecordedMetric {
  name: string;
  value: number;
  labels: MetricLabels;
}

export class RecordingTelemetry implements TelemetrySink {
  readonly events: Array<{ message: string; severity: Severity }> = [];
  readonly metrics: RecordedMetric[] = [];

  logEvent(message: string, severity: Severity = 'INFO'): void {
    this.events.push({ message, severity });
  }

  recordMetric(name: string, value: number, labels: MetricLabels = {}): void {
    this.metrics.push({ name, value, labels });
  }
}

/**
 * Temporary prompts directory holding the given files
 */
export async function createPromptDir(files: Record<string, string>): Promise<{
  dir: string;
  cleanup: () => Promise<void>;
}> {
  const dir = await mkdtemp(join(tmpdir(), 'career-prompts-'));
  for (const [name, content] of Object.entries(files)) {
    await writeFile(join(dir, name), content);
  }
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
