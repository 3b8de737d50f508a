import { describe, it, expect } from '@jest/globals';
import {
  InteractionRecorder,
  buildRunRecord,
  countTokens,
} from '../../../src/tracking/interaction-recorder';
import { InMemoryTrackingBackend } from '../../../src/tracking/memory-tracking';
import type { TrackingBackend } from '../../../src/infrastructure/mlflow/tracking';
import { BackendUnavailableError } from '../../../src/lib/errors';
import { silentLogger } from '../../__support__/fakes';

const INTERACTION = {
  endpoint: 'analyze_skills',
  prompt: 'Skills: SQL. Target: ML Engineer.',
  response: 'Learn  statistics\nand MLOps',
  model: 'gemini-1.5-flash',
};

describe('countTokens', () => {
  it('should count whitespace separated words', () => {
    expect(countTokens('  one two\n\tthree  ')).toBe(3);
  });

  it('should count nothing in blank text', () => {
    expect(countTokens('')).toBe(0);
    expect(countTokens('   ')).toBe(0);
  });
});

describe('buildRunRecord', () => {
  it('should lay out params, metrics, tags and artifacts', () => {
    expect(buildRunRecord(INTERACTION, 'staging')).toEqual({
      runName: 'analyze_skills_run_gcp',
      params: {
        endpoint: 'analyze_skills',
        model: 'gemini-1.5-flash',
        platform: 'gcp',
        vertex_ai_model: 'gemini-1.5-flash',
        prompt_length: 33,
        response_length: 27,
      },
      metrics: { prompt_tokens: 5, response_tokens: 4 },
      tags: {
        environment: 'staging',
        cloud_provider: 'gcp',
        service: 'ai_career_companion',
        endpoint: 'analyze_skills',
      },
      artifacts: {
        'prompt_analyze_skills.txt': 'Skills: SQL. Target: ML Engineer.',
        'response_analyze_skills.txt': 'Learn  statistics\nand MLOps',
      },
    });
  });
});

describe('InteractionRecorder', () => {
  it('should log one run per interaction', async () => {
    const backend = new InMemoryTrackingBackend(() => 42);
    const recorder = new InteractionRecorder(backend, silentLogger(), { environment: 'development' });

    await recorder.record(INTERACTION);

    expect(backend.runs).toHaveLength(1);
    expect(backend.runs[0]).toMatchObject({
      runName: 'analyze_skills_run_gcp',
      status: 'FINISHED',
      startTime: 42,
      params: { prompt_length: '33' },
    });
  });

  it('should swallow tracking failures', async () => {
    const backend: TrackingBackend = {
      logRun: async () => {
        throw new BackendUnavailableError('tracking down');
      },
      searchRuns: async () => [],
    };
    const recorder = new InteractionRecorder(backend, silentLogger(), { environment: 'development' });

    await expect(recorder.record(INTERACTION)).resolves.toBeUndefined();
  });
});
