/**
 * Interaction recorder
 *
 * Logs one tracking run per model interaction. Recording is best effort:
 * a tracking outage is logged and never reaches the request.
 */

import type { Logger } from 'pino';
import { CONSTANTS } from '../config/app-config';
import { errorMessage } from '../lib/errors';
import type { RunRecord, TrackingBackend } from '../infrastructure/mlflow/tracking';

export interface Interaction {
  endpoint: string;
  prompt: string;
  response: string;
  model: string;
}

export interface RecorderOptions {
  /** Deployment environment tag on every run */
  environment: string;
}

/**
 * Whitespace-delimited word count
 */
export function countTokens(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Run layout for one interaction
 */
export function buildRunRecord(interaction: Interaction, environment: string): RunRecord {
  const { endpoint, prompt, response, model } = interaction;
  return {
    runName: `${endpoint}_run_${CONSTANTS.SERVICE.CLOUD_PROVIDER}`,
    params: {
      endpoint,
      model,
      platform: CONSTANTS.SERVICE.CLOUD_PROVIDER,
      vertex_ai_model: model,
      prompt_length: prompt.length,
      response_length: response.length,
    },
    metrics: {
      prompt_tokens: countTokens(prompt),
      response_tokens: countTokens(response),
    },
    tags: {
      environment,
      cloud_provider: CONSTANTS.SERVICE.CLOUD_PROVIDER,
      service: CONSTANTS.SERVICE.NAME,
      endpoint,
    },
    artifacts: {
      [`prompt_${endpoint}.txt`]: prompt,
      [`response_${endpoint}.txt`]: response,
    },
  };
}

export class InteractionRecorder {
  private readonly logger: Logger;

  constructor(
    private readonly backend: TrackingBackend,
    logger: Logger,
    private readonly options: RecorderOptions,
  ) {
    this.logger = logger.child({ component: 'InteractionRecorder' });
  }

  /**
   * Resolves once the run is logged or the attempt has failed
   */
  async record(interaction: Interaction): Promise<void> {
    try {
      await this.backend.logRun(buildRunRecord(interaction, this.options.environment));
    } catch (error) {
      this.logger.error(
        { endpoint: interaction.endpoint, error: errorMessage(error) },
        'Failed to record interaction',
      );
    }
  }
}
