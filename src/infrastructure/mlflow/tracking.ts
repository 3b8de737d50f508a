/**
 * MLflow run tracking
 */

import type { Logger } from 'pino';
import { errorMessage } from '../../lib/errors';
import type { MlflowClient } from './client';
import {
  CreateRunResponseSchema,
  EmptyResponseSchema,
  SearchRunsResponseSchema,
  recordToTags,
  tagsToRecord,
} from './schemas';

/**
 * One run as handed to the tracking backend
 */
export interface RunRecord {
  runName: string;
  params: Record<string, string | number>;
  metrics: Record<string, number>;
  tags: Record<string, string>;
  /** Artifact file name to text content */
  artifacts: Record<string, string>;
}

/**
 * Run as read back from the tracking backend
 */
export interface TrackedRun {
  runId: string;
  status: string | undefined;
  startTime: number | undefined;
  metrics: Record<string, number>;
  tags: Record<string, string>;
}

export interface RunQuery {
  tags: Record<string, string>;
  startedAfter?: number;
  maxResults?: number;
}

export interface TrackingBackend {
  logRun(run: RunRecord): Promise<void>;
  searchRuns(query: RunQuery): Promise<TrackedRun[]>;
}

const MLFLOW_RUN_NAME_TAG = 'mlflow.runName';
const MAX_PARAM_LENGTH = 6000;

/**
 * Artifact location relative to the artifact proxy root
 */
export function artifactRoot(artifactUri: string | undefined, experimentId: string, runId: string): string {
  const proxied = artifactUri?.match(/^mlflow-artifacts:\/+(?:[^/]+:\d+\/)?(.*)$/);
  if (proxied?.[1]) {
    return proxied[1].replace(/\/+$/, '');
  }
  return `${experimentId}/${runId}/artifacts`;
}

function quote(value: string): string {
  return `'${value.replace(/'/g, "\\'")}'`;
}

export class MlflowTrackingBackend implements TrackingBackend {
  private readonly logger: Logger;

  constructor(
    private readonly client: MlflowClient,
    private readonly experimentId: string,
    logger: Logger,
    private readonly now: () => number = Date.now,
  ) {
    this.logger = logger.child({ component: 'MlflowTracking' });
  }

  async logRun(run: RunRecord): Promise<void> {
    const startTime = this.now();
    const { run: created } = await this.client.post(
      '/runs/create',
      {
        experiment_id: this.experimentId,
        run_name: run.runName,
        start_time: startTime,
        tags: recordToTags({ ...run.tags, [MLFLOW_RUN_NAME_TAG]: run.runName }),
      },
      CreateRunResponseSchema,
    );
    const runId = created.info.run_id;

    try {
      await this.client.post(
        '/runs/log-batch',
        {
          run_id: runId,
          params: Object.entries(run.params).map(([key, value]) => ({
            key,
            value: String(value).slice(0, MAX_PARAM_LENGTH),
          })),
          metrics: Object.entries(run.metrics).map(([key, value]) => ({
            key,
            value,
            timestamp: startTime,
            step: 0,
          })),
        },
        EmptyResponseSchema,
      );

      const root = artifactRoot(created.info.artifact_uri, this.experimentId, runId);
      for (const [fileName, content] of Object.entries(run.artifacts)) {
        await this.client.uploadArtifact(`${root}/${fileName}`, content);
      }
    } catch (error) {
      await this.terminate(runId, 'FAILED');
      throw error;
    }

    await this.terminate(runId, 'FINISHED');
    this.logger.debug({ runId, runName: run.runName }, 'Run logged');
  }

  async searchRuns(query: RunQuery): Promise<TrackedRun[]> {
    const clauses = Object.entries(query.tags).map(([key, value]) => `tags.${key} = ${quote(value)}`);
    if (query.startedAfter !== undefined) {
      clauses.push(`attributes.start_time > ${query.startedAfter}`);
    }

    const { runs } = await this.client.post(
      '/runs/search',
      {
        experiment_ids: [this.experimentId],
        filter: clauses.join(' AND '),
        max_results: query.maxResults ?? 100,
      },
      SearchRunsResponseSchema,
    );

    return runs.map((run) => ({
      runId: run.info.run_id,
      status: run.info.status,
      startTime: run.info.start_time,
      metrics: Object.fromEntries(run.data.metrics.map((metric) => [metric.key, metric.value])),
      tags: tagsToRecord(run.data.tags),
    }));
  }

  private async terminate(runId: string, status: 'FINISHED' | 'FAILED'): Promise<void> {
    try {
      await this.client.post(
        '/runs/update',
        { run_id: runId, status, end_time: this.now() },
        EmptyResponseSchema,
      );
    } catch (error) {
      this.logger.warn({ runId, status, error: errorMessage(error) }, 'Failed to close run');
      if (status === 'FINISHED') {
        throw error;
      }
    }
  }
}
