/**
 * Tracking backend kept in process memory. Used with REGISTRY_BACKEND=memory.
 */

import type { RunQuery, RunRecord, TrackedRun, TrackingBackend } from '../infrastructure/mlflow/tracking';

export interface StoredRun extends TrackedRun {
  runName: string;
  params: Record<string, string>;
  artifacts: Record<string, string>;
}

export class InMemoryTrackingBackend implements TrackingBackend {
  readonly runs: StoredRun[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  async logRun(run: RunRecord): Promise<void> {
    this.runs.push({
      runId: `run-${this.runs.length + 1}`,
      runName: run.runName,
      status: 'FINISHED',
      startTime: this.now(),
      params: Object.fromEntries(Object.entries(run.params).map(([key, value]) => [key, String(value)])),
      metrics: { ...run.metrics },
      tags: { ...run.tags },
      artifacts: { ...run.artifacts },
    });
  }

  async searchRuns(query: RunQuery): Promise<TrackedRun[]> {
    const matches = this.runs.filter(
      (run) =>
        Object.entries(query.tags).every(([key, value]) => run.tags[key] === value) &&
        (query.startedAfter === undefined || (run.startTime ?? 0) > query.startedAfter),
    );
    return matches.slice(0, query.maxResults ?? 100);
  }
}
