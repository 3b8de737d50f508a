/**
 * Telemetry sink
 *
 * Structured events go to the log, counters go to a prom-client registry
 * served at /metrics. Neither call ever throws.
 */

import { Counter, Registry, collectDefaultMetrics } from 'prom-client';
import type { Logger } from 'pino';
import { errorMessage } from '../../lib/errors';
import type { MetricLabels, Severity } from '../../types/core';

export interface TelemetrySink {
  logEvent(message: string, severity?: Severity, context?: Record<string, unknown>): void;
  recordMetric(name: string, value: number, labels?: MetricLabels): void;
}

export interface PrometheusTelemetryOptions {
  registry?: Registry;
  /** Also export process and runtime metrics */
  defaultMetrics?: boolean;
}

const METRIC_NAME_PATTERN = /[^a-zA-Z0-9_:]/g;

export class PrometheusTelemetry implements TelemetrySink {
  readonly registry: Registry;
  private readonly counters = new Map<string, Counter<string>>();
  private readonly logger: Logger;

  constructor(logger: Logger, options: PrometheusTelemetryOptions = {}) {
    this.logger = logger.child({ component: 'Telemetry' });
    this.registry = options.registry ?? new Registry();
    if (options.defaultMetrics) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  logEvent(message: string, severity: Severity = 'INFO', context: Record<string, unknown> = {}): void {
    const fields = { event: message, ...context };
    switch (severity) {
      case 'DEBUG':
        this.logger.debug(fields, message);
        break;
      case 'WARNING':
        this.logger.warn(fields, message);
        break;
      case 'ERROR':
        this.logger.error(fields, message);
        break;
      default:
        this.logger.info(fields, message);
    }
  }

  recordMetric(name: string, value: number, labels: MetricLabels = {}): void {
    try {
      this.counterFor(name, Object.keys(labels)).inc(labels, value);
    } catch (error) {
      this.logger.warn({ metric: name, labels, error: errorMessage(error) }, 'Failed to record metric');
    }
  }

  /**
   * Current registry contents in the Prometheus text format
   */
  metrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  private counterFor(name: string, labelNames: string[]): Counter<string> {
    const metricName = name.replace(METRIC_NAME_PATTERN, '_');
    let counter = this.counters.get(metricName);
    if (!counter) {
      counter = new Counter({
        name: metricName,
        help: `Count of ${name}`,
        labelNames: [...labelNames].sort(),
        registers: [this.registry],
      });
      this.counters.set(metricName, counter);
    }
    return counter;
  }
}
