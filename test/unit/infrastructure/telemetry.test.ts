import { describe, it, expect, beforeEach } from '@jest/globals';
import { PrometheusTelemetry } from '../../../src/infrastructure/telemetry';
import { silentLogger } from '../../__support__/fakes';

describe('PrometheusTelemetry', () => {
  let telemetry: PrometheusTelemetry;

  beforeEach(() => {
    telemetry = new PrometheusTelemetry(silentLogger());
  });

  it('should count metrics per label set', async () => {
    telemetry.recordMetric('skills_analysis_requests', 1, { status: 'success' });
    telemetry.recordMetric('skills_analysis_requests', 1, { status: 'success' });
    telemetry.recordMetric('skills_analysis_requests', 1, { status: 'error' });

    const text = await telemetry.metrics();
    expect(text).toContain('skills_analysis_requests{status="success"} 2');
    expect(text).toContain('skills_analysis_requests{status="error"} 1');
  });

  it('should not throw when labels change between calls', () => {
    telemetry.recordMetric('requests', 1, { status: 'success' });
    expect(() => telemetry.recordMetric('requests', 1, { route: '/x' })).not.toThrow();
  });

  it('should not throw for negative increments', () => {
    expect(() => telemetry.recordMetric('requests', -1)).not.toThrow();
  });

  it('should sanitise metric names', async () => {
    telemetry.recordMetric('health-check.count', 1);
    expect(await telemetry.metrics()).toContain('health_check_count 1');
  });

  it('should accept events at every severity', () => {
    for (const severity of ['DEBUG', 'INFO', 'WARNING', 'ERROR'] as const) {
      expect(() => telemetry.logEvent('health_check', severity)).not.toThrow();
    }
  });

  it('should report the Prometheus content type', () => {
    expect(telemetry.contentType).toContain('text/plain');
  });
});
