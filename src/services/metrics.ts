/**
 * In-process ingestion metrics with Prometheus text exposition.
 *
 * @module services/metrics
 */

import type { ErrorKind } from '../core/errors';

const DURATION_BUCKETS = [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60];

type Labels = Record<string, string>;

interface LabeledCounter {
  help: string;
  values: Map<string, { labels: Labels; value: number }>;
}

interface HistogramState {
  count: number;
  sum: number;
  buckets: Record<number, number>;
}

export interface IngestionMetricsSnapshot {
  attempts: Record<string, number>;
  errors: Record<string, number>;
  redeliveries: number;
  circuitRejections: number;
  rateLimited: number;
  publishFailures: number;
  persistenceFailures: number;
  duration: { count: number; sumSeconds: number };
}

const labelKey = (labels: Labels): string =>
  Object.keys(labels)
    .sort()
    .map(key => `${key}=${labels[key]}`)
    .join(',');

const escapeLabel = (value: string): string => value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');

const formatLabels = (labels: Labels): string => {
  const parts = Object.entries(labels).map(([key, value]) => `${key}="${escapeLabel(value)}"`);
  return parts.length > 0 ? `{${parts.join(',')}}` : '';
};

const formatCounter = (name: string, help: string, value: number): string =>
  `# HELP ${name} ${help}\n# TYPE ${name} counter\n${name} ${value}`;

const formatGauge = (name: string, help: string, value: number): string =>
  `# HELP ${name} ${help}\n# TYPE ${name} gauge\n${name} ${value}`;

const createHistogram = (): HistogramState => ({
  count: 0,
  sum: 0,
  buckets: Object.fromEntries(DURATION_BUCKETS.map(bucket => [bucket, 0]))
});

export class IngestionMetrics {
  private attempts: LabeledCounter = { help: 'Ingestion attempts by adapter and status', values: new Map() };
  private errors: LabeledCounter = { help: 'Failed attempts by error classification', values: new Map() };
  private redeliveries = 0;
  private circuitRejections = 0;
  private rateLimited = 0;
  private publishFailures = 0;
  private persistenceFailures = 0;
  private duration = createHistogram();

  recordAttempt(adapterType: string, status: 'success' | 'error'): void {
    this.increment(this.attempts, { adapter: adapterType, status });
  }

  recordError(classification: ErrorKind, errorType: string): void {
    this.increment(this.errors, { classification, error_type: errorType });
  }

  recordDuration(durationMs: number): void {
    const seconds = durationMs / 1000;
    this.duration.count++;
    this.duration.sum += seconds;
    for (const bucket of DURATION_BUCKETS) {
      if (seconds <= bucket) {
        this.duration.buckets[bucket] = (this.duration.buckets[bucket] ?? 0) + 1;
      }
    }
  }

  recordRedelivery(): void {
    this.redeliveries++;
  }

  recordCircuitRejection(): void {
    this.circuitRejections++;
  }

  recordRateLimited(): void {
    this.rateLimited++;
  }

  recordPublishFailure(): void {
    this.publishFailures++;
  }

  recordPersistenceFailure(): void {
    this.persistenceFailures++;
  }

  snapshot(): IngestionMetricsSnapshot {
    const flatten = (counter: LabeledCounter): Record<string, number> =>
      Object.fromEntries(Array.from(counter.values.entries(), ([key, entry]) => [key, entry.value]));

    return {
      attempts: flatten(this.attempts),
      errors: flatten(this.errors),
      redeliveries: this.redeliveries,
      circuitRejections: this.circuitRejections,
      rateLimited: this.rateLimited,
      publishFailures: this.publishFailures,
      persistenceFailures: this.persistenceFailures,
      duration: { count: this.duration.count, sumSeconds: this.duration.sum }
    };
  }

  reset(): void {
    this.attempts.values.clear();
    this.errors.values.clear();
    this.redeliveries = 0;
    this.circuitRejections = 0;
    this.rateLimited = 0;
    this.publishFailures = 0;
    this.persistenceFailures = 0;
    this.duration = createHistogram();
  }

  /**
   * Render every metric in Prometheus text format. `gauges` are point-in-time
   * values owned by other components (queue depth, open circuits).
   */
  renderPrometheus(gauges: Record<string, { help: string; value: number }> = {}): string {
    const lines: string[] = [];

    lines.push(this.renderLabeled('sluice_ingestion_attempts_total', this.attempts));
    lines.push(this.renderLabeled('sluice_ingestion_errors_total', this.errors));
    lines.push(formatCounter('sluice_ingestion_redeliveries_total', 'Failed attempts scheduled for redelivery', this.redeliveries));
    lines.push(formatCounter('sluice_circuit_rejections_total', 'Attempts rejected by an open circuit', this.circuitRejections));
    lines.push(formatCounter('sluice_rate_limited_total', 'Requests denied by the rate limiter', this.rateLimited));
    lines.push(formatCounter('sluice_event_publish_failures_total', 'Completion events that failed to publish', this.publishFailures));
    lines.push(formatCounter('sluice_persistence_failures_total', 'Ingestion records that failed to persist', this.persistenceFailures));

    lines.push('# HELP sluice_processing_duration_seconds Adapter pipeline duration histogram (seconds)');
    lines.push('# TYPE sluice_processing_duration_seconds histogram');
    for (const bucket of DURATION_BUCKETS) {
      lines.push(`sluice_processing_duration_seconds_bucket{le="${bucket}"} ${this.duration.buckets[bucket] ?? 0}`);
    }
    lines.push(`sluice_processing_duration_seconds_bucket{le="+Inf"} ${this.duration.count}`);
    lines.push(`sluice_processing_duration_seconds_sum ${this.duration.sum}`);
    lines.push(`sluice_processing_duration_seconds_count ${this.duration.count}`);

    for (const [name, gauge] of Object.entries(gauges)) {
      lines.push(formatGauge(name, gauge.help, gauge.value));
    }

    return `${lines.join('\n')}\n`;
  }

  private increment(counter: LabeledCounter, labels: Labels): void {
    const key = labelKey(labels);
    const entry = counter.values.get(key);
    if (entry) {
      entry.value++;
    } else {
      counter.values.set(key, { labels, value: 1 });
    }
  }

  private renderLabeled(name: string, counter: LabeledCounter): string {
    const lines = [`# HELP ${name} ${counter.help}`, `# TYPE ${name} counter`];
    for (const { labels, value } of counter.values.values()) {
      lines.push(`${name}${formatLabels(labels)} ${value}`);
    }
    return lines.join('\n');
  }
}
