/**
 * Delivery metrics
 */

import { Counter, Histogram, Registry } from 'prom-client';
import type { DeliveryMetricLabels, DeliveryMetricStatus, MetricsRecorder } from './types.js';

const DURATION_BUCKETS = [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60, 120];
const ATTEMPT_BUCKETS = [1, 2, 3, 4, 5, 7, 10];

/**
 * prom-client recorder on its own registry, so several instances (tests,
 * multiple services in one process) never collide on metric names.
 */
export class PrometheusMetricsRecorder implements MetricsRecorder {
  readonly registry: Registry;
  private readonly deliveries: Counter<'tenant' | 'event_type' | 'status'>;
  private readonly duration: Histogram<'tenant' | 'event_type'>;
  private readonly attempts: Histogram<'tenant' | 'event_type'>;

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;

    this.deliveries = new Counter({
      name: 'delivery_total',
      help: 'Webhook deliveries by terminal status',
      labelNames: ['tenant', 'event_type', 'status'],
      registers: [registry],
    });

    this.duration = new Histogram({
      name: 'delivery_duration_seconds',
      help: 'Wall-clock time of a delivery across all attempts and backoff',
      labelNames: ['tenant', 'event_type'],
      buckets: DURATION_BUCKETS,
      registers: [registry],
    });

    this.attempts = new Histogram({
      name: 'delivery_attempts',
      help: 'Attempts made per delivery',
      labelNames: ['tenant', 'event_type'],
      buckets: ATTEMPT_BUCKETS,
      registers: [registry],
    });
  }

  recordDelivery(labels: DeliveryMetricLabels, status: DeliveryMetricStatus): void {
    this.deliveries.inc({ tenant: labels.tenant, event_type: labels.eventType, status });
  }

  observeDuration(labels: DeliveryMetricLabels, seconds: number): void {
    this.duration.observe({ tenant: labels.tenant, event_type: labels.eventType }, seconds);
  }

  observeAttempts(labels: DeliveryMetricLabels, attempts: number): void {
    this.attempts.observe({ tenant: labels.tenant, event_type: labels.eventType }, attempts);
  }

  async render(): Promise<{ contentType: string; body: string }> {
    return { contentType: this.registry.contentType, body: await this.registry.metrics() };
  }
}

export class NoopMetricsRecorder implements MetricsRecorder {
  recordDelivery(): void {}
  observeDuration(): void {}
  observeAttempts(): void {}
}
