/**
 * Prometheus metrics tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { PrometheusMetricsRecorder } from '../src/metrics.js';

const labels = { tenant: 'tenant-a', eventType: 'order.created' };

/** Sample lines of one series, e.g. `delivery_total{...} 2` */
async function samples(recorder: PrometheusMetricsRecorder, series: string): Promise<string[]> {
  const { body } = await recorder.render();
  return body.split('\n').filter(line => line.startsWith(`${series}{`));
}

test('delivery counter is labelled by tenant, event type and status', async () => {
  const recorder = new PrometheusMetricsRecorder();
  recorder.recordDelivery(labels, 'success');
  recorder.recordDelivery(labels, 'success');
  recorder.recordDelivery(labels, 'client_error');

  const lines = await samples(recorder, 'delivery_total');
  assert.equal(lines.length, 2);

  const success = lines.find(line => line.includes('status="success"'));
  assert.ok(success);
  assert.ok(success.includes('tenant="tenant-a"'));
  assert.ok(success.includes('event_type="order.created"'));
  assert.ok(success.endsWith('} 2'));

  const clientError = lines.find(line => line.includes('status="client_error"'));
  assert.ok(clientError?.endsWith('} 1'));
});

test('duration and attempts histograms accumulate observations', async () => {
  const recorder = new PrometheusMetricsRecorder();
  recorder.observeDuration(labels, 1.5);
  recorder.observeAttempts(labels, 2);
  recorder.observeAttempts(labels, 3);

  assert.deepEqual(
    (await samples(recorder, 'delivery_duration_seconds_sum')).map(line => line.split(' ').pop()),
    ['1.5']
  );
  assert.deepEqual(
    (await samples(recorder, 'delivery_attempts_sum')).map(line => line.split(' ').pop()),
    ['5']
  );
  assert.deepEqual(
    (await samples(recorder, 'delivery_attempts_count')).map(line => line.split(' ').pop()),
    ['2']
  );
});

test('separate recorders do not share a registry', async () => {
  const first = new PrometheusMetricsRecorder();
  const second = new PrometheusMetricsRecorder();
  first.recordDelivery(labels, 'success');

  assert.equal((await samples(first, 'delivery_total')).length, 1);
  assert.deepEqual(await samples(second, 'delivery_total'), []);
});

test('render produces the Prometheus text format', async () => {
  const recorder = new PrometheusMetricsRecorder();
  recorder.recordDelivery(labels, 'max_retries_exceeded');

  const { contentType, body } = await recorder.render();
  assert.ok(contentType.startsWith('text/plain'));
  assert.ok(body.includes('# TYPE delivery_total counter'));
  assert.ok(body.includes('# TYPE delivery_attempts histogram'));
});
