/**
 * Webhook Delivery Service Tests
 *
 * Deliveries go to an in-process receiver on 127.0.0.1, so the service runs
 * with loopback destinations allowed. Backoff waits are recorded instead of
 * slept except where elapsed time is the point of the test.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { WebhookDeliveryService } from '../src/delivery.js';
import { WebhookUrlValidator } from '../src/url-validator.js';
import { canonicalizePayload, verifySignature } from '../src/signature.js';
import {
  FailingDeliveryStore,
  MemoryDeliveryStore,
  RecordingMetrics,
  TEST_DELIVERY_CONFIG,
  ThrowingMetrics,
  fakeResolver,
  recordingSleep,
  sequence,
  startReceiver,
  type Receiver,
} from './fakes.js';
import type { DeliveryStore, MetricsRecorder } from '../src/types.js';

const validator = new WebhookUrlValidator(fakeResolver({}));

function createService(options: {
  store?: DeliveryStore;
  metrics?: MetricsRecorder;
  sleep?: (ms: number) => Promise<void>;
} = {}) {
  return new WebhookDeliveryService({
    store: options.store ?? new MemoryDeliveryStore(),
    metrics: options.metrics,
    validator,
    config: TEST_DELIVERY_CONFIG,
    sleep: options.sleep ?? recordingSleep().sleep,
  });
}

async function withReceiver(
  respond: Parameters<typeof startReceiver>[0],
  fn: (receiver: Receiver) => Promise<void>
) {
  const receiver = await startReceiver(respond);
  try {
    await fn(receiver);
  } finally {
    await receiver.close();
  }
}

test('4xx response fails after a single attempt', async () => {
  await withReceiver(sequence({ status: 400, body: 'bad payload' }), async (receiver) => {
    const { delays, sleep } = recordingSleep();
    const result = await createService({ sleep }).deliver({
      url: receiver.url,
      payload: { id: 1 },
    });

    assert.equal(result.status, 'failed');
    assert.equal(result.attempts, 1);
    assert.equal(result.responseCode, 400);
    assert.equal(result.error, 'Client error 400: bad payload');
    assert.equal(receiver.requests.length, 1);
    assert.deepEqual(delays, []);
  });
});

test('503 then 200 delivers on the second attempt after a real 1s backoff', async () => {
  await withReceiver(sequence({ status: 503 }, { status: 200 }), async (receiver) => {
    const service = new WebhookDeliveryService({
      store: new MemoryDeliveryStore(),
      validator,
      config: TEST_DELIVERY_CONFIG,
    });

    const started = Date.now();
    const result = await service.deliver({ url: receiver.url, payload: { id: 2 } });
    const elapsed = Date.now() - started;

    assert.equal(result.status, 'delivered');
    assert.equal(result.attempts, 2);
    assert.equal(result.responseCode, 200);
    assert.equal(result.error, null);
    assert.ok(elapsed >= 995, `expected at least 1s between attempts, took ${elapsed}ms`);
    assert.ok(result.durationMs >= 995);
  });
});

test('persistent 500 exhausts all attempts with doubling backoff', async () => {
  await withReceiver(sequence({ status: 500, body: 'boom' }), async (receiver) => {
    const { delays, sleep } = recordingSleep();
    const result = await createService({ sleep }).deliver({
      url: receiver.url,
      payload: { id: 3 },
      maxAttempts: 3,
    });

    assert.equal(result.status, 'failed');
    assert.equal(result.attempts, 3);
    assert.equal(result.responseCode, 500);
    assert.equal(result.error, 'Server error 500: boom');
    assert.equal(receiver.requests.length, 3);
    assert.deepEqual(delays, [1000, 2000]);
  });
});

test('signed delivery survives two 503s and stays verifiable', async () => {
  await withReceiver(sequence({ status: 503 }, { status: 503 }, { status: 200 }), async (receiver) => {
    const payload = { order: { id: 'ord_1', total: 1250 }, currency: 'EUR' };
    const result = await createService().deliver({
      url: receiver.url,
      payload,
      signingSecret: 's3cr3t',
      eventType: 'order.paid',
      tenantId: 'tenant-a',
    });

    assert.equal(result.status, 'delivered');
    assert.equal(result.attempts, 3);
    assert.equal(result.responseCode, 200);

    const third = receiver.requests[2];
    assert.ok(third);
    assert.equal(third.body, canonicalizePayload(payload));

    const signature = third.headers['x-webhook-signature'];
    const timestamp = third.headers['x-webhook-timestamp'];
    assert.equal(typeof signature, 'string');
    assert.equal(typeof timestamp, 'string');
    assert.ok(signature?.toString().startsWith('sha256='));
    assert.equal(
      verifySignature(third.body, String(signature), String(timestamp), 's3cr3t'),
      true
    );
  });
});

test('a store that throws everywhere does not change the outcome', async () => {
  await withReceiver(sequence({ status: 200 }), async (receiver) => {
    const store = new FailingDeliveryStore();
    const result = await createService({ store }).deliver({
      url: receiver.url,
      payload: { id: 4 },
      tenantId: 'tenant-a',
      eventType: 'order.created',
    });

    assert.equal(result.status, 'delivered');
    assert.equal(result.attempts, 1);
    assert.equal(result.responseCode, 200);
    // create and complete were both attempted
    assert.equal(store.calls, 2);
  });

  await withReceiver(sequence({ status: 422, body: 'nope' }), async (receiver) => {
    const result = await createService({ store: new FailingDeliveryStore() }).deliver({
      url: receiver.url,
      payload: { id: 5 },
      tenantId: 'tenant-a',
      eventType: 'order.created',
    });

    assert.equal(result.status, 'failed');
    assert.equal(result.attempts, 1);
    assert.equal(result.error, 'Client error 422: nope');
  });
});

test('blocked destination fails without a delivery id, request or record', async () => {
  const store = new MemoryDeliveryStore();
  const metrics = new RecordingMetrics();
  const result = await createService({ store, metrics }).deliver({
    url: 'http://10.0.0.5/hook',
    payload: { id: 6 },
    tenantId: 'tenant-a',
    eventType: 'order.created',
  });

  assert.deepEqual(
    { ...result, durationMs: 0 },
    {
      deliveryId: null,
      status: 'failed',
      attempts: 0,
      responseCode: null,
      error: 'invalid destination: Address 10.0.0.5 is blocked (private network)',
      durationMs: 0,
    }
  );
  assert.equal(store.records.size, 0);
  assert.deepEqual(metrics.events, [
    { name: 'delivery', labels: { tenant: 'tenant-a', eventType: 'order.created' }, value: 'validation_failed' },
  ]);
});

test('tracked delivery is recorded from pending to delivered', async () => {
  await withReceiver(sequence({ status: 204 }), async (receiver) => {
    const store = new MemoryDeliveryStore();
    const result = await createService({ store }).deliver({
      url: receiver.url,
      payload: { id: 7 },
      tenantId: 'tenant-b',
      eventType: 'invoice.sent',
      objectId: 'inv_7',
    });

    assert.ok(result.deliveryId);
    assert.match(result.deliveryId, /^whd_[0-9a-f]{12}$/);

    const record = await store.getDelivery(result.deliveryId);
    assert.ok(record);
    assert.equal(record.status, 'delivered');
    assert.equal(record.attempts, 1);
    assert.equal(record.response_code, 204);
    assert.equal(record.last_error, null);
    assert.equal(record.tenant_id, 'tenant-b');
    assert.equal(record.event_type, 'invoice.sent');
    assert.equal(record.object_id, 'inv_7');
    assert.equal(record.webhook_url, receiver.url);
    assert.ok(record.delivered_at instanceof Date);
  });
});

test('exhausted delivery records the last error and status code', async () => {
  await withReceiver(sequence({ status: 502, body: 'upstream down' }), async (receiver) => {
    const store = new MemoryDeliveryStore();
    const metrics = new RecordingMetrics();
    const result = await createService({ store, metrics }).deliver({
      url: receiver.url,
      payload: { id: 8 },
      maxAttempts: 2,
      tenantId: 'tenant-b',
      eventType: 'invoice.sent',
    });

    assert.ok(result.deliveryId);
    const record = await store.getDelivery(result.deliveryId);
    assert.ok(record);
    assert.equal(record.status, 'failed');
    assert.equal(record.attempts, 2);
    assert.equal(record.response_code, 502);
    assert.equal(record.last_error, 'Server error 502: upstream down');
    assert.equal(record.delivered_at, null);

    const statuses = metrics.events.filter(event => event.name === 'delivery').map(event => event.value);
    assert.deepEqual(statuses, ['max_retries_exceeded']);
    const attempts = metrics.events.filter(event => event.name === 'attempts').map(event => event.value);
    assert.deepEqual(attempts, [2]);
  });
});

test('untracked delivery creates no record and emits no metrics', async () => {
  await withReceiver(sequence({ status: 200 }), async (receiver) => {
    const store = new MemoryDeliveryStore();
    const metrics = new RecordingMetrics();
    const result = await createService({ store, metrics }).deliver({
      url: receiver.url,
      payload: { id: 9 },
      tenantId: 'tenant-c',
    });

    assert.equal(result.status, 'delivered');
    assert.equal(store.records.size, 0);
    assert.deepEqual(metrics.events, []);
  });
});

test('service headers win over caller headers; other caller headers pass through', async () => {
  await withReceiver(sequence({ status: 200 }), async (receiver) => {
    const result = await createService().deliver({
      url: receiver.url,
      payload: { id: 10 },
      eventType: 'user.deleted',
      headers: {
        'X-Custom': 'yes',
        'x-webhook-delivery-id': 'spoofed',
        'X-Webhook-Signature': 'sha256=spoofed',
        'content-type': 'application/vnd.test+json',
      },
    });

    const request = receiver.requests[0];
    assert.ok(request);
    assert.equal(request.method, 'POST');
    assert.equal(request.headers['x-custom'], 'yes');
    assert.equal(request.headers['x-webhook-delivery-id'], result.deliveryId);
    assert.equal(request.headers['x-webhook-event-type'], 'user.deleted');
    assert.equal(request.headers['x-webhook-signature'], undefined);
    assert.equal(request.headers['content-type'], 'application/vnd.test+json');
    assert.equal(request.headers['user-agent'], 'hookline-webhooks/test');
  });
});

test('redirects are not followed', async () => {
  await withReceiver(
    sequence({ status: 302, headers: { Location: 'http://10.0.0.5/internal' } }),
    async (receiver) => {
      const result = await createService().deliver({ url: receiver.url, payload: { id: 11 } });

      assert.equal(result.status, 'failed');
      assert.equal(result.attempts, 1);
      assert.equal(result.responseCode, 302);
      assert.equal(result.error, 'Redirect 302 not followed');
      assert.equal(receiver.requests.length, 1);
    }
  );
});

test('per-attempt timeout is retried and reported', async () => {
  await withReceiver(() => null, async (receiver) => {
    const { delays, sleep } = recordingSleep();
    const result = await createService({ sleep }).deliver({
      url: receiver.url,
      payload: { id: 12 },
      maxAttempts: 2,
      timeoutMs: 100,
    });

    assert.equal(result.status, 'failed');
    assert.equal(result.attempts, 2);
    assert.equal(result.responseCode, null);
    assert.equal(result.error, 'Request timeout after 0.1s');
    assert.deepEqual(delays, [1000]);
  });
});

test('refused connection is retried as a connection error', async () => {
  const receiver = await startReceiver(sequence({ status: 200 }));
  await receiver.close();

  const { delays, sleep } = recordingSleep();
  const result = await createService({ sleep }).deliver({
    url: receiver.url,
    payload: { id: 13 },
    maxAttempts: 2,
  });

  assert.equal(result.status, 'failed');
  assert.equal(result.attempts, 2);
  assert.equal(result.responseCode, null);
  assert.ok(result.error?.startsWith('Connection error: '), `unexpected error: ${result.error}`);
  assert.deepEqual(delays, [1000]);
});

test('long receiver bodies are cut to 200 characters in the error', async () => {
  await withReceiver(sequence({ status: 400, body: 'e'.repeat(450) }), async (receiver) => {
    const result = await createService().deliver({ url: receiver.url, payload: { id: 14 } });
    assert.equal(result.error, `Client error 400: ${'e'.repeat(200)}`);
  });
});

test('successful tracked delivery emits success, duration and attempts', async () => {
  await withReceiver(sequence({ status: 200 }), async (receiver) => {
    const metrics = new RecordingMetrics();
    await createService({ metrics }).deliver({
      url: receiver.url,
      payload: { id: 15 },
      tenantId: 'tenant-d',
      eventType: 'ping',
    });

    assert.deepEqual(
      metrics.events.map(event => event.name),
      ['delivery', 'duration', 'attempts']
    );
    assert.equal(metrics.events[0]?.value, 'success');
    assert.equal(metrics.events[2]?.value, 1);
    assert.deepEqual(metrics.events[0]?.labels, { tenant: 'tenant-d', eventType: 'ping' });
  });
});

test('a single allowed attempt is never retried, whatever the status', async () => {
  await withReceiver(sequence({ status: 503, body: 'busy' }), async (receiver) => {
    const { delays, sleep } = recordingSleep();
    const result = await createService({ sleep }).deliver({
      url: receiver.url,
      payload: { id: 16 },
      maxAttempts: 1,
    });

    assert.equal(result.status, 'failed');
    assert.equal(result.attempts, 1);
    assert.equal(result.responseCode, 503);
    assert.equal(result.error, 'Server error 503: busy');
    assert.equal(receiver.requests.length, 1);
    assert.deepEqual(delays, []);
  });

  const closed = await startReceiver(sequence({ status: 200 }));
  await closed.close();

  const { delays, sleep } = recordingSleep();
  const result = await createService({ sleep }).deliver({ url: closed.url, payload: { id: 17 }, maxAttempts: 1 });

  assert.equal(result.attempts, 1);
  assert.ok(result.error?.startsWith('Connection error: '), `unexpected error: ${result.error}`);
  assert.deepEqual(delays, []);
});

test('timeouts beyond the timer range are capped instead of firing at once', async () => {
  await withReceiver(sequence({ status: 200, delayMs: 50 }), async (receiver) => {
    const result = await createService().deliver({
      url: receiver.url,
      payload: { id: 18 },
      timeoutMs: 3_000_000_000,
    });

    assert.equal(result.status, 'delivered');
    assert.equal(result.attempts, 1);
    assert.equal(result.responseCode, 200);
  });
});

test('a throwing metrics recorder does not change the outcome', async () => {
  await withReceiver(sequence({ status: 200 }), async (receiver) => {
    const store = new MemoryDeliveryStore();
    const metrics = new ThrowingMetrics();
    const result = await createService({ store, metrics }).deliver({
      url: receiver.url,
      payload: { id: 19 },
      tenantId: 'tenant-e',
      eventType: 'ping',
    });

    assert.equal(result.status, 'delivered');
    assert.equal(metrics.calls, 1);
    assert.equal((await store.getDelivery(result.deliveryId ?? ''))?.status, 'delivered');
  });

  const metrics = new ThrowingMetrics();
  const blocked = await createService({ metrics }).deliver({
    url: 'http://10.0.0.5/hook',
    payload: { id: 20 },
    tenantId: 'tenant-e',
    eventType: 'ping',
  });

  assert.equal(blocked.error, 'invalid destination: Address 10.0.0.5 is blocked (private network)');
  assert.equal(metrics.calls, 1);
});

test('connections go to the addresses that passed validation', async () => {
  await withReceiver(sequence({ status: 200 }), async (receiver) => {
    const port = new URL(receiver.url).port;
    // hooks.test exists only in the fake resolver; the system resolver would fail it
    const service = new WebhookDeliveryService({
      validator: new WebhookUrlValidator(fakeResolver({ 'hooks.test': ['127.0.0.1'] })),
      config: TEST_DELIVERY_CONFIG,
      sleep: recordingSleep().sleep,
    });

    const result = await service.deliver({ url: `http://hooks.test:${port}/hook`, payload: { id: 21 } });

    assert.equal(result.status, 'delivered');
    assert.equal(receiver.requests.length, 1);
    assert.equal(receiver.requests[0]?.headers.host, `hooks.test:${port}`);
  });
});
