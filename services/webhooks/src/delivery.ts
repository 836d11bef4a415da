/**
 * Webhook Delivery Service
 * Validates the destination, signs the payload and runs the bounded retry loop
 */

import { randomBytes } from 'crypto';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import fetch, { AbortError, FetchError } from 'node-fetch';
import {
  computeBackoffDelay,
  createLogger,
  sleep as defaultSleep,
  type RetryConfig,
} from '@hookline/service-utils';
import { classifyAttempt, type AttemptObservation, type TransportError } from './outcome.js';
import { DeliveryAttemptRecorder } from './recorder.js';
import { canonicalizePayload, signPayload, SIGNATURE_HEADER, TIMESTAMP_HEADER } from './signature.js';
import { pinnedLookup, WebhookUrlValidator, type ResolvedAddress } from './url-validator.js';
import { NoopMetricsRecorder } from './metrics.js';
import { MAX_REQUEST_TIMEOUT_MS, type Config } from './config.js';
import type {
  DeliveryMetricLabels,
  DeliveryStore,
  MetricsRecorder,
  WebhookDeliveryRequest,
  UrlValidationResult,
  WebhookDeliveryResult,
} from './types.js';

const logger = createLogger('webhooks:delivery');

export const DELIVERY_ID_HEADER = 'X-Webhook-Delivery-Id';
export const EVENT_TYPE_HEADER = 'X-Webhook-Event-Type';

const RESERVED_HEADERS = new Set(
  [SIGNATURE_HEADER, TIMESTAMP_HEADER, DELIVERY_ID_HEADER, EVENT_TYPE_HEADER].map(name => name.toLowerCase())
);

export type DeliveryConfig = Pick<
  Config,
  'maxAttempts' | 'requestTimeoutMs' | 'retryBaseDelayMs' | 'retryMaxDelayMs' | 'userAgent' | 'allowLocalhost'
>;

export interface DeliveryServiceOptions {
  /** Without a store, deliveries are not recorded */
  store?: DeliveryStore;
  config: DeliveryConfig;
  metrics?: MetricsRecorder;
  validator?: WebhookUrlValidator;
  /** Backoff wait; replaced in tests to observe delays without waiting */
  sleep?: (ms: number) => Promise<void>;
}

export function generateDeliveryId(): string {
  return `whd_${randomBytes(6).toString('hex')}`;
}

function trackingLabels(request: WebhookDeliveryRequest): DeliveryMetricLabels | null {
  if (!request.tenantId || !request.eventType) {
    return null;
  }
  return { tenant: request.tenantId, eventType: request.eventType };
}

/** Agent whose sockets connect only to the validated addresses */
function pinnedAgent(url: string, addresses: ResolvedAddress[]): HttpAgent | null {
  if (addresses.length === 0) {
    return null;
  }
  const lookup = pinnedLookup(addresses);
  return new URL(url).protocol === 'https:' ? new HttpsAgent({ lookup }) : new HttpAgent({ lookup });
}

function toTransportError(error: unknown, timeoutMs: number): TransportError {
  if (error instanceof AbortError || (error instanceof Error && error.name === 'AbortError')) {
    return { kind: 'timeout', message: `Request timeout after ${timeoutMs / 1000}s` };
  }
  if (error instanceof FetchError && error.type === 'system') {
    return { kind: 'connection', message: error.message };
  }
  return { kind: 'request', message: error instanceof Error ? error.message : 'Unknown error' };
}

export class WebhookDeliveryService {
  private readonly recorder: DeliveryAttemptRecorder | null;
  private readonly metrics: MetricsRecorder;
  private readonly validator: WebhookUrlValidator;
  private readonly config: DeliveryConfig;
  private readonly retryConfig: RetryConfig;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: DeliveryServiceOptions) {
    this.recorder = options.store ? new DeliveryAttemptRecorder(options.store) : null;
    this.metrics = options.metrics ?? new NoopMetricsRecorder();
    this.validator = options.validator ?? new WebhookUrlValidator();
    this.config = options.config;
    this.retryConfig = {
      baseDelay: options.config.retryBaseDelayMs,
      maxDelay: options.config.retryMaxDelayMs,
      backoffMultiplier: 2,
    };
    this.sleep = options.sleep ?? defaultSleep;
  }

  async validateDestination(url: string): Promise<UrlValidationResult> {
    return this.config.allowLocalhost
      ? this.validator.validateForTesting(url, true)
      : this.validator.validate(url);
  }

  /**
   * Deliver one event. Always resolves; failures are reported in the result.
   */
  async deliver(request: WebhookDeliveryRequest): Promise<WebhookDeliveryResult> {
    const startTime = Date.now();
    const labels = trackingLabels(request);
    const maxAttempts = Math.max(1, Math.floor(request.maxAttempts ?? this.config.maxAttempts));
    const timeoutMs = this.resolveTimeout(request.timeoutMs);

    const validation = await this.validator.check(request.url, this.config.allowLocalhost);
    if (!validation.valid) {
      logger.error(`Webhook URL validation failed: ${validation.reason}`, { url: request.url });
      if (labels) {
        this.emitMetrics(metrics => metrics.recordDelivery(labels, 'validation_failed'));
      }
      return {
        deliveryId: null,
        status: 'failed',
        attempts: 0,
        responseCode: null,
        error: `invalid destination: ${validation.reason}`,
        durationMs: Date.now() - startTime,
      };
    }

    const deliveryId = generateDeliveryId();
    const body = canonicalizePayload(request.payload);
    const headers = this.buildHeaders(request, deliveryId);

    if (labels && this.recorder) {
      await this.recorder.create({
        deliveryId,
        tenantId: labels.tenant,
        webhookUrl: request.url,
        payload: request.payload,
        eventType: labels.eventType,
        objectId: request.objectId ?? null,
      });
    }

    const agent = pinnedAgent(request.url, validation.addresses);
    try {
      let lastError: string | null = null;
      let lastResponseCode: number | null = null;

      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        logger.info(`Attempt ${attempt}/${maxAttempts} for ${deliveryId}`, { url: request.url });

        const outcome = classifyAttempt(await this.post(request.url, body, headers, timeoutMs, agent));

        if (outcome.kind === 'success') {
          const durationMs = Date.now() - startTime;
          logger.success(`Delivered ${deliveryId}`, { attempts: attempt, status: outcome.statusCode, durationMs });

          if (labels) {
            await this.recorder?.update(deliveryId, {
              status: 'delivered',
              attempts: attempt,
              responseCode: outcome.statusCode,
              deliveredAt: new Date(),
            });
            this.emitMetrics(metrics => {
              metrics.recordDelivery(labels, 'success');
              metrics.observeDuration(labels, durationMs / 1000);
              metrics.observeAttempts(labels, attempt);
            });
          }

          return {
            deliveryId,
            status: 'delivered',
            attempts: attempt,
            responseCode: outcome.statusCode,
            error: null,
            durationMs,
          };
        }

        if (outcome.kind === 'client_error') {
          logger.warn(`Rejected by receiver, not retrying: ${deliveryId}`, { error: outcome.error });

          if (labels) {
            await this.recorder?.update(deliveryId, {
              status: 'failed',
              attempts: attempt,
              responseCode: outcome.statusCode,
              lastError: outcome.error,
            });
            this.emitMetrics(metrics => metrics.recordDelivery(labels, 'client_error'));
          }

          return {
            deliveryId,
            status: 'failed',
            attempts: attempt,
            responseCode: outcome.statusCode,
            error: outcome.error,
            durationMs: Date.now() - startTime,
          };
        }

        lastError = outcome.error;
        if (outcome.statusCode !== null) {
          lastResponseCode = outcome.statusCode;
        }

        if (attempt < maxAttempts) {
          const delay = computeBackoffDelay(attempt, this.retryConfig);
          logger.warn(`Attempt ${attempt} failed for ${deliveryId}, retrying`, { error: outcome.error, nextRetryIn: delay });
          await this.sleep(delay);
        }
      }

      const durationMs = Date.now() - startTime;
      const error = lastError ?? 'Max retries exceeded';
      logger.error(`Delivery failed: ${deliveryId}`, { attempts: maxAttempts, error, durationMs });

      if (labels) {
        await this.recorder?.update(deliveryId, {
          status: 'failed',
          attempts: maxAttempts,
          responseCode: lastResponseCode,
          lastError: error,
        });
        this.emitMetrics(metrics => {
          metrics.recordDelivery(labels, 'max_retries_exceeded');
          metrics.observeDuration(labels, durationMs / 1000);
          metrics.observeAttempts(labels, maxAttempts);
        });
      }

      return {
        deliveryId,
        status: 'failed',
        attempts: maxAttempts,
        responseCode: lastResponseCode,
        error,
        durationMs,
      };
    } finally {
      agent?.destroy();
    }
  }

  private resolveTimeout(requested: number | undefined): number {
    const timeoutMs = requested !== undefined && Number.isFinite(requested) && requested >= 1
      ? Math.floor(requested)
      : this.config.requestTimeoutMs;
    return Math.min(timeoutMs, MAX_REQUEST_TIMEOUT_MS);
  }

  /** Metrics never change a delivery outcome */
  private emitMetrics(record: (metrics: MetricsRecorder) => void): void {
    try {
      record(this.metrics);
    } catch (error) {
      logger.warn('Failed to record delivery metrics', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  /**
   * Defaults, then caller headers, then service headers. A caller header that
   * names a service header is dropped.
   */
  private buildHeaders(request: WebhookDeliveryRequest, deliveryId: string): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': this.config.userAgent,
    };

    for (const [name, value] of Object.entries(request.headers ?? {})) {
      const lower = name.toLowerCase();
      if (RESERVED_HEADERS.has(lower)) {
        logger.warn(`Ignoring caller header ${name}: reserved for delivery metadata`);
        continue;
      }
      for (const existing of Object.keys(headers)) {
        if (existing.toLowerCase() === lower) {
          delete headers[existing];
        }
      }
      headers[name] = value;
    }

    headers[DELIVERY_ID_HEADER] = deliveryId;
    if (request.eventType) {
      headers[EVENT_TYPE_HEADER] = request.eventType;
    }
    if (request.signingSecret) {
      Object.assign(headers, signPayload(request.payload, request.signingSecret));
    }

    return headers;
  }

  private async post(
    url: string,
    body: string,
    headers: Record<string, string>,
    timeoutMs: number,
    agent: HttpAgent | null
  ): Promise<AttemptObservation> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body,
        signal: controller.signal,
        redirect: 'manual',
        agent: agent ?? undefined,
      });
      const responseBody = await response.text();
      return { kind: 'response', statusCode: response.status, body: responseBody };
    } catch (error) {
      return { kind: 'transport_error', error: toTransportError(error, timeoutMs) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
