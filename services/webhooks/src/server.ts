/**
 * Webhooks Service Server
 * HTTP API for synchronous delivery, delivery records and signature checks
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import {
  createLogger,
  ApiRateLimiter,
  createAuthHook,
  createRateLimitHook,
  validatePagination,
  type ServiceHealth,
} from '@hookline/service-utils';
import { WebhooksDatabase } from './database.js';
import { WebhookDeliveryService } from './delivery.js';
import { PrometheusMetricsRecorder } from './metrics.js';
import { verifySignature } from './signature.js';
import { loadConfig, type Config } from './config.js';
import {
  DeliverRequestSchema,
  ListDeliveriesQuerySchema,
  StatsQuerySchema,
  ValidateUrlSchema,
  VerifySignatureSchema,
  formatZodError,
  type DeliverRequestInput,
} from './schemas.js';
import type { WebhookUrlValidator } from './url-validator.js';
import type { DeliveryStore, WebhookDeliveryRequest } from './types.js';

const logger = createLogger('webhooks:server');

export interface ServerDependencies {
  /** Defaults to a connected WebhooksDatabase with its schema initialized */
  store?: DeliveryStore;
  metrics?: PrometheusMetricsRecorder;
  validator?: WebhookUrlValidator;
  sleep?: (ms: number) => Promise<void>;
}

export function toDeliveryRequest(body: DeliverRequestInput): WebhookDeliveryRequest {
  return {
    url: body.url,
    payload: body.payload,
    headers: body.headers,
    maxAttempts: body.max_attempts,
    timeoutMs: body.timeout_ms,
    signingSecret: body.signing_secret,
    eventType: body.event_type,
    tenantId: body.tenant_id,
    objectId: body.object_id,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export async function createServer(config?: Partial<Config>, deps: ServerDependencies = {}) {
  const fullConfig = loadConfig(config);

  // Initialize components
  let ownedDatabase: WebhooksDatabase | null = null;
  let store: DeliveryStore;
  if (deps.store) {
    store = deps.store;
  } else {
    ownedDatabase = new WebhooksDatabase();
    await ownedDatabase.connect();
    await ownedDatabase.initializeSchema();
    store = ownedDatabase;
  }

  const metrics = deps.metrics ?? new PrometheusMetricsRecorder();
  const deliveryService = new WebhookDeliveryService({
    store,
    metrics,
    validator: deps.validator,
    config: fullConfig,
    sleep: deps.sleep,
  });

  // Create Fastify server
  const app = Fastify({
    logger: false,
    bodyLimit: fullConfig.maxPayloadSize * 2, // Allow some overhead
  });

  // Register CORS
  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  // Security middleware
  const rateLimiter = new ApiRateLimiter(
    fullConfig.security.rateLimitMax,
    fullConfig.security.rateLimitWindowMs
  );

  app.addHook('preHandler', createRateLimitHook(rateLimiter));

  // Add API key authentication (skips health check endpoints)
  if (fullConfig.security.apiKey) {
    app.addHook('preHandler', createAuthHook(fullConfig.security.apiKey));
    logger.info('API key authentication enabled');
  }

  app.addHook('onClose', async () => {
    rateLimiter.stop();
    if (ownedDatabase) {
      await ownedDatabase.disconnect();
    }
  });

  // =========================================================================
  // Health Check Endpoints
  // =========================================================================

  app.get('/health', async (): Promise<ServiceHealth> => {
    return { status: 'ok', service: 'webhooks', timestamp: new Date().toISOString() };
  });

  app.get('/ready', async (_request, reply) => {
    try {
      await store.ping();
      return { ready: true, service: 'webhooks', timestamp: new Date().toISOString() };
    } catch (error) {
      logger.error('Readiness check failed', { error: errorMessage(error) });
      return reply.status(503).send({
        ready: false,
        service: 'webhooks',
        error: 'Database unavailable',
        timestamp: new Date().toISOString(),
      });
    }
  });

  app.get('/metrics', async (_request, reply) => {
    const { contentType, body } = await metrics.render();
    return reply.header('Content-Type', contentType).send(body);
  });

  // =========================================================================
  // Deliveries
  // =========================================================================

  app.post('/v1/deliveries', async (request, reply) => {
    try {
      const body = DeliverRequestSchema.parse(request.body);
      const result = await deliveryService.deliver(toDeliveryRequest(body));
      return reply.status(result.status === 'delivered' ? 200 : 422).send(result);
    } catch (error) {
      if (error instanceof ZodError) {
        return reply.status(400).send({ error: formatZodError(error) });
      }

      const message = errorMessage(error);
      logger.error('Delivery request failed', { error: message });
      return reply.status(500).send({ error: message });
    }
  });

  app.get('/v1/deliveries', async (request, reply) => {
    const parsed = ListDeliveriesQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: formatZodError(parsed.error) });
    }

    const { tenant_id, event_type, status } = parsed.data;
    const { limit, offset } = validatePagination(parsed.data.limit, parsed.data.offset);

    const deliveries = await store.listDeliveries({
      tenantId: tenant_id,
      eventType: event_type,
      status,
      limit,
      offset,
    });

    return { deliveries, limit, offset };
  });

  app.get<{ Params: { id: string } }>('/v1/deliveries/:id', async (request, reply) => {
    const delivery = await store.getDelivery(request.params.id);
    if (!delivery) {
      return reply.status(404).send({ error: 'Delivery not found' });
    }
    return delivery;
  });

  // =========================================================================
  // Statistics
  // =========================================================================

  app.get('/v1/stats', async (request, reply) => {
    const parsed = StatsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: formatZodError(parsed.error) });
    }
    const stats = await store.getStats(parsed.data.tenant_id);
    return { stats };
  });

  // =========================================================================
  // Tools
  // =========================================================================

  app.post('/v1/validate-url', async (request, reply) => {
    const parsed = ValidateUrlSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: formatZodError(parsed.error) });
    }
    return deliveryService.validateDestination(parsed.data.url);
  });

  app.post('/v1/verify', async (request, reply) => {
    const parsed = VerifySignatureSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: formatZodError(parsed.error) });
    }

    const { payload, signature, timestamp, secret, tolerance_seconds } = parsed.data;
    const valid = verifySignature(
      payload,
      signature,
      timestamp,
      secret,
      tolerance_seconds ?? fullConfig.signatureToleranceSeconds
    );
    return { valid };
  });

  return app;
}

/**
 * Start listening and close cleanly on SIGTERM/SIGINT
 */
export async function startServer(config?: Partial<Config>): Promise<void> {
  const fullConfig = loadConfig(config);
  const app = await createServer(config);

  const shutdown = async () => {
    logger.info('Shutting down server...');
    try {
      await app.close();
      logger.info('Server shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  await app.listen({ port: fullConfig.port, host: fullConfig.host });
  logger.success(`Webhooks server listening on ${fullConfig.host}:${fullConfig.port}`);
}

// Start server if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  try {
    await startServer();
  } catch (error) {
    logger.error('Failed to start server:', { error: errorMessage(error) });
    process.exit(1);
  }
}
