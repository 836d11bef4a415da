#!/usr/bin/env tsx
/**
 * Webhooks Service CLI
 * Command-line interface for delivery, signing and delivery records
 */

import { Command } from 'commander';
import { ZodError } from 'zod';
import { createLogger, isOneOf, parsePositiveInt, validatePagination } from '@hookline/service-utils';
import { WebhooksDatabase } from './database.js';
import { WebhookDeliveryService } from './delivery.js';
import { startServer, toDeliveryRequest } from './server.js';
import { canonicalizePayload, signPayload, verifySignature } from './signature.js';
import { DeliverRequestSchema, formatZodError } from './schemas.js';
import { loadConfig } from './config.js';
import type { DeliveryStatus, JsonObject } from './types.js';

const logger = createLogger('webhooks:cli');
const program = new Command();

const DELIVERY_STATUSES: readonly DeliveryStatus[] = ['pending', 'delivered', 'failed'];

function errorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return formatZodError(error);
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse repeated `Name: value` options into a header map
 */
function parseHeaderOptions(values: string[] | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const value of values ?? []) {
    const separator = value.indexOf(':');
    if (separator <= 0) {
      throw new Error(`Invalid header "${value}", expected "Name: value"`);
    }
    headers[value.slice(0, separator).trim()] = value.slice(separator + 1).trim();
  }
  return headers;
}

function parsePayloadOption(raw: string): JsonObject {
  const parsed: unknown = JSON.parse(raw);
  return DeliverRequestSchema.shape.payload.parse(parsed);
}

program
  .name('hookline-webhooks')
  .description('Signed outbound webhook delivery')
  .version('1.0.0');

// =========================================================================
// Init Command
// =========================================================================

program
  .command('init')
  .description('Initialize webhook database schema')
  .action(async () => {
    try {
      const db = new WebhooksDatabase();
      await db.connect();
      await db.initializeSchema();
      await db.disconnect();
      logger.success('Webhook schema initialized successfully');
    } catch (error) {
      logger.error('Initialization failed:', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// =========================================================================
// Server Command
// =========================================================================

program
  .command('server')
  .description('Start webhook delivery server')
  .option('-p, --port <port>', 'Server port')
  .option('-h, --host <host>', 'Server host')
  .action(async (options: { port?: string; host?: string }) => {
    try {
      await startServer({
        ...(options.port ? { port: parseInt(options.port, 10) } : {}),
        ...(options.host ? { host: options.host } : {}),
      });
    } catch (error) {
      logger.error('Failed to start server:', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// =========================================================================
// Deliver Command
// =========================================================================

program
  .command('deliver <url>')
  .description('Deliver a JSON payload to a URL and wait for the outcome')
  .requiredOption('-d, --payload <json>', 'JSON object to deliver')
  .option('-s, --secret <secret>', 'Signing secret')
  .option('-e, --event-type <type>', 'Event type')
  .option('-t, --tenant <id>', 'Tenant id (with --event-type, the delivery is recorded)')
  .option('-o, --object-id <id>', 'Related object id')
  .option('-a, --max-attempts <n>', 'Total attempts')
  .option('--timeout <ms>', 'Per-attempt timeout in milliseconds')
  .option('-H, --header <header...>', 'Extra header, "Name: value"')
  .action(async (url: string, options: {
    payload: string;
    secret?: string;
    eventType?: string;
    tenant?: string;
    objectId?: string;
    maxAttempts?: string;
    timeout?: string;
    header?: string[];
  }) => {
    let db: WebhooksDatabase | null = null;

    try {
      const body = DeliverRequestSchema.parse({
        url,
        payload: JSON.parse(options.payload),
        headers: parseHeaderOptions(options.header),
        max_attempts: options.maxAttempts ? parsePositiveInt(options.maxAttempts, '--max-attempts') : undefined,
        timeout_ms: options.timeout ? parsePositiveInt(options.timeout, '--timeout') : undefined,
        signing_secret: options.secret,
        event_type: options.eventType,
        tenant_id: options.tenant,
        object_id: options.objectId,
      });

      if (body.tenant_id && body.event_type) {
        db = new WebhooksDatabase();
        await db.connect();
      }

      const service = new WebhookDeliveryService({ store: db ?? undefined, config: loadConfig() });
      const result = await service.deliver(toDeliveryRequest(body));

      console.log(JSON.stringify(result, null, 2));
      if (result.status !== 'delivered') {
        process.exitCode = 1;
      }
    } catch (error) {
      logger.error('Delivery failed:', { error: errorMessage(error) });
      process.exitCode = 1;
    } finally {
      await db?.disconnect();
    }
  });

// =========================================================================
// Validate URL Command
// =========================================================================

program
  .command('validate-url <url>')
  .description('Check whether a URL is an allowed delivery destination')
  .action(async (url: string) => {
    try {
      const service = new WebhookDeliveryService({ config: loadConfig() });
      const result = await service.validateDestination(url);

      if (result.valid) {
        logger.success(`${url} is an allowed destination`);
      } else {
        logger.error(`${url} is blocked: ${result.reason}`);
        process.exitCode = 1;
      }
    } catch (error) {
      logger.error('Validation failed:', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// =========================================================================
// Signing Commands
// =========================================================================

program
  .command('sign')
  .description('Print the signature headers and body for a payload')
  .requiredOption('-d, --payload <json>', 'JSON object to sign')
  .requiredOption('-s, --secret <secret>', 'Signing secret')
  .action((options: { payload: string; secret: string }) => {
    try {
      const payload = parsePayloadOption(options.payload);
      const headers = signPayload(payload, options.secret);

      for (const [name, value] of Object.entries(headers)) {
        console.log(`${name}: ${value}`);
      }
      console.log('');
      console.log(canonicalizePayload(payload));
    } catch (error) {
      logger.error('Signing failed:', { error: errorMessage(error) });
      process.exit(1);
    }
  });

program
  .command('verify')
  .description('Verify a received body against its signature headers')
  .requiredOption('-d, --payload <raw>', 'Raw request body as received')
  .requiredOption('--signature <signature>', 'X-Webhook-Signature value')
  .requiredOption('--timestamp <timestamp>', 'X-Webhook-Timestamp value')
  .requiredOption('-s, --secret <secret>', 'Signing secret')
  .option('--tolerance <seconds>', 'Allowed clock skew in seconds')
  .action((options: { payload: string; signature: string; timestamp: string; secret: string; tolerance?: string }) => {
    try {
      const tolerance = options.tolerance
        ? parsePositiveInt(options.tolerance, '--tolerance')
        : loadConfig().signatureToleranceSeconds;

      if (verifySignature(options.payload, options.signature, options.timestamp, options.secret, tolerance)) {
        logger.success('Signature is valid');
      } else {
        logger.error('Signature is invalid');
        process.exitCode = 1;
      }
    } catch (error) {
      logger.error('Verification failed:', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// =========================================================================
// Status Command
// =========================================================================

program
  .command('status')
  .description('Show webhook delivery statistics')
  .option('-t, --tenant <id>', 'Limit to one tenant')
  .action(async (options: { tenant?: string }) => {
    try {
      const db = new WebhooksDatabase();
      await db.connect();
      const stats = await db.getStats(options.tenant);
      await db.disconnect();

      console.log('\n=== Webhook Deliveries ===\n');
      if (options.tenant) {
        console.log(`Tenant: ${options.tenant}`);
      }
      console.log(`  Total: ${stats.total}`);
      console.log(`  Pending: ${stats.pending}`);
      console.log(`  Delivered: ${stats.delivered}`);
      console.log(`  Failed: ${stats.failed}`);
    } catch (error) {
      logger.error('Failed to get status:', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// =========================================================================
// Deliveries Command
// =========================================================================

program
  .command('deliveries')
  .description('List recorded deliveries')
  .option('-t, --tenant <id>', 'Filter by tenant')
  .option('-e, --event-type <type>', 'Filter by event type')
  .option('--status <status>', 'Filter by status (pending, delivered, failed)')
  .option('-l, --limit <limit>', 'Number of records', '20')
  .action(async (options: { tenant?: string; eventType?: string; status?: string; limit: string }) => {
    try {
      if (options.status !== undefined && !isOneOf(options.status, DELIVERY_STATUSES)) {
        throw new Error(`Unknown status "${options.status}"`);
      }
      const status = isOneOf(options.status, DELIVERY_STATUSES) ? options.status : undefined;
      const { limit } = validatePagination(options.limit, 0);

      const db = new WebhooksDatabase();
      await db.connect();
      const deliveries = await db.listDeliveries({
        tenantId: options.tenant,
        eventType: options.eventType,
        status,
        limit,
      });
      await db.disconnect();

      if (deliveries.length === 0) {
        console.log('No deliveries found');
        return;
      }

      console.log('\nDelivery ID'.padEnd(21) + 'Status'.padEnd(12) + 'Attempts'.padEnd(10) + 'Code'.padEnd(6) + 'Event');
      console.log('-'.repeat(80));

      for (const delivery of deliveries) {
        console.log(
          delivery.delivery_id.padEnd(20) +
          delivery.status.padEnd(12) +
          String(delivery.attempts).padEnd(10) +
          String(delivery.response_code ?? '-').padEnd(6) +
          delivery.event_type
        );
        if (delivery.last_error) {
          console.log(`  ${delivery.last_error}`);
        }
      }
    } catch (error) {
      logger.error('Failed to list deliveries:', { error: errorMessage(error) });
      process.exit(1);
    }
  });

// Parse CLI arguments
await program.parseAsync();
