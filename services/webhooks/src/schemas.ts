/**
 * Request Validation Schemas
 * Zod schemas for validating API request bodies
 */

import { z } from 'zod';
import { MAX_REQUEST_TIMEOUT_MS } from './config.js';
import type { JsonObject, JsonValue } from './types.js';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

const JsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), JsonValueSchema);

export const DeliveryStatusSchema = z.enum(['pending', 'delivered', 'failed']);

// Deliver request schema
export const DeliverRequestSchema = z.object({
  url: z.string().min(1, 'url is required'),
  payload: JsonObjectSchema,
  headers: z.record(z.string(), z.string()).optional(),
  max_attempts: z.number().int().min(1, 'max_attempts must be >= 1').max(20).optional(),
  timeout_ms: z
    .number()
    .int()
    .min(1, 'timeout_ms must be >= 1')
    .max(MAX_REQUEST_TIMEOUT_MS, `timeout_ms must be <= ${MAX_REQUEST_TIMEOUT_MS}`)
    .optional(),
  signing_secret: z.string().min(1).optional(),
  event_type: z.string().min(1).optional(),
  tenant_id: z.string().min(1).optional(),
  object_id: z.string().min(1).optional(),
});

export type DeliverRequestInput = z.infer<typeof DeliverRequestSchema>;

// List deliveries query schema
export const ListDeliveriesQuerySchema = z.object({
  tenant_id: z.string().optional(),
  event_type: z.string().optional(),
  status: DeliveryStatusSchema.optional(),
  limit: z.string().optional(),
  offset: z.string().optional(),
});

export const StatsQuerySchema = z.object({
  tenant_id: z.string().optional(),
});

export const ValidateUrlSchema = z.object({
  url: z.string().min(1, 'url is required'),
});

// Receiver-side verification; payload is the raw body as received
export const VerifySignatureSchema = z.object({
  payload: z.string(),
  signature: z.string().min(1, 'signature is required'),
  timestamp: z.string().min(1, 'timestamp is required'),
  secret: z.string().min(1, 'secret is required'),
  tolerance_seconds: z.number().int().min(1).optional(),
});

export type VerifySignatureInput = z.infer<typeof VerifySignatureSchema>;

/**
 * Validation helper that formats zod errors nicely
 */
export function formatZodError(error: z.ZodError): string {
  const errors = error.issues.map((issue: z.ZodIssue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });

  return errors.join(', ');
}
