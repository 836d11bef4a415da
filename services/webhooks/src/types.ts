/**
 * Webhooks Service Types
 * Type definitions for signed outbound webhook delivery
 */

// =============================================================================
// Payloads
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// =============================================================================
// Delivery Requests and Results
// =============================================================================

export interface WebhookDeliveryRequest {
  url: string;
  payload: JsonObject;
  headers?: Record<string, string>;
  /** Total attempts including the first, at least 1 */
  maxAttempts?: number;
  /** Per-attempt network timeout */
  timeoutMs?: number;
  signingSecret?: string;
  eventType?: string;
  tenantId?: string;
  objectId?: string;
}

export type DeliveryStatus = 'pending' | 'delivered' | 'failed';

export type TerminalDeliveryStatus = Exclude<DeliveryStatus, 'pending'>;

export interface WebhookDeliveryResult {
  /** null only when the destination was rejected before a delivery started */
  deliveryId: string | null;
  status: TerminalDeliveryStatus;
  attempts: number;
  responseCode: number | null;
  error: string | null;
  durationMs: number;
}

// =============================================================================
// Delivery Records
// =============================================================================

export interface WebhookDeliveryRecord {
  delivery_id: string;
  tenant_id: string;
  webhook_url: string;
  event_type: string;
  object_id: string | null;
  payload: JsonObject;
  status: DeliveryStatus;
  attempts: number;
  response_code: number | null;
  last_error: string | null;
  created_at: Date;
  last_attempt_at: Date | null;
  delivered_at: Date | null;
}

export interface CreateDeliveryInput {
  deliveryId: string;
  tenantId: string;
  webhookUrl: string;
  payload: JsonObject;
  eventType: string;
  objectId?: string | null;
}

export interface DeliveryOutcomeUpdate {
  status: TerminalDeliveryStatus;
  attempts: number;
  responseCode?: number | null;
  lastError?: string | null;
  deliveredAt?: Date | null;
}

export interface ListDeliveriesFilters {
  tenantId?: string;
  eventType?: string;
  status?: DeliveryStatus;
  limit?: number;
  offset?: number;
}

export interface DeliveryStats {
  total: number;
  pending: number;
  delivered: number;
  failed: number;
}

/**
 * Persistence behind the attempt recorder. Implementations must accept
 * concurrent writes for different delivery ids.
 */
export interface DeliveryStore {
  createDelivery(input: CreateDeliveryInput): Promise<void>;
  /** @returns false when no pending row with that id exists */
  completeDelivery(deliveryId: string, update: DeliveryOutcomeUpdate): Promise<boolean>;
  getDelivery(deliveryId: string): Promise<WebhookDeliveryRecord | null>;
  listDeliveries(filters?: ListDeliveriesFilters): Promise<WebhookDeliveryRecord[]>;
  getStats(tenantId?: string): Promise<DeliveryStats>;
  ping(): Promise<void>;
}

// =============================================================================
// Destination Validation
// =============================================================================

export interface UrlValidationResult {
  valid: boolean;
  /** Empty when valid */
  reason: string;
}

// =============================================================================
// Metrics
// =============================================================================

export type DeliveryMetricStatus = 'success' | 'client_error' | 'max_retries_exceeded' | 'validation_failed';

export interface DeliveryMetricLabels {
  tenant: string;
  eventType: string;
}

export interface MetricsRecorder {
  recordDelivery(labels: DeliveryMetricLabels, status: DeliveryMetricStatus): void;
  observeDuration(labels: DeliveryMetricLabels, seconds: number): void;
  observeAttempts(labels: DeliveryMetricLabels, attempts: number): void;
}
