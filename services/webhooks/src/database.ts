/**
 * Webhooks Database Operations
 * PostgreSQL-backed delivery records
 */

import { createDatabase, createLogger, type Database } from '@hookline/service-utils';
import type {
  CreateDeliveryInput,
  DeliveryOutcomeUpdate,
  DeliveryStats,
  DeliveryStore,
  ListDeliveriesFilters,
  WebhookDeliveryRecord,
} from './types.js';

const logger = createLogger('webhooks:db');

export class WebhooksDatabase implements DeliveryStore {
  private db: Database;

  constructor(db?: Database) {
    this.db = db ?? createDatabase();
  }

  async connect(): Promise<void> {
    await this.db.connect();
  }

  async disconnect(): Promise<void> {
    await this.db.disconnect();
  }

  async ping(): Promise<void> {
    await this.db.ping();
  }

  // =========================================================================
  // Schema Management
  // =========================================================================

  async initializeSchema(): Promise<void> {
    logger.info('Initializing webhooks schema...');

    const schema = `
      CREATE TABLE IF NOT EXISTS webhook_deliveries (
        delivery_id VARCHAR(64) PRIMARY KEY,
        tenant_id VARCHAR(128) NOT NULL,
        webhook_url TEXT NOT NULL,
        event_type VARCHAR(128) NOT NULL,
        object_id VARCHAR(255),
        payload JSONB NOT NULL,
        status VARCHAR(32) NOT NULL DEFAULT 'pending',
        attempts INTEGER NOT NULL DEFAULT 0,
        response_code INTEGER,
        last_error TEXT,
        created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW(),
        last_attempt_at TIMESTAMP WITH TIME ZONE,
        delivered_at TIMESTAMP WITH TIME ZONE
      );

      CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_tenant
        ON webhook_deliveries(tenant_id);
      CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_status
        ON webhook_deliveries(status);
      CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_event_type
        ON webhook_deliveries(event_type);
      CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_object
        ON webhook_deliveries(object_id);
      CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_created
        ON webhook_deliveries(created_at DESC);
    `;

    await this.db.execute(schema);
    logger.success('Webhooks schema initialized');
  }

  // =========================================================================
  // Webhook Deliveries
  // =========================================================================

  async createDelivery(input: CreateDeliveryInput): Promise<void> {
    await this.db.execute(
      `INSERT INTO webhook_deliveries (
        delivery_id, tenant_id, webhook_url, event_type, object_id, payload, status, attempts
      ) VALUES ($1, $2, $3, $4, $5, $6, 'pending', 0)`,
      [
        input.deliveryId,
        input.tenantId,
        input.webhookUrl,
        input.eventType,
        input.objectId ?? null,
        JSON.stringify(input.payload),
      ]
    );
  }

  async completeDelivery(deliveryId: string, update: DeliveryOutcomeUpdate): Promise<boolean> {
    const rowCount = await this.db.execute(
      `UPDATE webhook_deliveries SET
        status = $2,
        attempts = $3,
        response_code = $4,
        last_error = $5,
        delivered_at = $6,
        last_attempt_at = NOW()
      WHERE delivery_id = $1 AND status = 'pending'`,
      [
        deliveryId,
        update.status,
        update.attempts,
        update.responseCode ?? null,
        update.lastError ?? null,
        update.deliveredAt ?? null,
      ]
    );

    return rowCount > 0;
  }

  async getDelivery(deliveryId: string): Promise<WebhookDeliveryRecord | null> {
    return this.db.queryOne<WebhookDeliveryRecord>(
      'SELECT * FROM webhook_deliveries WHERE delivery_id = $1',
      [deliveryId]
    );
  }

  async listDeliveries(filters?: ListDeliveriesFilters): Promise<WebhookDeliveryRecord[]> {
    let sql = 'SELECT * FROM webhook_deliveries WHERE 1 = 1';
    const params: unknown[] = [];
    let paramIndex = 1;

    if (filters?.tenantId) {
      sql += ` AND tenant_id = $${paramIndex++}`;
      params.push(filters.tenantId);
    }

    if (filters?.eventType) {
      sql += ` AND event_type = $${paramIndex++}`;
      params.push(filters.eventType);
    }

    if (filters?.status) {
      sql += ` AND status = $${paramIndex++}`;
      params.push(filters.status);
    }

    sql += ' ORDER BY created_at DESC';

    sql += ` LIMIT $${paramIndex++} OFFSET $${paramIndex++}`;
    params.push(filters?.limit ?? 100, filters?.offset ?? 0);

    const result = await this.db.query<WebhookDeliveryRecord>(sql, params);
    return result.rows;
  }

  // =========================================================================
  // Statistics
  // =========================================================================

  async getStats(tenantId?: string): Promise<DeliveryStats> {
    const where = tenantId ? 'WHERE tenant_id = $1' : '';
    const params = tenantId ? [tenantId] : [];

    const stats = await this.db.queryOne<DeliveryStats>(
      `SELECT
        COUNT(*)::int as total,
        (COUNT(*) FILTER (WHERE status = 'pending'))::int as pending,
        (COUNT(*) FILTER (WHERE status = 'delivered'))::int as delivered,
        (COUNT(*) FILTER (WHERE status = 'failed'))::int as failed
      FROM webhook_deliveries
      ${where}`,
      params
    );

    return stats ?? { total: 0, pending: 0, delivered: 0, failed: 0 };
  }
}
