/**
 * Delivery attempt tracking
 *
 * Best-effort audit trail over a DeliveryStore. Store failures are logged and
 * dropped: a delivery's outcome never depends on whether it could be recorded.
 */

import { createLogger } from '@hookline/service-utils';
import type { CreateDeliveryInput, DeliveryOutcomeUpdate, DeliveryStore } from './types.js';

const logger = createLogger('webhooks:recorder');

export class DeliveryAttemptRecorder {
  private readonly store: DeliveryStore;

  constructor(store: DeliveryStore) {
    this.store = store;
  }

  async create(input: CreateDeliveryInput): Promise<void> {
    try {
      await this.store.createDelivery(input);
      logger.debug(`Created delivery record: ${input.deliveryId}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Failed to create delivery record: ${input.deliveryId}`, { error: message });
    }
  }

  async update(deliveryId: string, update: DeliveryOutcomeUpdate): Promise<void> {
    try {
      const updated = await this.store.completeDelivery(deliveryId, update);
      if (!updated) {
        logger.warn(`Delivery record not found: ${deliveryId}`);
        return;
      }
      logger.debug(`Updated delivery record: ${deliveryId}`, { status: update.status });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Failed to update delivery record: ${deliveryId}`, { error: message });
    }
  }
}
