/**
 * hookline webhooks
 * Signed outbound webhook delivery with SSRF protection and bounded retries
 */

export { WebhooksDatabase } from './database.js';
export { WebhookDeliveryService, generateDeliveryId, type DeliveryServiceOptions } from './delivery.js';
export { DeliveryAttemptRecorder } from './recorder.js';
export {
  WebhookUrlValidator,
  pinnedLookup,
  resolveWithDns,
  type DestinationCheck,
  type HostResolver,
  type ResolvedAddress,
} from './url-validator.js';
export {
  signPayload,
  verifySignature,
  canonicalizePayload,
  extractSignatureHeaders,
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER,
} from './signature.js';
export { PrometheusMetricsRecorder, NoopMetricsRecorder } from './metrics.js';
export { createServer, startServer } from './server.js';
export { loadConfig, MAX_REQUEST_TIMEOUT_MS, type Config } from './config.js';
export * from './types.js';
