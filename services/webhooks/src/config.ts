/**
 * Webhooks Service Configuration
 */

import 'dotenv/config';
import { isProduction, loadSecurityConfig, parseBoolean, validatePort, type SecurityConfig } from '@hookline/service-utils';

/** Longest per-attempt timeout; timers past 2^31-1 ms fire immediately */
export const MAX_REQUEST_TIMEOUT_MS = 300000;

export interface Config {
  // Server
  port: number;
  host: string;

  // Delivery
  maxAttempts: number;
  requestTimeoutMs: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxPayloadSize: number;
  userAgent: string;

  // Signing
  signatureToleranceSeconds: number;

  // Destination validation
  allowLocalhost: boolean;

  // Security
  security: SecurityConfig;
}

function parseIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return parseInt(value, 10);
}

export function loadConfig(overrides?: Partial<Config>): Config {
  const config: Config = {
    // Server
    port: validatePort(process.env.WEBHOOKS_PORT ?? process.env.PORT, 3403),
    host: process.env.WEBHOOKS_HOST ?? process.env.HOST ?? '0.0.0.0',

    // Delivery
    maxAttempts: parseIntEnv(process.env.WEBHOOKS_MAX_ATTEMPTS, 3),
    requestTimeoutMs: parseIntEnv(process.env.WEBHOOKS_REQUEST_TIMEOUT_MS, 10000),
    retryBaseDelayMs: parseIntEnv(process.env.WEBHOOKS_RETRY_BASE_DELAY_MS, 1000),
    retryMaxDelayMs: parseIntEnv(process.env.WEBHOOKS_RETRY_MAX_DELAY_MS, 30000),
    maxPayloadSize: parseIntEnv(process.env.WEBHOOKS_MAX_PAYLOAD_SIZE, 1048576), // 1MB
    userAgent: process.env.WEBHOOKS_USER_AGENT ?? 'hookline-webhooks/1.0',

    // Signing
    signatureToleranceSeconds: parseIntEnv(process.env.WEBHOOKS_SIGNATURE_TOLERANCE_SECONDS, 300),

    // Destination validation
    allowLocalhost: parseBoolean(process.env.WEBHOOKS_ALLOW_LOCALHOST),

    // Security
    security: loadSecurityConfig('WEBHOOKS'),

    ...overrides,
  };

  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new Error('WEBHOOKS_MAX_ATTEMPTS must be an integer of at least 1');
  }

  if (isNaN(config.requestTimeoutMs) || config.requestTimeoutMs < 1 || config.requestTimeoutMs > MAX_REQUEST_TIMEOUT_MS) {
    throw new Error(`WEBHOOKS_REQUEST_TIMEOUT_MS must be between 1 and ${MAX_REQUEST_TIMEOUT_MS} milliseconds`);
  }

  if (isNaN(config.retryBaseDelayMs) || config.retryBaseDelayMs < 0) {
    throw new Error('WEBHOOKS_RETRY_BASE_DELAY_MS must not be negative');
  }

  if (isNaN(config.retryMaxDelayMs) || config.retryMaxDelayMs < config.retryBaseDelayMs) {
    throw new Error('WEBHOOKS_RETRY_MAX_DELAY_MS must be at least WEBHOOKS_RETRY_BASE_DELAY_MS');
  }

  if (isNaN(config.maxPayloadSize) || config.maxPayloadSize < 1024) {
    throw new Error('WEBHOOKS_MAX_PAYLOAD_SIZE must be at least 1024 bytes');
  }

  if (isNaN(config.signatureToleranceSeconds) || config.signatureToleranceSeconds < 1) {
    throw new Error('WEBHOOKS_SIGNATURE_TOLERANCE_SECONDS must be at least 1');
  }

  if (config.allowLocalhost && isProduction()) {
    throw new Error('WEBHOOKS_ALLOW_LOCALHOST cannot be enabled in production');
  }

  return config;
}
