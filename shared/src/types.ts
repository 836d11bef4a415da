/**
 * Shared types for hookline services
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
}

export interface RetryConfig {
  /** Delay before the second attempt, in milliseconds */
  baseDelay: number;
  /** Upper bound for any single delay, in milliseconds */
  maxDelay: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  baseDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

export interface ServiceHealth {
  status: 'ok';
  service: string;
  timestamp: string;
}
