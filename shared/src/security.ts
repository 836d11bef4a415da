/**
 * Security Middleware and Utilities
 * Authentication, rate limiting, and security helpers for hookline services
 */

import { timingSafeEqual } from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { createLogger } from './logger.js';

const logger = createLogger('security');

const PUBLIC_PATHS = new Set(['/health', '/ready', '/live']);

/**
 * Simple in-memory rate limiter, keyed by caller
 */
export class ApiRateLimiter {
  private requests: Map<string, { count: number; resetAt: number }> = new Map();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly cleanupTimer: NodeJS.Timeout;

  constructor(maxRequests = 100, windowMs = 60000) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;

    this.cleanupTimer = setInterval(() => this.cleanup(), 60000);
    // Never hold the process open for housekeeping
    this.cleanupTimer.unref();
  }

  get limit(): number {
    return this.maxRequests;
  }

  /**
   * @returns true if allowed, false if rate limited
   */
  check(key: string): boolean {
    const now = Date.now();
    const record = this.requests.get(key);

    if (!record || now > record.resetAt) {
      this.requests.set(key, { count: 1, resetAt: now + this.windowMs });
      return true;
    }

    if (record.count >= this.maxRequests) {
      return false;
    }

    record.count++;
    return true;
  }

  getRemaining(key: string): number {
    const record = this.requests.get(key);
    if (!record || Date.now() > record.resetAt) {
      return this.maxRequests;
    }
    return Math.max(0, this.maxRequests - record.count);
  }

  getResetTime(key: string): number {
    const record = this.requests.get(key);
    if (!record || Date.now() > record.resetAt) {
      return Date.now() + this.windowMs;
    }
    return record.resetAt;
  }

  stop(): void {
    clearInterval(this.cleanupTimer);
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, record] of this.requests) {
      if (now > record.resetAt) {
        this.requests.delete(key);
      }
    }
  }
}

export interface AuthResult {
  authenticated: boolean;
  error?: string;
}

/**
 * Validate an API key against the configured one.
 * No configured key means auth is disabled (dev mode).
 */
export function validateApiKey(providedKey: string | undefined, validKey: string | undefined): AuthResult {
  if (!validKey) {
    return { authenticated: true };
  }

  if (!providedKey) {
    return { authenticated: false, error: 'API key required' };
  }

  const provided = Buffer.from(providedKey);
  const expected = Buffer.from(validKey);
  if (provided.length !== expected.length || !timingSafeEqual(provided, expected)) {
    return { authenticated: false, error: 'Invalid API key' };
  }

  return { authenticated: true };
}

/**
 * Extract API key from request headers
 * Supports: Authorization: Bearer <key>, X-API-Key: <key>
 */
export function extractApiKey(headers: Record<string, string | string[] | undefined>): string | undefined {
  const authHeader = headers['authorization'];
  if (authHeader) {
    const auth = Array.isArray(authHeader) ? authHeader[0] : authHeader;
    if (auth?.startsWith('Bearer ')) {
      return auth.slice(7);
    }
  }

  const apiKeyHeader = headers['x-api-key'];
  if (apiKeyHeader) {
    return Array.isArray(apiKeyHeader) ? apiKeyHeader[0] : apiKeyHeader;
  }

  return undefined;
}

export function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

export interface SecurityConfig {
  /** API key for authenticating requests (optional - if not set, no auth required) */
  apiKey?: string;
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

/**
 * Load security configuration from environment variables
 */
export function loadSecurityConfig(prefix: string): SecurityConfig {
  const envPrefix = prefix.toUpperCase();
  return {
    apiKey: process.env[`${envPrefix}_API_KEY`] || process.env.HOOKLINE_API_KEY || undefined,
    rateLimitMax: parseInt(process.env[`${envPrefix}_RATE_LIMIT_MAX`] || process.env.RATE_LIMIT_MAX || '100', 10),
    rateLimitWindowMs: parseInt(process.env[`${envPrefix}_RATE_LIMIT_WINDOW_MS`] || process.env.RATE_LIMIT_WINDOW_MS || '60000', 10),
  };
}

/**
 * Fastify preHandler enforcing the API key. Health endpoints stay public.
 */
export function createAuthHook(apiKey: string | undefined) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (PUBLIC_PATHS.has(request.url.split('?')[0] ?? request.url)) {
      return;
    }

    const result = validateApiKey(extractApiKey(request.headers), apiKey);

    if (!result.authenticated) {
      logger.warn('Authentication failed', { error: result.error });
      return reply.status(401).send({ error: result.error });
    }
  };
}

/**
 * Fastify preHandler applying the rate limiter per client IP
 */
export function createRateLimitHook(limiter: ApiRateLimiter) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const key = request.ip || 'unknown';

    reply.header('X-RateLimit-Limit', limiter.limit.toString());
    reply.header('X-RateLimit-Remaining', limiter.getRemaining(key).toString());
    reply.header('X-RateLimit-Reset', Math.ceil(limiter.getResetTime(key) / 1000).toString());

    if (!limiter.check(key)) {
      logger.warn('Rate limit exceeded', { ip: key });
      reply.header('Retry-After', '60');
      return reply.status(429).send({ error: 'Too many requests' });
    }
  };
}
