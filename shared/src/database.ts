/**
 * Database utilities for hookline services
 */

import pg from 'pg';
import type { DatabaseConfig } from './types.js';
import { createLogger } from './logger.js';

const { Pool } = pg;
const logger = createLogger('database');

export class Database {
  private pool: pg.Pool;
  private config: DatabaseConfig;
  private connected = false;

  constructor(config: DatabaseConfig) {
    this.config = config;
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    this.pool.on('error', (err) => {
      logger.error('Unexpected database pool error', { error: err.message });
    });
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    try {
      const client = await this.pool.connect();
      client.release();
      this.connected = true;
      logger.info('Database connected', {
        host: this.config.host,
        database: this.config.database,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Failed to connect to database', { error: message });
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    this.connected = false;
    logger.info('Database disconnected');
  }

  async query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<T>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);
      logger.debug('Query executed', { duration: Date.now() - start, rows: result.rowCount });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error('Query failed', { error: message, query: text.substring(0, 100) });
      throw error;
    }
  }

  async queryOne<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<T | null> {
    const result = await this.query<T>(text, params);
    return result.rows[0] ?? null;
  }

  async execute(text: string, params?: unknown[]): Promise<number> {
    const result = await this.query(text, params);
    return result.rowCount ?? 0;
  }

  async ping(): Promise<void> {
    await this.query('SELECT 1');
  }

}

/**
 * Parse DATABASE_URL into connection parameters
 */
export function parseDatabaseUrl(url: string | undefined): Omit<DatabaseConfig, 'maxConnections'> | null {
  if (!url) {
    return null;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  if (parsed.protocol !== 'postgres:' && parsed.protocol !== 'postgresql:') {
    return null;
  }

  const database = decodeURIComponent(parsed.pathname.replace(/^\//, ''));
  if (!parsed.hostname || !database) {
    return null;
  }

  const sslmode = parsed.searchParams.get('sslmode');
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 5432,
    database,
    user: decodeURIComponent(parsed.username),
    password: decodeURIComponent(parsed.password),
    ssl: sslmode === 'require' || parsed.searchParams.get('ssl') === 'true',
  };
}

export function createDatabase(config?: Partial<DatabaseConfig>): Database {
  // DATABASE_URL wins over the individual POSTGRES_* variables
  const dbFromUrl = parseDatabaseUrl(process.env.DATABASE_URL);

  const fullConfig: DatabaseConfig = {
    host: config?.host ?? dbFromUrl?.host ?? process.env.POSTGRES_HOST ?? 'localhost',
    port: config?.port ?? dbFromUrl?.port ?? parseInt(process.env.POSTGRES_PORT ?? '5432', 10),
    database: config?.database ?? dbFromUrl?.database ?? process.env.POSTGRES_DB ?? 'hookline',
    user: config?.user ?? dbFromUrl?.user ?? process.env.POSTGRES_USER ?? 'postgres',
    password: config?.password ?? dbFromUrl?.password ?? process.env.POSTGRES_PASSWORD ?? '',
    ssl: config?.ssl ?? dbFromUrl?.ssl ?? process.env.POSTGRES_SSL === 'true',
    maxConnections: config?.maxConnections ?? parseInt(process.env.POSTGRES_MAX_CONNECTIONS ?? '10', 10),
  };

  // An empty password fails SCRAM auth with an unhelpful message
  if (!fullConfig.password) {
    logger.error('Database password is empty or undefined', {
      hasDatabaseUrl: Boolean(process.env.DATABASE_URL),
      hasPostgresPassword: Boolean(process.env.POSTGRES_PASSWORD),
    });
  }

  return new Database(fullConfig);
}
