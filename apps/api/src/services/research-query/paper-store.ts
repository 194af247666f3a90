/**
 * Paper storage adapter.
 * Runs synthesized statements against PostgreSQL through a pg Pool and maps
 * rows to PaperRecord. Storage failures are logged and yield no rows.
 */

import pg from 'pg';
import type { PaperRecord } from '@research-finder/shared';
import type { DatabaseConfig } from '../config';
import { silentLogger, type Logger } from '../logger';

export interface PaperStore {
  query(sql: string): Promise<PaperRecord[]>;
  close?(): Promise<void>;
}

export type PaperRow = {
  id: string | null;
  title: string | null;
  author: string | null;
  pub_date: Date | string | null;
  venue: string | null;
  type: string | null;
};

/** What the store needs from a pg Pool */
export interface PaperQueryable {
  query(text: string): Promise<{ rows: PaperRow[] }>;
  end(): Promise<void>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** DATE columns as YYYY-MM-DD, whether pg hands back a Date or a string */
export function formatPubDate(value: Date | string | null): string | null {
  if (value === null) return null;
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  }
  const match = value.match(/^(\d{4}-\d{2}-\d{2})/);
  return match ? match[1] : value.trim() || null;
}

export function toPaperRecord(row: PaperRow): PaperRecord {
  return {
    id: row.id ?? '',
    title: row.title ?? '',
    author: row.author ?? '',
    pubDate: formatPubDate(row.pub_date),
    venue: row.venue ?? '',
    type: row.type ?? '',
  };
}

export class PostgresPaperStore implements PaperStore {
  private readonly logger: Logger;

  constructor(
    private readonly db: PaperQueryable,
    logger: Logger = silentLogger
  ) {
    this.logger = logger;
  }

  static fromConfig(config: DatabaseConfig, password: string | undefined, logger?: Logger): PostgresPaperStore {
    const pool = new pg.Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password,
      max: config.maxConnections,
      connectionTimeoutMillis: config.connectionTimeoutMs,
      statement_timeout: config.statementTimeoutMs,
    });
    // Idle clients report dropped connections here
    pool.on('error', (error) => {
      (logger ?? silentLogger).error(`Idle database client error: ${error.message}`);
    });
    const queryable: PaperQueryable = {
      query: (text) => pool.query<PaperRow>(text),
      end: () => pool.end(),
    };
    return new PostgresPaperStore(queryable, logger);
  }

  async query(sql: string): Promise<PaperRecord[]> {
    try {
      const result = await this.db.query(sql);
      this.logger.debug(`Query returned ${result.rows.length} rows`);
      return result.rows.map(toPaperRecord);
    } catch (error) {
      this.logger.error(`Paper query failed: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
