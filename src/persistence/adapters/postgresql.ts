/**
 * PostgreSQL Database Adapter
 *
 * Implements DatabaseAdapter using node-postgres (pg). Each logical operation
 * opens and closes its own client, so an idle adapter holds no connection.
 * A transaction keeps one client for its whole duration.
 */

import pg, { type Client, type ClientConfig, type QueryResult } from 'pg';
import type { DatabaseAdapter, SqlRow } from '../../core/types/database.js';
import { logger } from '../../core/utils/logger.js';

/** PostgreSQL wire protocol limit on bind parameters */
const MAX_BIND_PARAMETERS = 65535;

/**
 * Convert `?` placeholders to `$1, $2, ...`. Every `?` counts, including one
 * inside a string literal, so SQL without parameters is passed through as is.
 */
export function parameterize(sql: string, paramCount: number): string {
  if (paramCount === 0) {
    return sql;
  }
  let paramIndex = 1;
  return sql.replace(/\?/g, () => `$${paramIndex++}`);
}

export class PostgreSQLAdapter implements DatabaseAdapter {
  readonly dialect = 'postgresql';
  readonly maxParameters = MAX_BIND_PARAMETERS;

  private transactionClient: Client | null = null;
  private transactionDepth = 0;

  constructor(private readonly config: ClientConfig) {}

  async queryOne(sql: string, params: ReadonlyArray<unknown> = []): Promise<SqlRow | null> {
    const result = await this.run(sql, params);
    return result.rows[0] ?? null;
  }

  async queryMany(sql: string, params: ReadonlyArray<unknown> = []): Promise<ReadonlyArray<SqlRow>> {
    const result = await this.run(sql, params);
    return result.rows;
  }

  async execute(sql: string, params: ReadonlyArray<unknown> = []): Promise<number> {
    const result = await this.run(sql, params);
    return result.rowCount ?? 0;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    // Support nested transactions via savepoints
    const savepoint = `sp_${this.transactionDepth}`;
    this.transactionDepth++;

    try {
      if (this.transactionDepth === 1) {
        // Acquire client for entire transaction
        this.transactionClient = await this.connect();
        await this.transactionClient.query('BEGIN');
      } else {
        await this.requireTransactionClient().query(`SAVEPOINT ${savepoint}`);
      }

      const result = await fn();

      if (this.transactionDepth === 1) {
        await this.requireTransactionClient().query('COMMIT');
        await this.releaseTransactionClient();
      } else {
        await this.requireTransactionClient().query(`RELEASE SAVEPOINT ${savepoint}`);
      }

      this.transactionDepth--;
      return result;
    } catch (error) {
      try {
        if (this.transactionClient) {
          await this.transactionClient.query(
            this.transactionDepth === 1 ? 'ROLLBACK' : `ROLLBACK TO SAVEPOINT ${savepoint}`
          );
        }
      } catch (rollbackError) {
        logger.error('PostgreSQL rollback failed', {
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        });
      } finally {
        if (this.transactionDepth === 1) {
          await this.releaseTransactionClient();
        }
        this.transactionDepth--;
      }
      throw error;
    }
  }

  async tableColumns(tableName: string): Promise<readonly string[]> {
    const rows = await this.queryMany(
      `SELECT column_name FROM information_schema.columns
       WHERE table_schema = current_schema() AND table_name = ?
       ORDER BY ordinal_position`,
      [tableName]
    );
    return rows.map((row) => String(row.column_name));
  }

  quoteIdentifier(identifier: string): string {
    return pg.escapeIdentifier(identifier);
  }

  columnType(type: string): string {
    return type;
  }

  async close(): Promise<void> {
    await this.releaseTransactionClient();
  }

  private async run(sql: string, params: ReadonlyArray<unknown>): Promise<QueryResult<SqlRow>> {
    const text = parameterize(sql, params.length);
    if (this.transactionClient) {
      return this.transactionClient.query<SqlRow>(text, [...params]);
    }

    const client = await this.connect();
    try {
      return await client.query<SqlRow>(text, [...params]);
    } finally {
      await client.end();
    }
  }

  private async connect(): Promise<Client> {
    const client = new pg.Client(this.config);
    client.on('error', (err: Error) => {
      logger.error('Unexpected PostgreSQL client error', {
        error: err.message,
        stack: err.stack,
      });
    });
    await client.connect();
    return client;
  }

  private requireTransactionClient(): Client {
    if (!this.transactionClient) {
      throw new Error('No active transaction client');
    }
    return this.transactionClient;
  }

  private async releaseTransactionClient(): Promise<void> {
    const client = this.transactionClient;
    this.transactionClient = null;
    if (client) {
      await client.end();
    }
  }
}
