// src/services/store/PgScoreStore.ts
import { Pool, QueryResult, QueryResultRow, types } from 'pg';
import { Logger } from '../../utils/logger';
import { createPgRepositories, Queryable } from './PgRepositories';
import { ScoreRepositories, ScoreStore } from './ScoreStore';

const DATE_OID = 1082;

// Show dates are calendar days; keep them as 'yyyy-MM-dd' instead of local-midnight Dates
types.setTypeParser(DATE_OID, (value: string) => value);

// The parts of pg's Pool and PoolClient the store uses
export interface TransactionClient {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
  release(): void;
}

export interface ConnectionPool {
  connect(): Promise<TransactionClient>;
  query(text: string): Promise<unknown>;
  end(): Promise<void>;
}

function asQueryable(client: TransactionClient): Queryable {
  return {
    query: <R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> =>
      client.query(text, values)
  };
}

export class PgScoreStore implements ScoreStore {
  private logger = new Logger('PgScoreStore');

  constructor(private readonly pool: ConnectionPool) {}

  static fromUrl(connectionString: string): PgScoreStore {
    return new PgScoreStore(new Pool({ connectionString }));
  }

  async transaction<T>(work: (tx: ScoreRepositories) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(createPgRepositories(asQueryable(client)));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.error('Rollback failed', rollbackError);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async applySchema(sql: string): Promise<void> {
    await this.pool.query(sql);
    this.logger.info('Schema applied');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
