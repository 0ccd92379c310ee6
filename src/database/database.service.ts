import { Inject, Injectable, Logger, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common'
import { DatabaseError, Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg'
import { APP_CONFIG, type AppConfig } from '../config/app-config'

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS users (
    id SERIAL PRIMARY KEY,
    email VARCHAR(255) NOT NULL UNIQUE,
    hashed_password VARCHAR(255) NOT NULL,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    subscription_tier VARCHAR(50) NOT NULL DEFAULT 'free',
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS api_keys (
    id SERIAL PRIMARY KEY,
    key VARCHAR(128) NOT NULL UNIQUE,
    name VARCHAR(255) NOT NULL,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    last_used_at TIMESTAMPTZ
);

CREATE TABLE IF NOT EXISTS training_history (
    id SERIAL PRIMARY KEY,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    muscle_group VARCHAR(50) NOT NULL,
    training_level VARCHAR(50) NOT NULL,
    current_sets INTEGER NOT NULL,
    progress BOOLEAN NOT NULL,
    recovered BOOLEAN NOT NULL,
    outcome VARCHAR(50) NOT NULL,
    target_sets INTEGER,
    message TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_training_history_user_created
ON training_history(user_id, created_at DESC);
`

const UNIQUE_VIOLATION = '23505'

export function isUniqueViolation(err: unknown, constraint: string): boolean {
  return err instanceof DatabaseError && err.code === UNIQUE_VIOLATION && err.constraint === constraint
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name)
  readonly pool: Pool

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.pool = new Pool({ connectionString: config.databaseUrl })
    // idle clients report dropped connections here; the pool replaces them on next checkout
    this.pool.on('error', (err) => this.logger.error(`Idle database client error: ${err.message}`, err.stack))
  }

  async onModuleInit() {
    await this.pool.query(SCHEMA_SQL)
    this.logger.log('Database schema ready')
  }

  async onModuleDestroy() {
    await this.pool.end()
  }

  query<R extends QueryResultRow>(text: string, params: unknown[] = []): Promise<QueryResult<R>> {
    return this.pool.query<R>(text, params)
  }

  /** Runs `work` on one client inside BEGIN/COMMIT, rolling back when it throws. */
  async transaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect()
    try {
      await client.query('BEGIN')
      const result = await work(client)
      await client.query('COMMIT')
      return result
    } catch (err) {
      await client.query('ROLLBACK')
      throw err
    } finally {
      client.release()
    }
  }
}
