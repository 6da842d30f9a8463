import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { databaseConfig, getEnvironment } from '@/config/environment.js';
import * as schema from './schema/index.js';

let pool: Pool | null = null;
let db: ReturnType<typeof createDatabase> | null = null;

function createDatabase(connection: Pool) {
  return drizzle(connection, {
    schema,
    logger: getEnvironment().NODE_ENV === 'development',
  });
}

export type Database = ReturnType<typeof createDatabase>;

export function getDatabase(): Database {
  if (!db) {
    const config = databaseConfig.get();

    pool = new Pool({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: 15,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });

    db = createDatabase(pool);
  }

  return db;
}

export async function closeDatabaseConnection(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    db = null;
    await closing.end();
  }
}

export { schema };
