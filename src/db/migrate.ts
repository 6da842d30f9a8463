import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { closeDatabaseConnection, getDatabase } from './connection.js';
import { logger } from '@/config/logger.js';

export async function runMigrations(migrationsFolder = './drizzle'): Promise<void> {
  logger.info('Starting database migrations...', { migrationsFolder });
  await migrate(getDatabase(), { migrationsFolder });
  logger.info('Database migrations completed successfully');
}

async function main(): Promise<void> {
  try {
    await runMigrations();
  } catch (error) {
    logger.error('Database migration failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  } finally {
    await closeDatabaseConnection();
  }
}

if (require.main === module) {
  void main();
}
