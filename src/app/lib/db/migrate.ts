import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { env } from '@/app/lib/env';
import { logger } from '@/app/lib/logger';
import { createDatabase } from '@/app/lib/db';

/**
 * Applies the migrations generated by `npm run db:generate`.
 * Run it with: npm run db:migrate
 */
async function runMigration(): Promise<void> {
  const { db, pool } = createDatabase(env.DATABASE_URL);

  try {
    logger.info('Running migrations...');
    await migrate(db, { migrationsFolder: './drizzle/migrations' });
    logger.info('Migrations completed successfully');
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  runMigration().catch((error: unknown) => {
    logger.error('Migration failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}

export { runMigration };
