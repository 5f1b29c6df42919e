import { createHTTPServer } from '@trpc/server/adapters/standalone';
import { appRouter } from '@/app/api/trpc/routers/_app';
import { createContextFactory } from '@/app/api/trpc/context';
import { createDatabase } from '@/app/lib/db';
import { env } from '@/app/lib/env';
import { logger } from '@/app/lib/logger';
import { DrizzleUnitOfWork } from '@/app/lib/repositories';
import { createServices } from '@/app/lib/services';

/**
 * Boots the tRPC API over a PostgreSQL pool.
 * Run it with: npm run dev
 */
function main(): void {
  const { db, pool } = createDatabase(env.DATABASE_URL);
  const services = createServices(new DrizzleUnitOfWork(db), {
    generalFundTitle: env.GENERAL_FUND_PROJECT_TITLE,
  });

  const server = createHTTPServer({
    router: appRouter,
    createContext: createContextFactory(services),
    onError({ error, path }) {
      if (error.code === 'INTERNAL_SERVER_ERROR') {
        logger.error(`tRPC request failed on ${path ?? '<no-path>'}: ${error.message}`, {
          stack: error.stack,
        });
      }
    },
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.server.close();
    pool.end().catch((error: unknown) => {
      logger.error('Failed to close database pool', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  server.listen(env.PORT);
  logger.info(`tRPC API listening on port ${env.PORT}`);
}

if (require.main === module) {
  main();
}
