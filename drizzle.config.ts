import { defineConfig } from 'drizzle-kit';
import { env } from './src/app/lib/env';

export default defineConfig({
  schema: './src/app/lib/db/schema.ts',
  out: './drizzle/migrations',
  dialect: 'postgresql',
  dbCredentials: {
    url: env.DATABASE_URL,
  },
  strict: true,
});
