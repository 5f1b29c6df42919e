import { config } from 'dotenv';
import { z } from 'zod';

config();

/*
 * Server environment variables. Parsed once at startup; a missing or malformed
 * variable stops the process before any connection is opened.
 */
const envSchema = z.object({
  DATABASE_URL: z.string().url(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug']).optional(),
  GENERAL_FUND_PROJECT_TITLE: z.string().min(1).default('General Donation'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);
