import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),

  // SQLite database file; ':memory:' for a throwaway database
  DB_PATH: z.string().min(1),
  // Shared secret expected in the X-Api-Key header
  API_KEY: z.string().min(1)
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/** Reset cached env (for tests only) */
export function resetEnv(): void {
  cachedEnv = null;
}

/**
 * Loads and validates environment variables (cached after first call).
 * Throws when something required is missing so startup fails early.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (cachedEnv) return cachedEnv;
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const msg = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${msg}`);
  }
  cachedEnv = parsed.data;
  return cachedEnv;
}
