import { z } from 'zod';

/** DEBUG accepts true/false or 1/0 */
export const DebugFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().default('0.0.0.0'),
  DATABASE_URL: z.string().optional(),
  OPENROUTER_API_KEY: z.string().optional(),
  APP_URL: z.string().default('http://localhost:3001'),
  ADMIN_API_KEY: z.string().optional(),
  FRONTEND_URL: z.string().optional(),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LANGFUSE_PUBLIC_KEY: z.string().optional(),
  LANGFUSE_SECRET_KEY: z.string().optional(),
  LANGFUSE_HOST: z.string().default('https://us.cloud.langfuse.com'),
  DEBUG: DebugFlagSchema,
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validate process environment. Empty strings count as unset.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function isLangfuseConfigured(env: Env): boolean {
  return Boolean(env.LANGFUSE_PUBLIC_KEY && env.LANGFUSE_SECRET_KEY);
}
