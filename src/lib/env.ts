import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).optional(),
  RISK_REWARD_LOG_REQUESTS: booleanFlag.optional(),
});

export type AppEnv = z.infer<typeof envSchema>;

function formatEnvIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const key = issue.path.join('.') || 'environment';
      return `${key}: ${issue.message}`;
    })
    .join('; ');
}

export function parseEnv(source: Record<string, string | undefined>): AppEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new Error(`[Startup Env Validation Failed] ${formatEnvIssues(result.error.issues)}`);
  }
  return result.data;
}

function loadEnv(): AppEnv {
  const isProduction = process.env.NODE_ENV === 'production';
  const isBuildPhase = process.env.NEXT_PHASE === 'phase-production-build';

  try {
    return parseEnv(process.env);
  } catch (error) {
    // Fail fast at production runtime; elsewhere fall back to defaults.
    if (isProduction && !isBuildPhase) throw error;
    console.warn('[Env]', error instanceof Error ? error.message : String(error));
    return {};
  }
}

export const env: AppEnv = loadEnv();

export function isRequestLoggingEnabled(): boolean {
  return env.RISK_REWARD_LOG_REQUESTS ?? false;
}
