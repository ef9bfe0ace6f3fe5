import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().optional(),
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  SESSION_SECRET: z.string().min(1).optional(),
  MESSAGE_MAX_LENGTH: z.coerce.number().int().positive().default(2000),
  AUTO_COMPLETE_INTERVAL_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  SYSTEM_ADMIN_ID: z.coerce.number().int().positive().optional(),
  ALLOWED_ORIGINS: z.string().optional(),
});

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  isProduction: boolean;
  port: number;
  databaseUrl: string | undefined;
  dbPoolMax: number;
  sessionSecret: string | undefined;
  messageMaxLength: number;
  autoCompleteIntervalMs: number;
  /** Administrator the auto-complete job acts as; the job stays off without it */
  systemAdminId: number | undefined;
  /** Empty outside production means any origin */
  allowedOrigins: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`[Config] Invalid environment: ${issues}`);
  }

  const values = parsed.data;
  const isProduction = values.NODE_ENV === 'production';

  if (isProduction && !values.SESSION_SECRET) {
    throw new Error('[Config] SESSION_SECRET is required in production');
  }

  return {
    env: values.NODE_ENV,
    isProduction,
    port: values.PORT ?? (isProduction ? 5001 : 3001),
    databaseUrl: values.DATABASE_URL,
    dbPoolMax: values.DB_POOL_MAX,
    sessionSecret: values.SESSION_SECRET,
    messageMaxLength: values.MESSAGE_MAX_LENGTH,
    autoCompleteIntervalMs: values.AUTO_COMPLETE_INTERVAL_MS,
    systemAdminId: values.SYSTEM_ADMIN_ID,
    allowedOrigins: (values.ALLOWED_ORIGINS ?? '').split(',').map(o => o.trim()).filter(Boolean),
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
