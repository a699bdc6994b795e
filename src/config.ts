import { z } from 'zod';
import { ConfigError, formatZodIssues } from './errors.js';
import type { LogLevel } from './logger.js';
import type { MSSQLConfig } from './MSSQL.js';

// Unset or empty reads as false; case does not matter.
const booleanFlag = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const normalized = (value ?? '').trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0' || normalized === '') return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'expected true, false, 1 or 0',
    });
    return z.NEVER;
  });

const integer = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  DB_HOST: z.string().min(1, 'DB_HOST is required'),
  DB_NAME: z.string().min(1, 'DB_NAME is required'),
  DB_USER: z.string().default(''),
  DB_PASSWORD: z.string().default(''),
  DB_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  TRUST_SERVER_CERTIFICATE: booleanFlag,
  ENCRYPT: booleanFlag,
  MAX_POOL: integer(10),
  MIN_POOL: integer(0),
  IDLE: integer(30000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  mssql: MSSQLConfig;
  logLevel: LogLevel;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatZodIssues(parsed.error.issues));
  }
  const vars = parsed.data;
  if (vars.MIN_POOL > vars.MAX_POOL) {
    throw new ConfigError([
      `MIN_POOL: must not exceed MAX_POOL (${vars.MAX_POOL})`,
    ]);
  }

  return {
    mssql: {
      user: vars.DB_USER,
      password: vars.DB_PASSWORD,
      server: vars.DB_HOST,
      database: vars.DB_NAME,
      port: vars.DB_PORT,
      options: {
        trustServerCertificate: vars.TRUST_SERVER_CERTIFICATE,
        encrypt: vars.ENCRYPT,
      },
      pool: {
        max: vars.MAX_POOL,
        min: vars.MIN_POOL,
        idleTimeoutMillis: vars.IDLE,
      },
    },
    logLevel: vars.LOG_LEVEL,
  };
}
