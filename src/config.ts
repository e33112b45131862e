import { z } from 'zod';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value, ctx) => {
    if (['1', 'true', 'yes', 'on'].includes(value)) return true;
    if (['0', 'false', 'no', 'off'].includes(value)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got '${value}'` });
    return z.NEVER;
  });

const envSchema = z.object({
  DATABASE_URL: z.string().trim().min(1, 'DATABASE_URL is required'),
  API_KEY: z.string().trim().min(1, 'API_KEY is required'),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // pool of 10 plus 5 overflow connections
  DB_POOL_MAX: z.coerce.number().int().positive().default(15),
  STRICT_SELECTORS: booleanFlag.default('false'),
});

export interface ServiceConfig {
  databaseUrl: string;
  apiKey: string;
  host: string;
  port: number;
  logLevel: string;
  poolMax: number;
  strictSelectors: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const cfg = parsed.data;
  return {
    databaseUrl: cfg.DATABASE_URL,
    apiKey: cfg.API_KEY,
    host: cfg.HOST,
    port: cfg.PORT,
    logLevel: cfg.LOG_LEVEL,
    poolMax: cfg.DB_POOL_MAX,
    strictSelectors: cfg.STRICT_SELECTORS,
  };
}
