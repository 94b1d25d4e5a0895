import { z } from 'zod';
import { LogLevel, parseLogLevel, ValidationError } from '@dayboard/shared-utils';

const booleanFlag = z
  .string()
  .optional()
  .transform(value => {
    const normalized = value?.trim().toLowerCase();
    return normalized === 'true' || normalized === '1';
  });

const optionalText = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  DEMO_MODE: booleanFlag,
  DATABASE_URL: optionalText,
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().default('dayboard'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  TAX_YEAR: z.coerce.number().int().min(1900).max(2200).optional(),
  MAPS_API_KEY: optionalText,
  COMMUTE_SURGE_DEFAULT: z.coerce.number().finite().min(1).default(1),
  RECURRING_LOOKBACK_DAYS: z.coerce.number().int().positive().default(90),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export interface DashboardConfig {
  demoMode: boolean;
  database: {
    connectionString?: string;
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
  };
  taxYear: number;
  mapsApiKey?: string;
  defaultSurge: number;
  recurringLookbackDays: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): Readonly<DashboardConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map(issue => issue.path.join('.')))];
    throw new ValidationError(`Invalid configuration: ${variables.join(', ')}`, parsed.error.issues);
  }

  const values = parsed.data;
  return Object.freeze({
    demoMode: values.DEMO_MODE,
    database: {
      connectionString: values.DATABASE_URL,
      host: values.DB_HOST,
      port: values.DB_PORT,
      database: values.DB_NAME,
      user: values.DB_USER,
      password: values.DB_PASSWORD,
    },
    taxYear: values.TAX_YEAR ?? now.getFullYear(),
    mapsApiKey: values.MAPS_API_KEY,
    defaultSurge: values.COMMUTE_SURGE_DEFAULT,
    recurringLookbackDays: values.RECURRING_LOOKBACK_DAYS,
    logLevel: parseLogLevel(values.LOG_LEVEL),
  });
}
