import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.string().min(1).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  CORS_ORIGIN: z.string().min(1).default('*'),
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_NAME: z.string().min(1).optional(),
});

export interface AppConfig {
  readonly nodeEnv: string;
  readonly host: string;
  /** 0 binds an ephemeral port. */
  readonly port: number;
  /** `'*'` reflects any request origin; otherwise an explicit allow-list. */
  readonly corsOrigins: '*' | readonly string[];
  readonly databaseUrl?: string;
  readonly databaseName?: string;
}

/** Parses process configuration. Throws a ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const origins = parsed.CORS_ORIGIN.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.HOST,
    port: parsed.PORT,
    corsOrigins: origins.includes('*') ? '*' : origins,
    databaseUrl: parsed.DATABASE_URL,
    databaseName: parsed.DATABASE_NAME,
  };
}
