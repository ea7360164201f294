import { z } from 'zod';

const booleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true')
]);

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
  z.string().optional()
);

const ipList = z.union([
  z.array(z.string()),
  z.string().transform((value) => value.split(','))
]).transform((values) => values.map((value) => value.trim()).filter((value) => value.length > 0));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().url().optional()
  ),
  JWT_SECRET: optionalString,
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(30),
  REFRESH_TOKEN_TTL_DAYS: z.coerce.number().int().positive().default(7),
  CREDENTIAL_ENCRYPTION_KEY: optionalString,
  AUTH_LOCKOUT_ATTEMPTS: z.coerce.number().int().positive().default(5),
  AUTH_LOCKOUT_SECONDS: z.coerce.number().int().positive().default(900),
  AUTH_RESET_TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(60),
  PORTAL_BASE_URL: z.string().url().default('http://localhost:5173'),
  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_SECURE: booleanFlag.default(false),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  MAIL_FROM: z.string().min(3).default('no-reply@example.com'),
  DOWNSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CONNECTOR_ENABLED: booleanFlag.default(true),
  CONNECTOR_ALLOWED_IPS: ipList.default([]),
  CONNECTOR_TRUST_PROXY: booleanFlag.default(false),
  OTEL_ENABLED: booleanFlag.default(false),
  OTEL_SERVICE_NAME: z.string().min(1).default('hr-portal-gateway'),
  OTEL_METRIC_EXPORT_INTERVAL_MS: z.coerce.number().int().positive().default(30_000)
});

export type Env = Readonly<z.infer<typeof envSchema>>;

export function getEnv(overrides: Partial<Record<keyof Env, unknown>> = {}): Env {
  return Object.freeze(envSchema.parse({
    ...process.env,
    ...overrides
  }));
}
