import { z, ZodError } from 'zod';
import { MIN_SECRET_LENGTH } from '../domain/auth/tokenCodec.js';

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Parses `<n>ms|s|m|h|d` into milliseconds. A bare integer is seconds.
 * Returns null for anything else.
 */
export function parseDuration(value: string): number | null {
  const match = /^(\d+)(ms|s|m|h|d)?$/.exec(value.trim());
  if (!match) {
    return null;
  }
  return parseInt(match[1], 10) * UNIT_MS[match[2] ?? 's'];
}

const duration = (fallback: string, minMs = 0) =>
  z
    .string()
    .default(fallback)
    .transform((value, ctx) => {
      const ms = parseDuration(value);
      if (ms === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration "${value}"` });
        return z.NEVER;
      }
      if (ms < minMs) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Must be at least ${minMs} ms` });
        return z.NEVER;
      }
      return ms;
    });

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const list = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item !== '')
    );

const databaseUrl = z.string({ required_error: 'DATABASE_URL is required' });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATABASE_URL: databaseUrl,
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  JWT_SECRET: z
    .string({ required_error: 'JWT_SECRET is required' })
    .min(MIN_SECRET_LENGTH, `JWT_SECRET must be at least ${MIN_SECRET_LENGTH} characters long`),
  ACCESS_TOKEN_TTL: duration('15m', 1000),
  REFRESH_TOKEN_TTL: duration('7d', 1000),
  PASSWORD_HASH_COST: z.coerce.number().int().min(1).max(10).default(3),
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_WINDOW: duration('1m', 1000),
  REFRESH_COOKIE_PATH: z.string().startsWith('/').default('/api/auth/refresh'),
  COOKIE_SECURE: flag(true),
  TOKEN_SWEEP_INTERVAL: duration('1h'),
  TRUST_PROXY: flag(false),
  CORS_ALLOWED_ORIGINS: list('http://localhost:3000'),
  CORS_ALLOWED_METHODS: list('GET,POST,PUT,DELETE,OPTIONS'),
  CORS_ALLOWED_HEADERS: list('Content-Type,Authorization'),
});

export interface AppConfig {
  readonly env: 'development' | 'test' | 'production';
  readonly server: { readonly host: string; readonly port: number };
  readonly databaseUrl: string;
  readonly redisUrl: string;
  readonly jwt: {
    readonly secret: string;
    readonly accessTokenTtlSeconds: number;
    readonly refreshTokenTtlSeconds: number;
  };
  readonly passwordHashCost: number;
  readonly rateLimit: { readonly requests: number; readonly windowMs: number };
  readonly refreshCookie: { readonly path: string; readonly secure: boolean };
  /** 0 disables the periodic sweep. */
  readonly tokenSweepIntervalMs: number;
  /** Take the client IP from X-Forwarded-For. */
  readonly trustProxy: boolean;
  /** `*` in allowedOrigins admits any origin. */
  readonly cors: {
    readonly allowedOrigins: readonly string[];
    readonly allowedMethods: readonly string[];
    readonly allowedHeaders: readonly string[];
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  try {
    // Empty strings behave like unset variables
    const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
    return schema.parse(present);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
    }
    throw error;
  }
}

/**
 * Validates the environment into a frozen {@link AppConfig}. Throws
 * ConfigError listing every problem at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseEnv(envSchema, env);

  return Object.freeze({
    env: parsed.NODE_ENV,
    server: Object.freeze({ host: parsed.HOST, port: parsed.PORT }),
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,
    jwt: Object.freeze({
      secret: parsed.JWT_SECRET,
      accessTokenTtlSeconds: Math.floor(parsed.ACCESS_TOKEN_TTL / 1000),
      refreshTokenTtlSeconds: Math.floor(parsed.REFRESH_TOKEN_TTL / 1000),
    }),
    passwordHashCost: parsed.PASSWORD_HASH_COST,
    rateLimit: Object.freeze({ requests: parsed.RATE_LIMIT_REQUESTS, windowMs: parsed.RATE_LIMIT_WINDOW }),
    refreshCookie: Object.freeze({ path: parsed.REFRESH_COOKIE_PATH, secure: parsed.COOKIE_SECURE }),
    tokenSweepIntervalMs: parsed.TOKEN_SWEEP_INTERVAL,
    trustProxy: parsed.TRUST_PROXY,
    cors: Object.freeze({
      allowedOrigins: Object.freeze(parsed.CORS_ALLOWED_ORIGINS),
      allowedMethods: Object.freeze(parsed.CORS_ALLOWED_METHODS),
      allowedHeaders: Object.freeze(parsed.CORS_ALLOWED_HEADERS),
    }),
  });
}

/** Reads only DATABASE_URL, for tools that never touch tokens. */
export function loadDatabaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  return parseEnv(z.object({ DATABASE_URL: databaseUrl }), env).DATABASE_URL;
}
