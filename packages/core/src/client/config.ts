/**
 * Client configuration
 *
 * Builder input is validated with zod before any engine is created. Environment
 * overrides (HTTP_DEBUG, HTTP_DEBUG_FULL, HTTP_TIMEOUT_MS) are read once per build.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_COOKIES_KEY = 'default.cookies';

export const CookiePolicySchema = z.enum(['accept-all', 'reject-all']);
export type CookiePolicy = z.infer<typeof CookiePolicySchema>;

const TimeoutSchema = z.number().int().nonnegative();

export const ProxyConfigSchema = z.object({
  protocol: z.string().optional(),
  host: z.string().min(1),
  port: z.number().int().positive(),
  auth: z
    .object({
      username: z.string(),
      password: z.string(),
    })
    .optional(),
});
export type ProxyConfig = z.infer<typeof ProxyConfigSchema>;

export const TlsConfigSchema = z.object({
  ca: z.string().optional(),
  cert: z.string().optional(),
  key: z.string().optional(),
  rejectUnauthorized: z.boolean().optional(),
});

export const ClientConfigSchema = z.object({
  baseUrl: z.string().default(''),
  connectTimeoutMs: TimeoutSchema.optional(),
  readTimeoutMs: TimeoutSchema.optional(),
  writeTimeoutMs: TimeoutSchema.optional(),
  userAgent: z.string().min(1).optional(),
  cookiePolicy: CookiePolicySchema.default('accept-all'),
  cookiesKey: z.string().min(1).default(DEFAULT_COOKIES_KEY),
  proxy: ProxyConfigSchema.optional(),
  tls: TlsConfigSchema.optional(),
  debug: z.boolean().optional(),
  debugFullBody: z.boolean().optional(),
});

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type ClientConfig = z.output<typeof ClientConfigSchema>;

/**
 * Validate builder input
 * @throws ValidationError listing every zod issue
 */
export function parseClientConfig(input: ClientConfigInput): ClientConfig {
  const parsed = ClientConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid client config: ${parsed.error.message}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export interface EnvConfig {
  debug: boolean;
  debugFullBody: boolean;
  timeoutMs?: number;
}

/**
 * Read the HTTP_* environment switches. A non-numeric HTTP_TIMEOUT_MS is ignored.
 */
export function resolveEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const timeout = Number.parseInt(env.HTTP_TIMEOUT_MS ?? '', 10);
  return {
    debug: env.HTTP_DEBUG === '1',
    debugFullBody: env.HTTP_DEBUG_FULL === '1',
    timeoutMs: Number.isFinite(timeout) && timeout >= 0 ? timeout : undefined,
  };
}

/**
 * One total deadline for the engine: the sum of the configured phase timeouts,
 * else the environment timeout, else 30s
 */
export function totalTimeoutMs(config: ClientConfig, env: EnvConfig): number {
  const phases = [config.connectTimeoutMs, config.readTimeoutMs, config.writeTimeoutMs].filter(
    (t): t is number => t !== undefined
  );
  if (phases.length > 0) return phases.reduce((sum, t) => sum + t, 0);
  return env.timeoutMs ?? DEFAULT_TIMEOUT_MS;
}

/**
 * True when any option that only a built-in engine can honour is set
 */
export function hasEngineOptions(config: ClientConfig): boolean {
  return (
    config.connectTimeoutMs !== undefined ||
    config.readTimeoutMs !== undefined ||
    config.writeTimeoutMs !== undefined ||
    config.proxy !== undefined ||
    config.tls !== undefined
  );
}
