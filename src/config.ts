/**
 * Configuration Module
 *
 * Runtime settings for the data-protection layer, read from environment
 * variables and validated with zod. Development mode is an explicit flag:
 * nothing is inferred from the host.
 *
 * | Variable                     | Default                  |
 * |------------------------------|--------------------------|
 * | `PRIVACY_KIT_DEV_MODE`       | `false`                  |
 * | `PRIVACY_KIT_LOG_LEVEL`      | `INFO`                   |
 * | `PRIVACY_KIT_LOG_JSON`       | `false`                  |
 * | `PRIVACY_KIT_HTTP_TIMEOUT_MS`| `30000`                  |
 * | `PRIVACY_KIT_POLICY_VERSION` | `1.0.0`                  |
 * | `PRIVACY_KIT_EXTRA_DOMAINS`  | none (comma-separated)   |
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import { LogLevel, parseLogLevel } from './utils/logger.js';

/**
 * Host substrings the gateway may reach outside development mode
 */
export const DEFAULT_ALLOWED_DOMAINS: readonly string[] = [
  'localhost',
  '127.0.0.1',
  '192.168.',
  '172.17.',
  '10.',
  'api.gemini.google.com',
  'generativelanguage.googleapis.com',
  'firebase.googleapis.com',
  'firebaseapp.com',
  'openrouter.ai',
];

export interface PrivacyKitConfig {
  /** Every http(s) host passes the gateway allowlist */
  developmentMode: boolean;
  logLevel: LogLevel;
  logJson: boolean;
  httpTimeoutMs: number;
  policyVersion: string;
  allowedDomains: string[];
}

export const DEFAULT_CONFIG: PrivacyKitConfig = {
  developmentMode: false,
  logLevel: LogLevel.INFO,
  logJson: false,
  httpTimeoutMs: 30_000,
  policyVersion: '1.0.0',
  allowedDomains: [...DEFAULT_ALLOWED_DOMAINS],
};

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

const logLevel = z.string().transform((value, ctx) => {
  const level = parseLogLevel(value);
  if (level === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log level '${value}'` });
    return z.NEVER;
  }
  return level;
});

const domainList = z.string().transform((value) =>
  value
    .split(',')
    .map((domain) => domain.trim().toLowerCase())
    .filter((domain) => domain.length > 0)
);

const envSchema = z.object({
  PRIVACY_KIT_DEV_MODE: booleanFlag.optional(),
  PRIVACY_KIT_LOG_LEVEL: logLevel.optional(),
  PRIVACY_KIT_LOG_JSON: booleanFlag.optional(),
  PRIVACY_KIT_HTTP_TIMEOUT_MS: z.coerce.number().int().min(1).max(600_000).optional(),
  PRIVACY_KIT_POLICY_VERSION: z.string().trim().min(1).optional(),
  PRIVACY_KIT_EXTRA_DOMAINS: domainList.optional(),
});

/**
 * Builds a configuration from environment variables. Unset variables take
 * their defaults; extra domains are appended to the default allowlist.
 *
 * @throws ValidationError naming the first invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfigFromEnv(process.env);
 * const sdk = createDataProtectionSDK({ store, config });
 * ```
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): PrivacyKitConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? String(issue.path[0]) : 'environment';
    throw new ValidationError(`Invalid ${variable}: ${issue?.message ?? 'unparseable'}`, 'INVALID_CONFIG', variable);
  }

  const values = parsed.data;
  const extraDomains = values.PRIVACY_KIT_EXTRA_DOMAINS ?? [];

  return {
    developmentMode: values.PRIVACY_KIT_DEV_MODE ?? DEFAULT_CONFIG.developmentMode,
    logLevel: values.PRIVACY_KIT_LOG_LEVEL ?? DEFAULT_CONFIG.logLevel,
    logJson: values.PRIVACY_KIT_LOG_JSON ?? DEFAULT_CONFIG.logJson,
    httpTimeoutMs: values.PRIVACY_KIT_HTTP_TIMEOUT_MS ?? DEFAULT_CONFIG.httpTimeoutMs,
    policyVersion: values.PRIVACY_KIT_POLICY_VERSION ?? DEFAULT_CONFIG.policyVersion,
    allowedDomains: [...new Set([...DEFAULT_ALLOWED_DOMAINS, ...extraDomains])],
  };
}
