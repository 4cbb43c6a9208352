/**
 * Pushline Configuration
 *
 * Typed settings for the APNS and GCM clients. Each factory starts from
 * documented defaults and applies an explicit override object, validated
 * with zod so a bad value fails at construction rather than mid-send.
 *
 * All timeouts are in milliseconds.
 *
 * @module config
 */

import { z } from 'zod';
import {
  APNS_DEFAULT_BATCH_SIZE,
  APNS_DEFAULT_ERROR_TIMEOUT,
  APNS_DEFAULT_EXPIRATION_OFFSET,
  APNS_DEFAULT_RETRIES,
  APNS_DEFAULT_SOCKET_TIMEOUT,
  APNS_FEEDBACK_HOST,
  APNS_FEEDBACK_PORT,
  APNS_FEEDBACK_SANDBOX_HOST,
  APNS_HOST,
  APNS_MAX_NOTIFICATION_SIZE,
  APNS_PORT,
  APNS_SANDBOX_HOST,
  GCM_DEFAULT_TIMEOUT,
  GCM_MAX_RECIPIENTS,
  GCM_URL,
} from './constants.js';
import { ConfigurationError } from './errors/index.js';

// ============================================================================
// Schemas
// ============================================================================

const port = z.number().int().min(1).max(65535);
const timeout = z.number().int().nonnegative();

/**
 * APNS settings
 */
export const APNSConfigSchema = z.object({
  /** Path to a PEM file holding both the client certificate and its key */
  certificate: z.string().min(1).nullable().default(null),
  host: z.string().min(1).default(APNS_HOST),
  port: port.default(APNS_PORT),
  feedbackHost: z.string().min(1).default(APNS_FEEDBACK_HOST),
  feedbackPort: port.default(APNS_FEEDBACK_PORT),
  /** Final blocking error check after the last unit of a send */
  errorTimeout: timeout.default(APNS_DEFAULT_ERROR_TIMEOUT),
  /** Seconds from now used when a send does not give an expiration */
  defaultExpirationOffset: z.number().int().nonnegative().default(APNS_DEFAULT_EXPIRATION_OFFSET),
  /** Frames per socket write */
  batchSize: z.number().int().positive().default(APNS_DEFAULT_BATCH_SIZE),
  /** Reconnect-and-rewrite attempts after a failed write */
  retries: z.number().int().nonnegative().default(APNS_DEFAULT_RETRIES),
  /** Connect, handshake, read and write timeout */
  timeout: timeout.default(APNS_DEFAULT_SOCKET_TIMEOUT),
  maxNotificationSize: z.number().int().positive().max(APNS_MAX_NOTIFICATION_SIZE).default(APNS_MAX_NOTIFICATION_SIZE),
});

/**
 * GCM/FCM settings
 */
export const GCMConfigSchema = z.object({
  apiKey: z.string().min(1).nullable().default(null),
  url: z.string().url().default(GCM_URL),
  /** Registration ids per request; may be lowered, never raised */
  maxRecipients: z.number().int().positive().max(GCM_MAX_RECIPIENTS).default(GCM_MAX_RECIPIENTS),
  timeout: timeout.default(GCM_DEFAULT_TIMEOUT),
});

export type APNSConfig = z.infer<typeof APNSConfigSchema>;
export type APNSConfigInput = z.input<typeof APNSConfigSchema>;
export type GCMConfig = z.infer<typeof GCMConfigSchema>;
export type GCMConfigInput = z.input<typeof GCMConfigSchema>;

// ============================================================================
// Factories
// ============================================================================

function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid ${label} configuration`, issues);
  }
  return result.data;
}

/**
 * Production APNS configuration.
 *
 * @throws {ConfigurationError} When an override fails validation
 *
 * @example
 * const config = createApnsConfig({ certificate: '/etc/push/cert.pem' });
 * config.host; // 'gateway.push.apple.com'
 */
export function createApnsConfig(overrides: APNSConfigInput = {}): APNSConfig {
  return parseConfig(APNSConfigSchema, overrides, 'APNS');
}

/**
 * Sandbox APNS configuration. Hosts given in `overrides` still win.
 */
export function createApnsSandboxConfig(overrides: APNSConfigInput = {}): APNSConfig {
  return parseConfig(
    APNSConfigSchema,
    {
      ...overrides,
      host: overrides.host ?? APNS_SANDBOX_HOST,
      feedbackHost: overrides.feedbackHost ?? APNS_FEEDBACK_SANDBOX_HOST,
    },
    'APNS'
  );
}

/**
 * GCM/FCM configuration.
 */
export function createGcmConfig(overrides: GCMConfigInput = {}): GCMConfig {
  return parseConfig(GCMConfigSchema, overrides, 'GCM');
}

// ============================================================================
// Environment
// ============================================================================

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, key: string): number | undefined {
  const value = readString(env, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError('Invalid environment', [`${key}: expected a number, got "${value}"`]);
  }
  return parsed;
}

/**
 * Build an APNS configuration from `PUSHLINE_APNS_*` variables.
 *
 * | Variable | Field |
 * |---|---|
 * | PUSHLINE_APNS_SANDBOX=true | sandbox hosts |
 * | PUSHLINE_APNS_CERTIFICATE | certificate |
 * | PUSHLINE_APNS_HOST / _PORT | host / port |
 * | PUSHLINE_APNS_FEEDBACK_HOST / _PORT | feedbackHost / feedbackPort |
 * | PUSHLINE_APNS_ERROR_TIMEOUT | errorTimeout |
 * | PUSHLINE_APNS_EXPIRATION_OFFSET | defaultExpirationOffset |
 * | PUSHLINE_APNS_BATCH_SIZE | batchSize |
 * | PUSHLINE_APNS_RETRIES | retries |
 * | PUSHLINE_APNS_TIMEOUT | timeout |
 */
export function loadApnsConfigFromEnv(env: Env = process.env): APNSConfig {
  const overrides: APNSConfigInput = {
    certificate: readString(env, 'PUSHLINE_APNS_CERTIFICATE'),
    host: readString(env, 'PUSHLINE_APNS_HOST'),
    port: readNumber(env, 'PUSHLINE_APNS_PORT'),
    feedbackHost: readString(env, 'PUSHLINE_APNS_FEEDBACK_HOST'),
    feedbackPort: readNumber(env, 'PUSHLINE_APNS_FEEDBACK_PORT'),
    errorTimeout: readNumber(env, 'PUSHLINE_APNS_ERROR_TIMEOUT'),
    defaultExpirationOffset: readNumber(env, 'PUSHLINE_APNS_EXPIRATION_OFFSET'),
    batchSize: readNumber(env, 'PUSHLINE_APNS_BATCH_SIZE'),
    retries: readNumber(env, 'PUSHLINE_APNS_RETRIES'),
    timeout: readNumber(env, 'PUSHLINE_APNS_TIMEOUT'),
  };

  // Unset variables stay undefined and fall through to the schema defaults
  return readString(env, 'PUSHLINE_APNS_SANDBOX') === 'true'
    ? createApnsSandboxConfig(overrides)
    : createApnsConfig(overrides);
}

/**
 * Build a GCM configuration from `PUSHLINE_GCM_API_KEY`, `PUSHLINE_GCM_URL`,
 * `PUSHLINE_GCM_MAX_RECIPIENTS` and `PUSHLINE_GCM_TIMEOUT`.
 */
export function loadGcmConfigFromEnv(env: Env = process.env): GCMConfig {
  const overrides: GCMConfigInput = {
    apiKey: readString(env, 'PUSHLINE_GCM_API_KEY'),
    url: readString(env, 'PUSHLINE_GCM_URL'),
    maxRecipients: readNumber(env, 'PUSHLINE_GCM_MAX_RECIPIENTS'),
    timeout: readNumber(env, 'PUSHLINE_GCM_TIMEOUT'),
  };

  return createGcmConfig(overrides);
}
