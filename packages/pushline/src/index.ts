/**
 * Pushline
 *
 * Push notification delivery over the APNS binary interface and the
 * GCM/FCM HTTP API, with per-notification failure reporting.
 *
 * @packageDocumentation
 */

export * from './constants.js';
export * from './config.js';
export * from './errors/index.js';
export * from './apns/index.js';
export * from './gcm/index.js';
export { createLogger, getLogLevel, logger, parseLogLevel, setLogLevel } from './logger.js';
export type { LogLevel, Logger } from './logger.js';
export { canonicalJson, canonicalJsonBytes } from './utils/json.js';
export type { JsonObject, JsonValue } from './utils/json.js';
export { chunk } from './utils/chunk.js';
