/**
 * APNS Errors
 *
 * Local validation, setup and transport errors, plus the status-code table
 * used to turn a gateway error response into an {@link APNSServerError}.
 */

import { NotificationError, ServerError } from './base.js';
import type { APNSErrorKind, ServerErrorEntry } from './types.js';

// ============================================================================
// Local errors
// ============================================================================

/**
 * Base class for APNS errors that are not tied to a notification identifier.
 */
export class APNSError extends NotificationError {}

/**
 * Missing, unreadable or empty certificate file.
 */
export class APNSAuthError extends APNSError {}

/**
 * Token is not a hex string of the expected decoded length.
 */
export class APNSInvalidTokenFormatError extends APNSError {
  readonly token: string;

  constructor(token: string, expectedBytes: number) {
    super(`Invalid token format. Expected ${expectedBytes * 2} character hex string, got "${token}"`);
    this.token = token;
  }
}

/**
 * Serialized payload exceeds the gateway maximum and no truncation was requested.
 */
export class APNSPayloadTooLargeError extends APNSError {
  readonly size: number;
  readonly maxSize: number;

  constructor(size: number, maxSize: number) {
    super(`Notification body cannot exceed ${maxSize} bytes (got ${size})`);
    this.size = size;
    this.maxSize = maxSize;
  }
}

/**
 * An expiration or priority does not fit its field in the push frame.
 */
export class APNSInvalidFrameFieldError extends APNSError {
  readonly field: 'expiration' | 'priority';
  readonly value: number;

  constructor(field: 'expiration' | 'priority', value: number, max: number) {
    super(`Invalid ${field} ${value}. Expected an integer from 0 to ${max}`);
    this.field = field;
    this.value = value;
  }
}

/**
 * A readiness wait, handshake, read or write did not complete in time.
 * The connection has been closed when this is raised.
 */
export class APNSSocketTimeoutError extends APNSError {
  readonly operation: string;
  readonly timeout: number;

  constructor(operation: string, timeout: number) {
    super(`Timed out after ${timeout}ms waiting to ${operation}`);
    this.operation = operation;
    this.timeout = timeout;
  }
}

/**
 * The TCP connection or TLS session could not be established.
 */
export class APNSConnectionError extends APNSError {}

// ============================================================================
// Server errors
// ============================================================================

/**
 * Static description of every APNS error kind.
 */
export const APNS_ERROR_KINDS: Record<APNSErrorKind, ServerErrorEntry<number>> = {
  processing: { code: 1, description: 'Processing error', fatal: false },
  missing_token: { code: 2, description: 'Missing token', fatal: false },
  missing_topic: { code: 3, description: 'Missing topic', fatal: true },
  missing_payload: { code: 4, description: 'Missing payload', fatal: true },
  invalid_token_size: { code: 5, description: 'Invalid token size', fatal: false },
  invalid_topic_size: { code: 6, description: 'Invalid topic size', fatal: true },
  invalid_payload_size: { code: 7, description: 'Invalid payload size', fatal: true },
  invalid_token: { code: 8, description: 'Invalid token', fatal: false },
  shutdown: { code: 10, description: 'Shutdown', fatal: true },
  unknown: { code: 255, description: 'Unknown', fatal: false },
  timeout: { code: null, description: 'Connection timeout', fatal: false },
  unsendable: { code: null, description: 'Unable to send due to previous fatal error', fatal: false },
};

function isAPNSErrorKind(value: string): value is APNSErrorKind {
  return Object.prototype.hasOwnProperty.call(APNS_ERROR_KINDS, value);
}

function buildStatusTable(): Map<number, APNSErrorKind> {
  const table = new Map<number, APNSErrorKind>();
  for (const [kind, entry] of Object.entries(APNS_ERROR_KINDS)) {
    if (entry.code !== null && isAPNSErrorKind(kind)) {
      table.set(entry.code, kind);
    }
  }
  return table;
}

/**
 * Status byte → kind, built once from {@link APNS_ERROR_KINDS}.
 */
export const APNS_STATUS_KINDS: ReadonlyMap<number, APNSErrorKind> = buildStatusTable();

/**
 * Failure of one notification, correlated by its sequence identifier.
 */
export class APNSServerError extends ServerError<APNSErrorKind, number, number> {
  constructor(kind: APNSErrorKind, identifier: number) {
    const entry = APNS_ERROR_KINDS[kind];
    super(kind, entry.code, entry.description, identifier, entry.fatal);
  }
}

/**
 * Build the error for a status byte read from an error response.
 * Unrecognized statuses map to the `unknown` kind.
 */
export function apnsErrorFromStatus(status: number, identifier: number): APNSServerError {
  return new APNSServerError(APNS_STATUS_KINDS.get(status) ?? 'unknown', identifier);
}
