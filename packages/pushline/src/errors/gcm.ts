/**
 * GCM Errors
 *
 * Setup errors and the error-string table used when parsing the `results`
 * array of a GCM/FCM response.
 */

import { NotificationError, ServerError } from './base.js';
import type { GCMErrorKind, ServerErrorEntry } from './types.js';

/**
 * Base class for GCM errors that are not tied to a registration id.
 */
export class GCMError extends NotificationError {}

/**
 * No API key configured.
 */
export class GCMAuthError extends GCMError {}

/**
 * Static description of every known GCM error string.
 */
export const GCM_ERROR_KINDS: Record<GCMErrorKind, ServerErrorEntry<string>> = {
  MissingRegistration: { code: 'MissingRegistration', description: 'Missing registration ID', fatal: false },
  InvalidRegistration: { code: 'InvalidRegistration', description: 'Invalid registration ID', fatal: false },
  NotRegistered: { code: 'NotRegistered', description: 'Device not registered', fatal: false },
  InvalidPackageName: { code: 'InvalidPackageName', description: 'Invalid package name', fatal: false },
  MismatchSenderId: { code: 'MismatchSenderId', description: 'Mismatched sender ID', fatal: false },
  MessageTooBig: { code: 'MessageTooBig', description: 'Message too big', fatal: false },
  InvalidDataKey: { code: 'InvalidDataKey', description: 'Invalid data key', fatal: false },
  InvalidTtl: { code: 'InvalidTtl', description: 'Invalid time to live', fatal: false },
  Unavailable: { code: 'Unavailable', description: 'Timeout', fatal: false },
  InternalServerError: { code: 'InternalServerError', description: 'Internal server error', fatal: false },
  DeviceMessageRateExceeded: {
    code: 'DeviceMessageRateExceeded',
    description: 'Device message rate exceeded',
    fatal: false,
  },
  TopicsMessageRateExceeded: {
    code: 'TopicsMessageRateExceeded',
    description: 'Topics message rate exceeded',
    fatal: false,
  },
};

export function isGCMErrorKind(value: string): value is GCMErrorKind {
  return Object.prototype.hasOwnProperty.call(GCM_ERROR_KINDS, value);
}

/**
 * Failure of one registration id. `kind` is `'unknown'` for error strings
 * missing from {@link GCM_ERROR_KINDS}; `code` then carries the raw string.
 */
export class GCMServerError extends ServerError<GCMErrorKind | 'unknown', string, string> {}

/**
 * Build the error for an error string from a GCM result entry.
 */
export function gcmErrorFromCode(code: string, registrationId: string): GCMServerError {
  if (isGCMErrorKind(code)) {
    const entry = GCM_ERROR_KINDS[code];
    return new GCMServerError(code, code, entry.description, registrationId, entry.fatal);
  }
  return new GCMServerError('unknown', code, 'Unknown error', registrationId, false);
}
