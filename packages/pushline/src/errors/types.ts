/**
 * Error Kind Types
 *
 * Static descriptions of every server-reported failure, keyed by kind.
 */

/**
 * Failure kinds reported by the APNS gateway, plus two synthetic kinds
 * produced locally by the bulk sender.
 */
export type APNSErrorKind =
  | 'processing'
  | 'missing_token'
  | 'missing_topic'
  | 'missing_payload'
  | 'invalid_token_size'
  | 'invalid_topic_size'
  | 'invalid_payload_size'
  | 'invalid_token'
  | 'shutdown'
  | 'unknown'
  | 'timeout'     // Write retries exhausted for the unit in flight
  | 'unsendable'; // Never attempted because an earlier error was fatal

/**
 * Failure kinds reported in the `results` array of a GCM response
 */
export type GCMErrorKind =
  | 'MissingRegistration'
  | 'InvalidRegistration'
  | 'NotRegistered'
  | 'InvalidPackageName'
  | 'MismatchSenderId'
  | 'MessageTooBig'
  | 'InvalidDataKey'
  | 'InvalidTtl'
  | 'Unavailable'
  | 'InternalServerError'
  | 'DeviceMessageRateExceeded'
  | 'TopicsMessageRateExceeded';

/**
 * Entry of a code table
 */
export interface ServerErrorEntry<C> {
  /** Wire code, or null for kinds that never come from the server */
  code: C | null;
  /** Human-readable summary */
  description: string;
  /**
   * Whether the failure makes every notification at or after it
   * undeliverable on the current stream
   */
  fatal: boolean;
}
