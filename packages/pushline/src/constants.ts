/**
 * Protocol constants for the APNS binary interface and the GCM/FCM HTTP API.
 */

// ============================================================================
// APNS endpoints
// ============================================================================

export const APNS_HOST = 'gateway.push.apple.com';
export const APNS_SANDBOX_HOST = 'gateway.sandbox.push.apple.com';
export const APNS_PORT = 2195;

export const APNS_FEEDBACK_HOST = 'feedback.push.apple.com';
export const APNS_FEEDBACK_SANDBOX_HOST = 'feedback.sandbox.push.apple.com';
export const APNS_FEEDBACK_PORT = 2196;

// ============================================================================
// APNS wire format
// ============================================================================

/** Command byte of a push notification frame */
export const APNS_PUSH_COMMAND = 2;

/** Command byte of an error response sent by the gateway */
export const APNS_ERROR_RESPONSE_COMMAND = 8;

/** [cmd:1][status:1][identifier:4] */
export const APNS_ERROR_RESPONSE_LENGTH = 6;

/** [timestamp:4][token_len:2] */
export const APNS_FEEDBACK_HEADER_LENGTH = 6;

/** Decoded length of a device token in bytes */
export const APNS_TOKEN_LENGTH = 32;

/** Largest payload the gateway accepts, in bytes */
export const APNS_MAX_NOTIFICATION_SIZE = 2048;

/** Deliver immediately */
export const APNS_HIGH_PRIORITY = 10;

/** Deliver at a time that conserves power on the device */
export const APNS_LOW_PRIORITY = 5;

/** Appended to a truncated alert body */
export const APNS_TRUNCATION_MARKER = '…';

// ============================================================================
// APNS defaults
// ============================================================================

/** 30 days, in seconds */
export const APNS_DEFAULT_EXPIRATION_OFFSET = 60 * 60 * 24 * 30;

/**
 * Frames written per socket write. Kept conservatively low: very large
 * writes can stall on TCP buffering.
 */
export const APNS_DEFAULT_BATCH_SIZE = 100;

/** Final blocking error check after the last unit, in ms */
export const APNS_DEFAULT_ERROR_TIMEOUT = 5000;

/** Reconnect-and-rewrite attempts per unit after a failed write */
export const APNS_DEFAULT_RETRIES = 5;

/** Connect, handshake, read and write timeout, in ms */
export const APNS_DEFAULT_SOCKET_TIMEOUT = 10000;

// ============================================================================
// GCM / FCM
// ============================================================================

export const GCM_URL = 'https://fcm.googleapis.com/fcm/send';

/** Registration ids accepted per request */
export const GCM_MAX_RECIPIENTS = 1000;

export const GCM_HIGH_PRIORITY = 'high';
export const GCM_LOW_PRIORITY = 'normal';

/** Request timeout, in ms */
export const GCM_DEFAULT_TIMEOUT = 10000;
