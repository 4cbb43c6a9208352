/**
 * APNS Payload Builder
 *
 * Builds the `aps` dictionary from normalized alert fields and serializes it
 * canonically, so the byte length checked here is the length sent on the
 * wire. Absent fields are omitted, never sent as null.
 */

import { APNS_MAX_NOTIFICATION_SIZE, APNS_TRUNCATION_MARKER } from '../constants.js';
import { APNSPayloadTooLargeError } from '../errors/index.js';
import { canonicalJsonBytes } from '../utils/json.js';

/**
 * Alert text, a pre-built alert dictionary, or nothing (silent push)
 */
export type APNSAlert = string | Record<string, unknown> | null | undefined;

/**
 * Optional notification fields
 */
export interface APNSPayloadOptions {
  /** App icon badge number; 0 clears it */
  badge?: number;
  /** Sound file name, or a critical-alert sound dictionary */
  sound?: string | Record<string, unknown>;
  /** Notification category identifier */
  category?: string;
  /** Wake the app in the background (`content-available: 1`) */
  contentAvailable?: boolean;
  /** Allow a notification service extension to modify the content */
  mutableContent?: boolean;
  /** Groups notifications in Notification Center */
  threadId?: string;
  title?: string;
  titleLocKey?: string;
  titleLocArgs?: string[];
  actionLocKey?: string;
  locKey?: string;
  locArgs?: string[];
  launchImage?: string;
  /** Custom keys merged at the top level, beside `aps` */
  extra?: Record<string, unknown>;
}

/**
 * Size policy applied by {@link buildPayload}
 */
export interface APNSPayloadLimits {
  /** Hard gateway limit; exceeding it throws */
  maxSize?: number;
  /** Truncate the alert body until the payload fits in this many bytes */
  maxPayloadLength?: number;
}

export interface APSDictionary {
  alert?: string | Record<string, unknown>;
  badge?: number;
  sound?: string | Record<string, unknown>;
  category?: string;
  'content-available'?: 1;
  'mutable-content'?: 1;
  'thread-id'?: string;
}

export interface APNSPayload {
  aps: APSDictionary;
  [key: string]: unknown;
}

/** Option name → key inside a structured alert */
const ALERT_FIELDS: ReadonlyArray<readonly [keyof APNSPayloadOptions, string]> = [
  ['title', 'title'],
  ['titleLocKey', 'title-loc-key'],
  ['titleLocArgs', 'title-loc-args'],
  ['actionLocKey', 'action-loc-key'],
  ['locKey', 'loc-key'],
  ['locArgs', 'loc-args'],
  ['launchImage', 'launch-image'],
];

function isPresent(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return value !== undefined && value !== null && value !== '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build the alert value: passed through unless a title or localization
 * field is present, in which case it becomes a dictionary with `body` plus
 * each present field.
 */
function buildAlert(
  alert: APNSAlert,
  options: APNSPayloadOptions
): string | Record<string, unknown> | undefined {
  const fields = ALERT_FIELDS.filter(([option]) => isPresent(options[option]));

  if (fields.length === 0) {
    return alert ?? undefined;
  }

  const structured: Record<string, unknown> = isRecord(alert)
    ? { ...alert }
    : alert
      ? { body: alert }
      : {};

  for (const [option, key] of fields) {
    structured[key] = options[option];
  }
  return structured;
}

/**
 * Build the payload object for one notification.
 *
 * @example
 * createPayload('Hello', { badge: 1, extra: { ref: 7 } });
 * // { ref: 7, aps: { alert: 'Hello', badge: 1 } }
 */
export function createPayload(alert: APNSAlert, options: APNSPayloadOptions = {}): APNSPayload {
  const aps: APSDictionary = {};

  const builtAlert = buildAlert(alert, options);
  if (builtAlert !== undefined) {
    aps.alert = builtAlert;
  }
  if (options.badge !== undefined) {
    aps.badge = options.badge;
  }
  if (options.sound !== undefined) {
    aps.sound = options.sound;
  }
  if (options.category !== undefined) {
    aps.category = options.category;
  }
  if (options.contentAvailable) {
    aps['content-available'] = 1;
  }
  if (options.mutableContent) {
    aps['mutable-content'] = 1;
  }
  if (options.threadId !== undefined) {
    aps['thread-id'] = options.threadId;
  }

  return { ...options.extra, aps };
}

/**
 * Shorten the alert body one character at a time, appending the truncation
 * marker, until the payload fits or the body is exhausted. Mutates
 * `payload.aps.alert`.
 */
function truncateAlert(payload: APNSPayload, maxLength: number): Buffer {
  const { aps } = payload;
  const alert = aps.alert;
  const original = isRecord(alert) ? alert.body : alert;

  let encoded = canonicalJsonBytes(payload);
  if (typeof original !== 'string') {
    return encoded;
  }

  // Code points, so a surrogate pair is never split
  const chars = Array.from(original);
  while (encoded.length > maxLength && chars.length > 0) {
    chars.pop();
    const body = chars.join('') + APNS_TRUNCATION_MARKER;
    aps.alert = isRecord(alert) ? { ...alert, body } : body;
    encoded = canonicalJsonBytes(payload);
  }
  return encoded;
}

/**
 * Build and serialize a payload.
 *
 * @throws {APNSPayloadTooLargeError} When the serialized payload (after any
 * truncation) exceeds `limits.maxSize`
 */
export function buildPayload(
  alert: APNSAlert,
  options: APNSPayloadOptions = {},
  limits: APNSPayloadLimits = {}
): Buffer {
  const maxSize = limits.maxSize ?? APNS_MAX_NOTIFICATION_SIZE;
  const payload = createPayload(alert, options);

  let encoded = canonicalJsonBytes(payload);
  if (limits.maxPayloadLength !== undefined && encoded.length > limits.maxPayloadLength) {
    encoded = truncateAlert(payload, limits.maxPayloadLength);
  }

  if (encoded.length > maxSize) {
    throw new APNSPayloadTooLargeError(encoded.length, maxSize);
  }
  return encoded;
}
