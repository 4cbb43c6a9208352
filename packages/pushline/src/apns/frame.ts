/**
 * APNS Frame Codec
 *
 * Packs notification frames and unpacks error responses and feedback
 * records. Byte order and item order are fixed by the gateway:
 *
 * ```
 * [cmd=2:1][frame_len:4]
 *   [1][len:2][token]  [2][len:2][payload]  [3][4:2][identifier:4]
 *   [4][4:2][expiration:4]  [5][1:2][priority:1]
 * ```
 *
 * All integers are big-endian.
 */

import {
  APNS_ERROR_RESPONSE_LENGTH,
  APNS_FEEDBACK_HEADER_LENGTH,
  APNS_PUSH_COMMAND,
  APNS_TOKEN_LENGTH,
} from '../constants.js';
import { APNSInvalidFrameFieldError, APNSInvalidTokenFormatError } from '../errors/index.js';

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/** Item header: tag byte + 16-bit length */
const ITEM_HEADER_LENGTH = 3;
const ITEM_COUNT = 5;

const MAX_EXPIRATION = 0xffffffff;
const MAX_PRIORITY = 0xff;

const ItemTag = {
  TOKEN: 1,
  PAYLOAD: 2,
  IDENTIFIER: 3,
  EXPIRATION: 4,
  PRIORITY: 5,
} as const;

/**
 * Whether `token` is a hex string that decodes to exactly
 * {@link APNS_TOKEN_LENGTH} bytes.
 *
 * @example
 * isValidToken('1'.repeat(64)); // true
 * isValidToken('x'.repeat(64)); // false
 */
export function isValidToken(token: string): boolean {
  return (
    token.length === APNS_TOKEN_LENGTH * 2 &&
    HEX_PATTERN.test(token)
  );
}

/**
 * Decode a hex token, throwing on anything {@link isValidToken} rejects.
 */
export function decodeToken(token: string): Buffer {
  if (!isValidToken(token)) {
    throw new APNSInvalidTokenFormatError(token, APNS_TOKEN_LENGTH);
  }
  return Buffer.from(token, 'hex');
}

/**
 * Check that `expiration` and `priority` fit their frame fields.
 *
 * @throws {APNSInvalidFrameFieldError}
 */
export function assertFrameFields(expiration: number, priority: number): void {
  if (!Number.isInteger(expiration) || expiration < 0 || expiration > MAX_EXPIRATION) {
    throw new APNSInvalidFrameFieldError('expiration', expiration, MAX_EXPIRATION);
  }
  if (!Number.isInteger(priority) || priority < 0 || priority > MAX_PRIORITY) {
    throw new APNSInvalidFrameFieldError('priority', priority, MAX_PRIORITY);
  }
}

/**
 * Pack one notification into a binary push frame.
 *
 * @param token - Hex device token
 * @param identifier - Sequence identifier echoed back in error responses
 * @param payload - Serialized JSON payload
 * @param expiration - UNIX time (seconds) after which the gateway drops the notification
 * @param priority - 10 for immediate delivery, 5 for power-conserving delivery
 * @throws {APNSInvalidTokenFormatError}
 * @throws {APNSInvalidFrameFieldError}
 */
export function packFrame(
  token: string,
  identifier: number,
  payload: Buffer,
  expiration: number,
  priority: number
): Buffer {
  const tokenBytes = decodeToken(token);
  assertFrameFields(expiration, priority);
  const frameLength =
    ITEM_HEADER_LENGTH * ITEM_COUNT + tokenBytes.length + payload.length + 4 + 4 + 1;

  const frame = Buffer.alloc(1 + 4 + frameLength);
  let offset = 0;

  offset = frame.writeUInt8(APNS_PUSH_COMMAND, offset);
  offset = frame.writeUInt32BE(frameLength, offset);

  offset = frame.writeUInt8(ItemTag.TOKEN, offset);
  offset = frame.writeUInt16BE(tokenBytes.length, offset);
  offset += tokenBytes.copy(frame, offset);

  offset = frame.writeUInt8(ItemTag.PAYLOAD, offset);
  offset = frame.writeUInt16BE(payload.length, offset);
  offset += payload.copy(frame, offset);

  offset = frame.writeUInt8(ItemTag.IDENTIFIER, offset);
  offset = frame.writeUInt16BE(4, offset);
  offset = frame.writeUInt32BE(identifier, offset);

  offset = frame.writeUInt8(ItemTag.EXPIRATION, offset);
  offset = frame.writeUInt16BE(4, offset);
  offset = frame.writeUInt32BE(expiration, offset);

  offset = frame.writeUInt8(ItemTag.PRIORITY, offset);
  offset = frame.writeUInt16BE(1, offset);
  frame.writeUInt8(priority, offset);

  return frame;
}

/**
 * Decoded `[cmd:1][status:1][identifier:4]` error response
 */
export interface ErrorResponse {
  command: number;
  status: number;
  identifier: number;
}

export function unpackErrorResponse(data: Buffer): ErrorResponse {
  if (data.length < APNS_ERROR_RESPONSE_LENGTH) {
    throw new RangeError(
      `Error response must be ${APNS_ERROR_RESPONSE_LENGTH} bytes, got ${data.length}`
    );
  }
  return {
    command: data.readUInt8(0),
    status: data.readUInt8(1),
    identifier: data.readUInt32BE(2),
  };
}

/**
 * Decoded `[timestamp:4][token_len:2]` feedback header
 */
export interface FeedbackHeader {
  timestamp: number;
  tokenLength: number;
}

export function unpackFeedbackHeader(data: Buffer): FeedbackHeader {
  if (data.length < APNS_FEEDBACK_HEADER_LENGTH) {
    throw new RangeError(
      `Feedback header must be ${APNS_FEEDBACK_HEADER_LENGTH} bytes, got ${data.length}`
    );
  }
  return {
    timestamp: data.readUInt32BE(0),
    tokenLength: data.readUInt16BE(4),
  };
}
