/**
 * APNS Feedback
 *
 * Reads expired-token records from the feedback service. The service
 * streams every record it holds and then closes the connection.
 */

import { APNS_FEEDBACK_HEADER_LENGTH } from '../constants.js';
import { APNSSocketTimeoutError } from '../errors/index.js';
import { createLogger } from '../logger.js';
import type { APNSConnection } from './connection.js';
import { unpackFeedbackHeader } from './frame.js';

const log = createLogger('apns:feedback');

/**
 * A device token the service reported as no longer valid
 */
export interface APNSExpiredToken {
  /** Lowercase hex */
  token: string;
  /** UNIX time (seconds) at which the service found the token invalid */
  timestamp: number;
}

/**
 * Read `size` bytes, or null at a short read or a read timeout.
 */
async function readRecordPart(connection: APNSConnection, size: number): Promise<Buffer | null> {
  try {
    const data = await connection.read(size);
    return data.length === size ? data : null;
  } catch (error) {
    if (error instanceof APNSSocketTimeoutError) {
      log.debug(`Feedback read stopped: ${error.message}`);
      return null;
    }
    throw error;
  }
}

/**
 * Yield every record until the service closes the stream, a record is cut
 * short, or a read times out. The connection is closed afterwards.
 *
 * @throws {APNSAuthError}
 * @throws {APNSConnectionError}
 */
export async function* readExpiredTokens(connection: APNSConnection): AsyncGenerator<APNSExpiredToken> {
  await connection.connect();

  try {
    for (;;) {
      const header = await readRecordPart(connection, APNS_FEEDBACK_HEADER_LENGTH);
      if (!header) {
        return;
      }

      const { timestamp, tokenLength } = unpackFeedbackHeader(header);
      const token = await readRecordPart(connection, tokenLength);
      if (!token) {
        return;
      }

      yield { token: token.toString('hex'), timestamp };
    }
  } finally {
    connection.close();
  }
}
