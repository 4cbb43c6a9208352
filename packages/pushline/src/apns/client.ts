/**
 * APNS Client
 *
 * Public entry point for the binary APNS interface: validates tokens,
 * builds the payload once, then runs a bulk send over the client's push
 * connection. Overlapping `send` calls are queued, since a connection
 * serves one bulk send at a time.
 */

import { APNS_HIGH_PRIORITY, APNS_TOKEN_LENGTH } from '../constants.js';
import { createApnsConfig, type APNSConfig, type APNSConfigInput } from '../config.js';
import { APNSInvalidTokenFormatError } from '../errors/index.js';
import { APNSConnection } from './connection.js';
import { readExpiredTokens, type APNSExpiredToken } from './feedback.js';
import { assertFrameFields, isValidToken } from './frame.js';
import { buildPayload, type APNSAlert, type APNSPayloadOptions } from './payload.js';
import { APNSResponse } from './response.js';
import { APNSBulkSender } from './sender.js';
import type { SocketFactory } from './socket.js';
import { APNSMessageStream } from './stream.js';

export interface APNSClientOptions {
  /** Replaces the TLS socket for both push and feedback connections */
  socketFactory?: SocketFactory;
}

/**
 * Per-call options. Notification fields come from
 * {@link APNSPayloadOptions}; the rest override the client configuration
 * for this call only.
 */
export interface APNSSendOptions extends APNSPayloadOptions {
  /** UNIX time (seconds); defaults to now plus `defaultExpirationOffset` */
  expiration?: number;
  /** {@link APNS_HIGH_PRIORITY} (default) or `APNS_LOW_PRIORITY` */
  priority?: number;
  batchSize?: number;
  errorTimeout?: number;
  retries?: number;
  /** Truncate the alert body so the payload fits in this many bytes */
  maxPayloadLength?: number;
}

export class APNSClient {
  readonly config: APNSConfig;
  private readonly socketFactory: SocketFactory | undefined;
  private readonly connection: APNSConnection;
  private queue: Promise<unknown> = Promise.resolve();

  /**
   * @throws {ConfigurationError}
   */
  constructor(config: APNSConfigInput = {}, options: APNSClientOptions = {}) {
    this.config = createApnsConfig(config);
    this.socketFactory = options.socketFactory;
    this.connection = new APNSConnection({
      host: this.config.host,
      port: this.config.port,
      certificate: this.config.certificate,
      timeout: this.config.timeout,
      socketFactory: this.socketFactory,
    });
  }

  /**
   * Send one notification to every token in `ids`.
   *
   * Per-notification failures are reported in the returned response.
   *
   * @throws {APNSInvalidTokenFormatError} Some token is not 64 hex characters; nothing was sent
   * @throws {APNSPayloadTooLargeError} The payload is over the size limit; nothing was sent
   * @throws {APNSInvalidFrameFieldError} Expiration or priority out of range; nothing was sent
   * @throws {APNSAuthError} The certificate is missing, unreadable or empty
   *
   * @example
   * const response = await client.send(tokens, 'Build finished', { badge: 1 });
   * response.failures; // tokens the gateway rejected
   */
  async send(ids: string | readonly string[], alert: APNSAlert, options: APNSSendOptions = {}): Promise<APNSResponse> {
    const tokens = typeof ids === 'string' ? [ids] : [...ids];

    for (const token of tokens) {
      if (!isValidToken(token)) {
        throw new APNSInvalidTokenFormatError(token, APNS_TOKEN_LENGTH);
      }
    }

    const payload = buildPayload(alert, options, {
      maxSize: this.config.maxNotificationSize,
      maxPayloadLength: options.maxPayloadLength,
    });
    const expiration =
      options.expiration ?? Math.floor(Date.now() / 1000) + this.config.defaultExpirationOffset;
    const priority = options.priority ?? APNS_HIGH_PRIORITY;
    assertFrameFields(expiration, priority);

    const stream = new APNSMessageStream(
      tokens,
      payload,
      expiration,
      priority,
      options.batchSize ?? this.config.batchSize
    );

    const sender = new APNSBulkSender(this.connection, {
      errorTimeout: options.errorTimeout ?? this.config.errorTimeout,
      retries: options.retries ?? this.config.retries,
    });

    return this.exclusive(async () => {
      const outcome = await sender.send(stream);
      return new APNSResponse(tokens, payload, outcome.errors);
    });
  }

  /**
   * Same as {@link APNSClient.send}.
   */
  sendBulk(ids: string | readonly string[], alert: APNSAlert, options: APNSSendOptions = {}): Promise<APNSResponse> {
    return this.send(ids, alert, options);
  }

  /**
   * Fetch the tokens the feedback service reports as expired, over a
   * connection of their own.
   */
  async getExpiredTokens(): Promise<APNSExpiredToken[]> {
    const connection = new APNSConnection({
      host: this.config.feedbackHost,
      port: this.config.feedbackPort,
      certificate: this.config.certificate,
      timeout: this.config.timeout,
      socketFactory: this.socketFactory,
    });

    const expired: APNSExpiredToken[] = [];
    for await (const record of readExpiredTokens(connection)) {
      expired.push(record);
    }
    return expired;
  }

  /**
   * Close the push connection. A later send reconnects.
   */
  close(): void {
    this.connection.close();
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // Failures reach the caller through `run`; the queue only orders calls
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
