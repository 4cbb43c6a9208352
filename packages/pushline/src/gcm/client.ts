/**
 * GCM Client
 *
 * Sends one message to any number of registration ids, split into requests
 * of at most `maxRecipients` ids each.
 */

import { createGcmConfig, type GCMConfig, type GCMConfigInput } from '../config.js';
import { GCMAuthError } from '../errors/index.js';
import { GCMConnection, type HttpTransport } from './connection.js';
import { GCMMessage, type GCMMessageData, type GCMMessageOptions } from './message.js';
import type { GCMResponse } from './response.js';
import { GCMMessageStream } from './stream.js';

export interface GCMClientOptions {
  /** Replaces the fetch-based transport */
  transport?: HttpTransport;
}

export class GCMClient {
  readonly config: GCMConfig;
  private readonly transport: HttpTransport | undefined;
  private connection: GCMConnection | null = null;

  /**
   * @throws {ConfigurationError}
   */
  constructor(config: GCMConfigInput = {}, options: GCMClientOptions = {}) {
    this.config = createGcmConfig(config);
    this.transport = options.transport;
  }

  /**
   * Send `message` to every registration id in `ids`.
   *
   * @throws {GCMAuthError} No API key is configured
   *
   * @example
   * const response = await client.send(ids, { title: 'Deploy', status: 'ok' }, { timeToLive: 3600 });
   * for (const { oldId, newId } of response.canonicalIds) {
   *   await devices.replace(oldId, newId);
   * }
   */
  async send(
    ids: string | readonly string[],
    message: GCMMessageData,
    options: GCMMessageOptions = {}
  ): Promise<GCMResponse> {
    const connection = this.getConnection();
    const registrationIds = typeof ids === 'string' ? [ids] : [...ids];

    const stream = new GCMMessageStream(
      new GCMMessage(registrationIds, message, options),
      this.config.maxRecipients
    );
    return connection.send(stream);
  }

  /**
   * Same as {@link GCMClient.send}.
   */
  sendBulk(
    ids: string | readonly string[],
    message: GCMMessageData,
    options: GCMMessageOptions = {}
  ): Promise<GCMResponse> {
    return this.send(ids, message, options);
  }

  private getConnection(): GCMConnection {
    if (!this.config.apiKey) {
      throw new GCMAuthError('Missing GCM API key.');
    }
    if (!this.connection) {
      this.connection = new GCMConnection({
        apiKey: this.config.apiKey,
        url: this.config.url,
        timeout: this.config.timeout,
        transport: this.transport,
      });
    }
    return this.connection;
  }
}
