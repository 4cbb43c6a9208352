/**
 * GCM Connection
 *
 * POSTs each chunk of a {@link GCMMessageStream} to the send endpoint, one
 * request at a time, and hands the collected results to {@link GCMResponse}.
 * HTTP goes through an {@link HttpTransport} so tests can answer requests
 * in process.
 */

import { createLogger } from '../logger.js';
import { canonicalJson } from '../utils/json.js';
import type { GCMRequestBody } from './message.js';
import { GCMResponse } from './response.js';
import type { GCMMessageStream, GCMRequestChunk } from './stream.js';

const log = createLogger('gcm');

// ============================================================================
// Transport
// ============================================================================

export interface HttpRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
  /** Abort the request after this many ms */
  timeout: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Minimal HTTP capability: one POST, resolved with status and body text.
 * Rejects only when no response was received.
 */
export interface HttpTransport {
  post(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * {@link HttpTransport} over the global `fetch`
 */
export class FetchTransport implements HttpTransport {
  async post(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), request.timeout);

    try {
      const response = await fetch(request.url, {
        method: 'POST',
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
      return { status: response.status, body: await response.text() };
    } finally {
      clearTimeout(timer);
    }
  }
}

// ============================================================================
// Connection
// ============================================================================

export interface GCMConnectionOptions {
  apiKey: string;
  url: string;
  timeout: number;
  transport?: HttpTransport;
}

/**
 * Outcome of one request. `response` is null when the transport rejected,
 * in which case `error` holds the reason.
 */
export interface GCMChunkResult {
  registrationIds: string[];
  body: GCMRequestBody;
  response: HttpResponse | null;
  error?: Error;
}

export class GCMConnection {
  private readonly options: GCMConnectionOptions;
  private readonly transport: HttpTransport;
  private readonly headers: Record<string, string>;

  constructor(options: GCMConnectionOptions) {
    this.options = options;
    this.transport = options.transport ?? new FetchTransport();
    this.headers = {
      Authorization: `key=${options.apiKey}`,
      'Content-Type': 'application/json',
    };
  }

  /**
   * Send one chunk. Never rejects: a transport failure is recorded on the
   * result.
   */
  async post(chunk: GCMRequestChunk): Promise<GCMChunkResult> {
    const body = canonicalJson(chunk.body);
    log.debug(`Posting ${chunk.registrationIds.length} registration ids (${Buffer.byteLength(body)} bytes)`);

    try {
      const response = await this.transport.post({
        url: this.options.url,
        headers: this.headers,
        body,
        timeout: this.options.timeout,
      });
      return { registrationIds: chunk.registrationIds, body: chunk.body, response };
    } catch (error) {
      const reason = error instanceof Error ? error : new Error(String(error));
      log.debug(`Request to ${this.options.url} failed: ${reason.message}`);
      return { registrationIds: chunk.registrationIds, body: chunk.body, response: null, error: reason };
    }
  }

  /**
   * Send every chunk in order and aggregate the results.
   */
  async send(stream: GCMMessageStream): Promise<GCMResponse> {
    log.debug(`Sending ${stream.length} notifications to GCM`);

    const results: GCMChunkResult[] = [];
    for (const chunk of stream) {
      results.push(await this.post(chunk));
    }

    const response = new GCMResponse(results);
    if (response.failures.length > 0) {
      log.debug(`Encountered ${response.failures.length} failures while sending to GCM`);
    }
    return response;
  }
}
