/**
 * APNS Connection
 *
 * Owns one TLS stream to one gateway endpoint. Incoming bytes are buffered
 * as they arrive; every wait (readiness, read, write) is a race between a
 * socket event and a timer, so no operation blocks longer than its timeout.
 *
 * Transport failures close the connection. Callers reconnect explicitly
 * with {@link APNSConnection.connect}.
 */

import type { Duplex } from 'node:stream';
import { APNS_ERROR_RESPONSE_COMMAND, APNS_ERROR_RESPONSE_LENGTH } from '../constants.js';
import {
  APNSConnectionError,
  APNSServerError,
  APNSSocketTimeoutError,
  apnsErrorFromStatus,
} from '../errors/index.js';
import { createLogger } from '../logger.js';
import { unpackErrorResponse } from './frame.js';
import { createTlsSocket, readCertificate, type SocketFactory } from './socket.js';

const log = createLogger('apns:connection');

// ============================================================================
// Types
// ============================================================================

export interface APNSConnectionOptions {
  host: string;
  port: number;
  /** Path to the PEM certificate; read on every connect */
  certificate: string | null;
  /** Default bound for connect, read and write, in ms */
  timeout: number;
  /** Replaces the TLS socket, e.g. with an in-process stream */
  socketFactory?: SocketFactory;
}

/**
 * Outcome of {@link APNSConnection.checkError}
 */
export type ErrorCheckResult =
  | { status: 'clean' }
  | { status: 'error'; error: APNSServerError };

const CLEAN: ErrorCheckResult = { status: 'clean' };

// ============================================================================
// Connection
// ============================================================================

export class APNSConnection {
  private readonly options: APNSConnectionOptions;
  private readonly socketFactory: SocketFactory;
  private socket: Duplex | null = null;
  private connecting: Promise<void> | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private ended = false;
  private socketError: Error | null = null;
  private waiters: Set<() => void> = new Set();

  constructor(options: APNSConnectionOptions) {
    this.options = options;
    this.socketFactory = options.socketFactory ?? createTlsSocket;
  }

  get host(): string {
    return this.options.host;
  }

  get port(): number {
    return this.options.port;
  }

  get connected(): boolean {
    return this.socket !== null;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Open the connection unless it is already open. Concurrent callers share
   * one attempt.
   *
   * @throws {APNSAuthError} Certificate missing, unreadable or empty
   * @throws {APNSConnectionError} Connect or handshake failed
   * @throws {APNSSocketTimeoutError} Handshake did not finish in time
   */
  async connect(): Promise<void> {
    if (this.socket) {
      return;
    }
    if (!this.connecting) {
      this.connecting = this.open().finally(() => {
        this.connecting = null;
      });
    }
    await this.connecting;
  }

  private async open(): Promise<void> {
    const certificate = readCertificate(this.options.certificate);

    log.debug(`Connecting to ${this.host}:${this.port}`);
    const socket = await this.socketFactory({
      host: this.host,
      port: this.port,
      certificate,
      timeout: this.options.timeout,
    });

    this.attach(socket);
    log.debug(`Connected to ${this.host}:${this.port}`);
  }

  private attach(socket: Duplex): void {
    this.socket = socket;
    this.buffer = Buffer.alloc(0);
    this.ended = false;
    this.socketError = null;

    // Listeners stay on a closed socket; events from it are ignored
    socket.on('data', (chunk: Buffer | string) => {
      if (this.socket !== socket) return;
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      this.buffer = Buffer.concat([this.buffer, bytes]);
      this.notify();
    });
    socket.on('end', () => {
      if (this.socket !== socket) return;
      this.ended = true;
      this.notify();
    });
    socket.on('close', () => {
      if (this.socket !== socket) return;
      this.ended = true;
      this.notify();
    });
    socket.on('error', (error: Error) => {
      if (this.socket !== socket) return;
      log.debug(`Socket error on ${this.host}:${this.port}: ${error.message}`);
      this.socketError = error;
      this.notify();
    });
    socket.on('drain', () => {
      if (this.socket !== socket) return;
      this.notify();
    });
  }

  /**
   * Release the socket and drop any buffered bytes. Safe to call when
   * already closed.
   */
  close(): void {
    const socket = this.socket;
    if (!socket) {
      return;
    }

    this.socket = null;
    this.buffer = Buffer.alloc(0);
    this.ended = false;
    this.socketError = null;
    socket.destroy();
    log.debug(`Closed connection to ${this.host}:${this.port}`);
    this.notify();
  }

  // --------------------------------------------------------------------------
  // Readiness
  // --------------------------------------------------------------------------

  private notify(): void {
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }

  /**
   * Resolve true as soon as `ready()` holds, or false once `timeout` ms have
   * passed. A timeout of 0 checks once without waiting.
   */
  private waitFor(ready: () => boolean, timeout: number): Promise<boolean> {
    if (ready()) {
      return Promise.resolve(true);
    }
    if (timeout <= 0) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      const finish = (value: boolean) => {
        clearTimeout(timer);
        this.waiters.delete(waiter);
        resolve(value);
      };
      const waiter = () => {
        if (ready()) {
          finish(true);
        }
      };
      const timer = setTimeout(() => finish(false), timeout);
      this.waiters.add(waiter);
    });
  }

  private failWith(error: Error, operation: string): never {
    this.close();
    throw new APNSConnectionError(`Socket error while trying to ${operation}: ${error.message}`, {
      cause: error,
    });
  }

  /**
   * Whether a read would return without waiting: bytes are buffered or the
   * peer has closed. Returns false when nothing happened within `timeout`
   * or when there is no open connection.
   *
   * @throws {APNSConnectionError} The socket reported an error; the
   * connection has been closed
   */
  async readable(timeout: number): Promise<boolean> {
    if (!this.socket) {
      return false;
    }

    await this.waitFor(
      () => this.buffer.length > 0 || this.ended || this.socketError !== null || this.socket === null,
      timeout
    );

    if (this.buffer.length > 0) {
      return true;
    }
    if (this.socketError) {
      this.failWith(this.socketError, 'read');
    }
    return this.ended;
  }

  /**
   * Whether the socket accepts more bytes without buffering past its
   * high-water mark.
   *
   * @throws {APNSConnectionError}
   */
  async writable(timeout: number): Promise<boolean> {
    const canWrite = () => {
      const socket = this.socket;
      return socket !== null && !socket.writableNeedDrain;
    };

    await this.waitFor(() => canWrite() || this.socketError !== null || this.socket === null, timeout);

    if (this.socketError) {
      this.failWith(this.socketError, 'write');
    }
    return canWrite();
  }

  // --------------------------------------------------------------------------
  // I/O
  // --------------------------------------------------------------------------

  /**
   * Read exactly `size` bytes, or fewer if the peer closes first.
   *
   * @throws {APNSSocketTimeoutError} Neither happened within `timeout`; the
   * connection has been closed
   */
  async read(size: number, timeout: number = this.options.timeout): Promise<Buffer> {
    const ready = await this.waitFor(
      () =>
        this.buffer.length >= size ||
        this.ended ||
        this.socketError !== null ||
        this.socket === null,
      timeout
    );

    if (!ready) {
      this.close();
      throw new APNSSocketTimeoutError(`read ${size} bytes from ${this.host}`, timeout);
    }
    if (this.socketError && this.buffer.length < size) {
      this.failWith(this.socketError, 'read');
    }

    const data = Buffer.from(this.buffer.subarray(0, size));
    this.buffer = this.buffer.subarray(data.length);
    return data;
  }

  /**
   * Wait for writability, then write all of `data`.
   *
   * A writability or flush timeout closes the connection. A failed write leaves it
   * open so that an error response already received can still be read;
   * the caller closes it afterwards.
   *
   * @throws {APNSSocketTimeoutError}
   * @throws {APNSConnectionError}
   */
  async write(data: Buffer, timeout: number = this.options.timeout): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      throw new APNSConnectionError(`Not connected to ${this.host}:${this.port}`);
    }

    if (!(await this.writable(timeout))) {
      this.close();
      throw new APNSSocketTimeoutError(`write to ${this.host}`, timeout);
    }

    const flushed = await new Promise<boolean>((resolve, reject) => {
      const timer = setTimeout(() => resolve(false), timeout);
      socket.write(data, (error) => {
        clearTimeout(timer);
        if (error) {
          reject(
            new APNSConnectionError(`Write to ${this.host} failed: ${error.message}`, { cause: error })
          );
        } else {
          resolve(true);
        }
      });
    });

    if (!flushed) {
      this.close();
      throw new APNSSocketTimeoutError(`write to ${this.host}`, timeout);
    }
  }

  // --------------------------------------------------------------------------
  // Error responses
  // --------------------------------------------------------------------------

  /**
   * Look for an error response from the gateway.
   *
   * Returns clean when nothing is readable within `timeout`. Otherwise
   * reads one error record and closes the connection, since the gateway
   * closes its side after reporting an error.
   *
   * @throws {APNSConnectionError} The socket reported an error
   */
  async checkError(timeout: number): Promise<ErrorCheckResult> {
    if (!(await this.readable(timeout))) {
      return CLEAN;
    }

    let data: Buffer;
    try {
      data = await this.read(APNS_ERROR_RESPONSE_LENGTH);
    } finally {
      this.close();
    }

    if (data.length < APNS_ERROR_RESPONSE_LENGTH) {
      log.debug(`${this.host} closed the connection without an error response`);
      return CLEAN;
    }

    const response = unpackErrorResponse(data);
    log.debug(
      `Error response from ${this.host}: command=${response.command} status=${response.status} identifier=${response.identifier}`
    );

    if (response.command !== APNS_ERROR_RESPONSE_COMMAND) {
      return { status: 'error', error: new APNSServerError('unknown', response.identifier) };
    }
    if (response.status === 0) {
      return CLEAN;
    }
    return { status: 'error', error: apnsErrorFromStatus(response.status, response.identifier) };
  }
}
