/**
 * In-process stand-in for the APNS gateway and feedback service.
 *
 * Each connection gets a fresh {@link FakeGatewaySocket}. Push sockets parse
 * the frames written to them and answer with an error response for the
 * identifiers listed in `errors`, then end their readable side and ignore
 * any further frames, as the real gateway does. {@link StalledSocket}
 * stands in for a peer that stops reading.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Duplex } from 'node:stream';
import type { SocketFactory, SocketFactoryOptions } from '../../src/apns/socket.js';

export interface ReceivedFrame {
  identifier: number;
  token: string;
  payload: string;
  expiration: number;
  priority: number;
}

export interface FakeGatewayOptions {
  /** identifier → status byte to report for it (each reported once) */
  errors?: Record<number, number>;
  /** Sockets, in connect order, whose writes fail */
  failWrites?: number;
  /** Raw bytes the feedback service streams before closing */
  feedback?: Buffer;
  /** Command byte used in error responses */
  errorCommand?: number;
  /** identifier → identifier to put in its error response instead */
  reportAs?: Record<number, number>;
  /** The push socket that receives this identifier then fails with a socket error (once) */
  socketErrorAfter?: number;
  /** The feedback service never closes its side */
  feedbackStalls?: boolean;
}

export function errorResponse(status: number, identifier: number, command = 8): Buffer {
  const data = Buffer.alloc(6);
  data.writeUInt8(command, 0);
  data.writeUInt8(status, 1);
  data.writeUInt32BE(identifier, 2);
  return data;
}

export function feedbackRecord(token: string, timestamp: number): Buffer {
  const tokenBytes = Buffer.from(token, 'hex');
  const header = Buffer.alloc(6);
  header.writeUInt32BE(timestamp, 0);
  header.writeUInt16BE(tokenBytes.length, 4);
  return Buffer.concat([header, tokenBytes]);
}

function parseFrame(frame: Buffer): ReceivedFrame {
  const received: ReceivedFrame = { identifier: -1, token: '', payload: '', expiration: 0, priority: 0 };
  let offset = 0;
  while (offset < frame.length) {
    const tag = frame.readUInt8(offset);
    const length = frame.readUInt16BE(offset + 1);
    const item = frame.subarray(offset + 3, offset + 3 + length);
    offset += 3 + length;

    if (tag === 1) received.token = item.toString('hex');
    if (tag === 2) received.payload = item.toString('utf8');
    if (tag === 3) received.identifier = item.readUInt32BE(0);
    if (tag === 4) received.expiration = item.readUInt32BE(0);
    if (tag === 5) received.priority = item.readUInt8(0);
  }
  return received;
}

function toIdentifierMap(entries: Record<number, number> | undefined): Map<number, number> {
  return new Map(Object.entries(entries ?? {}).map(([id, value]): [number, number] => [Number(id), value]));
}

export class FakeGatewaySocket extends Duplex {
  readonly frames: ReceivedFrame[] = [];
  readonly connectOptions: SocketFactoryOptions;
  private readonly gateway: FakeAPNSGateway;
  private readonly failWrites: boolean;
  private pending: Buffer = Buffer.alloc(0);
  private reported = false;

  constructor(gateway: FakeAPNSGateway, connectOptions: SocketFactoryOptions, failWrites: boolean) {
    super();
    this.gateway = gateway;
    this.connectOptions = connectOptions;
    this.failWrites = failWrites;
  }

  get identifiers(): number[] {
    return this.frames.map((frame) => frame.identifier);
  }

  override _read(): void {}

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (this.failWrites) {
      callback(new Error('write EPIPE'));
      return;
    }
    if (this.reported) {
      callback();
      return;
    }

    this.pending = Buffer.concat([this.pending, chunk]);
    while (this.pending.length >= 5 && !this.reported) {
      const length = this.pending.readUInt32BE(1);
      if (this.pending.length < 5 + length) {
        break;
      }

      const frame = parseFrame(this.pending.subarray(5, 5 + length));
      this.pending = this.pending.subarray(5 + length);
      this.frames.push(frame);

      const status = this.gateway.takeError(frame.identifier);
      if (status !== undefined) {
        this.reported = true;
        const reported = this.gateway.reportAs.get(frame.identifier) ?? frame.identifier;
        this.push(errorResponse(status, reported, this.gateway.errorCommand));
        this.push(null);
      } else if (this.gateway.takeSocketError(frame.identifier)) {
        this.reported = true;
        setImmediate(() => this.destroy(new Error('read ECONNRESET')));
      }
    }
    callback();
  }
}

/**
 * Accepts writes but never completes them, like a peer that stopped reading.
 */
export class StalledSocket extends Duplex {
  constructor(highWaterMark = 16384) {
    super({ writableHighWaterMark: highWaterMark });
  }

  override _read(): void {}

  override _write(_chunk: Buffer, _encoding: BufferEncoding, _callback: (error?: Error | null) => void): void {}
}

export class FeedbackSocket extends Duplex {
  constructor(data: Buffer, stalls = false) {
    super();
    if (data.length > 0) {
      this.push(data);
    }
    if (!stalls) {
      this.push(null);
    }
  }

  override _read(): void {}

  override _write(_chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    callback();
  }
}

export class FakeAPNSGateway {
  readonly sockets: FakeGatewaySocket[] = [];
  readonly feedbackConnections: SocketFactoryOptions[] = [];
  readonly errorCommand: number;
  readonly reportAs: Map<number, number>;
  private readonly errors: Map<number, number>;
  private readonly feedback: Buffer;
  private readonly feedbackStalls: boolean;
  private socketErrorAfter: number | undefined;
  private failWritesRemaining: number;

  constructor(options: FakeGatewayOptions = {}) {
    this.errors = toIdentifierMap(options.errors);
    this.reportAs = toIdentifierMap(options.reportAs);
    this.socketErrorAfter = options.socketErrorAfter;
    this.feedbackStalls = options.feedbackStalls ?? false;
    this.failWritesRemaining = options.failWrites ?? 0;
    this.feedback = options.feedback ?? Buffer.alloc(0);
    this.errorCommand = options.errorCommand ?? 8;
  }

  readonly factory: SocketFactory = async (options) => {
    if (options.host.includes('feedback')) {
      this.feedbackConnections.push(options);
      return new FeedbackSocket(this.feedback, this.feedbackStalls);
    }

    const failWrites = this.failWritesRemaining > 0;
    if (failWrites) {
      this.failWritesRemaining -= 1;
    }
    const socket = new FakeGatewaySocket(this, options, failWrites);
    this.sockets.push(socket);
    return socket;
  };

  takeError(identifier: number): number | undefined {
    const status = this.errors.get(identifier);
    this.errors.delete(identifier);
    return status;
  }

  takeSocketError(identifier: number): boolean {
    if (this.socketErrorAfter !== identifier) {
      return false;
    }
    this.socketErrorAfter = undefined;
    return true;
  }

  /** Every frame received, across all sockets, in order */
  get frames(): ReceivedFrame[] {
    return this.sockets.flatMap((socket) => socket.frames);
  }
}

/**
 * Write a placeholder certificate to a fresh temp directory.
 */
export function writeCertificate(contents = 'test-certificate'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pushline-'));
  const file = path.join(dir, 'cert.pem');
  fs.writeFileSync(file, contents);
  return file;
}

export function makeTokens(count: number): string[] {
  return Array.from({ length: count }, (_, index) => index.toString(16).padStart(2, '0').repeat(32));
}
