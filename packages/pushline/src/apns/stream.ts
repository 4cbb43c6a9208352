/**
 * APNS Message Stream
 *
 * Resumable iterator over the frames of one bulk send. Each step yields a
 * unit of up to `batchSize` concatenated frames. The cursor is re-read on
 * every step, so {@link APNSMessageStream.seek} during iteration rewinds or
 * skips what the next step yields.
 */

import { packFrame } from './frame.js';

/**
 * Frames written with a single socket write
 */
export interface APNSStreamUnit {
  /** Identifier of the first frame in the unit */
  identifier: number;
  tokens: string[];
  data: Buffer;
}

/**
 * A token not yet consumed by the stream
 */
export interface APNSPendingToken {
  identifier: number;
  token: string;
}

export class APNSMessageStream implements Iterable<APNSStreamUnit> {
  private readonly tokens: readonly string[];
  private readonly payload: Buffer;
  private readonly expiration: number;
  private readonly priority: number;
  private readonly batchSize: number;
  private cursor = 0;

  /**
   * @param payload - Serialized once and shared by every frame
   * @param batchSize - Frames per unit; 1 writes each frame on its own
   */
  constructor(
    tokens: readonly string[],
    payload: Buffer,
    expiration: number,
    priority: number,
    batchSize: number
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
    }
    this.tokens = tokens;
    this.payload = payload;
    this.expiration = expiration;
    this.priority = priority;
    this.batchSize = batchSize;
  }

  get length(): number {
    return this.tokens.length;
  }

  /** Identifier of the next frame to be yielded */
  get position(): number {
    return this.cursor;
  }

  /**
   * Resume after `identifier`: the next unit starts at `identifier + 1`.
   */
  seek(identifier: number): void {
    this.cursor = Math.max(0, identifier + 1);
  }

  eof(): boolean {
    return this.cursor >= this.tokens.length;
  }

  /**
   * Tokens not yet consumed, without moving the cursor.
   */
  peek(count?: number): APNSPendingToken[] {
    const end = count === undefined ? this.tokens.length : Math.min(this.tokens.length, this.cursor + count);
    const pending: APNSPendingToken[] = [];
    for (let identifier = this.cursor; identifier < end; identifier++) {
      pending.push({ identifier, token: this.tokens[identifier] });
    }
    return pending;
  }

  *[Symbol.iterator](): Iterator<APNSStreamUnit> {
    while (!this.eof()) {
      const start = this.cursor;
      const end = Math.min(start + this.batchSize, this.tokens.length);
      const tokens = this.tokens.slice(start, end);
      const frames = tokens.map((token, offset) =>
        packFrame(token, start + offset, this.payload, this.expiration, this.priority)
      );

      this.cursor = end;
      yield { identifier: start, tokens, data: Buffer.concat(frames) };
    }
  }
}
