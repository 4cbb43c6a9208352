/**
 * APNS Bulk Sender
 *
 * Drives one {@link APNSMessageStream} over one {@link APNSConnection}.
 *
 * ```
 * sending ──write ok──▶ checking ──clean, more units──▶ sending
 *    │                     │  └──clean, stream done──▶ done
 *    │                     └──error response──▶ resume ──non-fatal──▶ sending
 *    │                                              └──fatal──▶ aborted
 *    └──retries exhausted──▶ aborted
 * ```
 *
 * After every unit the gateway is polled without waiting; after the last
 * unit the poll waits up to `errorTimeout`, since no later write would
 * trigger another check. Errors are collected, never thrown.
 */

import {
  APNSConnectionError,
  APNSServerError,
  APNSSocketTimeoutError,
} from '../errors/index.js';
import { createLogger } from '../logger.js';
import type { APNSConnection, ErrorCheckResult } from './connection.js';
import type { APNSMessageStream, APNSStreamUnit } from './stream.js';

const log = createLogger('apns:sender');

// ============================================================================
// Types
// ============================================================================

export interface BulkSenderOptions {
  /** Wait for a late error response after the last unit, in ms */
  errorTimeout: number;
  /** Reconnect-and-rewrite attempts per unit after a failed write */
  retries: number;
}

/**
 * State of one bulk send. `resume` carries the error that caused it.
 */
export type SenderState =
  | { name: 'sending' }
  | { name: 'checking' }
  | { name: 'resume'; error: APNSServerError }
  | { name: 'done' }
  | { name: 'aborted' };

export interface BulkSendOutcome {
  state: 'done' | 'aborted';
  errors: APNSServerError[];
}

type WriteResult =
  | { status: 'written' }
  | { status: 'error'; error: APNSServerError }
  | { status: 'exhausted' };

function isTransportError(error: unknown): error is APNSConnectionError | APNSSocketTimeoutError {
  return error instanceof APNSConnectionError || error instanceof APNSSocketTimeoutError;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Sender
// ============================================================================

export class APNSBulkSender {
  private readonly connection: APNSConnection;
  private readonly options: BulkSenderOptions;

  constructor(connection: APNSConnection, options: BulkSenderOptions) {
    this.connection = connection;
    this.options = options;
  }

  /**
   * Send every notification of `stream`.
   *
   * @throws {APNSAuthError} The certificate cannot be used; nothing was sent
   * @throws {APNSConnectionError} The first connect failed; nothing was sent
   */
  async send(stream: APNSMessageStream): Promise<BulkSendOutcome> {
    await this.connection.connect();
    log.debug(`Sending ${stream.length} notifications to ${this.connection.host}`);

    try {
      return await this.run(stream);
    } catch (error) {
      // Unexpected error; the stream may be half written
      this.connection.close();
      throw error;
    }
  }

  private async run(stream: APNSMessageStream): Promise<BulkSendOutcome> {
    const errors: APNSServerError[] = [];
    const units = stream[Symbol.iterator]();
    let state: SenderState = { name: 'sending' };

    for (;;) {
      switch (state.name) {
        case 'sending': {
          const next = units.next();
          if (next.done) {
            state = { name: 'done' };
            break;
          }

          const unit = next.value;
          const result = await this.writeUnit(unit);
          if (result.status === 'written') {
            state = { name: 'checking' };
          } else if (result.status === 'error') {
            state = { name: 'resume', error: result.error };
          } else {
            log.debug(`Giving up on identifier ${unit.identifier} after ${this.options.retries} retries`);
            errors.push(new APNSServerError('timeout', unit.identifier));
            this.connection.close();
            state = { name: 'aborted' };
          }
          break;
        }

        case 'checking': {
          const final = stream.eof();
          const check = await this.check(final ? this.options.errorTimeout : 0);
          if (check.status === 'error') {
            state = { name: 'resume', error: check.error };
          } else {
            state = final ? { name: 'done' } : { name: 'sending' };
          }
          break;
        }

        case 'resume': {
          let { error } = state;
          const { fatal } = error;
          // Identifiers below position have been written
          if (error.identifier >= stream.position) {
            log.debug(
              `${error.kind} reported for unwritten identifier ${error.identifier}; recording it at ${stream.position - 1}`
            );
            error = new APNSServerError('unknown', stream.position - 1);
          } else {
            stream.seek(error.identifier);
          }
          errors.push(error);

          if (fatal) {
            const pending = stream.peek();
            log.debug(
              `Fatal ${error.kind} at identifier ${error.identifier}; ${pending.length} notifications unsendable`
            );
            for (const { identifier } of pending) {
              errors.push(new APNSServerError('unsendable', identifier));
            }
            state = { name: 'aborted' };
          } else {
            log.debug(`${error.kind} at identifier ${error.identifier}; resuming at ${stream.position}`);
            state = { name: 'sending' };
          }
          break;
        }

        case 'done':
        case 'aborted':
          log.debug(`Bulk send ${state.name} with ${errors.length} errors`);
          return { state: state.name, errors };
      }
    }
  }

  /**
   * Poll for an error response. A transport failure while polling has
   * already closed the connection; it counts as clean and the next write
   * reconnects.
   */
  private async check(timeout: number): Promise<ErrorCheckResult> {
    try {
      return await this.connection.checkError(timeout);
    } catch (error) {
      if (!isTransportError(error)) {
        throw error;
      }
      log.debug(`Error check failed: ${describe(error)}`);
      this.connection.close();
      return { status: 'clean' };
    }
  }

  /**
   * Write one unit, reconnecting and rewriting the same unit after each
   * transport failure until the retries run out.
   */
  private async writeUnit(unit: APNSStreamUnit): Promise<WriteResult> {
    for (let attempt = 0; ; attempt++) {
      try {
        await this.connection.connect();
        await this.connection.write(unit.data);
        log.debug(
          `Wrote ${unit.data.length} bytes (identifiers ${unit.identifier}-${unit.identifier + unit.tokens.length - 1})`
        );
        return { status: 'written' };
      } catch (error) {
        if (!isTransportError(error)) {
          throw error;
        }

        // The gateway may have closed the socket after reporting an error
        const check = await this.check(0);
        if (check.status === 'error') {
          return check;
        }
        this.connection.close();

        if (attempt >= this.options.retries) {
          return { status: 'exhausted' };
        }
        log.debug(
          `Write failed (${describe(error)}); reconnecting, attempt ${attempt + 1} of ${this.options.retries}`
        );
      }
    }
  }
}
