import { chunk } from '../utils/chunk.js';
import type { GCMMessage, GCMRequestBody } from './message.js';

/**
 * One HTTP request's worth of recipients
 */
export interface GCMRequestChunk {
  registrationIds: string[];
  body: GCMRequestBody;
}

/**
 * Splits a message into requests of at most `maxRecipients` registration
 * ids, in order. A chunk with a single id addresses it with `to`; larger
 * chunks use `registration_ids`.
 */
export class GCMMessageStream implements Iterable<GCMRequestChunk> {
  private readonly message: GCMMessage;
  private readonly maxRecipients: number;

  constructor(message: GCMMessage, maxRecipients: number) {
    this.message = message;
    this.maxRecipients = maxRecipients;
  }

  get length(): number {
    return this.message.registrationIds.length;
  }

  *[Symbol.iterator](): Iterator<GCMRequestChunk> {
    const base = this.message.toDict();

    for (const registrationIds of chunk(this.message.registrationIds, this.maxRecipients)) {
      const body: GCMRequestBody =
        registrationIds.length === 1
          ? { ...base, to: registrationIds[0] }
          : { ...base, registration_ids: registrationIds };
      yield { registrationIds, body };
    }
  }
}
