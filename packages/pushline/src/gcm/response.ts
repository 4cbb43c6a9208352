/**
 * GCM Response
 *
 * Aggregates the results of every request of one send. A 200 response's
 * `results` array lines up by position with the request's registration
 * ids; any other outcome fails every id of that request.
 */

import { GCMServerError, gcmErrorFromCode } from '../errors/index.js';
import { isJsonObject, tryParseJson, type JsonObject } from '../utils/json.js';
import type { GCMChunkResult } from './connection.js';
import type { GCMRequestBody } from './message.js';

/**
 * A registration id the service replaced. Callers should store `newId` in
 * place of `oldId`.
 */
export interface GCMCanonicalID {
  oldId: string;
  newId: string;
}

export class GCMResponse {
  /** One entry per request, in send order */
  readonly responses: readonly GCMChunkResult[];
  /** Request body of each request */
  readonly payloads: GCMRequestBody[] = [];
  /** Every recipient across all requests, in order */
  readonly registrationIds: string[] = [];
  /** Parsed body of each 200 response */
  readonly data: JsonObject[] = [];
  readonly successes: string[] = [];
  readonly failures: string[] = [];
  readonly errors: GCMServerError[] = [];
  readonly canonicalIds: GCMCanonicalID[] = [];

  constructor(responses: readonly GCMChunkResult[]) {
    this.responses = responses;
    for (const result of responses) {
      this.parse(result);
    }
  }

  private parse(result: GCMChunkResult): void {
    const { registrationIds, response } = result;

    this.payloads.push(result.body);
    this.registrationIds.push(...registrationIds);

    if (!response) {
      this.failAll(registrationIds, 'Unavailable');
      return;
    }

    if (response.status !== 200) {
      this.failAll(registrationIds, response.status >= 500 ? 'InternalServerError' : `HTTP ${response.status}`);
      return;
    }

    const body = tryParseJson(response.body);
    if (!isJsonObject(body)) {
      this.failAll(registrationIds, 'InvalidResponse');
      return;
    }

    this.data.push(body);
    const results = Array.isArray(body.results) ? body.results : [];

    registrationIds.forEach((registrationId, index) => {
      const entry = results[index];
      if (!isJsonObject(entry)) {
        this.addFailure(registrationId, 'MissingResult');
        return;
      }

      if (typeof entry.error === 'string') {
        this.addFailure(registrationId, entry.error);
      } else {
        this.successes.push(registrationId);
      }

      if (typeof entry.registration_id === 'string') {
        this.canonicalIds.push({ oldId: registrationId, newId: entry.registration_id });
      }
    });
  }

  private failAll(registrationIds: readonly string[], code: string): void {
    for (const registrationId of registrationIds) {
      this.addFailure(registrationId, code);
    }
  }

  private addFailure(registrationId: string, code: string): void {
    this.failures.push(registrationId);
    this.errors.push(gcmErrorFromCode(code, registrationId));
  }
}
