/**
 * Tests for the APNS bulk sender state machine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { APNSConnection } from '../../src/apns/connection.js';
import { APNSResponse } from '../../src/apns/response.js';
import { APNSBulkSender } from '../../src/apns/sender.js';
import { APNSMessageStream } from '../../src/apns/stream.js';
import { APNSAuthError, APNSInvalidFrameFieldError } from '../../src/errors/index.js';
import { FakeAPNSGateway, makeTokens, writeCertificate } from '../helpers/fake-apns.js';

const PAYLOAD = Buffer.from('{"aps":{"alert":"hi"}}');

describe('APNSBulkSender', () => {
  let certificate: string;

  beforeEach(() => {
    certificate = writeCertificate();
  });

  async function send(
    gateway: FakeAPNSGateway,
    tokens: string[],
    { batchSize = 1, retries = 2 }: { batchSize?: number; retries?: number } = {}
  ) {
    const connection = new APNSConnection({
      host: 'gateway.push.apple.com',
      port: 2195,
      certificate,
      timeout: 50,
      socketFactory: gateway.factory,
    });
    const sender = new APNSBulkSender(connection, { errorTimeout: 20, retries });
    const outcome = await sender.send(new APNSMessageStream(tokens, PAYLOAD, 30, 10, batchSize));
    return { connection, outcome, response: new APNSResponse(tokens, PAYLOAD, outcome.errors) };
  }

  it('delivers everything and finishes done when the gateway reports nothing', async () => {
    const gateway = new FakeAPNSGateway();
    const tokens = makeTokens(5);

    const { outcome, response } = await send(gateway, tokens, { batchSize: 2 });

    expect(outcome.state).toBe('done');
    expect(outcome.errors).toEqual([]);
    expect(response.successes).toEqual(tokens);
    expect(gateway.sockets).toHaveLength(1);
    expect(gateway.sockets[0].identifiers).toEqual([0, 1, 2, 3, 4]);
  });

  it('keeps the connection open after a clean send', async () => {
    const { connection } = await send(new FakeAPNSGateway(), makeTokens(2));
    expect(connection.connected).toBe(true);
  });

  it('finishes done without writing for an empty stream', async () => {
    const gateway = new FakeAPNSGateway();
    const { outcome } = await send(gateway, []);

    expect(outcome).toEqual({ state: 'done', errors: [] });
    expect(gateway.frames).toEqual([]);
  });

  it('resumes after a non-fatal error on a new connection', async () => {
    const gateway = new FakeAPNSGateway({ errors: { 1: 8 } });
    const tokens = makeTokens(5);

    const { outcome, response } = await send(gateway, tokens);

    expect(outcome.state).toBe('done');
    expect(outcome.errors.map((error) => [error.kind, error.identifier])).toEqual([['invalid_token', 1]]);
    expect(gateway.sockets).toHaveLength(2);
    expect(gateway.sockets[1].identifiers).toEqual([2, 3, 4]);
    expect(response.successes).toEqual([tokens[0], tokens[2], tokens[3], tokens[4]]);
    expect(response.failures).toEqual([tokens[1]]);
  });

  it('resends the rest of a batch after an error inside it', async () => {
    const gateway = new FakeAPNSGateway({ errors: { 1: 8 } });
    const tokens = makeTokens(4);

    const { response } = await send(gateway, tokens, { batchSize: 4 });

    expect(gateway.sockets[0].identifiers).toEqual([0, 1]);
    expect(gateway.sockets[1].identifiers).toEqual([2, 3]);
    expect(response.failures).toEqual([tokens[1]]);
  });

  it('catches an error on the last notification with the final check', async () => {
    const gateway = new FakeAPNSGateway({ errors: { 2: 8 } });
    const tokens = makeTokens(3);

    const { outcome, response } = await send(gateway, tokens);

    expect(outcome.state).toBe('done');
    expect(response.failures).toEqual([tokens[2]]);
    expect(gateway.sockets).toHaveLength(1);
  });

  it('marks everything after a fatal error unsendable and aborts', async () => {
    const gateway = new FakeAPNSGateway({ errors: { 3: 3 } });
    const tokens = makeTokens(10);

    const { outcome, response } = await send(gateway, tokens);

    expect(outcome.state).toBe('aborted');
    expect(outcome.errors[0].kind).toBe('missing_topic');
    expect(outcome.errors[0].fatal).toBe(true);
    expect(outcome.errors.slice(1).map((error) => error.identifier)).toEqual([4, 5, 6, 7, 8, 9]);
    expect(outcome.errors.slice(1).every((error) => error.kind === 'unsendable' && error.code === null)).toBe(true);
    expect(response.successes).toEqual(tokens.slice(0, 3));
    expect(response.failures).toEqual(tokens.slice(3));
    expect(gateway.sockets).toHaveLength(1);
  });

  it('reconnects and rewrites the same unit after a failed write', async () => {
    const gateway = new FakeAPNSGateway({ failWrites: 2 });
    const tokens = makeTokens(3);

    const { outcome, response } = await send(gateway, tokens, { batchSize: 3, retries: 5 });

    expect(outcome.state).toBe('done');
    expect(gateway.sockets).toHaveLength(3);
    expect(gateway.sockets[2].identifiers).toEqual([0, 1, 2]);
    expect(response.successes).toEqual(tokens);
  });

  it('records a timeout at the unit and aborts when retries run out', async () => {
    const gateway = new FakeAPNSGateway({ failWrites: Infinity });
    const tokens = makeTokens(3);

    const { connection, outcome } = await send(gateway, tokens, { retries: 2 });

    expect(outcome.state).toBe('aborted');
    expect(outcome.errors).toHaveLength(1);
    expect(outcome.errors[0].kind).toBe('timeout');
    expect(outcome.errors[0].code).toBeNull();
    expect(outcome.errors[0].identifier).toBe(0);
    expect(gateway.sockets).toHaveLength(3);
    expect(connection.connected).toBe(false);
  });

  it('propagates setup errors before anything is sent', async () => {
    const gateway = new FakeAPNSGateway();
    const connection = new APNSConnection({
      host: 'gateway.push.apple.com',
      port: 2195,
      certificate: null,
      timeout: 50,
      socketFactory: gateway.factory,
    });
    const sender = new APNSBulkSender(connection, { errorTimeout: 20, retries: 1 });

    await expect(
      sender.send(new APNSMessageStream(makeTokens(1), PAYLOAD, 30, 10, 1))
    ).rejects.toThrow(APNSAuthError);
    expect(gateway.sockets).toHaveLength(0);
  });

  it('records an error for an unwritten identifier at the last written one and sends the rest', async () => {
    const gateway = new FakeAPNSGateway({ errors: { 2: 8 }, reportAs: { 2: 999 } });
    const tokens = makeTokens(5);

    const { outcome, response } = await send(gateway, tokens);

    expect(outcome.state).toBe('done');
    expect(outcome.errors.map((error) => [error.kind, error.identifier])).toEqual([['unknown', 2]]);
    expect(gateway.sockets[0].identifiers).toEqual([0, 1, 2]);
    expect(gateway.sockets[1].identifiers).toEqual([3, 4]);
    expect(response.successes).toEqual([tokens[0], tokens[1], tokens[3], tokens[4]]);
    expect(response.failures).toEqual([tokens[2]]);
  });

  it('marks the unwritten rest unsendable for a fatal error at an unwritten identifier', async () => {
    const gateway = new FakeAPNSGateway({ errors: { 2: 10 }, reportAs: { 2: 999 } });
    const tokens = makeTokens(5);

    const { outcome, response } = await send(gateway, tokens);

    expect(outcome.state).toBe('aborted');
    expect(outcome.errors.map((error) => [error.kind, error.identifier])).toEqual([
      ['unknown', 2],
      ['unsendable', 3],
      ['unsendable', 4],
    ]);
    expect(gateway.frames.map((frame) => frame.identifier)).toEqual([0, 1, 2]);
    expect(response.successes).toEqual([tokens[0], tokens[1]]);
  });

  it('counts a socket error during the final check as clean and reconnects on the next send', async () => {
    const gateway = new FakeAPNSGateway({ socketErrorAfter: 1 });
    const tokens = makeTokens(2);
    const connection = new APNSConnection({
      host: 'gateway.push.apple.com',
      port: 2195,
      certificate,
      timeout: 50,
      socketFactory: gateway.factory,
    });
    const sender = new APNSBulkSender(connection, { errorTimeout: 20, retries: 1 });

    const first = await sender.send(new APNSMessageStream(tokens, PAYLOAD, 30, 10, 2));

    expect(first).toEqual({ state: 'done', errors: [] });
    expect(connection.connected).toBe(false);

    const second = await sender.send(new APNSMessageStream(tokens, PAYLOAD, 30, 10, 2));

    expect(second).toEqual({ state: 'done', errors: [] });
    expect(gateway.sockets).toHaveLength(2);
    expect(gateway.sockets[1].identifiers).toEqual([0, 1]);
  });

  it('closes the connection when an unexpected error escapes', async () => {
    const gateway = new FakeAPNSGateway();
    const connection = new APNSConnection({
      host: 'gateway.push.apple.com',
      port: 2195,
      certificate,
      timeout: 50,
      socketFactory: gateway.factory,
    });
    const sender = new APNSBulkSender(connection, { errorTimeout: 20, retries: 1 });

    await expect(
      sender.send(new APNSMessageStream(makeTokens(1), PAYLOAD, -1, 10, 1))
    ).rejects.toThrow(APNSInvalidFrameFieldError);
    expect(gateway.sockets).toHaveLength(1);
    expect(connection.connected).toBe(false);
  });
});
