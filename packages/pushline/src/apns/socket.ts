/**
 * APNS Socket Factory
 *
 * Opens the TLS stream to a gateway. The certificate is read by the
 * connection before the factory is called; the factory only has to produce
 * a connected duplex stream. Callers may pass their own factory to substitute the transport.
 */

import * as fs from 'node:fs';
import * as tls from 'node:tls';
import type { Duplex } from 'node:stream';
import { APNSAuthError, APNSConnectionError, APNSSocketTimeoutError } from '../errors/index.js';

/**
 * Arguments handed to a {@link SocketFactory}
 */
export interface SocketFactoryOptions {
  host: string;
  port: number;
  /** PEM contents holding the client certificate and its private key */
  certificate: Buffer;
  /** Connect and handshake deadline, in ms */
  timeout: number;
}

export type SocketFactory = (options: SocketFactoryOptions) => Promise<Duplex>;

/**
 * Read the certificate file, rejecting a missing path, an unreadable file
 * and an empty one.
 *
 * @throws {APNSAuthError}
 */
export function readCertificate(path: string | null | undefined): Buffer {
  if (!path) {
    throw new APNSAuthError('Missing certificate. Cannot send notifications.');
  }

  let contents: Buffer;
  try {
    contents = fs.readFileSync(path);
  } catch (error) {
    throw new APNSAuthError(
      `The certificate at ${path} is not readable: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (contents.length === 0) {
    throw new APNSAuthError(`The certificate at ${path} is empty`);
  }
  return contents;
}

/**
 * Connect over TLS and wait for the handshake to finish, bounded by
 * `options.timeout`.
 */
export const createTlsSocket: SocketFactory = (options) =>
  new Promise<Duplex>((resolve, reject) => {
    const socket = tls.connect({
      host: options.host,
      port: options.port,
      servername: options.host,
      cert: options.certificate,
      key: options.certificate,
    });

    const timer = setTimeout(() => {
      cleanup();
      socket.destroy();
      reject(new APNSSocketTimeoutError(`complete TLS handshake with ${options.host}`, options.timeout));
    }, options.timeout);

    const onSecureConnect = () => {
      cleanup();
      resolve(socket);
    };

    const onError = (error: Error) => {
      cleanup();
      socket.destroy();
      reject(
        new APNSConnectionError(`Unable to connect to ${options.host}:${options.port}: ${error.message}`, {
          cause: error,
        })
      );
    };

    function cleanup(): void {
      clearTimeout(timer);
      socket.off('secureConnect', onSecureConnect);
      socket.off('error', onError);
    }

    socket.once('secureConnect', onSecureConnect);
    socket.once('error', onError);
  });
