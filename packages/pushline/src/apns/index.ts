/**
 * APNS binary interface
 */

export { APNSClient } from './client.js';
export type { APNSClientOptions, APNSSendOptions } from './client.js';

export { APNSConnection } from './connection.js';
export type { APNSConnectionOptions, ErrorCheckResult } from './connection.js';

export { readExpiredTokens } from './feedback.js';
export type { APNSExpiredToken } from './feedback.js';

export { assertFrameFields, decodeToken, isValidToken, packFrame, unpackErrorResponse, unpackFeedbackHeader } from './frame.js';
export type { ErrorResponse, FeedbackHeader } from './frame.js';

export { buildPayload, createPayload } from './payload.js';
export type { APNSAlert, APNSPayload, APNSPayloadLimits, APNSPayloadOptions, APSDictionary } from './payload.js';

export { APNSResponse } from './response.js';

export { APNSBulkSender } from './sender.js';
export type { BulkSendOutcome, BulkSenderOptions, SenderState } from './sender.js';

export { createTlsSocket, readCertificate } from './socket.js';
export type { SocketFactory, SocketFactoryOptions } from './socket.js';

export { APNSMessageStream } from './stream.js';
export type { APNSPendingToken, APNSStreamUnit } from './stream.js';
