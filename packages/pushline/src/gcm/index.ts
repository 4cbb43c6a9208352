/**
 * GCM/FCM HTTP interface
 */

export { GCMClient } from './client.js';
export type { GCMClientOptions } from './client.js';

export { FetchTransport, GCMConnection } from './connection.js';
export type { GCMChunkResult, GCMConnectionOptions, HttpRequest, HttpResponse, HttpTransport } from './connection.js';

export { GCMMessage } from './message.js';
export type { GCMMessageBody, GCMMessageData, GCMMessageOptions, GCMPriority, GCMRequestBody } from './message.js';

export { GCMResponse } from './response.js';
export type { GCMCanonicalID } from './response.js';

export { GCMMessageStream } from './stream.js';
export type { GCMRequestChunk } from './stream.js';
