/**
 * Pushline Errors
 */

export * from './types.js';
export * from './base.js';
export * from './apns.js';
export * from './gcm.js';
