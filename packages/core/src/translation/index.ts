/**
 * Translation Layer
 * Turns Pub/Sub messages into entries
 */

export * from './types.js';
export { translateMessage, translatePushBody, sanitizeLabelName, parseRfc3339 } from './translator.js';
