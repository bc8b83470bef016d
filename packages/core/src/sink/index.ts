/**
 * Sink Layer
 */

export * from './types.js';
export { BufferedEntrySink } from './buffered-sink.js';
