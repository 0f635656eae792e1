/**
 * Wire encoding and framing
 */

export type { ByteSink } from './buffer.js';
export { ByteBuffer } from './buffer.js';

export { writeHead, encodeHead, parseHead } from './head.js';
export type { ParsedHead } from './head.js';

export { encodePing, decodePingFrame } from './framing.js';
