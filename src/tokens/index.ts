/**
 * Token material: random byte sources and the text encoding applied to them.
 * Swap the source by implementing IRandomSource and passing it to TokenRegistry.
 */

export type { IRandomSource } from './IRandomSource.js';
export { CryptoRandomSource, defaultRandomSource } from './CryptoRandomSource.js';
export { encodeToken, decodeToken } from './encoding.js';
