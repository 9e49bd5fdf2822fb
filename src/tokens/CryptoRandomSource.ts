import crypto from 'crypto';
import type { IRandomSource } from './IRandomSource.js';
import { EntropySourceFailure } from '../registry/errors.js';

/**
 * Random source backed by Node's CSPRNG (crypto.randomBytes, synchronous form).
 */
export class CryptoRandomSource implements IRandomSource {
  readonly name = 'node-crypto';

  bytes(length: number): Uint8Array {
    try {
      return crypto.randomBytes(length);
    } catch (err) {
      throw new EntropySourceFailure(
        `${this.name} could not supply ${length} random bytes`,
        err,
      );
    }
  }
}

// One instance per process, shared by every registry that is not given its own source
export const defaultRandomSource: IRandomSource = new CryptoRandomSource();
