import type { EvictionListener } from '../core/types.js';
import type { IRandomSource } from '../tokens/IRandomSource.js';
import { defaultRandomSource } from '../tokens/CryptoRandomSource.js';
import { encodeToken } from '../tokens/encoding.js';
import { ConfigurationError, EntropySourceFailure } from './errors.js';

export const DEFAULT_ENTROPY_BYTES = 32;
export const DEFAULT_MAX_TOKENS = 10;

export interface TokenRegistryOptions {
  /** Defaults to the shared CSPRNG-backed source */
  random?: IRandomSource;
  /** Called for every token dropped by capacity eviction */
  onEvict?: EvictionListener;
}

function assertPositiveInteger(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigurationError(`${label} must be a positive integer, got ${value}`);
  }
}

/**
 * Bounded FIFO registry of single-use anti-forgery tokens.
 *
 * Tokens are appended on generate; once `maxTokens` are live the oldest one is
 * evicted to make room. Verification is an exact string match and consumes the
 * token unless told otherwise.
 *
 * All operations are synchronous, so calls on one instance never interleave
 * on the event loop.
 */
export class TokenRegistry {
  private readonly tokens: string[] = [];
  private readonly random: IRandomSource;
  private readonly onEvict?: EvictionListener;

  constructor(
    private readonly entropyBytes = DEFAULT_ENTROPY_BYTES,
    private readonly maxTokens = DEFAULT_MAX_TOKENS,
    opts: TokenRegistryOptions = {},
  ) {
    assertPositiveInteger(entropyBytes, 'entropyBytes');
    assertPositiveInteger(maxTokens, 'maxTokens');
    this.random = opts.random ?? defaultRandomSource;
    this.onEvict = opts.onEvict;
  }

  /**
   * Generate and register a token.
   * @param entropyBytes overrides the configured entropy for this token only
   * @throws ConfigurationError when the override is not a positive integer
   * @throws EntropySourceFailure when the random source fails or under-delivers
   */
  generate(entropyBytes = this.entropyBytes): string {
    assertPositiveInteger(entropyBytes, 'entropyBytes');
    const token = encodeToken(this.draw(entropyBytes));

    while (this.tokens.length >= this.maxTokens) {
      const evicted = this.tokens.shift();
      if (evicted !== undefined) this.onEvict?.(evicted);
    }
    this.tokens.push(token);

    return token;
  }

  /**
   * Check that `token` is live. When `remove` is true (the default) a match is
   * consumed, so the same token verifies at most once.
   */
  verify(token: string, remove = true): boolean {
    const index = this.tokens.indexOf(token);
    if (index === -1) return false;
    if (remove) this.tokens.splice(index, 1);
    return true;
  }

  size(): number {
    return this.tokens.length;
  }

  clear(): void {
    this.tokens.length = 0;
  }

  isEmpty(): boolean {
    return this.tokens.length === 0;
  }

  getEntropy(): number {
    return this.entropyBytes;
  }

  getMaximum(): number {
    return this.maxTokens;
  }

  private draw(length: number): Uint8Array {
    let bytes: Uint8Array;
    try {
      bytes = this.random.bytes(length);
    } catch (err) {
      if (err instanceof EntropySourceFailure) throw err;
      throw new EntropySourceFailure(`Random source ${this.random.name} failed`, err);
    }
    if (bytes.length !== length) {
      throw new EntropySourceFailure(
        `Random source ${this.random.name} returned ${bytes.length} of ${length} bytes`,
      );
    }
    return bytes;
  }
}
