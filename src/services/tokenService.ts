import { TokenRegistry } from '../registry/TokenRegistry.js';
import { EntropySourceFailure } from '../registry/errors.js';
import type { IRandomSource } from '../tokens/IRandomSource.js';
import type { IssuedToken, RegistryStats, VerificationResult } from '../core/types.js';
import { loadConfig } from '../config/index.js';
import { getLogger } from '../utils/logging.js';
import { tokenFingerprint } from '../utils/fingerprint.js';
import {
  entropyFailuresTotal,
  tokensClearedTotal,
  tokensEvictedTotal,
  tokensGeneratedTotal,
  tokensLive,
  tokenVerificationsTotal,
} from '../metrics/index.js';

export interface TokenServiceOptions {
  entropyBytes?: number;
  maxTokens?: number;
  random?: IRandomSource;
}

/**
 * Host-facing wrapper around one TokenRegistry: adds logging and metrics and
 * returns plain result objects for the HTTP and CLI layers.
 */
export class TokenService {
  private readonly registry: TokenRegistry;

  constructor(opts: TokenServiceOptions = {}) {
    const defaults = loadConfig().registry;
    this.registry = new TokenRegistry(
      opts.entropyBytes ?? defaults.entropyBytes,
      opts.maxTokens ?? defaults.maxTokens,
      {
        random: opts.random,
        onEvict: (token) => {
          tokensEvictedTotal.inc();
          getLogger().debug({ token: tokenFingerprint(token) }, 'token evicted at capacity');
        },
      },
    );
    tokensLive.set(this.registry.size());
  }

  issue(entropyBytes?: number): IssuedToken {
    let token: string;
    try {
      token = this.registry.generate(entropyBytes);
    } catch (err) {
      if (err instanceof EntropySourceFailure) {
        entropyFailuresTotal.inc();
        getLogger().error({ err }, 'random source failed, token not issued');
      }
      throw err;
    }
    const size = this.registry.size();
    tokensGeneratedTotal.inc();
    tokensLive.set(size);
    getLogger().debug({ token: tokenFingerprint(token), size }, 'token issued');
    return { token, size };
  }

  check(token: string, consume = true): VerificationResult {
    const valid = this.registry.verify(token, consume);
    const size = this.registry.size();
    tokenVerificationsTotal.inc({ result: valid ? 'valid' : 'invalid' });
    tokensLive.set(size);
    if (!valid) {
      getLogger().info({ token: tokenFingerprint(token) }, 'token verification failed');
    }
    return { valid, size };
  }

  stats(): RegistryStats {
    return {
      size: this.registry.size(),
      empty: this.registry.isEmpty(),
      entropyBytes: this.registry.getEntropy(),
      maxTokens: this.registry.getMaximum(),
    };
  }

  reset(): { cleared: number } {
    const cleared = this.registry.size();
    this.registry.clear();
    tokensClearedTotal.inc(cleared);
    tokensLive.set(0);
    getLogger().info({ cleared }, 'token registry cleared');
    return { cleared };
  }
}
