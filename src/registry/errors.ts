export type TokenRegistryErrorCode = 'CONFIGURATION_ERROR' | 'ENTROPY_SOURCE_FAILURE';

export class TokenRegistryError extends Error {
  constructor(
    readonly code: TokenRegistryErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'TokenRegistryError';
  }
}

/** Entropy or capacity that is not a positive integer. */
export class ConfigurationError extends TokenRegistryError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The secure random source could not supply the requested bytes.
 * Fatal for the call: no weaker source is substituted.
 */
export class EntropySourceFailure extends TokenRegistryError {
  constructor(message: string, cause?: unknown) {
    super('ENTROPY_SOURCE_FAILURE', message, cause);
    this.name = 'EntropySourceFailure';
  }
}
