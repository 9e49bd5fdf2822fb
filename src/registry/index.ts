export {
  TokenRegistry,
  DEFAULT_ENTROPY_BYTES,
  DEFAULT_MAX_TOKENS,
  type TokenRegistryOptions,
} from './TokenRegistry.js';
export {
  TokenRegistryError,
  ConfigurationError,
  EntropySourceFailure,
  type TokenRegistryErrorCode,
} from './errors.js';
