/**
 * Source of random bytes consumed by the token registry.
 * Production code must back this with a cryptographically secure generator;
 * deterministic implementations exist only for tests.
 */
export interface IRandomSource {
  /** Identifier used in logs and error messages */
  readonly name: string;

  /**
   * Return exactly `length` random bytes.
   * Implementations throw when the underlying generator cannot deliver.
   */
  bytes(length: number): Uint8Array;
}
