/**
 * Error codes for registry construction failures.
 */
export type RegistryErrorCode = "duplicate_code" | "invalid_code"

/**
 * Error thrown when a set of message kinds cannot form a registry.
 * These are programming errors, raised once at startup rather than while
 * decoding peer data.
 */
export class RegistryError extends Error {
  override readonly name = "RegistryError"

  constructor(
    public readonly code: RegistryErrorCode,
    message: string,
  ) {
    super(message)
  }
}
