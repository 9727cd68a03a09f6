/**
 * aclforge Policy Model: Error Types
 */

/**
 * Base class for every error raised by the aclforge packages.
 *
 * Subclasses set `name` so that callers and the CLI can tell failure
 * classes apart without `instanceof` across package boundaries.
 */
export class AclForgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AclForgeError';
  }
}

/** Raised by the address parser on malformed address text. */
export class InvalidAddressError extends AclForgeError {
  constructor(readonly input: string, reason: string) {
    super(`Invalid address ${JSON.stringify(input)}: ${reason}`);
    this.name = 'InvalidAddressError';
  }
}
